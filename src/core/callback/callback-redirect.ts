import { CallbackState, PaymentResponse } from '../domain/models';
import { PaymentStatus } from '../domain/enums';
import { escapeHtml, flattenToStringMap } from '../utils';

export type RedirectMethod = 'GET' | 'POST';

export interface CallbackRedirect {
  url: string;
  method: RedirectMethod;
  fields: Record<string, string>;
}

/**
 * Merge everything a processor can send back on a callback into one map.
 * Precedence on duplicate keys: query, then form fields, then JSON body.
 */
export function mergeCallbackPayload(
  query: unknown,
  form: unknown,
  json: unknown,
): Record<string, string> {
  return {
    ...flattenToStringMap(json),
    ...flattenToStringMap(form),
    ...flattenToStringMap(query),
  };
}

/**
 * Where to send the browser after a 3D completion attempt, success or not
 */
export function buildCallbackRedirect(
  state: CallbackState,
  outcome: PaymentResponse | Error,
  method: RedirectMethod = 'POST',
): CallbackRedirect {
  const fields: Record<string, string> = { paymentId: state.paymentId };

  if (outcome instanceof Error) {
    fields.status = PaymentStatus.FAILED;
    fields.message = 'Payment could not be completed';
    if (state.amount !== undefined) {
      fields.amount = String(state.amount);
    }
    return {
      url: state.errorUrl || state.originalCallbackUrl,
      method,
      fields,
    };
  }

  fields.paymentId = outcome.paymentId || state.paymentId;
  fields.status = outcome.status;
  if (outcome.transactionId) {
    fields.transactionId = outcome.transactionId;
  }
  const amount = outcome.amount ?? state.amount;
  if (amount !== undefined) {
    fields.amount = String(amount);
  }

  if (outcome.success) {
    return {
      url: state.successUrl || state.originalCallbackUrl,
      method,
      fields,
    };
  }

  if (outcome.errorCode) {
    fields.errorCode = outcome.errorCode;
  }
  if (outcome.message) {
    fields.message = outcome.message;
  }
  return {
    url: state.errorUrl || state.originalCallbackUrl,
    method,
    fields,
  };
}

/**
 * Auto-submitting HTML form. A GET form drops the action's own query string
 * in browsers, so those parameters are carried as hidden fields instead.
 */
export function renderRedirectForm(redirect: CallbackRedirect): string {
  let action = redirect.url;
  let fields = redirect.fields;

  if (redirect.method === 'GET') {
    const target = new URL(redirect.url);
    const carried: Record<string, string> = {};
    target.searchParams.forEach((value, key) => {
      carried[key] = value;
    });
    target.search = '';
    action = target.toString();
    fields = { ...carried, ...redirect.fields };
  }

  const inputs = Object.entries(fields)
    .map(
      ([name, value]) =>
        `    <input type="hidden" name="${escapeHtml(name)}" value="${escapeHtml(value)}">`,
    )
    .join('\n');

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head><meta charset="utf-8"><title>Redirecting</title></head>',
    '<body onload="document.forms[0].submit()">',
    `  <form method="${redirect.method.toLowerCase()}" action="${escapeHtml(action)}">`,
    inputs,
    '    <noscript><button type="submit">Continue</button></noscript>',
    '  </form>',
    '</body>',
    '</html>',
  ].join('\n');
}

/**
 * Generic failure page for callbacks whose state cannot be trusted.
 * Carries no detail about the rejection reason.
 */
export function renderCallbackErrorPage(): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head><meta charset="utf-8"><title>Payment error</title></head>',
    '<body>',
    '  <p>This payment session is invalid or has expired. Please start the payment again.</p>',
    '</body>',
    '</html>',
  ].join('\n');
}
