import { PipelineStage, StageResult, WebhookContext } from '../types';
import { flattenToStringMap } from '../../utils';

/**
 * Stage 1: Parse
 * Turns a JSON or form-encoded body (raw or already parsed) into a flat map
 */
export class ParseStage implements PipelineStage {
  name = 'parse';

  async execute(context: WebhookContext): Promise<StageResult> {
    try {
      const data = this.parse(context);
      if (Object.keys(data).length === 0) {
        return this.reject(context, 'Webhook body is empty');
      }

      context.data = data;
      return {
        success: true,
        context,
        shouldContinue: true,
        metadata: { fields: Object.keys(data).length },
      };
    } catch (error) {
      return this.reject(
        context,
        `Webhook body could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private parse(context: WebhookContext): Record<string, string> {
    const { body } = context;

    if (Buffer.isBuffer(body)) {
      context.rawBody = context.rawBody ?? body;
      return this.parseText(body.toString('utf8'), context.contentType);
    }

    if (typeof body === 'string') {
      context.rawBody = context.rawBody ?? Buffer.from(body);
      return this.parseText(body, context.contentType);
    }

    if (body !== null && typeof body === 'object') {
      return flattenToStringMap(body);
    }

    return {};
  }

  private parseText(text: string, contentType?: string): Record<string, string> {
    const trimmed = text.trim();
    if (!trimmed) {
      return {};
    }

    const isForm = contentType?.includes('application/x-www-form-urlencoded') ?? false;
    const looksLikeJson = trimmed.startsWith('{') || trimmed.startsWith('[');

    if (!isForm && looksLikeJson) {
      const parsed: unknown = JSON.parse(trimmed);
      return flattenToStringMap(parsed);
    }

    const data: Record<string, string> = {};
    new URLSearchParams(trimmed).forEach((value, key) => {
      if (!(key in data)) {
        data[key] = value;
      }
    });
    return data;
  }

  private reject(context: WebhookContext, reason: string): StageResult {
    context.rejectionReason = reason;
    return {
      success: false,
      context,
      shouldContinue: false,
    };
  }
}
