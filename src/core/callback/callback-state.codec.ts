import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';
import { CallbackState, CallbackStateInput } from '../domain/models';
import { parseEnvironment } from '../domain/enums';
import { StateExpiredError } from '../errors';

export interface CallbackStateCodecOptions {
  /**
   * How long a token stays redeemable. Defaults to 30 minutes.
   */
  ttlMs?: number;
  clock?: () => number;
}

const KEY_DERIVATION_SUFFIX = '-callback-encryption-v1';
const ALGORITHM = 'aes-256-gcm';
const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const DEFAULT_TTL_MS = 30 * 60 * 1000;

/**
 * Seals CallbackState into an opaque token for the 3D Secure round trip.
 *
 * Token layout: base64url(nonce | ciphertext | GCM tag). The key is
 * sha256(secret + KEY_DERIVATION_SUFFIX); rotating the secret invalidates
 * every outstanding token.
 */
export class CallbackStateCodec {
  private readonly key: Buffer;
  private readonly ttlMs: number;
  private readonly clock: () => number;
  // hex nonce -> expiresAt
  private readonly consumed = new Map<string, number>();

  constructor(secret: string, options: CallbackStateCodecOptions = {}) {
    if (!secret) {
      throw new Error('Callback state secret is required');
    }
    this.key = createHash('sha256').update(secret + KEY_DERIVATION_SUFFIX).digest();
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.clock = options.clock ?? Date.now;
  }

  get expiryMs(): number {
    return this.ttlMs;
  }

  encode(input: CallbackStateInput): string {
    const issuedAt = this.clock();
    const state: CallbackState = {
      ...input,
      issuedAt,
      expiresAt: issuedAt + this.ttlMs,
    };

    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, nonce);
    const ciphertext = Buffer.concat([
      cipher.update(JSON.stringify(state), 'utf8'),
      cipher.final(),
    ]);

    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]).toString('base64url');
  }

  /**
   * Verify and open a token without consuming it
   * @throws StateExpiredError
   */
  decode(token: string): CallbackState {
    return this.open(token).state;
  }

  /**
   * Decode and mark the token used. Any spelling of the same sealed bytes
   * counts as the same token.
   * @throws StateExpiredError
   */
  consume(token: string): CallbackState {
    const { state, nonce } = this.open(token);
    this.pruneConsumed();

    const id = nonce.toString('hex');
    if (this.consumed.has(id)) {
      throw new StateExpiredError('Callback state has already been used', 'consumed');
    }
    this.consumed.set(id, state.expiresAt);

    return state;
  }

  private open(token: string): { state: CallbackState; nonce: Buffer } {
    if (!token) {
      throw new StateExpiredError('Callback state is missing', 'malformed');
    }

    const sealed = Buffer.from(token, 'base64url');
    if (sealed.length <= NONCE_BYTES + TAG_BYTES) {
      throw new StateExpiredError('Callback state is malformed', 'malformed');
    }

    const nonce = sealed.subarray(0, NONCE_BYTES);
    const tag = sealed.subarray(sealed.length - TAG_BYTES);
    const ciphertext = sealed.subarray(NONCE_BYTES, sealed.length - TAG_BYTES);

    let plaintext: string;
    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, nonce);
      decipher.setAuthTag(tag);
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch {
      throw new StateExpiredError('Callback state failed integrity check', 'tampered');
    }

    const state = parseCallbackState(plaintext);
    if (this.clock() > state.expiresAt) {
      throw new StateExpiredError('Callback state has expired', 'expired');
    }

    return { state, nonce };
  }

  private pruneConsumed(): void {
    const now = this.clock();
    for (const [id, expiresAt] of this.consumed) {
      if (now > expiresAt) {
        this.consumed.delete(id);
      }
    }
  }
}

function parseCallbackState(plaintext: string): CallbackState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext);
  } catch {
    throw new StateExpiredError('Callback state is malformed', 'malformed');
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new StateExpiredError('Callback state is malformed', 'malformed');
  }

  const record: Record<string, unknown> = { ...parsed };
  const environment = parseEnvironment(readString(record, 'environment'));
  const paymentId = readString(record, 'paymentId');
  const tenantId = readString(record, 'tenantId');
  const providerName = readString(record, 'providerName');
  const originalCallbackUrl = readString(record, 'originalCallbackUrl');
  const issuedAt = readNumber(record, 'issuedAt');
  const expiresAt = readNumber(record, 'expiresAt');

  if (
    !environment ||
    !paymentId ||
    !tenantId ||
    !providerName ||
    !originalCallbackUrl ||
    issuedAt === undefined ||
    expiresAt === undefined
  ) {
    throw new StateExpiredError('Callback state is malformed', 'malformed');
  }

  const state: CallbackState = {
    paymentId,
    tenantId,
    providerName,
    environment,
    originalCallbackUrl,
    issuedAt,
    expiresAt,
  };

  const conversationId = readString(record, 'conversationId');
  if (conversationId !== undefined) state.conversationId = conversationId;
  const successUrl = readString(record, 'successUrl');
  if (successUrl !== undefined) state.successUrl = successUrl;
  const errorUrl = readString(record, 'errorUrl');
  if (errorUrl !== undefined) state.errorUrl = errorUrl;
  const amount = readNumber(record, 'amount');
  if (amount !== undefined) state.amount = amount;
  const currency = readString(record, 'currency');
  if (currency !== undefined) state.currency = currency;
  const clientIp = readString(record, 'clientIp');
  if (clientIp !== undefined) state.clientIp = clientIp;

  return state;
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
