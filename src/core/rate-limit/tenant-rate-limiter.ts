import { Logger } from '@nestjs/common';
import { RateLimitAction } from '../domain/enums';
import { normalizeTenantId } from '../cache';

/**
 * Who is asking. Requests without a tenant fall back to one bucket per IP.
 */
export interface RateLimitIdentity {
  tenantId?: string;
  ip?: string;
  premium?: boolean;
}

export interface RateLimitDecision {
  allowed: boolean;
  key: string;
  limit: number;
  /**
   * Whole tokens left after this request
   */
  remaining: number;
  /**
   * Milliseconds until the bucket is full again
   */
  resetMs: number;
  /**
   * 0 when allowed
   */
  retryAfterSeconds: number;
}

export interface TenantRateLimiterOptions {
  /**
   * Refill window; limits are per window. Defaults to one minute.
   */
  windowMs?: number;
  globalLimit?: number;
  /**
   * Per-action overrides of the derived defaults
   */
  limits?: Partial<Record<RateLimitAction, number>>;
  unauthenticatedLimit?: number;
  premiumMultiplier?: number;
  premiumTenants?: string[];
  /**
   * Idle buckets older than this are dropped by cleanup. Defaults to 10 windows.
   */
  idleMs?: number;
  /**
   * Run cleanup every N consume calls
   */
  cleanupEvery?: number;
  clock?: () => number;
}

interface TokenBucket {
  tokens: number;
  capacity: number;
  lastRefill: number;
  lastUsed: number;
}

const DEFAULT_WINDOW_MS = 60 * 1000;
const DEFAULT_GLOBAL_LIMIT = 100;

/**
 * Default per-window limits derived from the global limit
 */
export function defaultActionLimits(globalLimit: number): Record<RateLimitAction, number> {
  return {
    [RateLimitAction.GLOBAL]: globalLimit,
    [RateLimitAction.PAYMENT]: 50,
    [RateLimitAction.REFUND]: 20,
    [RateLimitAction.STATUS]: 200,
    [RateLimitAction.AUTH]: Math.floor(globalLimit / 2),
    [RateLimitAction.CONFIG]: Math.floor(globalLimit / 4),
    [RateLimitAction.CALLBACK]: 100,
    [RateLimitAction.WEBHOOK]: 300,
  };
}

/**
 * Continuous-refill token buckets per (tenant, action), or per IP for
 * unauthenticated callers.
 *
 * Check-and-take is synchronous, so each key is updated atomically on the
 * event loop. No timers: idle buckets are swept every `cleanupEvery` checks.
 */
export class TenantRateLimiter {
  private readonly logger = new Logger(TenantRateLimiter.name);
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly windowMs: number;
  private readonly limits: Record<RateLimitAction, number>;
  private readonly unauthenticatedLimit: number;
  private readonly premiumMultiplier: number;
  private readonly premiumTenants: Set<string>;
  private readonly idleMs: number;
  private readonly cleanupEvery: number;
  private readonly clock: () => number;
  private checks = 0;

  constructor(options: TenantRateLimiterOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.limits = {
      ...defaultActionLimits(options.globalLimit ?? DEFAULT_GLOBAL_LIMIT),
      ...options.limits,
    };
    this.unauthenticatedLimit = options.unauthenticatedLimit ?? 10;
    this.premiumMultiplier = options.premiumMultiplier ?? 2.0;
    this.premiumTenants = new Set((options.premiumTenants ?? []).map(normalizeTenantId));
    this.idleMs = options.idleMs ?? this.windowMs * 10;
    this.cleanupEvery = options.cleanupEvery ?? 1000;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Take one token if available
   */
  consume(identity: RateLimitIdentity, action: RateLimitAction): RateLimitDecision {
    this.checks++;
    if (this.checks % this.cleanupEvery === 0) {
      this.cleanup();
    }

    const now = this.clock();
    const key = this.keyFor(identity, action);
    const bucket = this.refill(key, this.limitFor(identity, action), now);
    bucket.lastUsed = now;

    const allowed = bucket.tokens >= 1;
    if (allowed) {
      bucket.tokens -= 1;
    } else {
      this.logger.warn(`Rate limit exceeded for ${key}`);
    }

    return this.decision(key, bucket, allowed);
  }

  /**
   * Current state without taking a token
   */
  peek(identity: RateLimitIdentity, action: RateLimitAction): RateLimitDecision {
    const key = this.keyFor(identity, action);
    const bucket = this.refill(key, this.limitFor(identity, action), this.clock());
    return this.decision(key, bucket, bucket.tokens >= 1);
  }

  limitFor(identity: RateLimitIdentity, action: RateLimitAction): number {
    if (!identity.tenantId) {
      return this.unauthenticatedLimit;
    }
    const base = this.limits[action];
    return this.isPremium(identity) ? Math.floor(base * this.premiumMultiplier) : base;
  }

  keyFor(identity: RateLimitIdentity, action: RateLimitAction): string {
    if (identity.tenantId) {
      return `tenant:${normalizeTenantId(identity.tenantId)}:${action}`;
    }
    return `ip:${identity.ip || 'unknown'}`;
  }

  /**
   * Forget one bucket, or all of them
   */
  reset(key?: string): void {
    if (key) {
      this.buckets.delete(key);
    } else {
      this.buckets.clear();
    }
  }

  /**
   * Drop buckets idle for longer than idleMs; returns how many went
   */
  cleanup(idleMs: number = this.idleMs): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      if (now - bucket.lastUsed > idleMs) {
        this.buckets.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug(`Dropped ${removed} idle rate limit buckets`);
    }
    return removed;
  }

  get size(): number {
    return this.buckets.size;
  }

  private isPremium(identity: RateLimitIdentity): boolean {
    return (
      identity.premium === true ||
      (identity.tenantId !== undefined && this.premiumTenants.has(normalizeTenantId(identity.tenantId)))
    );
  }

  private refill(key: string, capacity: number, now: number): TokenBucket {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { tokens: capacity, capacity, lastRefill: now, lastUsed: now };
      this.buckets.set(key, bucket);
      return bucket;
    }

    if (bucket.capacity !== capacity) {
      bucket.capacity = capacity;
      bucket.tokens = Math.min(bucket.tokens, capacity);
    }

    const elapsed = Math.max(0, now - bucket.lastRefill);
    bucket.tokens = Math.min(capacity, bucket.tokens + (elapsed * capacity) / this.windowMs);
    bucket.lastRefill = now;
    return bucket;
  }

  private decision(key: string, bucket: TokenBucket, allowed: boolean): RateLimitDecision {
    const perTokenMs = this.windowMs / bucket.capacity;
    const missing = bucket.capacity - bucket.tokens;
    return {
      allowed,
      key,
      limit: bucket.capacity,
      remaining: Math.floor(bucket.tokens),
      resetMs: Math.ceil(missing * perTokenMs),
      retryAfterSeconds: allowed ? 0 : Math.max(1, Math.ceil(((1 - bucket.tokens) * perTokenMs) / 1000)),
    };
  }
}
