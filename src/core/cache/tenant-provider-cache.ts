import { Logger } from '@nestjs/common';
import { Environment } from '../domain/enums';
import { ConfigurationStore, PaymentProviderAdapter } from '../interfaces';
import { ProviderRegistry, normalizeProviderName } from '../registry';
import { ConfigurationError } from '../errors';
import {
  buildCacheKey,
  fingerprintCredentials,
  normalizeTenantId,
} from './tenant-key';

export interface TenantProviderCacheOptions {
  /**
   * Entries beyond this are evicted least-recently-used first
   */
  maxSize?: number;
  /**
   * Idle entries older than this are rebuilt on next access
   */
  ttlMs?: number;
  clock?: () => number;
}

export interface TenantProviderCacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  ttlExpiries: number;
  rebuilds: number;
  hitRatio: number;
}

interface CacheEntry {
  provider: PaymentProviderAdapter;
  fingerprint: string;
  createdAt: number;
  lastUsedAt: number;
}

const DEFAULT_MAX_SIZE = 1000;
const DEFAULT_TTL_MS = 30 * 60 * 1000;
const MAX_BUILD_ATTEMPTS = 3;

/**
 * Lazily built, config-fingerprinted provider instances per
 * (tenant, provider, environment).
 *
 * Construction is serialized per key through an in-flight promise map, so
 * concurrent first access builds once and unrelated keys never wait on each
 * other. Every delete bumps a per-key generation; a build that started before
 * the delete is discarded and redone against the fresh config.
 */
export class TenantProviderCache {
  private readonly logger = new Logger(TenantProviderCache.name);
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<PaymentProviderAdapter>>();
  private readonly generations = new Map<string, number>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly clock: () => number;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private ttlExpiries = 0;
  private rebuilds = 0;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly configStore: ConfigurationStore,
    options: TenantProviderCacheOptions = {},
  ) {
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Resolve the live provider instance for a tenant.
   * @throws ConfigurationError when the tenant has no usable config
   * @throws ProviderNotRegisteredError for unknown provider names
   */
  get(
    tenantId: string,
    providerName: string,
    environment: Environment,
  ): Promise<PaymentProviderAdapter> {
    const key = buildCacheKey(tenantId, providerName, environment);

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const task = this.resolve(
      key,
      normalizeTenantId(tenantId),
      normalizeProviderName(providerName),
      environment,
      1,
    ).finally(() => {
      if (this.inFlight.get(key) === task) {
        this.inFlight.delete(key);
      }
    });

    this.inFlight.set(key, task);
    return task;
  }

  /**
   * Drop one (tenant, provider, environment) entry
   */
  delete(tenantId: string, providerName: string, environment: Environment): boolean {
    const key = buildCacheKey(tenantId, providerName, environment);
    this.bumpGeneration(key);
    const existed = this.entries.delete(key);
    if (existed) {
      this.logger.debug(`Invalidated provider instance ${key}`);
    }
    return existed;
  }

  /**
   * Drop a tenant's instances of a provider across every environment
   */
  deleteByTenantAndProvider(tenantId: string, providerName: string): number {
    let removed = 0;
    for (const environment of Object.values(Environment)) {
      if (this.delete(tenantId, providerName, environment)) {
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    for (const key of this.entries.keys()) {
      this.bumpGeneration(key);
    }
    this.entries.clear();
  }

  /**
   * Remove idle entries past their TTL. Returns how many were removed.
   */
  cleanup(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        this.ttlExpiries++;
        removed++;
      }
    }
    return removed;
  }

  has(tenantId: string, providerName: string, environment: Environment): boolean {
    return this.entries.has(buildCacheKey(tenantId, providerName, environment));
  }

  getStats(): TenantProviderCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      ttlExpiries: this.ttlExpiries,
      rebuilds: this.rebuilds,
      hitRatio: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  private async resolve(
    key: string,
    tenantId: string,
    providerName: string,
    environment: Environment,
    attempt: number,
  ): Promise<PaymentProviderAdapter> {
    const generation = this.generationOf(key);

    const config = await this.configStore.get(tenantId, providerName, environment);
    if (!config) {
      throw new ConfigurationError(
        `${providerName}: no ${environment} configuration for tenant ${tenantId}`,
        providerName,
      );
    }
    const fingerprint = fingerprintCredentials(config.credentials);
    const now = this.clock();

    const cached = this.entries.get(key);
    if (cached) {
      if (this.isExpired(cached, now)) {
        this.entries.delete(key);
        this.ttlExpiries++;
      } else if (cached.fingerprint === fingerprint) {
        this.hits++;
        cached.lastUsedAt = now;
        // re-insert to keep Map order least-recently-used first
        this.entries.delete(key);
        this.entries.set(key, cached);
        return cached.provider;
      } else {
        this.logger.warn(`Config fingerprint changed for ${key}; rebuilding provider`);
        this.entries.delete(key);
        this.rebuilds++;
      }
    }

    this.misses++;
    const provider = this.registry.create(providerName);
    provider.validateConfig(config.credentials);
    provider.initialize(config.credentials);

    if (this.generationOf(key) !== generation) {
      if (attempt >= MAX_BUILD_ATTEMPTS) {
        throw new ConfigurationError(
          `${providerName}: configuration for tenant ${tenantId} kept changing while building provider`,
          providerName,
        );
      }
      return this.resolve(key, tenantId, providerName, environment, attempt + 1);
    }

    this.store(key, {
      provider,
      fingerprint,
      createdAt: now,
      lastUsedAt: now,
    });
    this.logger.debug(`Built provider instance ${key}`);
    return provider;
  }

  private store(key: string, entry: CacheEntry): void {
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    this.entries.set(key, entry);
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.lastUsedAt > this.ttlMs;
  }

  private generationOf(key: string): number {
    return this.generations.get(key) ?? 0;
  }

  private bumpGeneration(key: string): void {
    this.generations.set(key, this.generationOf(key) + 1);
  }
}
