import { createHash } from 'crypto';
import { Environment } from '../domain/enums';
import { ProviderCredentials } from '../domain/models';
import { normalizeProviderName } from '../registry';

/**
 * Tenant ids are case-insensitive; everything downstream sees the upper-cased form
 */
export function normalizeTenantId(tenantId: string): string {
  return (tenantId ?? '').trim().toUpperCase();
}

/**
 * TENANT_provider, the internal name a tenant's provider instance lives under.
 * Two tenants on the same processor never share a qualified name.
 */
export function qualifyProviderName(tenantId: string, providerName: string): string {
  return `${normalizeTenantId(tenantId)}_${normalizeProviderName(providerName)}`;
}

export function buildCacheKey(
  tenantId: string,
  providerName: string,
  environment: Environment,
): string {
  return `${qualifyProviderName(tenantId, providerName)}:${environment}`;
}

/**
 * sha256 over the credentials with keys sorted, so key order never matters
 */
export function fingerprintCredentials(credentials: ProviderCredentials): string {
  const sorted = Object.keys(credentials)
    .sort()
    .map((key) => [key, credentials[key]]);
  return createHash('sha256').update(JSON.stringify(sorted)).digest('hex');
}
