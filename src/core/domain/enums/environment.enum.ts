/**
 * Credential environment a tenant configures per provider
 */
export enum Environment {
  SANDBOX = 'sandbox',
  PRODUCTION = 'production',
}

export function parseEnvironment(raw: string | undefined | null): Environment | undefined {
  switch (raw?.trim().toLowerCase()) {
    case Environment.SANDBOX:
      return Environment.SANDBOX;
    case Environment.PRODUCTION:
      return Environment.PRODUCTION;
    default:
      return undefined;
  }
}
