import { Request } from 'express';
import { Environment, OrchestrationContext, ValidationError, parseEnvironment } from '../../../core';
import { getClientIp } from '../middleware/client-ip';

/**
 * Environment from a query value; sandbox when absent
 * @throws ValidationError for anything other than sandbox or production
 */
export function resolveEnvironment(raw?: string): Environment {
  if (raw === undefined || raw === '') {
    return Environment.SANDBOX;
  }
  const environment = parseEnvironment(raw);
  if (!environment) {
    throw new ValidationError(
      `environment must be one of: ${Object.values(Environment).join(', ')}`,
    );
  }
  return environment;
}

export function buildOrchestrationContext(
  request: Request,
  tenantId: string,
  providerName: string,
  environment?: string,
): OrchestrationContext {
  return {
    tenantId,
    providerName,
    environment: resolveEnvironment(environment),
    clientIp: getClientIp(request) ?? undefined,
  };
}
