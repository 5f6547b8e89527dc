import type { DataSourceOptions } from 'typeorm';
import type { InjectionToken, ModuleMetadata, OptionalFactoryDependency } from '@nestjs/common';
import {
  ConfigurationStore,
  EventDispatcher,
  EventHandler,
  GatewayEventType,
  PaymentLedger,
  ProviderRegistry,
  RateLimitAction,
  RedirectMethod,
} from '../../core';

/**
 * Gateway Module Configuration
 */
export interface GatewayModuleConfig {
  /**
   * Where provider credentials and payment outcomes live
   */
  storage: {
    type: 'memory' | 'typeorm' | 'custom';
    options?: DataSourceOptions;
    configurationStore?: ConfigurationStore;
    ledger?: PaymentLedger;
  };

  /**
   * 3D Secure callback correlation
   */
  callback: {
    /**
     * Key material for sealing callback state
     */
    secret: string;
    /**
     * Public base URL of this gateway, e.g. https://pay.example.com
     */
    publicBaseUrl: string;
    ttlMs?: number;
    /**
     * How the customer's browser is sent on to the merchant
     */
    redirectMethod?: RedirectMethod;
  };

  /**
   * Provider plugins and call budgets
   */
  providers?: {
    /**
     * Built-in plugins to register; all of them when omitted
     */
    enabled?: string[];
    /**
     * Extra self-registration hooks for custom plugins
     */
    register?: Array<(registry: ProviderRegistry) => void>;
    paymentTimeoutMs?: number;
    inquiryTimeoutMs?: number;
    inquiryRetries?: number;
  };

  cache?: {
    maxSize?: number;
    ttlMs?: number;
  };

  webhooks?: {
    /**
     * Deadline for the asynchronous verification task
     */
    taskTimeoutMs?: number;
    /**
     * Allowed sender IPs, CIDRs or ranges per provider. Providers without an
     * entry accept any sender.
     */
    ipAllowlist?: Record<string, string[]>;
    checkProxyHeaders?: boolean;
  };

  rateLimit?: {
    enabled?: boolean;
    windowMs?: number;
    globalLimit?: number;
    limits?: Partial<Record<RateLimitAction, number>>;
    unauthenticatedLimit?: number;
    premiumMultiplier?: number;
    premiumTenants?: string[];
  };

  events?: {
    dispatcher?: EventDispatcher;
    enableLogging?: boolean;
    logLevel?: 'verbose' | 'normal' | 'minimal';
    handlers?: Array<{
      eventType: GatewayEventType;
      handler: EventHandler;
    }>;
  };
}

/**
 * Async configuration factory
 */
export interface GatewayModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
  useFactory: (...args: never[]) => Promise<GatewayModuleConfig> | GatewayModuleConfig;
}

/**
 * Default configuration values
 */
export const defaultGatewayConfig = {
  callback: {
    ttlMs: 30 * 60 * 1000,
    redirectMethod: 'POST',
  } satisfies Partial<GatewayModuleConfig['callback']>,
  providers: {
    paymentTimeoutMs: 30000,
    inquiryTimeoutMs: 10000,
    inquiryRetries: 1,
  } satisfies GatewayModuleConfig['providers'],
  cache: {
    maxSize: 1000,
    ttlMs: 30 * 60 * 1000,
  } satisfies GatewayModuleConfig['cache'],
  webhooks: {
    taskTimeoutMs: 2 * 60 * 1000,
    ipAllowlist: {},
    checkProxyHeaders: true,
  } satisfies GatewayModuleConfig['webhooks'],
  rateLimit: {
    enabled: true,
    windowMs: 60 * 1000,
    globalLimit: 100,
    unauthenticatedLimit: 10,
    premiumMultiplier: 2.0,
    premiumTenants: [],
  } satisfies GatewayModuleConfig['rateLimit'],
  events: {
    enableLogging: true,
    logLevel: 'normal',
  } satisfies GatewayModuleConfig['events'],
};

/**
 * Merge user config over the defaults: shallow at the top, then per section
 */
export function mergeGatewayConfig(config: GatewayModuleConfig): GatewayModuleConfig {
  return {
    ...defaultGatewayConfig,
    ...config,
    callback: { ...defaultGatewayConfig.callback, ...config.callback },
    providers: { ...defaultGatewayConfig.providers, ...config.providers },
    cache: { ...defaultGatewayConfig.cache, ...config.cache },
    webhooks: { ...defaultGatewayConfig.webhooks, ...config.webhooks },
    rateLimit: { ...defaultGatewayConfig.rateLimit, ...config.rateLimit },
    events: { ...defaultGatewayConfig.events, ...config.events },
  };
}
