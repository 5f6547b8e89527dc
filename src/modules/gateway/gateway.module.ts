import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { DataSource } from 'typeorm';
import {
  GatewayModuleConfig,
  GatewayModuleAsyncConfig,
  mergeGatewayConfig,
} from './gateway.config';
import {
  CALLBACK_STATE_CODEC,
  CONFIGURATION_STORE,
  EVENT_DISPATCHER,
  GATEWAY_CONFIG,
  GATEWAY_DATA_SOURCE,
  PAYMENT_LEDGER,
  PAYMENT_ORCHESTRATION,
  PROVIDER_REGISTRY,
  TENANT_PROVIDER_CACHE,
  TENANT_RATE_LIMITER,
  WEBHOOK_PIPELINE,
  WEBHOOK_TASK_RUNNER,
} from './constants';
import {
  CallbackStateCodec,
  ConfigurationStore,
  EventDispatcher,
  EventDispatcherImpl,
  LoggingEventHandler,
  PaymentLedger,
  PaymentOrchestrationService,
  ProviderRegistry,
  TenantProviderCache,
  TenantRateLimiter,
  WebhookPipeline,
  WebhookTaskRunner,
} from '../../core';
import {
  InMemoryConfigurationStore,
  InMemoryPaymentLedger,
  TypeORMConfigurationStore,
  TypeORMPaymentLedger,
  createDataSource,
  registerBuiltInProviders,
} from '../../adapters';
import { PaymentController } from './controllers/payment.controller';
import { CallbackController } from './controllers/callback.controller';
import { WebhookController } from './controllers/webhook.controller';
import { ProviderConfigController } from './controllers/provider-config.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';
import { ProviderConfigService } from './services/provider-config.service';
import { GatewayLifecycleService } from './services/gateway-lifecycle.service';
import { GatewayRateLimitGuard } from './middleware/rate-limit.guard';
import { WebhookIpAllowlistGuard } from './middleware/ip-allowlist.guard';
import { GatewayExceptionFilter } from './filters/gateway-exception.filter';

const EXPORTED_TOKENS = [
  GATEWAY_CONFIG,
  PROVIDER_REGISTRY,
  CONFIGURATION_STORE,
  PAYMENT_LEDGER,
  EVENT_DISPATCHER,
  TENANT_PROVIDER_CACHE,
  CALLBACK_STATE_CODEC,
  PAYMENT_ORCHESTRATION,
  WEBHOOK_PIPELINE,
  TENANT_RATE_LIMITER,
  ConfigurationService,
  ProviderConfigService,
];

/**
 * Gateway Module - Main NestJS Module
 *
 * Wires the provider registry, tenant cache, orchestration, webhook pipeline
 * and rate limiter, and mounts the HTTP surface.
 */
@Global()
@Module({})
export class GatewayModule {
  /**
   * Configure the gateway synchronously
   */
  static forRoot(config: GatewayModuleConfig): DynamicModule {
    return {
      module: GatewayModule,
      providers: [
        {
          provide: GATEWAY_CONFIG,
          useValue: mergeGatewayConfig(config),
        },
        ...this.createCoreProviders(),
      ],
      controllers: this.createControllers(),
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure the gateway asynchronously
   */
  static forRootAsync(options: GatewayModuleAsyncConfig): DynamicModule {
    return {
      module: GatewayModule,
      imports: options.imports || [],
      providers: [
        {
          provide: GATEWAY_CONFIG,
          useFactory: async (...args: never[]) => mergeGatewayConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createCoreProviders(),
      ],
      controllers: this.createControllers(),
      exports: EXPORTED_TOKENS,
    };
  }

  private static createControllers() {
    return [
      PaymentController,
      CallbackController,
      WebhookController,
      ProviderConfigController,
      HealthController,
    ];
  }

  /**
   * Providers that depend only on the resolved GATEWAY_CONFIG
   */
  private static createCoreProviders(): Provider[] {
    return [
      // Provider registry: built-ins first, then custom plugins, then frozen
      {
        provide: PROVIDER_REGISTRY,
        useFactory: (config: GatewayModuleConfig) => {
          const registry = new ProviderRegistry();
          registerBuiltInProviders(registry, config.providers?.enabled);
          for (const register of config.providers?.register ?? []) {
            register(registry);
          }
          return registry.freeze();
        },
        inject: [GATEWAY_CONFIG],
      },

      // Data source, only for TypeORM storage
      {
        provide: GATEWAY_DATA_SOURCE,
        useFactory: async (config: GatewayModuleConfig): Promise<DataSource | null> => {
          if (config.storage.type !== 'typeorm') {
            return null;
          }
          const dataSource = createDataSource(config.storage.options);
          await dataSource.initialize();
          return dataSource;
        },
        inject: [GATEWAY_CONFIG],
      },

      {
        provide: CONFIGURATION_STORE,
        useFactory: (config: GatewayModuleConfig, dataSource: DataSource | null): ConfigurationStore => {
          switch (config.storage.type) {
            case 'memory':
              return new InMemoryConfigurationStore();

            case 'typeorm':
              if (!dataSource) {
                throw new Error('TypeORM data source was not initialized');
              }
              return new TypeORMConfigurationStore(dataSource);

            case 'custom':
              if (!config.storage.configurationStore) {
                throw new Error('Custom configuration store not provided');
              }
              return config.storage.configurationStore;

            default:
              throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
          }
        },
        inject: [GATEWAY_CONFIG, GATEWAY_DATA_SOURCE],
      },

      {
        provide: PAYMENT_LEDGER,
        useFactory: (config: GatewayModuleConfig, dataSource: DataSource | null): PaymentLedger => {
          switch (config.storage.type) {
            case 'memory':
              return new InMemoryPaymentLedger();

            case 'typeorm':
              if (!dataSource) {
                throw new Error('TypeORM data source was not initialized');
              }
              return new TypeORMPaymentLedger(dataSource);

            case 'custom':
              return config.storage.ledger ?? new InMemoryPaymentLedger();

            default:
              throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
          }
        },
        inject: [GATEWAY_CONFIG, GATEWAY_DATA_SOURCE],
      },

      {
        provide: EVENT_DISPATCHER,
        useFactory: (config: GatewayModuleConfig): EventDispatcher => {
          const dispatcher = config.events?.dispatcher || new EventDispatcherImpl();

          if (config.events?.enableLogging) {
            const loggingHandler = new LoggingEventHandler(config.events.logLevel);
            dispatcher.onAll(loggingHandler.getHandler());
          }

          for (const { eventType, handler } of config.events?.handlers ?? []) {
            dispatcher.on(eventType, handler);
          }

          return dispatcher;
        },
        inject: [GATEWAY_CONFIG],
      },

      {
        provide: TENANT_PROVIDER_CACHE,
        useFactory: (
          config: GatewayModuleConfig,
          registry: ProviderRegistry,
          store: ConfigurationStore,
        ) =>
          new TenantProviderCache(registry, store, {
            maxSize: config.cache?.maxSize,
            ttlMs: config.cache?.ttlMs,
          }),
        inject: [GATEWAY_CONFIG, PROVIDER_REGISTRY, CONFIGURATION_STORE],
      },

      {
        provide: CALLBACK_STATE_CODEC,
        useFactory: (config: GatewayModuleConfig) =>
          new CallbackStateCodec(config.callback.secret, { ttlMs: config.callback.ttlMs }),
        inject: [GATEWAY_CONFIG],
      },

      {
        provide: PAYMENT_ORCHESTRATION,
        useFactory: (
          config: GatewayModuleConfig,
          cache: TenantProviderCache,
          codec: CallbackStateCodec,
        ) =>
          new PaymentOrchestrationService(cache, codec, {
            publicBaseUrl: config.callback.publicBaseUrl,
            paymentTimeoutMs: config.providers?.paymentTimeoutMs,
            inquiryTimeoutMs: config.providers?.inquiryTimeoutMs,
            inquiryRetries: config.providers?.inquiryRetries,
          }),
        inject: [GATEWAY_CONFIG, TENANT_PROVIDER_CACHE, CALLBACK_STATE_CODEC],
      },

      {
        provide: WEBHOOK_TASK_RUNNER,
        useFactory: (config: GatewayModuleConfig) =>
          new WebhookTaskRunner({ timeoutMs: config.webhooks?.taskTimeoutMs }),
        inject: [GATEWAY_CONFIG],
      },

      {
        provide: WEBHOOK_PIPELINE,
        useFactory: (
          orchestration: PaymentOrchestrationService,
          ledger: PaymentLedger,
          taskRunner: WebhookTaskRunner,
          eventDispatcher: EventDispatcher,
        ) => new WebhookPipeline({ orchestration, ledger, taskRunner, eventDispatcher }),
        inject: [PAYMENT_ORCHESTRATION, PAYMENT_LEDGER, WEBHOOK_TASK_RUNNER, EVENT_DISPATCHER],
      },

      {
        provide: TENANT_RATE_LIMITER,
        useFactory: (config: GatewayModuleConfig) =>
          new TenantRateLimiter({
            windowMs: config.rateLimit?.windowMs,
            globalLimit: config.rateLimit?.globalLimit,
            limits: config.rateLimit?.limits,
            unauthenticatedLimit: config.rateLimit?.unauthenticatedLimit,
            premiumMultiplier: config.rateLimit?.premiumMultiplier,
            premiumTenants: config.rateLimit?.premiumTenants,
          }),
        inject: [GATEWAY_CONFIG],
      },

      ConfigurationService,
      ProviderConfigService,
      GatewayLifecycleService,
      GatewayRateLimitGuard,
      WebhookIpAllowlistGuard,
      {
        provide: APP_FILTER,
        useClass: GatewayExceptionFilter,
      },
    ];
  }
}
