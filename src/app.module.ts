import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { GatewayModule, GatewayModuleConfig } from './modules';

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    GatewayModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService): GatewayModuleConfig => {
        const port = config.get<string>('PORT', '4010');
        const storageType = config.get<string>('STORAGE_TYPE', 'memory') === 'typeorm' ? 'typeorm' : 'memory';

        return {
          storage: { type: storageType },
          callback: {
            secret: config.getOrThrow<string>('CALLBACK_SECRET'),
            publicBaseUrl: config.get<string>('APP_URL', `http://localhost:${port}`),
          },
          rateLimit: {
            premiumTenants: parseList(config.get<string>('PREMIUM_TENANTS')),
          },
          events: {
            enableLogging: true,
          },
        };
      },
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
