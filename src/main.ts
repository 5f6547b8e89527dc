import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  // rawBody keeps the exact webhook bytes for signature checks
  const app = await NestFactory.create(AppModule, { rawBody: true });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Tenant Paygate')
    .setDescription(
      'Multi-tenant payment gateway: one canonical API over many processors, with per-tenant credentials.',
    )
    .setVersion('0.1.0')
    .addTag('Payments', 'Create, query, cancel and refund payments')
    .addTag('Webhooks', 'Receive processor notifications')
    .addTag('Configuration', 'Tenant provider credentials')
    .addTag('Health')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT ?? 4010;
  await app.listen(port);
  logger.log(`Payment gateway is running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
