import {
  BadRequestException,
  Controller,
  Inject,
  Logger,
  Param,
  Query,
  Req,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { WebhookPipeline } from '../../../core';
import { EnvironmentQueryDto } from '../../../_shared';
import { WEBHOOK_PIPELINE } from '../constants';
import { WebhookEndpoint, extractTenantId } from '../decorators';
import { RawBodyRequest } from '../interceptors/raw-body.interceptor';
import { resolveEnvironment } from './request-context';

export interface WebhookAcceptedResponse {
  status: 'accepted';
  paymentId?: string;
  processingId: string;
}

/**
 * Webhook Controller
 *
 * Receives processor notifications. Answers as soon as the signature is
 * verified; the status re-query and ledger write happen in the background.
 */
@ApiTags('Webhooks')
@Controller('webhooks')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(WEBHOOK_PIPELINE)
    private readonly pipeline: WebhookPipeline,
  ) {}

  @WebhookEndpoint()
  async handleWebhook(
    @Param('provider') provider: string,
    @Query() query: EnvironmentQueryDto,
    @Req() request: RawBodyRequest,
  ): Promise<WebhookAcceptedResponse> {
    const tenantId = extractTenantId(request);
    if (!tenantId) {
      throw new BadRequestException({
        status: 'rejected',
        message: 'tenantId query parameter or X-Tenant-ID header is required',
      });
    }

    const result = await this.pipeline.ingest(provider, {
      tenantId,
      environment: resolveEnvironment(query.environment),
      headers: request.headers,
      body: request.body,
      rawBody: request.rawBody,
      contentType: request.headers['content-type'],
    });

    if (!result.accepted) {
      throw new BadRequestException({
        status: 'rejected',
        message: result.message ?? 'Webhook rejected',
        processingId: result.processingId,
      });
    }

    this.logger.debug(`Webhook ${result.processingId} queued as task ${result.taskId}`);
    return {
      status: 'accepted',
      paymentId: result.paymentId,
      processingId: result.processingId,
    };
  }
}
