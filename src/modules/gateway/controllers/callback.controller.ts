import { Body, Controller, Headers, HttpStatus, Inject, Logger, Param, Query, Res } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { Response } from 'express';
import {
  CallbackState,
  CallbackStateCodec,
  PaymentOrchestrationService,
  PaymentResponse,
  StateExpiredError,
  buildCallbackRedirect,
  mergeCallbackPayload,
  normalizeProviderName,
  renderCallbackErrorPage,
  renderRedirectForm,
  toError,
} from '../../../core';
import { CALLBACK_STATE_CODEC, PAYMENT_ORCHESTRATION } from '../constants';
import { CallbackGet, CallbackPost } from '../decorators';
import { ConfigurationService } from '../services/configuration.service';

/**
 * Callback Controller
 *
 * The customer's browser lands here after a 3D Secure challenge. The sealed
 * state token is the only source of tenant and payment identity.
 */
@ApiExcludeController()
@Controller('callback')
export class CallbackController {
  private readonly logger = new Logger(CallbackController.name);

  constructor(
    @Inject(CALLBACK_STATE_CODEC)
    private readonly codec: CallbackStateCodec,
    @Inject(PAYMENT_ORCHESTRATION)
    private readonly orchestration: PaymentOrchestrationService,
    private readonly configService: ConfigurationService,
  ) {}

  @CallbackGet()
  async handleGet(
    @Param('provider') provider: string,
    @Query() query: Record<string, unknown>,
    @Res() res: Response,
  ): Promise<void> {
    await this.handle(provider, mergeCallbackPayload(query, undefined, undefined), res);
  }

  @CallbackPost()
  async handlePost(
    @Param('provider') provider: string,
    @Query() query: Record<string, unknown>,
    @Body() body: unknown,
    @Headers('content-type') contentType: string | undefined,
    @Res() res: Response,
  ): Promise<void> {
    const isJson = contentType?.toLowerCase().includes('application/json') ?? false;
    const data = isJson
      ? mergeCallbackPayload(query, undefined, body)
      : mergeCallbackPayload(query, body, undefined);
    await this.handle(provider, data, res);
  }

  private async handle(provider: string, data: Record<string, string>, res: Response): Promise<void> {
    const state = this.openState(provider, data.state);
    if (!state) {
      res.status(HttpStatus.BAD_REQUEST).type('html').send(renderCallbackErrorPage());
      return;
    }

    let outcome: PaymentResponse | Error;
    try {
      outcome = await this.orchestration.complete3DPayment(state, data);
      this.logger.log(
        `3D completion for ${state.tenantId}_${state.providerName} payment ${state.paymentId}: ${outcome.status}`,
      );
    } catch (error) {
      outcome = toError(error);
      this.logger.error(
        `3D completion for ${state.tenantId}_${state.providerName} payment ${state.paymentId} failed: ${outcome.message}`,
      );
    }

    const redirect = buildCallbackRedirect(state, outcome, this.configService.getRedirectMethod());
    res.status(HttpStatus.OK).type('html').send(renderRedirectForm(redirect));
  }

  /**
   * Consume the token; null for anything that cannot be trusted. A token
   * presented on another provider's path is refused without being consumed.
   */
  private openState(provider: string, token: string | undefined): CallbackState | null {
    try {
      const peeked = this.codec.decode(token ?? '');
      if (peeked.providerName !== normalizeProviderName(provider)) {
        this.logger.warn(
          `Rejected callback: state issued for ${peeked.providerName}, received on ${provider}`,
        );
        return null;
      }
      return this.codec.consume(token ?? '');
    } catch (error) {
      if (error instanceof StateExpiredError) {
        this.logger.warn(`Rejected ${provider} callback: ${error.reason}`);
        return null;
      }
      throw error;
    }
  }
}
