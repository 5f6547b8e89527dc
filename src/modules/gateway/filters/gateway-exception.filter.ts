import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import {
  ConfigurationError,
  ProviderNotRegisteredError,
  SignatureError,
  StateExpiredError,
  UpstreamError,
  ValidationError,
} from '../../../core';

type GatewayDomainError =
  | ValidationError
  | ConfigurationError
  | ProviderNotRegisteredError
  | SignatureError
  | StateExpiredError
  | UpstreamError;

export interface GatewayErrorBody {
  success: false;
  statusCode: number;
  error: string;
  message: string;
  errors?: string[];
}

/**
 * HTTP status for a domain error
 */
export function statusForDomainError(error: GatewayDomainError): HttpStatus {
  if (error instanceof ProviderNotRegisteredError) {
    return HttpStatus.NOT_FOUND;
  }
  if (error instanceof UpstreamError) {
    return HttpStatus.BAD_GATEWAY;
  }
  return HttpStatus.BAD_REQUEST;
}

/**
 * Maps gateway domain errors onto HTTP responses; anything else falls through
 * to Nest's default handling.
 */
@Catch(
  ValidationError,
  ConfigurationError,
  ProviderNotRegisteredError,
  SignatureError,
  StateExpiredError,
  UpstreamError,
)
export class GatewayExceptionFilter implements ExceptionFilter<GatewayDomainError> {
  private readonly logger = new Logger(GatewayExceptionFilter.name);

  catch(exception: GatewayDomainError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = statusForDomainError(exception);

    const body: GatewayErrorBody = {
      success: false,
      statusCode,
      error: exception.name,
      message: exception.message,
    };
    if (exception instanceof ValidationError) {
      body.errors = exception.errors;
    }

    if (statusCode >= 500) {
      this.logger.error(`${exception.name}: ${exception.message}`);
    }

    response.status(statusCode).json(body);
  }
}
