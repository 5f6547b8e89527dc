import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Request with the untouched payload bytes attached
 */
export interface RawBodyRequest extends Request {
  rawBody?: Buffer;
}

/**
 * Raw Body Interceptor
 *
 * Makes the exact payload bytes available as request.rawBody for signature
 * verification. Prefers the buffer captured by Nest's rawBody option; a body
 * that was already parsed is re-serialized, which only verifies if the sender
 * used the same JSON encoding.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest>();

    if (Buffer.isBuffer(request.rawBody)) {
      return next.handle();
    }

    if (Buffer.isBuffer(request.body)) {
      request.rawBody = request.body;
    } else if (typeof request.body === 'string') {
      request.rawBody = Buffer.from(request.body);
    } else if (request.body && typeof request.body === 'object') {
      request.rawBody = Buffer.from(JSON.stringify(request.body));
    }

    return next.handle();
  }
}
