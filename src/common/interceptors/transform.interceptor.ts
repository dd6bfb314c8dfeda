import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export type Envelope = Record<string, unknown> & { success: boolean; timestamp: string };

/**
 * Controllers answer with `{ success, data, meta }`; anything else is wrapped into that shape.
 */
@Injectable()
export class TransformInterceptor implements NestInterceptor<unknown, Envelope> {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<Envelope> {
    return next.handle().pipe(map((body: unknown) => toEnvelope(body)));
  }
}

export function toEnvelope(body: unknown): Envelope {
  const timestamp = new Date().toISOString();

  if (typeof body === 'object' && body !== null && 'success' in body && typeof body.success === 'boolean') {
    return { ...body, success: body.success, timestamp };
  }

  return { success: true, data: body ?? null, timestamp };
}
