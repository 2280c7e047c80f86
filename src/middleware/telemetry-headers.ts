import type {NextFunction, Request, Response} from 'express';

import {context as otelContext, propagation} from '@opentelemetry/api';

/**
 * Makes the trace context of incoming headers active for the rest of the
 * request, so request spans become children of the upstream span.
 */
export function telemetryHeadersMiddleware(req: Request, _res: Response, next: NextFunction) {
  const extracted = propagation.extract(otelContext.active(), req.headers);
  otelContext.with(extracted, () => next());
}
