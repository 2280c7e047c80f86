import type {NextFunction, Request, Response} from 'express';

import {HttpError} from '../errors';
import {logger} from '../logger';
import {has} from '../utils';
import {InterruptedError} from '../with-models';

function isBodyParseError(err: Error) {
  return err instanceof SyntaxError && 'body' in err;
}

/** Status of a client error raised by the body parser, e.g. 413 or 415. */
function clientStatus(err: Error): number | undefined {
  if (has(err, 'status') && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }

  return undefined;
}

/**
 * Maps errors to responses and marks the request context as failed.
 * Messages of unexpected errors never reach the client.
 */
export function errorMiddleware(err: Error, req: Request, res: Response, _next: NextFunction) {
  req.ctx.fail(err);

  if (err instanceof InterruptedError) {
    return res.status(503).json({error: 'Service unavailable'});
  }

  if (err instanceof HttpError) {
    return res.status(err.status).json({error: err.message});
  }

  if (isBodyParseError(err)) {
    return res.status(400).json({error: 'Invalid JSON body'});
  }

  const status = clientStatus(err);
  if (status !== undefined) {
    return res.status(status).json({error: err.message});
  }

  logger.error('Unhandled error:', err);
  return res.status(500).json({error: 'Internal server error'});
}
