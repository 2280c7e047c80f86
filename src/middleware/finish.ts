import type {NextFunction, Request, Response} from 'express';

/**
 * Ends the request context once the response is sent and kills it, which
 * also clears its deadline timer.
 *
 * A context already failed by the error middleware is left as is.
 * Must be registered before the error middleware so the listener exists
 * when the error response goes out.
 */
export function finishMiddleware(req: Request, res: Response, next: NextFunction) {
  res.once('finish', () => {
    if (!req.ctx.error) {
      req.ctx.end();
    }
    req.ctx.kill();
  });

  next();
}
