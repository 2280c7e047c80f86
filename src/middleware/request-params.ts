import type {NextFunction, Request, Response} from 'express';

import {RequestParams} from '../models';
import {isJson} from '../utils';

/**
 * Publishes the parsed body and query through the `RequestParams` model.
 * Must run after body parsing.
 */
export function requestParamsMiddleware(req: Request, _res: Response, next: NextFunction) {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.query)) {
    if (typeof value === 'string') {
      query[key] = value;
    }
  }

  const body: unknown = req.body;
  req.ctx.set(RequestParams, {query, body: isJson(body) ? body : null});

  next();
}
