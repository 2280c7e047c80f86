import type {NextFunction, Request, Response} from 'express';
import type {IncomingHttpHeaders} from 'node:http';

/**
 * Computes the request deadline from headers:
 * - `X-Request-Deadline`: milliseconds
 * - `X-Timeout`: seconds
 *
 * Falls back to `defaultDeadline` when neither holds a positive integer.
 */
export function deadlineMiddleware(defaultDeadline: number) {
  return function deadline(req: Request, _res: Response, next: NextFunction) {
    req.deadline = readDeadline(req.headers) ?? defaultDeadline;
    next();
  };
}

/** Deadline in ms requested by the client, if any. */
export function readDeadline(headers: IncomingHttpHeaders): number | undefined {
  const millis = parsePositive(headers['x-request-deadline']);
  if (millis !== undefined) {
    return millis;
  }

  const seconds = parsePositive(headers['x-timeout']);
  return seconds === undefined ? undefined : seconds * 1000;
}

function parsePositive(header: string | string[] | undefined): number | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}
