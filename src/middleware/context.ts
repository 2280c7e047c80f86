import type {AppDependencies} from '../app-context';
import type {WithModels} from '../with-models';
import type {WithTelemetry} from '../with-telemetry';
import type {NextFunction, Request, Response} from 'express';

import {AppContext} from '../app-context';
import {withDeadline} from '../with-deadline';
import {withModels} from '../with-models';
import {withTelemetry} from '../with-telemetry';

export type RequestContext = WithTelemetry<WithModels<AppContext>>;

/**
 * Creates the request context: memoized models, one span per context and
 * the request deadline. Must run after `deadlineMiddleware`.
 */
export function contextMiddleware(deps: AppDependencies) {
  const telemetry = withTelemetry({serviceName: deps.config.applicationName});

  return function context(req: Request, _res: Response, next: NextFunction) {
    const ctx = new AppContext(`${req.method.toUpperCase()} ${req.path}`, deps);

    req.ctx = withDeadline(req.deadline)(telemetry(withModels(new Map())(ctx)));
    next();
  };
}
