import type {Context} from '../context';
import type {Dead, WithModels} from '../with-models';

import {wait} from '../utils';

/**
 * Enhances a `WithModels` context with a deadline.
 *
 * Every promise resolved through `ctx.resolve` races against the deadline.
 * When the deadline fires, `ctx.kill()` is called and in-flight
 * `ctx.request` calls reject with `InterruptedError`. A manual `kill()`
 * clears the timer.
 *
 * @param timeout - Deadline in milliseconds, `0` or less disables it.
 *
 * @example
 * ```typescript
 * const ctx = withDeadline(req.deadline)(withModels(new Map())(new Context('GET /api/todos')));
 * ```
 */
export function withDeadline(timeout = 0) {
  return function <CTX extends WithModels<Context>>(ctx: CTX) {
    if (timeout <= 0) {
      return ctx;
    }

    const {resolve, kill} = ctx;
    const [deadline, clear] = wait(timeout, undefined);

    ctx.kill = () => {
      clear();
      return kill.call(ctx);
    };
    ctx.resolve = <R>(value: Promise<R>) =>
      Promise.race([resolve(value), deadline.then((): typeof Dead => ctx.kill())]);

    return ctx;
  };
}
