import type {Json} from '../types';

import {URLSearchParams} from 'node:url';

/**
 * Returns a promise resolved with `value` after `delay` ms and a function
 * cancelling the timer. The timer never keeps the process alive.
 */
export function wait<T>(delay: number, value: T): [Promise<T>, () => void] {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<T>(resolve => {
    timer = setTimeout(resolve, delay, value);
    timer.unref();
  });

  return [promise, () => clearTimeout(timer)];
}

export const isPlainObject = (target: unknown): target is Record<string, unknown> =>
  Object.prototype.toString.call(target) === '[object Object]';

/**
 * Builds an order-independent signature of a props object.
 * Undefined values are skipped so a missing optional property and an
 * explicit `undefined` produce the same key.
 */
export function sign(props: Record<string, unknown>, seen: Set<unknown> = new Set()): string {
  const acc = new URLSearchParams();

  Object.keys(props)
    .sort((a, b) => a.localeCompare(b))
    .forEach(key => {
      const value = props[key];

      if (value === undefined) {
        return;
      }

      if (isPlainObject(value)) {
        if (seen.has(value)) {
          return;
        }

        seen.add(value);
        acc.append(key, sign(value, seen));
      } else {
        acc.append(key, String(value));
      }
    });

  return acc.toString();
}

/**
 * Checks that `obj` is an object owning `prop`.
 *
 * @example
 * ```typescript
 * has(ctx, __Span__) // telemetry-enabled context
 * ```
 */
export function has<P extends string | symbol>(obj: unknown, prop: P): obj is Record<P, unknown> {
  return obj !== null && typeof obj === 'object' && prop in obj;
}

/**
 * Checks that a value is JSON data: primitives, arrays and plain objects
 * without cycles.
 */
export function isJson(value: unknown, seen: Set<unknown> = new Set()): value is Json {
  if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) {
    return true;
  }

  if (!Array.isArray(value) && !isPlainObject(value)) {
    return false;
  }

  if (seen.has(value)) {
    return false;
  }
  seen.add(value);

  const items = Array.isArray(value) ? value : Object.values(value);

  return items.every(item => item === undefined || isJson(item, seen));
}
