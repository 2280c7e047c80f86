import type {Context} from '../context';
import type {Json, Key, Model} from '../types';
import type {Registry, WithModels} from './types';

import {isPlainObject, sign} from '../utils';

import {__Registry__, Dead} from './types';

/**
 * Error thrown when a model execution is interrupted (context was killed).
 *
 * @example
 * ```typescript
 * try {
 *   const todos = await ctx.request(GetAllTodos, {});
 * } catch (error) {
 *   if (error instanceof InterruptedError) {
 *     // deadline exceeded
 *   }
 * }
 * ```
 */
export class InterruptedError extends Error {
  constructor(message = 'Model execution was interrupted') {
    super(message);
    this.name = 'InterruptedError';
  }
}

function keyOf(displayName: string, props: unknown): Key {
  return `${displayName};${isPlainObject(props) ? sign(props) : ''}` as Key;
}

/**
 * Executes a model in a child context named after it and memoizes the result.
 *
 * Failed executions are dropped from the registry so a later request can retry.
 *
 * @internal
 */
function request<Props, Result extends Json>(
  this: WithModels<Context>,
  model: Model<Props, Result, WithModels<Context>>,
  props: Props,
): Promise<Result> {
  if (!model.displayName) {
    return Promise.reject(new TypeError('Model should define static `displayName` property'));
  }

  const {displayName} = model;
  const registry = this[__Registry__];
  const key = keyOf(displayName, props);

  const cached = registry.get(key);
  if (cached) {
    return cached as Promise<Result>;
  }

  const promise = this.call(displayName, async child => {
    if (!child.isAlive()) {
      return Dead;
    }

    const pending = new Promise<Result>(resolve => resolve(model(props, child)));

    return child.resolve(pending);
  }).then(result => {
    if (result === Dead) {
      throw new InterruptedError(`Model ${displayName} execution was interrupted`);
    }
    return result;
  });

  registry.set(key, promise);
  promise.catch(() => registry.delete(key));

  return promise;
}

/**
 * Stores a precomputed value for a model under the same key `request()` uses.
 *
 * @throws {Error} If a value for this model and props is already registered
 *
 * @internal
 */
function set<Props, Result extends Json>(
  this: WithModels<Context>,
  model: Model<Props, Result, WithModels<Context>>,
  value: Result,
  props?: Props,
): void {
  if (!model.displayName) {
    throw new TypeError('Model should define static `displayName` property');
  }

  const key = keyOf(model.displayName, props ?? {});

  if (this[__Registry__].has(key)) {
    throw new Error(
      `Cannot set value for model "${model.displayName}": value already exists in registry. ` +
        'Use ctx.request() to retrieve it.',
    );
  }

  this[__Registry__].set(key, Promise.resolve(value));
}

/** @internal Runs an action in a child context and closes that context. */
async function call<R>(
  this: WithModels<Context>,
  name: string,
  action: (ctx: WithModels<Context>) => Promise<R>,
): Promise<R> {
  const child = this.create(name);

  try {
    const result = await action(child);
    child.end();
    return result;
  } catch (error) {
    child.fail(error);
    throw error;
  }
}

/**
 * Children share the registry and the liveness state of the context they
 * were created from, and inherit its (possibly wrapped) `resolve`.
 *
 * @internal
 */
const wrapCreate = (create: Context['create']) =>
  function (this: WithModels<Context>, name: string) {
    const child = create.call(this, name);

    return Object.assign(attach(child, this[__Registry__]), {
      isAlive: this.isAlive,
      kill: this.kill,
      resolve: this.resolve,
    });
  };

function attach<CTX extends Context>(ctx: CTX, registry: Registry): WithModels<CTX> {
  let state: typeof Dead | null = null;

  Object.assign(ctx, {
    [__Registry__]: registry,
    isAlive: () => state !== Dead,
    kill: () => (state = Dead),
    resolve: async <R>(value: Promise<R>) => value,
    request,
    set,
    call,
    create: wrapCreate(ctx.create),
  });

  return ctx as WithModels<CTX>;
}

/**
 * Enhances a Context with memoized model execution.
 *
 * Create one registry per HTTP request so memoization never crosses requests.
 *
 * @example
 * ```typescript
 * const ctx = withModels(new Map())(new Context('GET /api/todos/1'));
 * const todo = await ctx.request(GetTodo, {id: 1});
 * ```
 */
export function withModels(registry: Registry) {
  return function <CTX extends Context>(ctx: CTX) {
    return attach(ctx, registry);
  };
}
