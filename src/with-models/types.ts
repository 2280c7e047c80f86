import type {Context} from '../context';
import type {Json, Key, Model} from '../types';

/**
 * Internal symbol for registry storage.
 *
 * @internal
 */
export const __Registry__: unique symbol = Symbol('ModelRegistry');

/**
 * Marker returned by an interrupted execution. Never reaches callers of
 * `request()`: they get an `InterruptedError` instead.
 */
export const Dead: unique symbol = Symbol('Dead');

/**
 * Memoized model results of one request, shared by every context created
 * from the request context.
 */
export type Registry = Map<Key, Promise<unknown>>;

/**
 * Context extended with model execution.
 *
 * - `request()` runs a model once per `displayName` + props and memoizes the promise
 * - `set()` stores a precomputed value for request-dependent models
 * - `call()` runs an action in a named child context that is ended or failed afterwards
 * - `resolve()` awaits a promise, subject to helpers such as `withDeadline`
 * - `kill()` interrupts every pending and future `request()`
 */
export type WithModels<T extends Context> = {
  [__Registry__]: Registry;
  isAlive(): boolean;
  kill(): typeof Dead;
  request<Props, Result extends Json>(
    model: Model<Props, Result, WithModels<T>>,
    props: Props,
  ): Promise<Result>;
  set<Props, Result extends Json>(
    model: Model<Props, Result, WithModels<T>>,
    value: Result,
    props?: Props,
  ): void;
  call<R>(name: string, action: (ctx: WithModels<T>) => Promise<R>): Promise<R>;
  resolve<R>(value: Promise<R>): Promise<R | typeof Dead>;
  create(name: string): WithModels<T>;
} & T;
