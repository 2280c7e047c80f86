import type {Context} from './context';

export type Key = string & {
  __type: 'model-key';
};

export type Primitive = null | number | string | boolean;

/**
 * Object JSON: a JSON value whose top level is always an object.
 *
 * Undefined values are allowed so optional properties type-check;
 * `sign()` skips them when building memo keys.
 */
export type OJson = {
  [prop: string]: Json | undefined;
};

export type Json = OJson | Json[] | Primitive;

export type Actor<Props, Result extends Json, Ctx extends Context = Context> = (
  props: Props,
  context: Ctx,
) => Result | Promise<Result>;

/**
 * A named unit of work executed through `ctx.request()`.
 * The `displayName` is part of the memo key and names the span.
 */
export type Model<Props = OJson, Result extends Json = Json, Ctx extends Context = Context> = Actor<
  Props,
  Result,
  Ctx
> & {
  displayName: string;
};

export type ModelProps<M> = M extends (props: infer Props, ...args: never[]) => unknown
  ? Props
  : never;

export type ModelResult<M> = M extends (...args: never[]) => infer R ? Awaited<R> : never;
