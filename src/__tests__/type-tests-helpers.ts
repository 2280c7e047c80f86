/**
 * Compile-time helpers for type tests. Nothing here does anything at runtime.
 */

/** `true` only when `A` and `B` are identical, not merely assignable. */
export type Equal<A, B> =
  (<T>() => T extends A ? 1 : 2) extends (<T>() => T extends B ? 1 : 2) ? true : false;

/** Compiles only for `true`, e.g. `Expect<Equal<ModelResult<typeof GetTodo>, Todo>>`. */
export type Expect<T extends true> = T;

/** Fails to compile when `value` is not assignable to `T`. */
export function expectType<T>(_value: T): void {}
