import type {Context} from '../context';
import type {WithModels} from '../with-models';
import type {Attributes, Span} from '@opentelemetry/api';
import type {AsyncLocalStorage} from 'node:async_hooks';

/**
 * Which fields of props or results end up on a span.
 *
 * - `'*'` - every field
 * - object keyed by field name:
 *   - `true` - the field as-is
 *   - `string` - the value of another field under this name
 *   - `function` - custom extractor `(key, value) => attributeValue`
 */
export type PropsFilter =
  | '*'
  | Record<string, boolean | string | ((key: string, value: unknown) => unknown)>;

/**
 * Telemetry settings a model may carry next to its `displayName`.
 *
 * @example
 * ```typescript
 * export const GetTodo = defineModel('GetTodo', impl, {
 *   displayProps: {id: true},
 *   displayResult: {completed: true},
 * });
 * ```
 */
export type WithTelemetryConfig = {
  displayProps?: PropsFilter;
  displayResult?: PropsFilter;
  displayTags?: Attributes;
};

/** @internal Model execution info kept in AsyncLocalStorage for nested and parallel calls. */
export interface ModelInfo extends WithTelemetryConfig {
  props: unknown;
}

export const __Span__: unique symbol = Symbol('TelSpan');
export const __ModelStorage__: unique symbol = Symbol('TelModelStorage');

/**
 * Context extended with OpenTelemetry tracing.
 *
 * Every context owns a span that starts on creation and ends on `end()` or
 * `fail()`. Spans of child contexts are children of the parent span.
 */
export type WithTelemetry<T extends WithModels<Context>> = {
  create(name: string): WithTelemetry<T>;
  /** @internal */
  [__Span__]: Span;
  /** @internal */
  [__ModelStorage__]: AsyncLocalStorage<ModelInfo>;
} & T;

export type TelemetryConfig = {
  serviceName: string;
};
