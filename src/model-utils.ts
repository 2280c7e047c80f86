import type {WithTelemetryConfig} from './with-telemetry';

/**
 * Attaches a display name and telemetry settings to a model function.
 *
 * @example
 * ```typescript
 * export const GetTodo = defineModel(
 *   'GetTodo',
 *   function GetTodo(props: {id: number}, ctx: AppContext): Todo {
 *     return ctx.store.get(props.id);
 *   },
 *   {displayProps: {id: true}},
 * );
 * ```
 */
export function defineModel<M extends (...args: never[]) => unknown>(
  name: string,
  impl: M,
  config: WithTelemetryConfig = {},
): M & WithTelemetryConfig & {displayName: string} {
  return Object.assign(impl, {displayName: name}, config);
}
