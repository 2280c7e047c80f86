export type {PropsFilter, TelemetryConfig, WithTelemetry, WithTelemetryConfig} from './types';

export {withTelemetry, getSpan} from './with-telemetry';
