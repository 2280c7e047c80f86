/**
 * OpenTelemetry SDK initialization.
 *
 * Spans are created for every request context and model call. They are
 * exported when `OTEL_EXPORTER_OTLP_ENDPOINT` is configured, e.g.
 * `OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318`.
 */

import type {Config} from './config';

import {NodeSDK} from '@opentelemetry/sdk-node';

import {logger} from './logger';

let sdkInstance: NodeSDK | null = null;

export function initTelemetry(config: Pick<Config, 'applicationName'>) {
  if (sdkInstance) {
    return;
  }

  sdkInstance = new NodeSDK({serviceName: config.applicationName});
  sdkInstance.start();

  logger.info('✅ OpenTelemetry SDK initialized');
}

export async function shutdownTelemetry() {
  if (!sdkInstance) {
    return;
  }

  const sdk = sdkInstance;
  sdkInstance = null;

  try {
    await sdk.shutdown();
    logger.info('✅ OpenTelemetry SDK shutdown');
  } catch (error) {
    logger.error('❌ Error shutting down OpenTelemetry SDK', error);
  }
}
