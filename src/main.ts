import {ConfigError, loadConfig} from './config';
import {logger} from './logger';
import {createApp} from './server';
import {startSweeper, TodoStore} from './store';
import {initTelemetry, shutdownTelemetry} from './telemetry';

function main() {
  const config = loadConfig();

  initTelemetry(config);

  const store = new TodoStore({ttl: config.todoTtlMs});
  const stopSweeper = config.sweepIntervalMs > 0 ? startSweeper(store, config.sweepIntervalMs) : () => {};

  const server = createApp({store, config}).listen(config.port, () => {
    logger.info(`🚀 ${config.applicationName} running on http://localhost:${config.port}`);
    logger.info(`   📝 Todos expire after ${config.todoTtlMs / 1000} seconds`);
    if (config.sweepIntervalMs > 0) {
      logger.info(`   🧹 Expired todos are swept every ${config.sweepIntervalMs / 1000} seconds`);
    }
    if (config.emissaryUrl) {
      logger.info(`   🔥 Chaos emissary: ${config.emissaryUrl}`);
    }
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down`);
    stopSweeper();
    server.close(() => {
      void shutdownTelemetry().then(() => process.exit(0));
    });
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    logger.error(`❌ ${error.message}`);
  } else {
    logger.error('❌ Failed to start', error);
  }
  process.exitCode = 1;
}
