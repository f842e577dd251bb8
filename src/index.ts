import { env } from './config/env';
import { createApp } from './app';
import { createBridge } from './container';
import { PidCatalog } from './services/catalog/PidCatalog';
import { bindSelectionToInterest } from './services/interest/bindSelection';
import { DemoTransport } from './services/transport/DemoTransport';
import { LogLevel, logger, LogCategory } from './utils/Logger';

logger.setMinLevel(LogLevel[env.LOG_LEVEL]);

const catalog = PidCatalog.standard();
const transport = new DemoTransport(catalog, {
  handshakeMs: env.DEMO_HANDSHAKE_MS,
  failReason: env.DEMO_FAIL_REASON,
});

const bridge = createBridge({
  transport,
  catalog,
  units: env.UNITS,
  streamIntervalMs: env.STREAM_INTERVAL_MS,
  querySupportedPids: env.QUERY_SUPPORTED_PIDS,
});

// The enabled gauges are the bridge's own standing interest
const unbindGauges = bindSelectionToInterest(bridge.selection, bridge.registry);

const app = createApp(bridge, { exposeErrors: env.NODE_ENV !== 'production' });

const server = app.listen(env.PORT, '0.0.0.0', () => {
  logger.info(LogCategory.APP, `OBD live bridge running on 0.0.0.0:${env.PORT} [${env.NODE_ENV}]`);
});

if (env.AUTO_CONNECT) {
  bridge.lifecycle.connect().catch((error) => {
    logger.error(LogCategory.APP, 'Auto-connect failed', error);
  });
}

function shutdown(signal: string): void {
  logger.info(LogCategory.APP, `${signal} received, shutting down`);
  unbindGauges();
  bridge.dispose();
  server.close();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
