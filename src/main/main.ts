import { errorMessage } from '../common/errors';
import { StaticCatalog } from './catalog';
import { loadConfig } from './config';
import { logError, logInfo } from './logger';
import { MountController } from './mountController';
import { createServer } from './server';
import { StatusHistory } from './statusHistory';

async function main(): Promise<void> {
  const config = loadConfig();
  const catalog = await StaticCatalog.load(config.catalogPath);
  const history = new StatusHistory(config.historySize);

  const controller = new MountController({
    resolver: catalog,
    pollIntervalMs: config.pollIntervalMs,
    waitIntervalMs: config.waitIntervalMs,
    connectTimeoutMs: config.connectTimeoutMs,
    commandTimeoutMs: config.commandTimeoutMs,
    speed: config.speed,
    autoReverse: config.autoReverse,
    autoScreen: config.autoScreen
  });
  controller.onMountEvent('updated', (snapshot) => history.addEntry(snapshot));
  controller.onMountEvent('error', (err) => logError('mount_error', { error: err.message }));

  await controller.connect(config.address);

  const server = createServer({ controller, history, resolver: catalog }).listen(config.port, () => {
    logInfo('api_server_started', { port: config.port, mount: controller.identify() });
  });

  const shutdown = () => {
    logInfo('api_server_stopping', {});
    server.close();
    controller.close().catch((err: unknown) => {
      logError('mount_close_failed', { error: errorMessage(err) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logError('startup_failed', { error: errorMessage(err) });
  process.exitCode = 1;
});
