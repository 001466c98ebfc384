import 'dotenv/config';
import { ScannerService } from '../bot/service.js';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { openStore } from './lib/open_store.js';

const config = loadConfig(process.cwd());
const store = openStore(config, process.cwd());
const scanner = new ScannerService({ config, store });

const app = createApp({ config, store, scanner });

const server = app.listen(config.ui.port, config.ui.bind, () => {
  // eslint-disable-next-line no-console
  console.log(`[server] move feed: http://${config.ui.bind}:${config.ui.port}/api/moves`);

  if (config.scanner.autostart) {
    scanner.start().catch((e) => console.error('[autostart] scanner.start failed', e));
  }
});

async function shutdown(signal: string) {
  console.log(`[server] ${signal}, shutting down`);
  server.close();
  await scanner.stop();
  await store.close();
  process.exit(0);
}

process.once('SIGINT', () => {
  shutdown('SIGINT').catch((e) => {
    console.error('[server] shutdown failed', e);
    process.exit(1);
  });
});
process.once('SIGTERM', () => {
  shutdown('SIGTERM').catch((e) => {
    console.error('[server] shutdown failed', e);
    process.exit(1);
  });
});
