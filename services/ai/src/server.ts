import 'dotenv/config';
import type { Server } from 'node:http';
import { createApp } from './app.js';
import { describeEndpoint, describeListenError, loadConfig } from './config.js';
import type { ServiceConfig } from './config.js';

let httpServer: Server | null = null;
let endpoint = 'unbound';
let stopping = false;

function startServer(config: ServiceConfig) {
  const app = createApp({ logSearchStats: config.logSearchStats });
  endpoint = describeEndpoint(config);

  httpServer = app.listen(config.port, config.host, () => {
    const address = httpServer?.address();
    const port = address && typeof address !== 'string' ? address.port : config.port;
    console.log(
      `[server] Move advisor ready on ${config.host}:${port} (search stats ${config.logSearchStats ? 'on' : 'off'})`
    );
  });

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    console.error(`[server] ${describeListenError(err, config)}`);
    void stopServer(`listener on ${endpoint} failed`, 1);
  });
}

async function stopServer(cause: string, exitCode = 0) {
  if (stopping) {
    return;
  }
  stopping = true;
  console.info(`[server] Stopping move advisor on ${endpoint}: ${cause}`);

  const server = httpServer;
  httpServer = null;
  let code = exitCode;
  if (server?.listening) {
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      console.warn(`[server] Open connections kept ${endpoint} from closing cleanly`, err);
      code = code || 1;
    }
  }

  process.exit(code);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    void stopServer(`${signal} received`);
  });
}

try {
  startServer(loadConfig(process.env));
} catch (err) {
  console.error('[server] Move advisor configuration rejected', err);
  process.exit(1);
}
