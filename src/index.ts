import 'dotenv/config';
import http from 'http';
import { loadConfig } from './config';
import { createConsoleLogger } from './relay/logger';
import { createRelayServer } from './relay/server';
import { startHealthServer } from './routes/health';

async function main(): Promise<void> {
  const config = loadConfig();
  const relay = createRelayServer({
    host: config.relayHost,
    port: config.relayPort,
    onEvent: createConsoleLogger(),
  });

  await relay.start();

  // ── Optional health endpoint ─────────────────────────────────────────────
  let httpServer: http.Server | null = null;
  if (config.httpPort !== null) {
    httpServer = await startHealthServer(relay.registry, config.relayHost, config.httpPort);
    console.log(`[server] Health: http://${config.relayHost}:${config.httpPort}/health`);
  }

  const shutdown = async () => {
    console.log('[server] Shutting down…');
    httpServer?.close();
    await relay.stop();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[startup] Error running server:', err);
  process.exit(1);
});
