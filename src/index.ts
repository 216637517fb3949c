import { env } from './env';
import { log } from './log';
import { closePool } from './persistence/pgClientRepository';
import { closeRedisClient } from './redis/client';
import { buildServer } from './server';

const SHUTDOWN_TIMEOUT_MS = 15_000;

const { server, calls, wss } = buildServer();

server.listen(env.PORT, () => {
  log.info({ event: 'server_listening', port: env.PORT }, 'server listening');
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ event: 'shutdown_started', signal, active_calls: calls.registry.size }, 'shutting down');

  const forceExit = setTimeout(() => {
    log.error({ event: 'shutdown_timeout' }, 'shutdown timed out');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  server.close();
  await calls.shutdown();
  wss.close();
  await Promise.allSettled([closePool(), closeRedisClient()]);
  log.info({ event: 'shutdown_complete' }, 'shutdown complete');
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ err: error, event: 'shutdown_failed' }, 'shutdown failed');
      process.exit(1);
    });
  });
}
