import { pino } from 'pino';
import { buildApp } from './app.js';
import { loadConfig, traceLogMixin } from './infrastructure/index.js';

/**
 * Bootstrap the collector.
 *
 * Order:
 * 1) Configuration (fails fast on invalid variables)
 * 2) buildApp()
 * 3) Register shutdown signals
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel, mixin: traceLogMixin });

  const fastify = await buildApp({ config, log });

  // Graceful shutdown on SIGINT / SIGTERM
  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down...');

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
