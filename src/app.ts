// ──────────────────────────────────────────
// App entry point — bootstrap + Express server
// ──────────────────────────────────────────

import { loadConfig } from './config';
import { createLogger, logger } from './observability/logger';
import { TenantRegistry } from './platform/tenant';
import { tenantContext } from './platform/context';
import { SessionManager } from './db/session-manager';
import { KnexEngineFactory } from './db/connection';
import { createServer } from './server';

async function main() {
  const config = loadConfig(process.env.CONFIG_PATH || 'config.json');
  const log = createLogger(config.logger);

  // ── Tenants ──
  const registry = TenantRegistry.fromConfig(config);
  const tenants = registry.listTenants();
  log.info({ tenants }, `Initialized with ${tenants.length} tenants`);

  // ── Sessions ──
  const manager = new SessionManager(registry, {
    context: tenantContext,
    engineFactory: new KnexEngineFactory(log.child({ component: 'EngineFactory' })),
    logger: log,
  });

  // ── Express app ──
  const app = createServer(manager, config.server, log.child({ component: 'Http' }));
  const server = app.listen(config.server.port, config.server.host, () => {
    log.info(`Listening on ${config.server.host}:${config.server.port}`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    log.info('Shutting down...');
    server.close();
    const report = await manager.shutdown();
    process.exit(report.failed.length > 0 ? 1 : 0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
