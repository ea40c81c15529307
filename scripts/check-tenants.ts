// ──────────────────────────────────────────
// Script: ping every configured tenant database
// ──────────────────────────────────────────

import { loadConfig } from '../src/config';
import { createLogger, logger } from '../src/observability/logger';
import { TenantRegistry } from '../src/platform/tenant';
import { withTenantScope } from '../src/platform/context';
import { SessionManager } from '../src/db/session-manager';

async function checkTenants() {
  const config = loadConfig(process.env.CONFIG_PATH || 'config.json');
  const log = createLogger(config.logger).child({ component: 'CheckTenants' });
  const registry = TenantRegistry.fromConfig(config);
  const manager = new SessionManager(registry, { logger: log });

  let failures = 0;
  for (const tenantId of registry.listTenants()) {
    // Each tenant is its own unit of work
    try {
      await withTenantScope(tenantId, () =>
        manager.withSession(async (session) => {
          await session.raw('select 1');
        })
      );
      log.info({ tenant_id: tenantId }, 'Tenant database reachable');
    } catch (err) {
      failures++;
      log.error({ err, tenant_id: tenantId }, 'Tenant database unreachable');
    }
  }

  await manager.shutdown();
  log.info({ checked: registry.listTenants().length, failures }, 'Done');
  process.exit(failures > 0 ? 1 : 0);
}

checkTenants().catch((err) => {
  logger.fatal({ err }, 'Tenant check failed');
  process.exit(1);
});
