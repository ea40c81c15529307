// ──────────────────────────────────────────
// Database engines — one Knex instance per tenant
// ──────────────────────────────────────────

import knex, { type Knex } from 'knex';
import type { TenantDescriptor } from '../shared/types';
import { toKnexConfig } from '../config/dsn';
import { logger, type Logger } from '../observability/logger';

/**
 * Builds and tears down tenant engines. Building allocates the pool only;
 * connections are opened on first query.
 */
export interface EngineFactory {
  createEngine(descriptor: TenantDescriptor): Promise<Knex>;
  disposeEngine(engine: Knex): Promise<void>;
}

export class KnexEngineFactory implements EngineFactory {
  constructor(private log: Logger = logger.child({ component: 'EngineFactory' })) {}

  async createEngine(descriptor: TenantDescriptor): Promise<Knex> {
    const engine = knex(toKnexConfig(descriptor));

    if (descriptor.pool_options.echo) {
      const log = this.log.child({ tenant_id: descriptor.tenant_id });
      engine.on('query', (query: Knex.Sql) => {
        log.info({ sql: query.sql, bindings: query.bindings }, 'query');
      });
    }

    return engine;
  }

  async disposeEngine(engine: Knex): Promise<void> {
    await engine.destroy();
  }
}
