/**
 * Shared test fixtures.
 */

import type { Knex } from 'knex';
import { KnexEngineFactory, type EngineFactory } from '../src/db/connection';
import type { Session } from '../src/db/session';
import type { TenantDescriptor } from '../src/shared/types';
import { createLogger } from '../src/observability/logger';

export const silentLogger = createLogger({ level: 'silent' });

export const MEMORY_URL = 'sqlite::memory:';

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CustomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CustomError';
  }
}

/**
 * Real knex engines over in-memory SQLite, with construction and disposal
 * counted per tenant.
 */
export class CountingEngineFactory implements EngineFactory {
  created = 0;
  failNextCreate = false;
  private inner = new KnexEngineFactory(silentLogger);
  private tenants = new Map<Knex, string>();
  private disposals = new Map<string, number>();

  constructor(
    private readonly options: { createDelayMs?: number; failDisposeFor?: string } = {}
  ) {}

  async createEngine(descriptor: TenantDescriptor): Promise<Knex> {
    this.created++;
    if (this.options.createDelayMs) await delay(this.options.createDelayMs);
    if (this.failNextCreate) {
      this.failNextCreate = false;
      throw new Error(`engine build failed for ${descriptor.tenant_id}`);
    }
    const engine = await this.inner.createEngine(descriptor);
    this.tenants.set(engine, descriptor.tenant_id);
    return engine;
  }

  async disposeEngine(engine: Knex): Promise<void> {
    const tenantId = this.tenants.get(engine) ?? 'unknown';
    this.disposals.set(tenantId, (this.disposals.get(tenantId) ?? 0) + 1);
    await this.inner.disposeEngine(engine);
    if (tenantId === this.options.failDisposeFor) {
      throw new Error(`dispose failed for ${tenantId}`);
    }
  }

  disposedCount(tenantId: string): number {
    return this.disposals.get(tenantId) ?? 0;
  }
}

export async function createItemsTable(session: Session): Promise<void> {
  await session.schema.createTable('items', (t) => {
    t.increments('id');
    t.string('name').notNullable();
  });
}

export async function itemNames(session: Session): Promise<string[]> {
  const rows: Array<{ name: string }> = await session.table('items').select('name').orderBy('id');
  return rows.map((row) => row.name);
}
