// ──────────────────────────────────────────
// Engine / session-factory cache
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { DisposeReport, TenantDescriptor } from '../shared/types';
import type { TenantRegistry } from '../platform/tenant';
import { KnexEngineFactory, type EngineFactory } from './connection';
import { KnexSessionFactory, type SessionFactory } from './session';
import { logger, type Logger } from '../observability/logger';

export interface EngineEntry {
  tenant_id: string;
  engine: Knex;
  session_factory: SessionFactory;
  descriptor: TenantDescriptor;
  created_at: Date;
}

/**
 * Owns one engine and one session factory per tenant, built on first use.
 *
 * Construction is single-flight per tenant id: concurrent first callers
 * share one pending build, and tenants never wait on each other.
 */
export class EngineCache {
  private entries = new Map<string, EngineEntry>();
  private pending = new Map<string, Promise<EngineEntry>>();

  constructor(
    private registry: TenantRegistry,
    private engineFactory: EngineFactory = new KnexEngineFactory(),
    private log: Logger = logger.child({ component: 'EngineCache' })
  ) {}

  async getSessionFactory(tenantId: string): Promise<SessionFactory> {
    const cached = this.entries.get(tenantId);
    if (cached) return cached.session_factory;

    const entry = await this.getOrBuild(tenantId);
    return entry.session_factory;
  }

  /** Cached entry for a tenant, if its engine has been built. */
  peek(tenantId: string): EngineEntry | undefined {
    return this.entries.get(tenantId);
  }

  has(tenantId: string): boolean {
    return this.entries.has(tenantId);
  }

  cachedTenants(): string[] {
    return [...this.entries.keys()].sort();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Dispose a tenant's engine and drop it, so the next request rebuilds it
   * from the registry. Returns false when nothing was cached.
   */
  async evict(tenantId: string): Promise<boolean> {
    await this.settle(tenantId);

    const entry = this.entries.get(tenantId);
    if (!entry) return false;

    this.entries.delete(tenantId);
    await this.engineFactory.disposeEngine(entry.engine);
    this.log.info({ tenant_id: tenantId }, 'Evicted tenant engine');
    return true;
  }

  /**
   * Dispose every cached engine exactly once. One failing disposal is
   * logged and reported; it does not stop the others.
   */
  async disposeAll(): Promise<DisposeReport> {
    await Promise.allSettled([...this.pending.values()]);

    const entries = [...this.entries.values()];
    this.entries.clear();

    const report: DisposeReport = { disposed: [], failed: [] };
    const results = await Promise.allSettled(
      entries.map((entry) => this.engineFactory.disposeEngine(entry.engine))
    );

    results.forEach((result, i) => {
      const tenantId = entries[i].tenant_id;
      if (result.status === 'fulfilled') {
        report.disposed.push(tenantId);
      } else {
        const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
        report.failed.push({ tenant_id: tenantId, error });
        this.log.error({ err: error, tenant_id: tenantId }, 'Failed to dispose tenant engine');
      }
    });

    this.log.info(
      { disposed: report.disposed.length, failed: report.failed.length },
      'All tenant database connections closed'
    );
    return report;
  }

  private getOrBuild(tenantId: string): Promise<EngineEntry> {
    const inflight = this.pending.get(tenantId);
    if (inflight) return inflight;

    // Unknown tenants fail here, before anything is built.
    const descriptor = this.registry.resolve(tenantId);

    const build = this.build(descriptor).finally(() => {
      this.pending.delete(tenantId);
    });
    this.pending.set(tenantId, build);
    return build;
  }

  private async build(descriptor: TenantDescriptor): Promise<EngineEntry> {
    const engine = await this.engineFactory.createEngine(descriptor);
    const entry: EngineEntry = {
      tenant_id: descriptor.tenant_id,
      engine,
      session_factory: new KnexSessionFactory(
        descriptor.tenant_id,
        engine,
        this.log.child({ tenant_id: descriptor.tenant_id })
      ),
      descriptor,
      created_at: new Date(),
    };
    this.entries.set(descriptor.tenant_id, entry);
    this.log.info({ tenant_id: descriptor.tenant_id }, 'Created session factory for tenant');
    return entry;
  }

  private async settle(tenantId: string): Promise<void> {
    const inflight = this.pending.get(tenantId);
    if (!inflight) return;
    try {
      await inflight;
    } catch (err) {
      this.log.debug({ err, tenant_id: tenantId }, 'Pending engine build failed before eviction');
    }
  }
}
