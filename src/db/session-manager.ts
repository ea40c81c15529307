// ──────────────────────────────────────────
// Session scope manager — the public surface
// ──────────────────────────────────────────

import type { DisposeReport } from '../shared/types';
import { RollbackError, SessionManagerClosedError } from '../shared/errors';
import type { TenantRegistry } from '../platform/tenant';
import { tenantContext, type TenantContextCarrier } from '../platform/context';
import { EngineCache } from './engine-cache';
import type { EngineFactory } from './connection';
import type { Session } from './session';
import { logger, type Logger } from '../observability/logger';

export interface SessionScopeOptions {
  /** Cancels the unit of work. A transaction in flight rolls back instead of committing. */
  signal?: AbortSignal;
}

export interface SessionManagerOptions {
  context?: TenantContextCarrier;
  engineFactory?: EngineFactory;
  logger?: Logger;
  /** Called when rolling back after a failed body fails as well. */
  onRollbackFailure?: (failure: RollbackError) => void;
}

/**
 * Hands out tenant sessions for the tenant active in the current context.
 * One instance per process: construct at startup, `shutdown()` at teardown.
 */
export class SessionManager {
  readonly context: TenantContextCarrier;
  readonly cache: EngineCache;
  private log: Logger;
  private onRollbackFailure?: (failure: RollbackError) => void;
  private closed = false;
  private shutdownReport: Promise<DisposeReport> | null = null;

  constructor(
    readonly registry: TenantRegistry,
    options: SessionManagerOptions = {}
  ) {
    const base = options.logger ?? logger;
    this.log = base.child({ component: 'SessionManager' });
    this.context = options.context ?? tenantContext;
    this.cache = new EngineCache(registry, options.engineFactory, base.child({ component: 'EngineCache' }));
    this.onRollbackFailure = options.onRollbackFailure;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run `fn` with a plain session for the current tenant. No transaction is
   * opened; the session is closed however `fn` exits.
   */
  async withSession<T>(fn: (session: Session) => Promise<T>, options: SessionScopeOptions = {}): Promise<T> {
    const session = await this.acquire(false, options);
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  /**
   * Run `fn` inside a transaction for the current tenant. Commits when `fn`
   * resolves; rolls back and re-throws the original error when it rejects.
   * A commit failure reaches the caller; the session is closed either way.
   */
  async withTransaction<T>(fn: (session: Session) => Promise<T>, options: SessionScopeOptions = {}): Promise<T> {
    const session = await this.acquire(true, options);
    try {
      let result: T;
      try {
        result = await fn(session);
        options.signal?.throwIfAborted();
      } catch (err) {
        await this.rollbackAfterFailure(session, err);
        throw err;
      }
      if (session.inTransaction) await session.commit();
      return result;
    } finally {
      await session.close();
    }
  }

  /** Dispose every tenant engine. Repeated calls return the first report. */
  shutdown(): Promise<DisposeReport> {
    if (!this.shutdownReport) {
      this.closed = true;
      this.log.info('Shutting down tenant engines');
      this.shutdownReport = this.cache.disposeAll();
    }
    return this.shutdownReport;
  }

  private async acquire(transactional: boolean, options: SessionScopeOptions): Promise<Session> {
    options.signal?.throwIfAborted();
    if (this.closed) {
      throw new SessionManagerClosedError();
    }

    const tenantId = this.context.require();
    const factory = await this.cache.getSessionFactory(tenantId);
    // shutdown() may have started while the engine was being built
    if (this.closed) {
      throw new SessionManagerClosedError();
    }
    return transactional ? factory.openTransaction() : factory.openSession();
  }

  private async rollbackAfterFailure(session: Session, cause: unknown): Promise<void> {
    if (!session.inTransaction) return;
    try {
      await session.rollback();
    } catch (rollbackErr) {
      const failure = new RollbackError(session.tenantId, rollbackErr, cause);
      this.log.error({ err: failure, tenant_id: session.tenantId }, 'Rollback failed');
      this.onRollbackFailure?.(failure);
    }
  }
}
