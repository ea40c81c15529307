// ──────────────────────────────────────────
// Sessions — one tenant, one connection, one optional transaction
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import type { SessionMode, SessionState } from '../shared/types';
import { SessionStateError } from '../shared/errors';
import type { Logger } from '../observability/logger';

/** The part of knex's client that checks connections in and out of the pool. */
export interface ConnectionPool {
  acquireConnection(): Promise<unknown>;
  releaseConnection(connection: unknown): Promise<unknown>;
}

/**
 * A single-use handle on one pooled connection of a tenant engine. Plain
 * sessions run statements in the driver's autocommit mode; `begin()` opens
 * an explicit transaction on the same connection until `commit()` or
 * `rollback()`.
 *
 * Lifecycle: open → (committed | rolled_back) → closed. Closing with a
 * transaction still open rolls it back first, then returns the connection.
 */
export class Session {
  readonly id = uuidv4();
  private trx: Knex.Transaction | null = null;
  private _mode: SessionMode = 'plain';
  private _state: SessionState = 'open';
  private readonly _history: SessionState[] = ['open'];

  constructor(
    readonly tenantId: string,
    private readonly engine: Knex,
    private readonly pool: ConnectionPool,
    private readonly connection: unknown,
    private readonly log: Logger
  ) {}

  get mode(): SessionMode {
    return this._mode;
  }

  get state(): SessionState {
    return this._state;
  }

  /** Every state the session has passed through, in order. */
  get history(): readonly SessionState[] {
    return this._history;
  }

  get inTransaction(): boolean {
    return this.trx !== null;
  }

  table(name: string): Knex.QueryBuilder {
    const trx = this.executor();
    return trx ? trx(name) : this.engine(name).connection(this.connection);
  }

  raw(sql: string, bindings: Knex.RawBinding[] = []): Knex.Raw {
    const trx = this.executor();
    return trx ? trx.raw(sql, bindings) : this.engine.raw(sql, bindings).connection(this.connection);
  }

  get schema(): Knex.SchemaBuilder {
    const trx = this.executor();
    return trx ? trx.schema : this.engine.schema.connection(this.connection);
  }

  async begin(): Promise<void> {
    if (this._state === 'closed') {
      throw new SessionStateError(`Cannot begin: session for tenant "${this.tenantId}" is closed`);
    }
    if (this.trx) {
      throw new SessionStateError(`A transaction is already open for tenant "${this.tenantId}"`);
    }
    this.trx = await this.engine.transaction(null, { connection: this.connection });
    this._mode = 'transactional';
    if (this._state !== 'open') this.transition('open');
  }

  /**
   * Commit the open transaction. knex reports a failed COMMIT through the
   * transaction's execution promise, not through `commit()` itself. On
   * failure the transaction is rolled back on this connection and the
   * driver error is re-thrown.
   */
  async commit(): Promise<void> {
    const trx = this.requireTransaction('commit');
    this.trx = null;
    try {
      await trx.commit();
      await trx.executionPromise;
    } catch (err) {
      await this.discardFailedCommit(err);
      this.transition('rolled_back');
      throw err;
    }
    this.transition('committed');
  }

  /** Roll back the open transaction. A failed ROLLBACK is re-thrown. */
  async rollback(): Promise<void> {
    const trx = this.requireTransaction('rollback');
    this.trx = null;
    await trx.rollback();
    await trx.executionPromise;
    this.transition('rolled_back');
  }

  /** Release the session and its connection. Safe to call more than once. */
  async close(): Promise<void> {
    if (this._state === 'closed') return;

    const trx = this.trx;
    if (trx) {
      this.trx = null;
      if (!trx.isCompleted()) {
        try {
          await trx.rollback();
          await trx.executionPromise;
        } catch (err) {
          this.log.error({ err, tenant_id: this.tenantId, session_id: this.id }, 'Rollback on close failed');
        }
      }
      this.transition('rolled_back');
    }

    this.transition('closed');
    await this.pool.releaseConnection(this.connection);
  }

  private executor(): Knex.Transaction | null {
    if (this._state === 'closed') {
      throw new SessionStateError(`Session for tenant "${this.tenantId}" is closed`);
    }
    return this.trx;
  }

  // Some drivers (SQLite on a deferred constraint) keep the transaction
  // open after a failed COMMIT; the connection must not go back to the
  // pool that way.
  private async discardFailedCommit(commitErr: unknown): Promise<void> {
    try {
      await this.engine.raw('ROLLBACK').connection(this.connection);
    } catch (err) {
      this.log.debug(
        { err, commit_err: commitErr, tenant_id: this.tenantId, session_id: this.id },
        'No transaction left to roll back after failed commit'
      );
    }
  }

  private transition(state: SessionState): void {
    this._state = state;
    this._history.push(state);
  }

  private requireTransaction(action: string): Knex.Transaction {
    if (this._state === 'closed') {
      throw new SessionStateError(`Cannot ${action}: session for tenant "${this.tenantId}" is closed`);
    }
    if (!this.trx) {
      throw new SessionStateError(`Cannot ${action}: no transaction is open for tenant "${this.tenantId}"`);
    }
    return this.trx;
  }
}

/**
 * Opens sessions against one tenant engine.
 */
export interface SessionFactory {
  readonly tenantId: string;
  openSession(): Promise<Session>;
  openTransaction(): Promise<Session>;
}

export class KnexSessionFactory implements SessionFactory {
  private readonly pool: ConnectionPool;

  constructor(
    readonly tenantId: string,
    private readonly engine: Knex,
    private readonly log: Logger
  ) {
    this.pool = engine.client;
  }

  /** Checks out one connection; it stays with the session until `close()`. */
  async openSession(): Promise<Session> {
    const connection = await this.pool.acquireConnection();
    return new Session(this.tenantId, this.engine, this.pool, connection, this.log);
  }

  async openTransaction(): Promise<Session> {
    const session = await this.openSession();
    try {
      await session.begin();
    } catch (err) {
      await session.close();
      throw err;
    }
    return session;
  }
}
