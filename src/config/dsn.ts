// ──────────────────────────────────────────
// Connection URLs: config → URL → knex options
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { DatabaseConfig, TenantDescriptor } from '../shared/types';
import { ConfigError } from '../shared/errors';

/** Host values that select a SQLite storage mode instead of a network host. */
export const SQLITE_MEMORY_HOST = 'memory';
export const SQLITE_FILE_HOST = 'file';

const SQLITE_MEMORY_URL = 'sqlite:///:memory:';

export type ConnectionTarget =
  | { client: 'pg'; connectionString: string }
  | { client: 'better-sqlite3'; filename: string };

export function buildConnectionUrl(db: DatabaseConfig): string {
  if (db.driver === 'sqlite') {
    if (db.host === SQLITE_MEMORY_HOST) return SQLITE_MEMORY_URL;
    return `sqlite:///${db.database}`;
  }

  const user = encodeURIComponent(db.user);
  const password = encodeURIComponent(db.password);
  const database = encodeURIComponent(db.database);
  return `postgresql://${user}:${password}@${db.host}:${db.port}/${database}`;
}

/**
 * Accepted forms:
 *   postgres://…, postgresql://…
 *   sqlite::memory:, sqlite:///:memory:
 *   sqlite:///relative.db, sqlite:////absolute/path.db
 */
export function parseConnectionUrl(url: string): ConnectionTarget {
  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
    return { client: 'pg', connectionString: url };
  }

  if (url.startsWith('sqlite:')) {
    const rest = url.slice('sqlite:'.length);
    if (rest === ':memory:' || rest === '///:memory:') {
      return { client: 'better-sqlite3', filename: ':memory:' };
    }
    if (rest.startsWith('///') && rest.length > 3) {
      return { client: 'better-sqlite3', filename: rest.slice(3) };
    }
    throw new ConfigError(`Malformed sqlite connection URL: ${url}`);
  }

  const scheme = url.split(':', 1)[0] || url;
  throw new ConfigError(`Unsupported connection URL scheme "${scheme}"`);
}

export function toKnexConfig(descriptor: TenantDescriptor): Knex.Config {
  const target = parseConnectionUrl(descriptor.connection_url);
  const { size, max_overflow, timeout, extra } = descriptor.pool_options;
  const acquireConnectionTimeout = Math.round(timeout * 1000);

  if (target.client === 'better-sqlite3') {
    // One connection per engine: every SQLite connection to :memory: is a separate database.
    return {
      client: 'better-sqlite3',
      connection: { filename: target.filename },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 },
      acquireConnectionTimeout,
    };
  }

  return {
    client: 'pg',
    connection: withQueryOptions(target.connectionString, extra),
    pool: { min: 0, max: size + max_overflow },
    acquireConnectionTimeout,
  };
}

// pg reads driver options (application_name, statement_timeout, …) from the query string.
function withQueryOptions(connectionString: string, extra: Record<string, string>): string {
  const entries = Object.entries(extra);
  if (entries.length === 0) return connectionString;

  const url = new URL(connectionString);
  for (const [key, value] of entries) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}
