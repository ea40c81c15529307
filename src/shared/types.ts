// ──────────────────────────────────────────
// Shared type definitions for tenant sessions
// ──────────────────────────────────────────

export type DatabaseDriver = 'postgresql' | 'sqlite';
export type SessionMode = 'plain' | 'transactional';
export type SessionState = 'open' | 'committed' | 'rolled_back' | 'closed';

export interface PoolOptions {
  /** Connections kept by the pool */
  size: number;
  /** Extra connections allowed above `size` under load */
  max_overflow: number;
  /** Seconds to wait for a free connection */
  timeout: number;
  /** Log every statement issued through the engine */
  echo: boolean;
  /** Driver-specific connection options */
  extra: Record<string, string>;
}

export interface TenantDescriptor {
  tenant_id: string;
  connection_url: string;
  pool_options: PoolOptions;
}

export interface TenantDescriptorInput {
  connection_url: string;
  pool_options?: Partial<PoolOptions>;
}

export interface DatabaseConfig {
  enable: boolean;
  driver: DatabaseDriver;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  echo: boolean;
  pool_size: number;
  max_overflow: number;
  pool_timeout: number;
  extra: Record<string, string>;
}

export interface ServerConfig {
  host: string;
  port: number;
  tenant_enabled: boolean;
  tenant_header: string;
  default_tenant_id: string;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
}

export interface AppConfig {
  server: ServerConfig;
  logger: LoggerConfig;
  databases: Record<string, DatabaseConfig>;
}

export interface DisposeReport {
  disposed: string[];
  failed: Array<{ tenant_id: string; error: Error }>;
}
