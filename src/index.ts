export { SessionManager } from './db/session-manager';
export type { SessionManagerOptions, SessionScopeOptions } from './db/session-manager';
export { EngineCache } from './db/engine-cache';
export type { EngineEntry } from './db/engine-cache';
export { KnexEngineFactory } from './db/connection';
export type { EngineFactory } from './db/connection';
export { Session, KnexSessionFactory } from './db/session';
export type { SessionFactory } from './db/session';
export { TenantRegistry, DEFAULT_POOL_OPTIONS } from './platform/tenant';
export { TenantContextCarrier, tenantContext, withTenantScope, getTenantId } from './platform/context';
export type { RestoreToken } from './platform/context';
export { tenantScope, errorHandler } from './platform/middleware';
export type { TenantMiddlewareOptions } from './platform/middleware';
export { loadConfig, readEnvOverrides } from './config';
export { buildConnectionUrl, parseConnectionUrl, toKnexConfig } from './config/dsn';
export { createServer } from './server';
export { createLogger, logger } from './observability/logger';
export * from './shared/errors';
export type * from './shared/types';
