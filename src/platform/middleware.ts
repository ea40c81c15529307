// ──────────────────────────────────────────
// Platform: tenant resolution + error translation middleware
// ──────────────────────────────────────────

import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import type { ServerConfig } from '../shared/types';
import { ConfigError, NoTenantContextError, TenantNotFoundError } from '../shared/errors';
import { tenantContext, type TenantContextCarrier } from './context';
import { logger, type Logger } from '../observability/logger';

export type TenantMiddlewareOptions = Pick<ServerConfig, 'tenant_enabled' | 'tenant_header' | 'default_tenant_id'>;

/**
 * Resolve the tenant for a request and run the rest of the pipeline inside
 * its scope. With multi-tenancy disabled every request gets the default tenant.
 */
export function tenantScope(
  options: TenantMiddlewareOptions,
  context: TenantContextCarrier = tenantContext
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!options.tenant_enabled) {
      context.run(options.default_tenant_id, () => next());
      return;
    }

    const tenantId = req.get(options.tenant_header)?.trim();
    if (!tenantId) {
      res.status(400).json({ error: `${options.tenant_header} header is required` });
      return;
    }

    context.run(tenantId, () => next());
  };
}

export function errorHandler(log: Logger = logger.child({ component: 'Http' })): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof TenantNotFoundError) {
      res.status(404).json({ error: 'Unknown tenant', code: err.code, tenant_id: err.tenantId });
      return;
    }
    if (err instanceof NoTenantContextError || err instanceof ConfigError) {
      res.status(400).json({ error: err.message, code: err.code });
      return;
    }

    log.error({ err, method: req.method, path: req.path }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal error' });
  };
}
