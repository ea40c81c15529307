// ──────────────────────────────────────────
// HTTP server — Express app wired to the session manager
// ──────────────────────────────────────────

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { ServerConfig } from './shared/types';
import type { SessionManager } from './db/session-manager';
import { tenantScope, errorHandler } from './platform/middleware';
import type { Logger } from './observability/logger';

export function createServer(manager: SessionManager, config: ServerConfig, log?: Logger): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Administrative: registered tenant ids
  app.get('/api/v1/tenants', (_req, res) => {
    res.json({ tenants: manager.registry.listTenants() });
  });

  const api = express.Router();
  api.use(tenantScope(config, manager.context));

  // GET /db/ping — round-trip to the current tenant's database
  api.get('/db/ping', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const tenantId = manager.context.require();
      await manager.withSession(async (session) => {
        await session.raw('select 1');
      });
      res.json({ tenant_id: tenantId, ok: true });
    } catch (err) {
      next(err);
    }
  });

  app.use('/api/v1', api);
  app.use(errorHandler(log));

  return app;
}
