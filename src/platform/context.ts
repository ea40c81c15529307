// ──────────────────────────────────────────
// Platform: AsyncLocalStorage-based tenant context
// ──────────────────────────────────────────

import { AsyncLocalStorage } from 'async_hooks';
import { NoTenantContextError } from '../shared/errors';

interface TenantFrame {
  tenantId: string | undefined;
}

export interface RestoreToken {
  readonly frame: TenantFrame;
  readonly previous: string | undefined;
}

/**
 * Carries the active tenant id through one unit of work (a request or a
 * background task). Each unit of work gets its own frame, so concurrent
 * units never see each other's tenant.
 */
export class TenantContextCarrier {
  private readonly storage = new AsyncLocalStorage<TenantFrame>();

  /** Run `fn` with `tenantId` active; the previous value is back once `fn` settles. */
  run<T>(tenantId: string, fn: () => T): T {
    return this.storage.run({ tenantId }, fn);
  }

  /** Open an empty frame for a unit of work that will call `setCurrent` itself. */
  isolate<T>(fn: () => T): T {
    return this.storage.run({ tenantId: undefined }, fn);
  }

  /**
   * Set the tenant for the current frame. Pair with `restore` in a `finally`.
   * Outside any frame one is entered for the current async execution.
   */
  setCurrent(tenantId: string): RestoreToken {
    let frame = this.storage.getStore();
    if (!frame) {
      frame = { tenantId: undefined };
      this.storage.enterWith(frame);
    }
    const token: RestoreToken = { frame, previous: frame.tenantId };
    frame.tenantId = tenantId;
    return token;
  }

  restore(token: RestoreToken): void {
    token.frame.tenantId = token.previous;
  }

  getCurrent(): string | undefined {
    return this.storage.getStore()?.tenantId;
  }

  require(): string {
    const tenantId = this.getCurrent();
    if (!tenantId) {
      throw new NoTenantContextError();
    }
    return tenantId;
  }
}

export const tenantContext = new TenantContextCarrier();

export function withTenantScope<T>(tenantId: string, fn: () => T): T {
  return tenantContext.run(tenantId, fn);
}

export function getTenantId(): string {
  return tenantContext.require();
}
