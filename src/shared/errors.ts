// ──────────────────────────────────────────
// Error taxonomy
// ──────────────────────────────────────────

/**
 * Base error for everything raised by the session manager itself.
 * Driver errors are never wrapped in it; they pass through as thrown.
 */
export class TenantDbError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TenantDbError';
  }
}

export class TenantNotFoundError extends TenantDbError {
  constructor(public readonly tenantId: string) {
    super('TENANT_NOT_FOUND', `Tenant "${tenantId}" is not registered`);
    this.name = 'TenantNotFoundError';
  }
}

export class NoTenantContextError extends TenantDbError {
  constructor() {
    super('NO_TENANT_CONTEXT', 'No tenant context: the current unit of work is not scoped to a tenant');
    this.name = 'NoTenantContextError';
  }
}

/**
 * Rolling back after a failed body did not succeed. Reported alongside the
 * original failure, which is still the error the caller receives.
 */
export class RollbackError extends TenantDbError {
  constructor(
    public readonly tenantId: string,
    cause: unknown,
    public readonly originalError: unknown
  ) {
    super('ROLLBACK_FAILED', `Rollback failed for tenant "${tenantId}": ${describe(cause)}`, { cause });
    this.name = 'RollbackError';
  }
}

export class SessionStateError extends TenantDbError {
  constructor(message: string) {
    super('INVALID_SESSION_STATE', message);
    this.name = 'SessionStateError';
  }
}

export class SessionManagerClosedError extends TenantDbError {
  constructor() {
    super('MANAGER_CLOSED', 'Session manager has been shut down');
    this.name = 'SessionManagerClosedError';
  }
}

export class ConfigError extends TenantDbError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', message, options);
    this.name = 'ConfigError';
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
