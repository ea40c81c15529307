// ──────────────────────────────────────────
// Platform: Tenant registry
// ──────────────────────────────────────────

import { z } from 'zod';
import type { AppConfig, TenantDescriptor, TenantDescriptorInput } from '../shared/types';
import { ConfigError, TenantNotFoundError } from '../shared/errors';
import { buildConnectionUrl, parseConnectionUrl } from '../config/dsn';

export const DEFAULT_POOL_OPTIONS = {
  size: 5,
  max_overflow: 10,
  timeout: 30,
  echo: false,
} as const;

const descriptorInputSchema = z.object({
  connection_url: z.string().min(1),
  pool_options: z
    .object({
      size: z.number().int().min(1),
      max_overflow: z.number().int().min(0),
      timeout: z.number().positive(),
      echo: z.boolean(),
      extra: z.record(z.string()),
    })
    .partial()
    .default({}),
});

/**
 * Tenant id → connection descriptor. Pure metadata: registering a tenant
 * builds no pool. Replacing a descriptor does not touch an engine that is
 * already cached for that tenant; evict it to pick up the new settings.
 */
export class TenantRegistry {
  private descriptors = new Map<string, TenantDescriptor>();

  static fromConfig(config: AppConfig): TenantRegistry {
    const registry = new TenantRegistry();
    for (const [tenantId, db] of Object.entries(config.databases)) {
      if (!db.enable) continue;
      registry.register(tenantId, {
        connection_url: buildConnectionUrl(db),
        pool_options: {
          size: db.pool_size,
          max_overflow: db.max_overflow,
          timeout: db.pool_timeout,
          echo: db.echo,
          extra: db.extra,
        },
      });
    }
    return registry;
  }

  register(tenantId: string, input: string | TenantDescriptorInput): TenantDescriptor {
    if (!tenantId) {
      throw new ConfigError('Tenant id must be a non-empty string');
    }

    const parsed = descriptorInputSchema.safeParse(
      typeof input === 'string' ? { connection_url: input } : input
    );
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(
        `Invalid descriptor for tenant "${tenantId}": ${issue?.path.join('.') || '(root)'} ${issue?.message ?? ''}`.trim()
      );
    }

    // Rejects unsupported schemes at registration rather than at first use.
    parseConnectionUrl(parsed.data.connection_url);

    const options = parsed.data.pool_options;
    const descriptor: TenantDescriptor = Object.freeze({
      tenant_id: tenantId,
      connection_url: parsed.data.connection_url,
      pool_options: Object.freeze({
        size: options.size ?? DEFAULT_POOL_OPTIONS.size,
        max_overflow: options.max_overflow ?? DEFAULT_POOL_OPTIONS.max_overflow,
        timeout: options.timeout ?? DEFAULT_POOL_OPTIONS.timeout,
        echo: options.echo ?? DEFAULT_POOL_OPTIONS.echo,
        extra: Object.freeze({ ...options.extra }),
      }),
    });

    this.descriptors.set(tenantId, descriptor);
    return descriptor;
  }

  /** Replace the whole mapping (administrative reload). */
  reload(entries: Record<string, string | TenantDescriptorInput>): void {
    const next = new TenantRegistry();
    for (const [tenantId, input] of Object.entries(entries)) {
      next.register(tenantId, input);
    }
    this.descriptors = next.descriptors;
  }

  unregister(tenantId: string): boolean {
    return this.descriptors.delete(tenantId);
  }

  resolve(tenantId: string): TenantDescriptor {
    const descriptor = this.descriptors.get(tenantId);
    if (!descriptor) {
      throw new TenantNotFoundError(tenantId);
    }
    return descriptor;
  }

  has(tenantId: string): boolean {
    return this.descriptors.has(tenantId);
  }

  listTenants(): string[] {
    return [...this.descriptors.keys()].sort();
  }
}
