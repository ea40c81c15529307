// ──────────────────────────────────────────
// Configuration: file + environment + overrides, validated with zod
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { AppConfig } from '../shared/types';
import { ConfigError } from '../shared/errors';
import { deepMerge, isPlainObject, type PlainObject } from '../shared/objects';

const ENV_SECTIONS = ['server', 'logger', 'databases'] as const;

const booleanish = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off', ''].includes(normalized)) return false;
  return value;
}, z.boolean());

export const databaseConfigSchema = z.object({
  enable: booleanish.default(true),
  driver: z.enum(['postgresql', 'sqlite']).default('postgresql'),
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(5432),
  user: z.string().default('postgres'),
  password: z.string().default('postgres'),
  database: z.string().default('app'),
  echo: booleanish.default(false),
  pool_size: z.coerce.number().int().min(1).default(5),
  max_overflow: z.coerce.number().int().min(0).default(10),
  pool_timeout: z.coerce.number().positive().default(30),
  extra: z.record(z.coerce.string()).default({}),
});

const serverConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  tenant_enabled: booleanish.default(true),
  tenant_header: z.string().min(1).default('x-tenant-id'),
  default_tenant_id: z.string().min(1).default('default'),
});

const loggerConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: booleanish.default(false),
});

export const appConfigSchema = z.object({
  server: serverConfigSchema.default({}),
  logger: loggerConfigSchema.default({}),
  databases: z
    .record(databaseConfigSchema)
    .default({ default: {} })
    .refine((dbs) => 'default' in dbs, { message: 'databases.default is required' }),
});

/**
 * Load configuration. Later sources win:
 *   defaults → config file → environment (SECTION__KEY) → overrides.
 * A missing file falls back to defaults; only `.json` files are read.
 */
export function loadConfig(configPath?: string, overrides: PlainObject = {}): AppConfig {
  dotenv.config();

  let merged: PlainObject = {};
  if (configPath) merged = deepMerge(merged, readConfigFile(configPath));
  merged = deepMerge(merged, readEnvOverrides(process.env));
  merged = deepMerge(merged, overrides);

  const parsed = appConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigError(`Invalid configuration at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}

function readConfigFile(configPath: string): PlainObject {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) return {};

  if (path.extname(resolved).toLowerCase() !== '.json') {
    throw new ConfigError(`Unsupported config file format: ${path.basename(resolved)}`);
  }

  const text = fs.readFileSync(resolved, 'utf8');
  if (!text.trim()) return {};

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path.basename(resolved)} is not valid JSON`, { cause: err });
  }
  if (!isPlainObject(data)) {
    throw new ConfigError(`Config file ${path.basename(resolved)} must contain a JSON object`);
  }
  return data;
}

/**
 * `SERVER__PORT=9000` → `{ server: { port: '9000' } }`,
 * `DATABASES__MAIN__HOST=db` → `{ databases: { main: { host: 'db' } } }`.
 * Only the known top-level sections are picked up.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PlainObject {
  let result: PlainObject = {};
  for (const [name, value] of Object.entries(env)) {
    if (value === undefined || !name.includes('__')) continue;
    const segments = name.toLowerCase().split('__').filter(Boolean);
    const [section] = segments;
    if (segments.length < 2 || !ENV_SECTIONS.some((s) => s === section)) continue;

    const nested: PlainObject = {};
    let cursor = nested;
    segments.forEach((segment, i) => {
      if (i === segments.length - 1) {
        cursor[segment] = value;
      } else {
        const next: PlainObject = {};
        cursor[segment] = next;
        cursor = next;
      }
    });
    result = deepMerge(result, nested);
  }
  return result;
}
