import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, DEFAULT_OUTCOME_CAPACITY } from '../../application/index.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const appConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().min(0).max(65_535).default(3000),
  }).default({}),
  log_level: z.enum(LOG_LEVELS).default('info'),
  event_log_dir: z.string().min(1).default('./data/event-log'),
  outcome_cache_capacity: z.number().int().min(1).default(DEFAULT_OUTCOME_CAPACITY),
  redis: z.object({
    url: z.string().min(1).optional(),
    lock_ttl_ms: z.number().int().min(100).default(30_000),
    acquire_timeout_ms: z.number().int().min(0).default(10_000),
  }).default({}),
  geo: z.object({
    maxmind_db_path: z.string().optional(),
  }).default({}),
  /** Destination name → raw destination config, validated per destination at build time. */
  destinations: z.record(z.unknown()).default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'sinkflow.json');

type Env = Readonly<Record<string, string | undefined>>;

function readConfigFile(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw new ConfigurationError('invalid_config', `Cannot read config file ${filePath}`, { cause: err });
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err: unknown) {
    throw new ConfigurationError('invalid_config', `Config file ${filePath} is not valid JSON`, { cause: err });
  }
}

/** Environment variables win over the file. */
function applyEnv(raw: unknown, env: Env): Record<string, unknown> {
  const base: Record<string, unknown> =
    typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? { ...raw } : {};

  const server: Record<string, unknown> =
    typeof base['server'] === 'object' && base['server'] !== null ? { ...base['server'] } : {};
  if (env['HOST'] !== undefined) server['host'] = env['HOST'];
  if (env['PORT'] !== undefined) server['port'] = Number(env['PORT']);
  base['server'] = server;

  if (env['LOG_LEVEL'] !== undefined) base['log_level'] = env['LOG_LEVEL'];
  if (env['EVENT_LOG_DIR'] !== undefined) base['event_log_dir'] = env['EVENT_LOG_DIR'];

  if (env['REDIS_URL'] !== undefined) {
    const redis: Record<string, unknown> =
      typeof base['redis'] === 'object' && base['redis'] !== null ? { ...base['redis'] } : {};
    redis['url'] = env['REDIS_URL'];
    base['redis'] = redis;
  }

  if (env['MAXMIND_DB_PATH'] !== undefined) {
    const geo: Record<string, unknown> =
      typeof base['geo'] === 'object' && base['geo'] !== null ? { ...base['geo'] } : {};
    geo['maxmind_db_path'] = env['MAXMIND_DB_PATH'];
    base['geo'] = geo;
  }

  return base;
}

/**
 * Loads application configuration from a JSON file.
 *
 * A missing file yields defaults. Unreadable or invalid files throw
 * ConfigurationError. `DATABASE_URL` is read by the postgres adapter when a
 * destination has no connection block.
 */
export function loadAppConfig(configPath?: string, env: Env = process.env): AppConfig {
  const filePath = configPath ?? env['CONFIG_PATH'] ?? DEFAULT_CONFIG_PATH;
  const raw = applyEnv(readConfigFile(filePath), env);

  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError('invalid_config', `Invalid config ${filePath}: ${issues}`);
  }
  return parsed.data;
}
