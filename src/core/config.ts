import { existsSync, readFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ConfigSchema = z.object({
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
    })
    .default({}),
  parser: z
    .object({
      maxRangeItems: z.number().int().min(1).max(1000).default(50),
    })
    .default({}),
  resolver: z
    .object({
      cacheTtlMs: z.number().int().min(0).default(60 * 60 * 1000),
      scanLimit: z.number().int().min(0).default(200),
    })
    .default({}),
  pacing: z
    .object({
      standardIntervalMs: z.number().int().min(0).default(3000),
      privilegedIntervalMs: z.number().int().min(0).default(1000),
      backoffCapMs: z.number().int().min(0).default(300_000),
      defaultBackoffMs: z.number().int().min(0).default(5000),
    })
    .default({}),
  callers: z
    .object({
      privileged: z.array(z.union([z.string(), z.number()])).default([]),
    })
    .default({}),
  provider: z
    .object({
      callTimeoutMs: z.number().int().min(1).default(30_000),
      transferTimeoutMs: z.number().int().min(1).default(10 * 60 * 1000),
    })
    .default({}),
  relay: z
    .object({
      maxMediaBytes: z.number().int().min(0).default(2 * 1024 * 1024 * 1024),
    })
    .default({}),
  batch: z
    .object({
      progressEvery: z.number().int().min(1).default(10),
    })
    .default({}),
  storage: z
    .object({
      dbPath: z.string().default('~/.courier/courier.sqlite'),
      tempPath: z.string().default(join(tmpdir(), 'courier')),
      downloadsPath: z.string().default('~/.courier/downloads'),
    })
    .default({}),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type CourierConfig = z.infer<typeof ConfigSchema>;
export type CourierConfigInput = z.input<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a raw (already parsed) config object, fill defaults and expand `~/` paths.
 */
export function parseConfig(raw: unknown): CourierConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const cfg = result.data;
  cfg.storage.dbPath = expandHome(cfg.storage.dbPath);
  cfg.storage.tempPath = expandHome(cfg.storage.tempPath);
  cfg.storage.downloadsPath = expandHome(cfg.storage.downloadsPath);
  return cfg;
}

export function loadConfig(configPath?: string): CourierConfig {
  const path =
    configPath ??
    process.env.COURIER_CONFIG_PATH ??
    join(homedir(), '.courier', 'config.yaml');

  let parsed: unknown = {};
  if (existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    parsed = yaml.parse(raw) ?? {};
  } else if (configPath) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  const cfg = parseConfig(parsed);

  const envDbPath = process.env.COURIER_DB_PATH;
  if (envDbPath) {
    cfg.storage.dbPath = expandHome(envDbPath);
  }

  const envLevel = LogLevelSchema.safeParse((process.env.COURIER_LOG_LEVEL ?? '').toLowerCase());
  if (envLevel.success) {
    cfg.logging.level = envLevel.data;
  }

  return cfg;
}
