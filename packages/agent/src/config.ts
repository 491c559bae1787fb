import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  DEFAULT_REFRESH_CONCURRENCY,
  DEFAULT_WATCH_INTERVAL_MS,
  FirstRefreshPolicy,
  MAX_TIMER_MS,
  MIN_WATCH_INTERVAL_MS,
} from '@hostsnap/shared';
import { isBuiltinCategory } from '@hostsnap/sources';
import { z } from 'zod';
import { ConfigError, errorMessage } from './runtime/errors.js';

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

function compiles(raw: string): boolean {
  try {
    new RegExp(raw, 'gi');
    return true;
  } catch {
    return false;
  }
}

export const AgentConfig = z.object({
  categories: z
    .array(z.string().refine(isBuiltinCategory, (name) => ({ message: `Unknown category "${name}"` })))
    .min(1)
    .optional(),
  queryTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
  concurrency: z.number().int().positive().default(DEFAULT_REFRESH_CONCURRENCY),
  firstRefresh: FirstRefreshPolicy.default('unchanged'),
  intervalMs: z
    .number()
    .int()
    .min(MIN_WATCH_INTERVAL_MS)
    .max(MAX_TIMER_MS)
    .default(DEFAULT_WATCH_INTERVAL_MS),
  scrubPatterns: z
    .array(z.string().refine(compiles, (raw) => ({ message: `Invalid regex "${raw}"` })))
    .default([]),
  logLevel: LogLevel.default('info'),
});
export type AgentConfig = z.infer<typeof AgentConfig>;

const FileContents = z.record(z.unknown());

const CONFIG_DIR = path.join(os.homedir(), '.hostsnap');
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.HOSTSNAP_CONFIG || CONFIG_FILE;
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

function readConfigFile(file: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err: unknown) {
    if (hasCode(err, 'ENOENT')) return {};
    throw new ConfigError(`Cannot read config at ${file}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Config file corrupted at ${file}: ${errorMessage(err)}`, { cause: err });
  }

  const contents = FileContents.safeParse(parsed);
  if (!contents.success) {
    throw new ConfigError(`Config file at ${file} must contain a JSON object`);
  }
  return contents.data;
}

/** Env values stay raw strings or numbers here; the schema rejects bad ones */
function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};

  if (env.HOSTSNAP_CATEGORIES) {
    out.categories = env.HOSTSNAP_CATEGORIES.split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
  }
  if (env.HOSTSNAP_QUERY_TIMEOUT_MS) out.queryTimeoutMs = Number(env.HOSTSNAP_QUERY_TIMEOUT_MS);
  if (env.HOSTSNAP_CONCURRENCY) out.concurrency = Number(env.HOSTSNAP_CONCURRENCY);
  if (env.HOSTSNAP_FIRST_REFRESH) out.firstRefresh = env.HOSTSNAP_FIRST_REFRESH;
  if (env.HOSTSNAP_INTERVAL_MS) out.intervalMs = Number(env.HOSTSNAP_INTERVAL_MS);
  if (env.HOSTSNAP_LOG_LEVEL) out.logLevel = env.HOSTSNAP_LOG_LEVEL;

  return out;
}

/**
 * Loads the config file (if any) and overlays environment variables.
 * Throws ConfigError when the file is unreadable or a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const file = getConfigPath(env);
  const parsed = AgentConfig.safeParse({ ...readConfigFile(file), ...readEnv(env) });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration (${issues})`);
  }
  return parsed.data;
}
