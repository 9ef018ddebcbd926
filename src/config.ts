import path from 'node:path';
import yaml from 'js-yaml';

import { ConfigError } from './errors.js';
import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';
import { fileExists, readText } from './todo/fs.js';
import { DEFAULT_CATEGORIES } from './todo/types.js';

export const CONFIG_FILE_NAME = 'todo.config.yaml';
export const TASKS_FILE_NAME = 'tasks.json';

export interface AppConfig {
  dataDir: string;
  dataFile: string;
  categories: string[];
  // unset means each entry point picks its own default
  logLevel?: LogLevel;
  timeZone?: string;
  host: string;
  port: number;
  reminderIntervalMs: number;
  cors: boolean;
  corsOrigin?: string;
}

// All scalars are strings: the file is read with the FAILSAFE schema.
export interface ConfigFileV1 {
  dataDir?: string;
  categories?: string[];
  logLevel?: string;
  timeZone?: string;
  host?: string;
  port?: string;
  reminderIntervalMs?: string;
}

const FILE_KEYS = new Set<string>(['dataDir', 'categories', 'logLevel', 'timeZone', 'host', 'port', 'reminderIntervalMs']);

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export function parseConfigYaml(text: string): ConfigFileV1 {
  const data: unknown = yaml.load(text, { schema: yaml.FAILSAFE_SCHEMA }) ?? {};
  if (!isRecord(data)) throw new ConfigError('(root)', 'expected a mapping');

  const out: ConfigFileV1 = {};
  for (const key of Object.keys(data)) {
    if (!FILE_KEYS.has(key)) throw new ConfigError(key, 'unknown key');
  }

  for (const key of ['dataDir', 'logLevel', 'timeZone', 'host', 'port', 'reminderIntervalMs'] as const) {
    const v = data[key];
    if (v === undefined) continue;
    if (!isString(v)) throw new ConfigError(key, 'must be a string');
    out[key] = v;
  }

  if (data.categories !== undefined) {
    const cats = data.categories;
    if (!Array.isArray(cats) || !cats.every(isString)) throw new ConfigError('categories', 'must be a list of strings');
    out.categories = cats;
  }

  return out;
}

function parsePort(raw: string, key: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new ConfigError(key, `not a port number: ${raw}`);
  return n;
}

function parseInterval(raw: string, key: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 50) throw new ConfigError(key, `must be a number of milliseconds >= 50: ${raw}`);
  return n;
}

function parseCategories(list: string[]): string[] {
  const out: string[] = [];
  for (const c of list) {
    const t = c.trim();
    if (!t) throw new ConfigError('categories', 'entries must be non-empty');
    if (!out.includes(t)) out.push(t);
  }
  if (!out.length) throw new ConfigError('categories', 'must not be empty');
  return out;
}

function checkTimeZone(tz: string, key: string): string {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
  } catch {
    throw new ConfigError(key, `unknown time zone: ${tz}`);
  }
  return tz;
}

function isTruthyFlag(v: string | undefined): boolean {
  return v === '1' || v === 'true';
}

export function resolveConfigPath(cwd: string, env: NodeJS.ProcessEnv = process.env): string {
  return env.TODO_CONFIG ? path.resolve(cwd, env.TODO_CONFIG) : path.join(cwd, CONFIG_FILE_NAME);
}

export async function readConfigFile(p: string): Promise<ConfigFileV1> {
  if (!(await fileExists(p))) return {};
  return parseConfigYaml(await readText(p));
}

/** Merges defaults, the optional YAML file and environment overrides (in that order). */
export function resolveConfig(file: ConfigFileV1, opts: { cwd: string; env?: NodeJS.ProcessEnv }): AppConfig {
  const env = opts.env ?? process.env;

  const dataDir = path.resolve(opts.cwd, env.TODO_DATA_DIR ?? file.dataDir ?? 'data');

  const levelRaw = env.TODO_LOG_LEVEL ?? file.logLevel;
  if (levelRaw !== undefined && !isLogLevel(levelRaw)) throw new ConfigError('logLevel', `unknown level: ${levelRaw}`);

  const tzRaw = env.TODO_TIMEZONE ?? file.timeZone;
  const portRaw = env.PORT ?? file.port;
  const intervalRaw = env.TODO_REMINDER_INTERVAL_MS ?? file.reminderIntervalMs;

  return {
    dataDir,
    dataFile: path.join(dataDir, TASKS_FILE_NAME),
    categories: parseCategories(file.categories ?? [...DEFAULT_CATEGORIES]),
    logLevel: levelRaw,
    timeZone: tzRaw ? checkTimeZone(tzRaw, 'timeZone') : undefined,
    host: env.HOST ?? file.host ?? '127.0.0.1',
    port: portRaw !== undefined ? parsePort(portRaw, 'port') : 8787,
    reminderIntervalMs: intervalRaw !== undefined ? parseInterval(intervalRaw, 'reminderIntervalMs') : 1000,
    cors: isTruthyFlag(env.CORS),
    corsOrigin: env.CORS_ORIGIN
  };
}

export async function loadConfig(opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): Promise<AppConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const file = await readConfigFile(resolveConfigPath(cwd, env));
  return resolveConfig(file, { cwd, env });
}
