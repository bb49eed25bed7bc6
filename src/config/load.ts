import * as fs from 'fs';
import * as os from 'os';
import * as YAML from 'yaml';
import { getCodecByName } from '../codec/registry.js';
import { ConfigError } from '../errors.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';
import type { LifespanMode, ServerConfig } from './types.js';

export function defaultSignals(): NodeJS.Signals[] {
  return process.platform === 'win32' ? ['SIGBREAK'] : ['SIGINT', 'SIGTERM'];
}

export function defaultConfig(): ServerConfig {
  return {
    host: '127.0.0.1',
    port: 8000,
    uds: null,
    codec: 'auto',
    lifespan: 'auto',
    rootPath: '',
    limitConcurrency: null,
    limitMaxRequests: null,
    limitRequestBody: null,
    timeoutKeepAliveMs: 5000,
    timeoutGracefulShutdownMs: null,
    readHighWater: 65536,
    readLowWater: 16384,
    writeHighWater: 65536,
    maxHeadSize: 16384,
    pipelineDepth: 1,
    serverHeader: true,
    dateHeader: true,
    headers: [],
    accessLog: true,
    signals: defaultSignals(),
    tickIntervalMs: 100,
    logLevel: 'info',
    logFile: null,
  };
}

interface Field<T> {
  env: string;
  parse(value: unknown, key: string): T;
}

function str(value: unknown, key: string): string {
  if (typeof value !== 'string') throw new ConfigError(`${key} must be a string`);
  return value;
}

function optStr(value: unknown, key: string): string | null {
  if (value === null || value === '') return null;
  return str(value, key);
}

function int(min: number) {
  return (value: unknown, key: string): number => {
    const n = typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value) : value;
    if (typeof n !== 'number' || !Number.isInteger(n)) throw new ConfigError(`${key} must be an integer`);
    if (n < min) throw new ConfigError(`${key} must be >= ${min}`);
    return n;
  };
}

function optInt(min: number) {
  const parse = int(min);
  return (value: unknown, key: string): number | null => {
    if (value === null || value === '' || value === 'none') return null;
    return parse(value, key);
  };
}

function bool(value: unknown, key: string): boolean {
  if (typeof value === 'boolean') return value;
  const s = String(value).toLowerCase();
  if (s === 'true' || s === '1') return true;
  if (s === 'false' || s === '0') return false;
  throw new ConfigError(`${key} must be a boolean`);
}

function lifespan(value: unknown, key: string): LifespanMode {
  if (value === 'auto' || value === 'on' || value === 'off') return value;
  throw new ConfigError(`${key} must be one of auto, on, off`);
}

function logLevel(value: unknown, key: string): LogLevel {
  if (typeof value === 'string' && isLogLevel(value)) return value;
  throw new ConfigError(`${key} must be one of debug, info, warn, error`);
}

function splitList(value: unknown, key: string): string[] {
  if (typeof value === 'string') return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  if (Array.isArray(value)) return value.map((v) => str(v, key));
  throw new ConfigError(`${key} must be a list`);
}

function headerPair(entry: string, key: string): [string, string] {
  const colon = entry.indexOf(':');
  if (colon <= 0) throw new ConfigError(`${key}: expected 'name: value', got '${entry}'`);
  return [entry.slice(0, colon).trim(), entry.slice(colon + 1).trim()];
}

function headers(value: unknown, key: string): Array<[string, string]> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.entries(value).map(([k, v]): [string, string] => [k, String(v)]);
  }
  return splitList(value, key).map((entry) => headerPair(entry, key));
}

function isSignal(name: string): name is NodeJS.Signals {
  return Object.prototype.hasOwnProperty.call(os.constants.signals, name);
}

function signals(value: unknown, key: string): NodeJS.Signals[] {
  return splitList(value, key).map((name) => {
    const upper = name.toUpperCase();
    if (!isSignal(upper)) throw new ConfigError(`${key}: unknown signal ${name}`);
    return upper;
  });
}

const FIELDS: { [K in keyof ServerConfig]: Field<ServerConfig[K]> } = {
  host: { env: 'TIDEWATER_HOST', parse: str },
  port: { env: 'TIDEWATER_PORT', parse: int(0) },
  uds: { env: 'TIDEWATER_UDS', parse: optStr },
  codec: { env: 'TIDEWATER_CODEC', parse: str },
  lifespan: { env: 'TIDEWATER_LIFESPAN', parse: lifespan },
  rootPath: { env: 'TIDEWATER_ROOT_PATH', parse: str },
  limitConcurrency: { env: 'TIDEWATER_LIMIT_CONCURRENCY', parse: optInt(1) },
  limitMaxRequests: { env: 'TIDEWATER_LIMIT_MAX_REQUESTS', parse: optInt(1) },
  limitRequestBody: { env: 'TIDEWATER_LIMIT_REQUEST_BODY', parse: optInt(0) },
  timeoutKeepAliveMs: { env: 'TIDEWATER_TIMEOUT_KEEP_ALIVE_MS', parse: int(1) },
  timeoutGracefulShutdownMs: { env: 'TIDEWATER_TIMEOUT_GRACEFUL_SHUTDOWN_MS', parse: optInt(0) },
  readHighWater: { env: 'TIDEWATER_READ_HIGH_WATER', parse: int(1) },
  readLowWater: { env: 'TIDEWATER_READ_LOW_WATER', parse: int(0) },
  writeHighWater: { env: 'TIDEWATER_WRITE_HIGH_WATER', parse: int(1) },
  maxHeadSize: { env: 'TIDEWATER_MAX_HEAD_SIZE', parse: int(64) },
  pipelineDepth: { env: 'TIDEWATER_PIPELINE_DEPTH', parse: int(1) },
  serverHeader: { env: 'TIDEWATER_SERVER_HEADER', parse: bool },
  dateHeader: { env: 'TIDEWATER_DATE_HEADER', parse: bool },
  headers: { env: 'TIDEWATER_HEADERS', parse: headers },
  accessLog: { env: 'TIDEWATER_ACCESS_LOG', parse: bool },
  signals: { env: 'TIDEWATER_SIGNALS', parse: signals },
  tickIntervalMs: { env: 'TIDEWATER_TICK_INTERVAL_MS', parse: int(1) },
  logLevel: { env: 'TIDEWATER_LOG_LEVEL', parse: logLevel },
  logFile: { env: 'TIDEWATER_LOG_FILE', parse: optStr },
};

function isConfigKey(key: string): key is keyof ServerConfig {
  return Object.prototype.hasOwnProperty.call(FIELDS, key);
}

const CONFIG_KEYS = Object.keys(FIELDS).filter(isConfigKey);

function assign<K extends keyof ServerConfig>(out: Partial<ServerConfig>, key: K, raw: unknown, source: string) {
  try {
    out[key] = FIELDS[key].parse(raw, key);
  } catch (e: unknown) {
    if (e instanceof ConfigError) throw new ConfigError(`${source}: ${e.message}`);
    throw e;
  }
}

export function configFromRecord(record: Record<string, unknown>, source = 'config'): Partial<ServerConfig> {
  const out: Partial<ServerConfig> = {};
  for (const [key, raw] of Object.entries(record)) {
    if (!isConfigKey(key)) throw new ConfigError(`${source}: unknown setting '${key}'`);
    assign(out, key, raw, source);
  }
  return out;
}

export function configFromEnv(env: NodeJS.ProcessEnv): Partial<ServerConfig> {
  const out: Partial<ServerConfig> = {};
  for (const key of CONFIG_KEYS) {
    const raw = env[FIELDS[key].env];
    if (raw !== undefined) assign(out, key, raw, FIELDS[key].env);
  }
  return out;
}

export class ConfigLoader {
  load(path: string): Partial<ServerConfig> {
    const content = fs.readFileSync(path, 'utf8');
    const parsed: unknown = YAML.parse(content);
    if (parsed === null || parsed === undefined) return {};
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(`${path}: top level must be a mapping`);
    }
    return configFromRecord(Object.fromEntries(Object.entries(parsed)), path);
  }
}

export function validateConfig(config: ServerConfig): void {
  if (config.port > 65535) throw new ConfigError('port must be <= 65535');
  if (config.readLowWater > config.readHighWater) {
    throw new ConfigError(`readLowWater (${config.readLowWater}) must not exceed readHighWater (${config.readHighWater})`);
  }
  if (config.maxHeadSize >= config.readHighWater) {
    // a head that cannot complete below the pause mark would stall the connection
    throw new ConfigError(`maxHeadSize (${config.maxHeadSize}) must be below readHighWater (${config.readHighWater})`);
  }
  if (config.pipelineDepth < 1) throw new ConfigError('pipelineDepth must be at least 1');
  if (!getCodecByName(config.codec)) throw new ConfigError(`Unknown wire codec '${config.codec}'`);
  if (config.rootPath && !config.rootPath.startsWith('/')) throw new ConfigError('rootPath must start with /');
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  file?: string | null;
  overrides?: Partial<ServerConfig>;
}

/** Defaults, then the YAML file, then TIDEWATER_* variables, then explicit overrides. */
export function loadConfig(opts: LoadConfigOptions = {}): ServerConfig {
  const env = opts.env ?? process.env;
  const file = opts.file === undefined ? env.TIDEWATER_CONFIG : opts.file;
  const config: ServerConfig = {
    ...defaultConfig(),
    ...(file ? new ConfigLoader().load(file) : {}),
    ...configFromEnv(env),
    ...opts.overrides,
  };
  validateConfig(config);
  return config;
}
