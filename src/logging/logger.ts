import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface LogEntry extends LogFields {
  ts: string;
  level: LogLevel;
  logger: string;
  msg: string;
}

export type LogSink = (entry: LogEntry) => void;

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

let minLevel: LogLevel = 'info';
let consoleEnabled = true;
let logStream: fs.WriteStream | null = null;
const sinks = new Set<LogSink>();
const loggers = new Map<string, Logger>();

export interface LoggingOptions {
  level?: LogLevel;
  console?: boolean;
  file?: string | null;
}

export function configureLogging(opts: LoggingOptions) {
  if (opts.level) minLevel = opts.level;
  if (opts.console !== undefined) consoleEnabled = opts.console;
  if (opts.file) initLogStream(opts.file);
}

export function initLogStream(logPath: string) {
  if (logStream) return;
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    logStream = fs.createWriteStream(logPath, { flags: 'a' });
    logStream.on('error', (err) => {
      console.error(`[LOG] Log stream error: ${err.message}`);
      logStream = null;
    });
  } catch (e: unknown) {
    console.error(`[LOG] Failed to initialize log stream: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function closeLogStream(): Promise<void> {
  const stream = logStream;
  logStream = null;
  if (!stream) return Promise.resolve();
  return new Promise((resolve) => stream.end(() => resolve()));
}

/** Attach an extra sink; returns a function that detaches it. */
export function addLogSink(sink: LogSink): () => void {
  sinks.add(sink);
  return () => {
    sinks.delete(sink);
  };
}

function enabled(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(minLevel);
}

function serializeField(value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message, stack: value.stack };
  if (Buffer.isBuffer(value)) return value.toString('latin1');
  return value;
}

function writeJsonl(entry: LogEntry) {
  if (!logStream) return;
  const out: LogFields = {};
  for (const [k, v] of Object.entries(entry)) out[k] = serializeField(v);
  try {
    logStream.write(JSON.stringify(out) + '\n');
  } catch (e: unknown) {
    console.error(`[LOG] Failed to write log entry: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function writeConsole(entry: LogEntry) {
  const line = `[${entry.logger.toUpperCase()}] ${entry.msg}`;
  const err = entry.err instanceof Error ? entry.err : undefined;
  switch (entry.level) {
    case 'error':
      if (err) console.error(line, err);
      else console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

export class Logger {
  constructor(readonly name: string) {}

  log(level: LogLevel, msg: string, fields?: LogFields) {
    if (!enabled(level)) return;
    const entry: LogEntry = { ...fields, ts: new Date().toISOString(), level, logger: this.name, msg };
    if (consoleEnabled) writeConsole(entry);
    writeJsonl(entry);
    for (const sink of sinks) sink(entry);
  }

  debug(msg: string, fields?: LogFields) { this.log('debug', msg, fields); }
  info(msg: string, fields?: LogFields) { this.log('info', msg, fields); }
  warn(msg: string, fields?: LogFields) { this.log('warn', msg, fields); }
  error(msg: string, fields?: LogFields) { this.log('error', msg, fields); }
}

export function getLogger(name: string): Logger {
  let logger = loggers.get(name);
  if (!logger) {
    logger = new Logger(name);
    loggers.set(name, logger);
  }
  return logger;
}
