import { EventEmitter } from 'events';
import * as net from 'net';
import { defaultConfig } from '../src/config/load.js';
import type { ServerConfig } from '../src/config/types.js';
import { Server, type ServerOptions } from '../src/lifecycle/server.js';
import { addLogSink, configureLogging, type LogEntry } from '../src/logging/logger.js';
import type { Application, HttpScope, Receive, Send } from '../src/types.js';

configureLogging({ console: false, level: 'debug' });

export interface TestServer {
  server: Server;
  port: number;
  logs: LogEntry[];
  signals: EventEmitter;
  served: Promise<void>;
  stop(): Promise<void>;
}

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    ...defaultConfig(),
    port: 0,
    lifespan: 'off',
    accessLog: false,
    tickIntervalMs: 10,
    ...overrides,
  };
}

/** Serve `app` on an ephemeral localhost port with captured logs and a fake signal source. */
export async function startTestServer(
  app: Application,
  overrides: Partial<ServerConfig> = {},
  opts: ServerOptions = {},
): Promise<TestServer> {
  const logs: LogEntry[] = [];
  const detach = addLogSink((entry) => logs.push(entry));
  const signals = new EventEmitter();
  const server = new Server(app, testConfig(overrides), { signalSource: signals, ...opts });
  const served = server.serve().finally(detach);
  const addr = await server.ready;
  if (!addr || typeof addr === 'string') {
    await served;
    throw new Error('test server did not bind a TCP port');
  }
  return {
    server,
    port: addr.port,
    logs,
    signals,
    served,
    async stop() {
      server.stop();
      await served;
    },
  };
}

export function messages(logs: LogEntry[], level?: LogEntry['level']): string[] {
  return logs.filter((e) => !level || e.level === level).map((e) => e.msg);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until `check` holds or `timeoutMs` passes. */
export async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await delay(5);
  }
}

export interface RawResponse {
  status: number;
  reason: string;
  headers: Array<[string, string]>;
  body: Buffer;
}

export function header(res: RawResponse, name: string): string | undefined {
  const found = res.headers.find(([k]) => k === name);
  return found ? found[1] : undefined;
}

/** A plain TCP client that writes raw bytes and reads HTTP/1.1 responses back. */
export class RawClient {
  private buf = Buffer.alloc(0);
  private _closed = false;
  private listeners: Array<() => void> = [];
  private closedPromise: Promise<void>;

  private constructor(readonly socket: net.Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.buf = Buffer.concat([this.buf, chunk]);
      this.notify();
    });
    socket.on('error', () => this.notify());
    this.closedPromise = new Promise((resolve) => {
      socket.on('close', () => {
        this._closed = true;
        this.notify();
        resolve();
      });
    });
  }

  static connect(port: number): Promise<RawClient> {
    return new Promise((resolve, reject) => {
      const socket = net.connect(port, '127.0.0.1', () => resolve(new RawClient(socket)));
      socket.once('error', reject);
    });
  }

  get closed(): boolean {
    return this._closed;
  }

  get pending(): number {
    return this.buf.length;
  }

  write(data: string | Buffer) {
    this.socket.write(data);
  }

  end() {
    this.socket.end();
  }

  destroy() {
    this.socket.destroy();
  }

  waitClosed(): Promise<void> {
    return this.closedPromise;
  }

  async readResponse(opts: { head?: boolean } = {}): Promise<RawResponse> {
    for (;;) {
      const res = this.tryParse(opts.head ?? false);
      if (res) return res;
      if (this._closed) throw new Error('connection closed before a complete response');
      await new Promise<void>((resolve) => this.listeners.push(resolve));
    }
  }

  private notify() {
    const listeners = this.listeners;
    this.listeners = [];
    for (const l of listeners) l();
  }

  private tryParse(head: boolean): RawResponse | null {
    const end = this.buf.indexOf('\r\n\r\n');
    if (end < 0) return null;
    const lines = this.buf.subarray(0, end).toString('latin1').split('\r\n');
    const m = /^HTTP\/1\.[01] (\d{3}) ?(.*)$/.exec(lines[0]);
    if (!m) throw new Error(`bad status line: ${lines[0]}`);
    const status = Number(m[1]);
    const headers = lines.slice(1).map((l): [string, string] => {
      const colon = l.indexOf(':');
      return [l.slice(0, colon).toLowerCase(), l.slice(colon + 1).trim()];
    });
    const res: RawResponse = { status, reason: m[2], headers, body: Buffer.alloc(0) };
    let offset = end + 4;

    const te = header(res, 'transfer-encoding');
    const cl = header(res, 'content-length');
    if (head || status < 200 || status === 204 || status === 304) {
      // no body
    } else if (te === 'chunked') {
      const parts: Buffer[] = [];
      for (;;) {
        const lineEnd = this.buf.indexOf('\r\n', offset);
        if (lineEnd < 0) return null;
        const size = parseInt(this.buf.subarray(offset, lineEnd).toString('latin1'), 16);
        const dataStart = lineEnd + 2;
        if (size === 0) {
          if (this.buf.length < dataStart + 2) return null;
          offset = dataStart + 2;
          break;
        }
        if (this.buf.length < dataStart + size + 2) return null;
        parts.push(this.buf.subarray(dataStart, dataStart + size));
        offset = dataStart + size + 2;
      }
      res.body = Buffer.concat(parts);
    } else if (cl !== undefined) {
      const len = Number(cl);
      if (this.buf.length < offset + len) return null;
      res.body = this.buf.subarray(offset, offset + len);
      offset += len;
    } else {
      if (!this._closed) return null;
      res.body = this.buf.subarray(offset);
      offset = this.buf.length;
    }
    this.buf = this.buf.subarray(offset);
    return res;
  }
}

/** Open a connection, send `raw`, read one response. */
export async function rawRequest(port: number, raw: string | Buffer, opts: { head?: boolean } = {}): Promise<RawResponse> {
  const client = await RawClient.connect(port);
  try {
    client.write(raw);
    return await client.readResponse(opts);
  } finally {
    client.destroy();
  }
}

export async function readAll(receive: Receive): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for (;;) {
    const event = await receive();
    if (event.type !== 'http.request') return Buffer.concat(chunks);
    chunks.push(event.body);
    if (!event.moreBody) return Buffer.concat(chunks);
  }
}

export async function respond(send: Send, status: number, text: string, headers: Array<[string, string]> = []) {
  const body = Buffer.from(text);
  await send({
    type: 'http.response.start',
    status,
    headers: [['content-type', 'text/plain'], ['content-length', String(body.length)], ...headers],
  });
  await send({ type: 'http.response.body', body });
}

/** Application answering `text` after reading the whole body. */
export function textApp(text: string | ((scope: HttpScope) => string)): Application {
  return async (scope, receive, send) => {
    if (scope.type !== 'http') return;
    await readAll(receive);
    await respond(send, 200, typeof text === 'string' ? text : text(scope));
  };
}
