import { AsyncResource } from 'async_hooks';
import * as net from 'net';
import type { RequestHead, RequestParser, WireCodec } from '../codec/types.js';
import type { ServerConfig } from '../config/types.js';
import { BackpressureExceeded, type ParseFailure } from '../errors.js';
import { FlowController } from '../flow/flow-control.js';
import { getLogger } from '../logging/logger.js';
import type { Address, Application, HeaderPair, HttpScope, StateBag } from '../types.js';
import { RequestCycle, type CycleTransport } from './request-cycle.js';
import { HandlerTask } from './task.js';

const logger = getLogger('http');
const accessLogger = getLogger('access');

export type ConnectionPhase =
  | 'awaiting-request'
  | 'reading-body'
  | 'awaiting-response'
  | 'writing-response'
  | 'closing'
  | 'closed';

/** Process-wide state shared by every connection of one server. */
export interface ServerState {
  totalRequests: number;
  connections: Set<HttpConnection>;
  tasks: Set<HandlerTask>;
  defaultHeaders: HeaderPair[];
  lifespanState: StateBag;
}

export interface ConnectionOptions {
  app: Application;
  config: ServerConfig;
  codec: WireCodec;
  state: ServerState;
}

interface RequestFailure {
  status: number;
  message: string;
}

let connCounter = 0;

function textResponse(message: string) {
  const body = Buffer.from(message, 'utf8');
  return {
    body,
    headers: [
      ['content-type', 'text/plain; charset=utf-8'],
      ['connection', 'close'],
      ['content-length', String(body.length)],
    ] satisfies Array<[string, string]>,
  };
}

const serviceUnavailable: Application = async (_scope, _receive, send) => {
  const { body, headers } = textResponse('Service Unavailable');
  await send({ type: 'http.response.start', status: 503, headers });
  await send({ type: 'http.response.body', body, moreBody: false });
};

function socketAddress(host: string | undefined, port: number | undefined): Address | null {
  if (!host || port === undefined) return null;
  return [host, port];
}

// Percent-decoding that leaves malformed escapes as they are.
function unquote(raw: string): string {
  if (!raw.includes('%')) return raw;
  const bytes: number[] = [];
  for (let i = 0; i < raw.length; i++) {
    const c = raw.charCodeAt(i);
    if (c === 0x25 && /^[0-9A-Fa-f]{2}$/.test(raw.slice(i + 1, i + 3))) {
      bytes.push(parseInt(raw.slice(i + 1, i + 3), 16));
      i += 2;
    } else {
      bytes.push(c & 0xff);
    }
  }
  return Buffer.from(bytes).toString('utf8');
}

function splitTarget(target: string): { rawPath: string; query: string } {
  let rest = target;
  // absolute-form: keep only the path
  const abs = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^/?]*/.exec(rest);
  if (abs) rest = rest.slice(abs[0].length) || '/';
  const q = rest.indexOf('?');
  if (q < 0) return { rawPath: rest, query: '' };
  return { rawPath: rest.slice(0, q), query: rest.slice(q + 1) };
}

/**
 * Owns one socket: feeds the parser, sequences request cycles against the
 * application one at a time, and applies the flow controller's pause/resume.
 */
export class HttpConnection implements CycleTransport {
  readonly id: string;
  readonly flow: FlowController;
  readonly codec: WireCodec;

  private parser: RequestParser;
  private _phase: ConnectionPhase = 'awaiting-request';
  // cycles awaiting their response, in request order; [0] is the active one
  private queue: RequestCycle[] = [];
  // cycle whose body the parser is currently producing
  private parseTarget: RequestCycle | null = null;
  private tasks = new Set<HandlerTask>();
  private pendingFailure: RequestFailure | null = null;
  private parsingStopped = false;
  private closeRequested = false;
  private keepAliveTimer: NodeJS.Timeout | null = null;
  private requestCount = 0;
  private bytesRead = 0;
  private bytesWritten = 0;
  private connState: StateBag;
  private client: Address | null;
  private server: Address | null;
  // context every handler task starts from
  private root: AsyncResource;

  constructor(private socket: net.Socket, private opts: ConnectionOptions) {
    this.id = `conn-${++connCounter}`;
    this.codec = opts.codec;
    this.flow = new FlowController(opts.config);
    this.parser = opts.codec.createParser({ maxHeadSize: opts.config.maxHeadSize });
    this.connState = { ...opts.state.lifespanState };
    this.client = socketAddress(socket.remoteAddress, socket.remotePort);
    this.server = socketAddress(socket.localAddress, socket.localPort);
    this.root = new AsyncResource('tidewater.connection');
  }

  get phase(): ConnectionPhase {
    return this._phase;
  }

  get defaultHeaders(): readonly HeaderPair[] {
    return this.opts.state.defaultHeaders;
  }

  get idle(): boolean {
    return this.queue.length === 0 && this.parseTarget === null;
  }

  start() {
    this.opts.state.connections.add(this);
    this.socket.setNoDelay(true);
    this.socket.on('data', (chunk: Buffer) => this.onData(chunk));
    this.socket.on('error', (err: Error) => {
      logger.debug(`Socket error on ${this.id}: ${err.message}`, { connId: this.id });
    });
    this.socket.on('close', () => this.onClose());
    logger.debug('Connection made', { connId: this.id, client: this.client });
    this.armKeepAlive();
  }

  /** Graceful close: finish the in-flight response, accept nothing new. */
  shutdown() {
    if (this.closeRequested) return;
    this.closeRequested = true;
    if (this.queue.length === 0) {
      this.closeAfterFlush();
      return;
    }
    for (const cycle of this.queue) cycle.requestClose();
  }

  /** Cancel every handler task and drop the socket now. */
  forceClose(reason = 'forced shutdown') {
    for (const task of this.tasks) task.cancel(reason);
    this.abort(reason);
  }

  // ---- CycleTransport ----

  write(data: Buffer) {
    if (data.length === 0 || this.socket.destroyed || !this.socket.writable) return;
    const n = data.length;
    this.bytesWritten += n;
    this.flow.onBytesQueuedForWrite(n);
    this.socket.write(data, () => this.flow.onBytesFlushed(n));
  }

  abort(reason: string) {
    if (this._phase === 'closed') return;
    logger.debug(`Aborting ${this.id}: ${reason}`, { connId: this.id });
    this._phase = 'closing';
    this.socket.destroy();
  }

  onBodyConsumed() {
    this.checkReadFlow();
  }

  onResponseStart(cycle: RequestCycle, status: number) {
    if (cycle === this.queue[0]) this._phase = 'writing-response';
    if (!this.opts.config.accessLog) return;
    const { scope } = cycle;
    const client = scope.client ? `${scope.client[0]}:${scope.client[1]}` : '-';
    const query = scope.queryString.length > 0 ? `?${scope.queryString.toString('latin1')}` : '';
    accessLogger.info(`${client} - "${scope.method} ${scope.path}${query} HTTP/${scope.httpVersion}" ${status}`, {
      connId: this.id,
      status,
    });
  }

  onResponseComplete(cycle: RequestCycle) {
    const idx = this.queue.indexOf(cycle);
    if (idx >= 0) this.queue.splice(idx, 1);
    cycle.releaseQueued();

    if (this.pendingFailure && this.queue.length === 0) {
      this.failNow(this.pendingFailure);
      return;
    }
    if (!cycle.keepAlive || this.closeRequested) {
      this.closeAfterFlush();
      return;
    }

    if (this.queue.length > 0) {
      this.startNext();
    } else {
      this._phase = 'awaiting-request';
    }
    this.pump();
    this.armKeepAlive();
  }

  // ---- socket side ----

  private onData(chunk: Buffer) {
    if (this._phase === 'closed') return;
    this.clearKeepAlive();
    this.bytesRead += chunk.length;
    this.flow.onBytesRead(chunk.length);
    this.parser.feed(chunk);
    this.pump();
    this.armKeepAlive();
  }

  private onClose() {
    if (this._phase === 'closed') return;
    this._phase = 'closed';
    this.clearKeepAlive();
    if (this.parseTarget && !this.queue.includes(this.parseTarget)) this.parseTarget.disconnect();
    for (const cycle of this.queue) cycle.disconnect();
    this.queue = [];
    this.parseTarget = null;
    this.flow.release();
    this.opts.state.connections.delete(this);
    logger.debug('Connection lost', {
      connId: this.id,
      requests: this.requestCount,
      bytesRead: this.bytesRead,
      bytesWritten: this.bytesWritten,
    });
    this.root.emitDestroy();
  }

  private pump() {
    while (!this.parsingStopped && this._phase !== 'closing' && this._phase !== 'closed') {
      if (this.parser.atMessageBoundary && !this.canAcceptRequest()) break;
      const event = this.parser.parseNextEvent();
      if (!event) break;
      switch (event.type) {
        case 'head':
          this.flow.onBytesConsumed(event.size);
          this.onHead(event.head);
          break;
        case 'body':
          this.flow.onBytesConsumed(event.size - event.data.length);
          this.onBody(event.data);
          break;
        case 'end':
          this.flow.onBytesConsumed(event.size);
          this.onEnd();
          break;
        case 'error':
          this.onParseError(event.error);
          break;
      }
    }
    this.checkReadFlow();
  }

  private canAcceptRequest(): boolean {
    if (this.closeRequested) return false;
    if (this.queue.length >= this.opts.config.pipelineDepth) return false;
    const last = this.queue[this.queue.length - 1];
    return !last || last.keepAlive;
  }

  private checkReadFlow() {
    if (this._phase === 'closed') return;
    if (this.flow.shouldPauseReading()) {
      this.socket.pause();
      logger.debug(`Paused reading on ${this.id}`, { connId: this.id, ...this.flow.snapshot() });
    } else if (this.flow.shouldResumeReading()) {
      this.socket.resume();
      logger.debug(`Resumed reading on ${this.id}`, { connId: this.id, ...this.flow.snapshot() });
    }
  }

  private buildScope(head: RequestHead): HttpScope {
    const { rawPath, query } = splitTarget(head.target.toString('latin1'));
    const rootPath = this.opts.config.rootPath;
    const scope: HttpScope = {
      type: 'http',
      httpVersion: head.httpVersion,
      method: head.method,
      scheme: 'http',
      path: rootPath + unquote(rawPath),
      rawPath: Buffer.from(rootPath + rawPath, 'latin1'),
      queryString: Buffer.from(query, 'latin1'),
      rootPath,
      headers: Object.freeze(head.headers.slice()),
      client: this.client,
      server: this.server,
      state: this.connState,
    };
    return Object.freeze(scope);
  }

  private onHead(head: RequestHead) {
    this.requestCount++;
    this.opts.state.totalRequests++;
    if (head.upgrade) logger.warn('Unsupported upgrade request.', { connId: this.id });

    const cycle = new RequestCycle(this.buildScope(head), head, this);
    if (this.closeRequested) cycle.requestClose();
    this.parseTarget = cycle;
    this.queue.push(cycle);
    if (this.queue.length === 1) {
      this._phase = head.contentLength === 0 ? 'awaiting-response' : 'reading-body';
      this.startNext();
    }
  }

  private onBody(data: Buffer) {
    const cycle = this.parseTarget;
    if (!cycle) {
      this.flow.discardRead(data.length);
      return;
    }
    cycle.receivedBytes += data.length;
    const limit = this.opts.config.limitRequestBody;
    if (limit !== null && cycle.receivedBytes > limit && !cycle.responseComplete) {
      this.flow.discardRead(data.length);
      const err = new BackpressureExceeded(`Request body exceeds limit of ${limit} bytes`, limit);
      logger.warn(err.message, { connId: this.id, path: cycle.scope.path });
      this.failRequest({ status: 413, message: 'Request Entity Too Large' });
      return;
    }
    if (!cycle.pushBody(data)) this.flow.discardRead(data.length);
  }

  private onEnd() {
    const cycle = this.parseTarget;
    this.parseTarget = null;
    if (!cycle) return;
    cycle.endBody();
    if (cycle === this.queue[0] && this._phase === 'reading-body') this._phase = 'awaiting-response';
  }

  private onParseError(err: ParseFailure) {
    logger.warn(`Invalid HTTP request received: ${err.message}`, { connId: this.id, status: err.status });
    this.failRequest({ status: err.status, message: 'Invalid HTTP request received.' });
  }

  /** Stop parsing; answer with `failure` once no response is in progress. */
  private failRequest(failure: RequestFailure) {
    this.parsingStopped = true;
    const broken = this.parseTarget;
    this.parseTarget = null;
    const active = this.queue[0];

    if (broken) {
      broken.disconnect();
      if (broken !== active) this.queue.splice(this.queue.indexOf(broken), 1);
    }
    if (active && active !== broken && !active.responseComplete) {
      // let the active response finish first
      for (const cycle of this.queue.slice(1)) cycle.disconnect();
      this.queue = [active];
      active.requestClose();
      this.pendingFailure = failure;
      return;
    }
    if (active && active.responseStarted && !active.responseComplete) {
      this.abort('request failed mid-response');
      return;
    }
    this.failNow(failure);
  }

  private failNow(failure: RequestFailure) {
    for (const cycle of this.queue) cycle.disconnect();
    this.queue = [];
    const encoder = this.codec.createEncoder({
      method: 'GET',
      httpVersion: '1.1',
      keepAlive: false,
      defaultHeaders: this.defaultHeaders,
    });
    const { body, headers } = textResponse(failure.message);
    this.write(encoder.encodeResponseEvent({ type: 'http.response.start', status: failure.status, headers }));
    this.write(encoder.encodeResponseEvent({ type: 'http.response.body', body, moreBody: false }));
    this.closeAfterFlush();
  }

  private startNext() {
    const cycle = this.queue[0];
    if (!cycle) return;
    const { config, state } = this.opts;
    const limit = config.limitConcurrency;
    // this connection already counts towards state.connections
    const overLimit = limit !== null && (state.connections.size > limit || state.tasks.size >= limit);
    const app = overLimit ? serviceUnavailable : this.opts.app;
    if (overLimit) logger.warn('Exceeded concurrency limit.', { connId: this.id, limit });

    const task = new HandlerTask(`${this.id}/${this.requestCount}`, app, cycle, {
      onInternalError: (c) => this.sendInternalError(c),
      abort: (reason) => this.abort(reason),
    }, logger);
    this.tasks.add(task);
    state.tasks.add(task);
    // onResponseComplete runs inside the previous handler's send(), so detach from it
    const done = this.root.runInAsyncScope(() => task.start());
    void done.then(() => {
      this.tasks.delete(task);
      state.tasks.delete(task);
    });
  }

  private async sendInternalError(cycle: RequestCycle): Promise<void> {
    const { body, headers } = textResponse('Internal Server Error');
    cycle.requestClose();
    try {
      await cycle.send({ type: 'http.response.start', status: 500, headers });
      await cycle.send({ type: 'http.response.body', body, moreBody: false });
    } catch (e: unknown) {
      logger.error('Failed to send 500 response', { connId: this.id, err: e });
      this.abort('500 response failed');
    }
  }

  private closeAfterFlush() {
    if (this._phase === 'closed') return;
    this._phase = 'closing';
    this.clearKeepAlive();
    this.socket.end();
  }

  private armKeepAlive() {
    if (this.keepAliveTimer || !this.idle || this.parser.buffered > 0) return;
    if (this._phase !== 'awaiting-request') return;
    this.keepAliveTimer = setTimeout(() => {
      this.keepAliveTimer = null;
      if (!this.idle) return;
      logger.debug(`Closing idle connection ${this.id}`, { connId: this.id });
      this.closeAfterFlush();
    }, this.opts.config.timeoutKeepAliveMs);
  }

  private clearKeepAlive() {
    if (!this.keepAliveTimer) return;
    clearTimeout(this.keepAliveTimer);
    this.keepAliveTimer = null;
  }
}
