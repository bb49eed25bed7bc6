import * as net from 'net';
import { setTimeout as sleep } from 'timers/promises';
import { resolveCodec } from '../codec/registry.js';
import type { WireCodec } from '../codec/types.js';
import type { ServerConfig } from '../config/types.js';
import { HttpConnection, type ServerState } from '../connectors/connection.js';
import { LifecycleFailure, ResourceExhaustion, errorMessage } from '../errors.js';
import { getLogger } from '../logging/logger.js';
import type { Application, HeaderPair } from '../types.js';
import { LifespanRunner } from './lifespan.js';
import { captureSignals, type SignalSource } from './signals.js';

const logger = getLogger('server');

export type ServerPhase = 'starting' | 'running' | 'stopping' | 'stopped';

export type BoundAddress = net.AddressInfo | string;

export interface ServerOptions {
  signalSource?: SignalSource;
}

const SERVER_NAME = 'tidewater';

/**
 * Process-wide lifecycle: lifespan startup, listeners, the tick loop that watches
 * signal flags and the request limit, then graceful (or forced) shutdown.
 */
export class Server {
  readonly config: ServerConfig;
  readonly codec: WireCodec;
  readonly state: ServerState;
  readonly ready: Promise<BoundAddress | null>;

  private _phase: ServerPhase = 'starting';
  private shouldExit = false;
  private forceExit = false;
  private lastSignal: NodeJS.Signals | null = null;
  private listeners: net.Server[] = [];
  private lifespan: LifespanRunner;
  private signalSource: SignalSource;
  private currentDate = '';
  private resolveReady: (addr: BoundAddress | null) => void = () => undefined;

  constructor(private app: Application, config: ServerConfig, opts: ServerOptions = {}) {
    this.config = config;
    this.codec = resolveCodec(config.codec);
    this.signalSource = opts.signalSource ?? process;
    this.lifespan = new LifespanRunner(app, config.lifespan);
    this.state = {
      totalRequests: 0,
      connections: new Set(),
      tasks: new Set(),
      defaultHeaders: [],
      lifespanState: this.lifespan.state,
    };
    this.ready = new Promise((resolve) => {
      this.resolveReady = resolve;
    });
    this.refreshDefaultHeaders();
  }

  get phase(): ServerPhase {
    return this._phase;
  }

  /** Signal that stopped the server, if one did. */
  get signal(): NodeJS.Signals | null {
    return this.lastSignal;
  }

  /** Same effect as a termination signal. */
  stop(force = false) {
    if (force || this.shouldExit) this.forceExit = true;
    this.shouldExit = true;
  }

  handleExit(sig: NodeJS.Signals) {
    this.lastSignal = sig;
    if (this.shouldExit) this.forceExit = true;
    else this.shouldExit = true;
  }

  async serve(): Promise<void> {
    const restoreSignals = captureSignals(this.signalSource, this.config.signals, (sig) => this.handleExit(sig));
    try {
      logger.info(`Started server process [${process.pid}]`);
      await this.startup();
      await this.mainLoop();
      await this.shutdown();
      logger.info(`Finished server process [${process.pid}]`);
    } finally {
      this.resolveReady(null);
      this._phase = 'stopped';
      restoreSignals();
    }
  }

  private async startup(): Promise<void> {
    await this.lifespan.startup();

    const address: BoundAddress | null = await this.listen().catch(async (e: unknown) => {
      logger.error(`Could not bind: ${errorMessage(e)}`, { err: e });
      await this.lifespan.shutdown();
      throw new LifecycleFailure('startup', `Could not bind: ${errorMessage(e)}`, e);
    });

    this._phase = 'running';
    if (typeof address === 'string') {
      logger.info(`Listening on unix socket ${address} (Press CTRL+C to quit)`);
    } else if (address) {
      const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
      logger.info(`Listening on http://${host}:${address.port} (Press CTRL+C to quit)`);
    }
    this.resolveReady(address);
  }

  private listen(): Promise<BoundAddress | null> {
    const srv = net.createServer((socket) => this.onConnection(socket));
    this.listeners.push(srv);
    return new Promise((resolve, reject) => {
      srv.once('error', reject);
      const onListening = () => {
        srv.off('error', reject);
        srv.on('error', (err: Error) => logger.error(`Listener error: ${err.message}`, { err }));
        resolve(srv.address());
      };
      if (this.config.uds) srv.listen(this.config.uds, onListening);
      else srv.listen(this.config.port, this.config.host, onListening);
    });
  }

  private onConnection(socket: net.Socket) {
    if (this._phase !== 'running') {
      socket.destroy();
      return;
    }
    const conn = new HttpConnection(socket, {
      app: this.app,
      config: this.config,
      codec: this.codec,
      state: this.state,
    });
    conn.start();
  }

  private async mainLoop(): Promise<void> {
    while (!this.onTick()) {
      await sleep(this.config.tickIntervalMs);
    }
  }

  /** One iteration of the supervision loop; true means shut down. */
  private onTick(): boolean {
    this.refreshDefaultHeaders();
    if (this.shouldExit) return true;
    const limit = this.config.limitMaxRequests;
    if (limit !== null && this.state.totalRequests >= limit) {
      logger.warn(new ResourceExhaustion(limit).message, { limit, totalRequests: this.state.totalRequests });
      return true;
    }
    return false;
  }

  private refreshDefaultHeaders() {
    const date = new Date().toUTCString();
    if (date === this.currentDate && this.state.defaultHeaders.length > 0) return;
    this.currentDate = date;
    const headers: HeaderPair[] = [];
    if (this.config.serverHeader) headers.push([Buffer.from('server'), Buffer.from(SERVER_NAME)]);
    if (this.config.dateHeader) headers.push([Buffer.from('date'), Buffer.from(date)]);
    for (const [name, value] of this.config.headers) {
      headers.push([Buffer.from(name.toLowerCase(), 'latin1'), Buffer.from(value, 'latin1')]);
    }
    this.state.defaultHeaders = headers;
  }

  private async shutdown(): Promise<void> {
    this._phase = 'stopping';
    logger.info('Shutting down');

    const listenersClosed = this.listeners.map(
      (srv) => new Promise<void>((resolve) => {
        srv.close(() => resolve());
      }),
    );

    for (const conn of this.state.connections) conn.shutdown();

    const timeout = this.config.timeoutGracefulShutdownMs;
    const deadline = timeout === null ? null : Date.now() + timeout;
    if (this.state.connections.size > 0 && !this.forceExit) {
      logger.info('Waiting for connections to close. (CTRL+C to force quit)');
    }
    let forced = false;
    while ((this.state.connections.size > 0 || this.state.tasks.size > 0) && !this.forceExit) {
      if (deadline !== null && Date.now() >= deadline) {
        logger.warn(
          `Cancel ${this.state.tasks.size} running task(s), timeout graceful shutdown exceeded (${timeout} ms)`,
          { connections: this.state.connections.size, tasks: this.state.tasks.size },
        );
        this.forceClose('graceful shutdown timed out');
        forced = true;
        break;
      }
      await sleep(this.config.tickIntervalMs);
    }
    if (this.forceExit) {
      this.forceClose('forced exit');
      forced = true;
    }

    // cancelled tasks settle at their next receive/send; only a clean stop waits for them
    if (!forced) await Promise.all(Array.from(this.state.tasks, (t) => t.done));
    await Promise.all(listenersClosed);

    if (!this.forceExit) await this.lifespan.shutdown();
  }

  private forceClose(reason: string) {
    for (const task of this.state.tasks) task.cancel(reason);
    for (const conn of this.state.connections) conn.forceClose(reason);
  }
}
