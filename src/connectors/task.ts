import { AsyncLocalStorage } from 'async_hooks';
import { ApplicationError, TaskCancelled } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { Application } from '../types.js';
import type { RequestCycle } from './request-cycle.js';

export interface TaskContext {
  readonly requestId: string;
  readonly values: Map<string, unknown>;
  readonly signal: AbortSignal;
}

const storage = new AsyncLocalStorage<TaskContext>();
let contextDefaults: ReadonlyMap<string, unknown> = new Map();

/** Values every handler task starts with; meant to be set once at process start. */
export function setContextDefaults(entries: Iterable<readonly [string, unknown]>) {
  contextDefaults = new Map(entries);
}

/** Context of the handler task the caller runs in, if any. */
export function currentContext(): TaskContext | undefined {
  return storage.getStore();
}

export interface TaskHooks {
  onInternalError(cycle: RequestCycle): Promise<void>;
  abort(reason: string): void;
}

/**
 * One application invocation for one request. Runs detached from the connection's
 * read loop, in a fresh context, and observes cancellation at receive/send.
 */
export class HandlerTask {
  private controller = new AbortController();
  private _done: Promise<void> | null = null;

  constructor(
    readonly requestId: string,
    private app: Application,
    readonly cycle: RequestCycle,
    private hooks: TaskHooks,
    private logger: Logger,
  ) {}

  get done(): Promise<void> {
    return this._done ?? Promise.resolve();
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  start(): Promise<void> {
    if (this._done) return this._done;
    const ctx: TaskContext = {
      requestId: this.requestId,
      values: new Map(contextDefaults),
      signal: this.controller.signal,
    };
    this._done = new Promise<void>((resolve) => {
      storage.run(ctx, () => {
        setImmediate(() => {
          this.run().then(resolve, (err: unknown) => {
            this.logger.error('Handler task failed outside the application', { err, requestId: this.requestId });
            resolve();
          });
        });
      });
    });
    return this._done;
  }

  cancel(reason = 'Handler task cancelled') {
    if (this.controller.signal.aborted) return;
    const err = new TaskCancelled(reason);
    this.controller.abort(err);
    this.cycle.cancel(err);
  }

  private requestFields() {
    const { scope } = this.cycle;
    return {
      requestId: this.requestId,
      method: scope.method,
      path: scope.path,
      client: scope.client ? `${scope.client[0]}:${scope.client[1]}` : null,
    };
  }

  private async run(): Promise<void> {
    const { cycle } = this;
    try {
      await this.app(cycle.scope, cycle.receive, cycle.send);
    } catch (e: unknown) {
      if (e instanceof TaskCancelled) {
        this.logger.debug(`Handler task cancelled: ${e.message}`, this.requestFields());
        return;
      }
      const err = new ApplicationError('Exception in application', e);
      this.logger.error(err.message, { ...this.requestFields(), err: e });
      if (cycle.disconnected) return;
      if (!cycle.responseStarted) await this.hooks.onInternalError(cycle);
      else this.hooks.abort('application raised after response start');
      return;
    }

    if (cycle.disconnected || this.cancelled) return;
    if (!cycle.responseStarted) {
      this.logger.error('Application returned without starting response.', this.requestFields());
      await this.hooks.onInternalError(cycle);
    } else if (!cycle.responseComplete) {
      this.logger.error('Application returned without completing response.', this.requestFields());
      this.hooks.abort('incomplete response');
    }
  }
}
