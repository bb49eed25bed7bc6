import type { LifespanMode } from '../config/types.js';
import { LifecycleFailure, errorMessage } from '../errors.js';
import { getLogger } from '../logging/logger.js';
import type { Application, IncomingEvent, LifespanReceiveEvent, OutgoingEvent, StateBag } from '../types.js';

const logger = getLogger('lifespan');

type Outcome = { ok: true } | { ok: false; message: string };

/** One-shot latch: the first settle wins. */
class Phase {
  outcome: Outcome | null = null;
  readonly settled: Promise<Outcome>;
  private resolve: (o: Outcome) => void = () => undefined;

  constructor() {
    this.settled = new Promise<Outcome>((resolve) => {
      this.resolve = resolve;
    });
  }

  settle(outcome: Outcome) {
    if (this.outcome) return;
    this.outcome = outcome;
    this.resolve(outcome);
  }
}

/**
 * Runs the application once with a lifespan scope for the life of the server.
 * In `auto` mode an application that raises before answering startup is taken to
 * not support lifespan; in `on` mode that is a startup failure.
 */
export class LifespanRunner {
  readonly state: StateBag = {};

  private inbox: LifespanReceiveEvent[] = [];
  private receiver: ((event: LifespanReceiveEvent) => void) | null = null;
  private startupPhase = new Phase();
  private shutdownPhase = new Phase();
  private task: Promise<void> | null = null;
  private unsupported = false;
  private errorOccurred = false;

  constructor(private app: Application, private mode: LifespanMode) {}

  get active(): boolean {
    return this.mode !== 'off' && !this.unsupported;
  }

  async startup(): Promise<void> {
    if (this.mode === 'off') return;
    logger.info('Waiting for application startup.');
    this.task = this.main();
    this.push({ type: 'lifespan.startup' });
    const result = await this.startupPhase.settled;

    if (this.unsupported) return;
    if (!result.ok || (this.errorOccurred && this.mode === 'on')) {
      const message = result.ok ? '' : result.message;
      if (message) logger.error(message);
      logger.error('Application startup failed. Exiting.');
      throw new LifecycleFailure('startup', message || 'Application startup failed');
    }
    logger.info('Application startup complete.');
  }

  async shutdown(): Promise<void> {
    if (!this.active || this.errorOccurred) return;
    logger.info('Waiting for application shutdown.');
    this.push({ type: 'lifespan.shutdown' });
    const result = await this.shutdownPhase.settled;
    if (!result.ok || this.errorOccurred) {
      if (!result.ok && result.message) logger.error(result.message);
      logger.error('Application shutdown failed. Exiting.');
      return;
    }
    logger.info('Application shutdown complete.');
    if (this.task) await this.task;
  }

  private push(event: LifespanReceiveEvent) {
    const receiver = this.receiver;
    if (receiver) {
      this.receiver = null;
      receiver(event);
    } else {
      this.inbox.push(event);
    }
  }

  private receive = async (): Promise<IncomingEvent> => {
    const queued = this.inbox.shift();
    if (queued) return queued;
    return new Promise<LifespanReceiveEvent>((resolve) => {
      this.receiver = resolve;
    });
  };

  private send = async (event: OutgoingEvent): Promise<void> => {
    switch (event.type) {
      case 'lifespan.startup.complete':
        this.expect(this.startupPhase, event.type);
        this.startupPhase.settle({ ok: true });
        return;
      case 'lifespan.startup.failed':
        this.expect(this.startupPhase, event.type);
        this.startupPhase.settle({ ok: false, message: event.message ?? '' });
        return;
      case 'lifespan.shutdown.complete':
        this.expect(this.shutdownPhase, event.type);
        this.shutdownPhase.settle({ ok: true });
        return;
      case 'lifespan.shutdown.failed':
        this.expect(this.shutdownPhase, event.type);
        this.shutdownPhase.settle({ ok: false, message: event.message ?? '' });
        return;
      default:
        throw new LifecycleFailure(
          this.startupPhase.outcome ? 'shutdown' : 'startup',
          `Unexpected '${event.type}' in lifespan scope`,
        );
    }
  };

  private expect(phase: Phase, type: string) {
    const isStartup = phase === this.startupPhase;
    if (phase.outcome || (!isStartup && !this.startupPhase.outcome)) {
      throw new LifecycleFailure(isStartup ? 'startup' : 'shutdown', `Unexpected '${type}'`);
    }
  }

  private async main(): Promise<void> {
    try {
      await this.app({ type: 'lifespan', state: this.state }, this.receive, this.send);
    } catch (e: unknown) {
      this.errorOccurred = true;
      if (!this.startupPhase.outcome && this.mode === 'auto') {
        this.unsupported = true;
        logger.info('Lifespan protocol appears unsupported.');
        logger.debug(`Lifespan probe raised: ${errorMessage(e)}`);
      } else {
        logger.error('Exception in lifespan handler', { err: e });
      }
    } finally {
      // returning without answering leaves nothing to wait for
      this.startupPhase.settle({ ok: true });
      this.shutdownPhase.settle({ ok: true });
    }
  }
}
