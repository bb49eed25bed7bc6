export interface WatermarkConfig {
  readHighWater: number;
  readLowWater: number;
  writeHighWater: number;
}

export interface FlowSnapshot {
  readBuffered: number;
  writeBuffered: number;
  readPaused: boolean;
  pauseSignals: number;
  resumeSignals: number;
}

/**
 * Byte accounting for one connection. The read side latches between paused and
 * reading with hysteresis; the write side parks writers until flushes bring the
 * queued count back to the high mark. Performs no I/O.
 */
export class FlowController {
  private readBuffered = 0;
  private writeBuffered = 0;
  private readPaused = false;
  private pauseSignals = 0;
  private resumeSignals = 0;
  private writers: Array<() => void> = [];
  private released = false;

  constructor(private config: WatermarkConfig) {}

  onBytesRead(n: number) {
    this.readBuffered += n;
  }

  onBytesConsumed(n: number) {
    this.readBuffered = Math.max(0, this.readBuffered - n);
  }

  /** Drop read bytes nobody will consume, e.g. the unread body of a finished request. */
  discardRead(n: number) {
    this.onBytesConsumed(n);
  }

  onBytesQueuedForWrite(n: number) {
    this.writeBuffered += n;
  }

  onBytesFlushed(n: number) {
    this.writeBuffered = Math.max(0, this.writeBuffered - n);
    if (this.writeBuffered <= this.config.writeHighWater) this.wakeWriters();
  }

  shouldPauseReading(): boolean {
    if (this.readPaused || this.readBuffered <= this.config.readHighWater) return false;
    this.readPaused = true;
    this.pauseSignals++;
    return true;
  }

  shouldResumeReading(): boolean {
    if (!this.readPaused || this.readBuffered > this.config.readLowWater) return false;
    this.readPaused = false;
    this.resumeSignals++;
    return true;
  }

  get isReadPaused(): boolean {
    return this.readPaused;
  }

  get isWritable(): boolean {
    return this.released || this.writeBuffered <= this.config.writeHighWater;
  }

  awaitWritable(): Promise<void> {
    if (this.isWritable) return Promise.resolve();
    return new Promise((resolve) => this.writers.push(resolve));
  }

  /** Connection is gone: let every parked writer continue and find that out itself. */
  release() {
    this.released = true;
    this.wakeWriters();
  }

  snapshot(): FlowSnapshot {
    return {
      readBuffered: this.readBuffered,
      writeBuffered: this.writeBuffered,
      readPaused: this.readPaused,
      pauseSignals: this.pauseSignals,
      resumeSignals: this.resumeSignals,
    };
  }

  private wakeWriters() {
    const writers = this.writers;
    this.writers = [];
    for (const wake of writers) wake();
  }
}
