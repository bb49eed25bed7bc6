import type { RequestHead, ResponseEncoder, WireCodec } from '../codec/types.js';
import { ProtocolViolation, TaskCancelled } from '../errors.js';
import type { FlowController } from '../flow/flow-control.js';
import type {
  HeaderPair,
  HttpDisconnectEvent,
  HttpScope,
  OutgoingEvent,
  ReceiveEvent,
  ResponseBodyEvent,
  ResponseStartEvent,
} from '../types.js';

const DISCONNECT: HttpDisconnectEvent = Object.freeze({ type: 'http.disconnect' });

/** What a request cycle needs from the connection that owns it. */
export interface CycleTransport {
  readonly flow: FlowController;
  readonly codec: WireCodec;
  readonly defaultHeaders: readonly HeaderPair[];
  write(data: Buffer): void;
  abort(reason: string): void;
  onBodyConsumed(): void;
  onResponseStart(cycle: RequestCycle, status: number): void;
  onResponseComplete(cycle: RequestCycle): void;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * Bridges one parsed request to the application's receive/send calls. Holds the
 * queued body chunks and the response encoder; nothing here outlives the request.
 */
export class RequestCycle {
  private chunks: Buffer[] = [];
  private queuedBytes = 0;
  private bodyComplete = false;
  private finalBodyDelivered = false;
  private _disconnected = false;
  private disconnectDelivered = false;
  private waiter: Waiter | null = null;
  private continueSent = false;
  private keepAliveAllowed = true;
  private encoder: ResponseEncoder | null = null;
  private cancelled: TaskCancelled | null = null;
  private _status = 0;
  receivedBytes = 0;

  constructor(
    readonly scope: HttpScope,
    readonly head: RequestHead,
    private transport: CycleTransport,
  ) {}

  get responseStarted(): boolean {
    return this.encoder !== null && this.encoder.headersSent;
  }

  get responseComplete(): boolean {
    return this.encoder !== null && this.encoder.complete;
  }

  get disconnected(): boolean {
    return this._disconnected;
  }

  get keepAlive(): boolean {
    if (this.encoder) return this.encoder.keepAlive;
    return this.head.keepAlive && this.keepAliveAllowed;
  }

  get status(): number {
    return this._status;
  }

  // ---- connection side ----

  /** Queue a body chunk; returns false when nobody will read it any more. */
  pushBody(data: Buffer): boolean {
    if (this._disconnected || this.responseComplete) return false;
    this.chunks.push(data);
    this.queuedBytes += data.length;
    this.wake();
    return true;
  }

  endBody() {
    this.bodyComplete = true;
    this.wake();
  }

  disconnect() {
    if (this._disconnected) return;
    this._disconnected = true;
    this.releaseQueued();
    this.wake();
  }

  /** Refuse keep-alive for a response that has not started yet. */
  requestClose() {
    this.keepAliveAllowed = false;
  }

  cancel(err: TaskCancelled) {
    if (this.cancelled) return;
    this.cancelled = err;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(err);
  }

  /** Drop queued body bytes nobody will receive; returns how many were dropped. */
  releaseQueued(): number {
    const n = this.queuedBytes;
    this.chunks = [];
    this.queuedBytes = 0;
    if (n > 0) this.transport.flow.discardRead(n);
    return n;
  }

  // ---- application side ----

  receive = async (): Promise<ReceiveEvent> => {
    if (this.cancelled) throw this.cancelled;
    if (this.disconnectDelivered) return DISCONNECT;
    if (this.waiter) throw new ProtocolViolation('receive() called while a previous receive() is still pending');

    if (this.head.expectContinue && !this.continueSent && !this.responseStarted && !this._disconnected) {
      this.continueSent = true;
      this.transport.write(this.transport.codec.encodeInterim(100));
    }

    if (!this.hasMessage()) {
      await new Promise<void>((resolve, reject) => {
        this.waiter = { resolve, reject };
      });
    }

    if (this._disconnected || this.responseComplete) {
      this.disconnectDelivered = true;
      return DISCONNECT;
    }

    const body = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
    const consumed = this.queuedBytes;
    this.chunks = [];
    this.queuedBytes = 0;
    this.transport.flow.onBytesConsumed(consumed);
    this.transport.onBodyConsumed();

    const moreBody = !this.bodyComplete;
    if (!moreBody) this.finalBodyDelivered = true;
    return { type: 'http.request', body, moreBody };
  };

  send = async (event: OutgoingEvent): Promise<void> => {
    if (this.cancelled) throw this.cancelled;

    switch (event.type) {
      case 'http.disconnect':
        this.disconnect();
        this.transport.abort('application requested disconnect');
        return;
      case 'http.response.start':
      case 'http.response.body':
        break;
      default:
        throw new ProtocolViolation(`Unexpected event type '${event.type}' for an http scope`);
    }

    // the client is gone; the application finds out through receive()
    if (this._disconnected) return;

    if (event.type === 'http.response.start') {
      if (this.encoder) throw new ProtocolViolation("Unexpected 'http.response.start': response already started");
      this.writeStart(event);
    } else {
      if (!this.responseStarted) {
        throw new ProtocolViolation("Expected 'http.response.start' before 'http.response.body'");
      }
      if (this.responseComplete) throw new ProtocolViolation('Unexpected message after response completed');
      this.writeBody(event);
    }

    await this.transport.flow.awaitWritable();
  };

  private writeStart(event: ResponseStartEvent) {
    const encoder = this.transport.codec.createEncoder({
      method: this.head.method,
      httpVersion: this.head.httpVersion,
      keepAlive: this.head.keepAlive && this.keepAliveAllowed,
      defaultHeaders: this.transport.defaultHeaders,
    });
    const out = encoder.encodeResponseEvent(event);
    this.encoder = encoder;
    this._status = event.status;
    this.transport.onResponseStart(this, event.status);
    this.transport.write(out);
  }

  private writeBody(event: ResponseBodyEvent) {
    if (!this.encoder) return;
    const out = this.encoder.encodeResponseEvent(event);
    if (out.length > 0) this.transport.write(out);
    if (this.encoder.complete) {
      this.releaseQueued();
      this.wake();
      this.transport.onResponseComplete(this);
    }
  }

  private hasMessage(): boolean {
    if (this._disconnected || this.responseComplete) return true;
    if (this.chunks.length > 0) return true;
    return this.bodyComplete && !this.finalBodyDelivered;
  }

  private wake() {
    if (!this.waiter || !this.hasMessage()) return;
    const waiter = this.waiter;
    this.waiter = null;
    waiter.resolve();
  }
}
