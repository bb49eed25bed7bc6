// Application-facing event interface: one scope plus receive/send per request or lifespan.

export type HeaderPair = readonly [Buffer, Buffer];

/** Headers as the application may pass them; names are matched case-insensitively. */
export type HeaderInput = ReadonlyArray<readonly [string | Buffer, string | Buffer]>;

export type Address = readonly [string, number];

export type StateBag = Record<string, unknown>;

export interface HttpScope {
  readonly type: 'http';
  readonly httpVersion: '1.0' | '1.1';
  readonly method: string;
  readonly scheme: 'http';
  readonly path: string;
  readonly rawPath: Buffer;
  readonly queryString: Buffer;
  readonly rootPath: string;
  readonly headers: readonly HeaderPair[];
  readonly client: Address | null;
  readonly server: Address | null;
  /** Shared by every request on the same connection; seeded from lifespan state. */
  readonly state: StateBag;
}

export interface LifespanScope {
  readonly type: 'lifespan';
  readonly state: StateBag;
}

export type Scope = HttpScope | LifespanScope;

export interface HttpRequestEvent {
  type: 'http.request';
  body: Buffer;
  moreBody: boolean;
}

export interface HttpDisconnectEvent {
  type: 'http.disconnect';
}

export type ReceiveEvent = HttpRequestEvent | HttpDisconnectEvent;

export interface ResponseStartEvent {
  type: 'http.response.start';
  status: number;
  headers?: HeaderInput;
}

export interface ResponseBodyEvent {
  type: 'http.response.body';
  body?: Uint8Array;
  moreBody?: boolean;
}

export type SendEvent = ResponseStartEvent | ResponseBodyEvent | HttpDisconnectEvent;

export type LifespanReceiveEvent =
  | { type: 'lifespan.startup' }
  | { type: 'lifespan.shutdown' };

export type LifespanSendEvent =
  | { type: 'lifespan.startup.complete' }
  | { type: 'lifespan.startup.failed'; message?: string }
  | { type: 'lifespan.shutdown.complete' }
  | { type: 'lifespan.shutdown.failed'; message?: string };

export type IncomingEvent = ReceiveEvent | LifespanReceiveEvent;
export type OutgoingEvent = SendEvent | LifespanSendEvent;

export type Receive = () => Promise<IncomingEvent>;
export type Send = (event: OutgoingEvent) => Promise<void>;

export type Application = (scope: Scope, receive: Receive, send: Send) => Promise<void>;
