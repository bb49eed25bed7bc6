import type { ParseFailure } from '../errors.js';
import type { HeaderPair, ResponseBodyEvent, ResponseStartEvent } from '../types.js';

export interface RequestHead {
  method: string;
  target: Buffer;
  httpVersion: '1.0' | '1.1';
  headers: HeaderPair[];
  keepAlive: boolean;
  expectContinue: boolean;
  upgrade: boolean;
  // -1 when the body is chunked
  contentLength: number;
}

// `size` is the number of wire bytes the event accounts for, framing included.
export type ParseEvent =
  | { type: 'head'; head: RequestHead; size: number }
  | { type: 'body'; data: Buffer; size: number }
  | { type: 'end'; size: number }
  | { type: 'error'; error: ParseFailure };

export interface ParserLimits {
  maxHeadSize: number;
}

export interface RequestParser {
  feed(data: Buffer): void;
  /** Next structural event, or null when more bytes are needed. */
  parseNextEvent(): ParseEvent | null;
  /** True between messages, i.e. the next event can only be a head. */
  readonly atMessageBoundary: boolean;
  readonly buffered: number;
}

export interface ResponseContext {
  method: string;
  httpVersion: '1.0' | '1.1';
  keepAlive: boolean;
  defaultHeaders: readonly HeaderPair[];
}

export interface ResponseEncoder {
  encodeResponseEvent(event: ResponseStartEvent | ResponseBodyEvent): Buffer;
  readonly keepAlive: boolean;
  readonly headersSent: boolean;
  readonly complete: boolean;
}

export interface WireCodec {
  name: string;
  createParser(limits: ParserLimits): RequestParser;
  createEncoder(ctx: ResponseContext): ResponseEncoder;
  encodeInterim(status: number): Buffer;
}
