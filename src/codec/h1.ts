import { STATUS_CODES } from 'http';
import { ParseFailure, ProtocolViolation } from '../errors.js';
import type { HeaderPair, ResponseBodyEvent, ResponseStartEvent } from '../types.js';
import { DynBuf, bufCreate, bufPop, bufPush, bufSize, bufTake, bufView } from './buffer.js';
import type {
  ParseEvent,
  ParserLimits,
  RequestHead,
  RequestParser,
  ResponseContext,
  ResponseEncoder,
  WireCodec,
} from './types.js';

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const REQUEST_LINE = /^([!#$%&'*+\-.^_`|~0-9A-Za-z]+) ([^\s]+) HTTP\/(\d)\.(\d)$/;
const INVALID_VALUE = /[\x00-\x08\x0a-\x1f\x7f]/;
const MAX_CHUNK_LINE = 4096;
const CRLF = Buffer.from('\r\n');
const LAST_CHUNK = Buffer.from('0\r\n\r\n');

type ParserState =
  | { kind: 'head' }
  | { kind: 'length'; remaining: number }
  | { kind: 'chunk-size' }
  | { kind: 'chunk-data'; remaining: number }
  | { kind: 'chunk-data-end' }
  | { kind: 'trailers'; size: number }
  | { kind: 'failed' };

export interface H1Options {
  // accept bare LF line endings and obsolete header line folding
  lenient: boolean;
}

function headerTokens(headers: HeaderPair[], name: string): string[] {
  const out: string[] = [];
  for (const [k, v] of headers) {
    if (k.toString('latin1') !== name) continue;
    for (const part of v.toString('latin1').split(',')) {
      const t = part.trim().toLowerCase();
      if (t) out.push(t);
    }
  }
  return out;
}

function hasHeader(headers: HeaderPair[], name: string): boolean {
  return headers.some(([k]) => k.toString('latin1') === name);
}

export class H1Parser implements RequestParser {
  private buf: DynBuf = bufCreate();
  private state: ParserState = { kind: 'head' };
  private pendingFraming = 0;

  constructor(private limits: ParserLimits, private opts: H1Options) {}

  get atMessageBoundary(): boolean {
    return this.state.kind === 'head';
  }

  get buffered(): number {
    return bufSize(this.buf);
  }

  feed(data: Buffer) {
    if (this.state.kind === 'failed' || data.length === 0) return;
    bufPush(this.buf, data);
  }

  parseNextEvent(): ParseEvent | null {
    try {
      return this.step();
    } catch (e: unknown) {
      if (!(e instanceof ParseFailure)) throw e;
      this.state = { kind: 'failed' };
      return { type: 'error', error: e };
    }
  }

  private step(): ParseEvent | null {
    for (;;) {
      const state = this.state;
      switch (state.kind) {
        case 'failed':
          return null;
        case 'head':
          return this.parseHead();
        case 'length': {
          if (state.remaining === 0) {
            this.state = { kind: 'head' };
            return this.emitEnd();
          }
          const n = Math.min(state.remaining, bufSize(this.buf));
          if (n === 0) return null;
          state.remaining -= n;
          return this.emitBody(bufTake(this.buf, n));
        }
        case 'chunk-size': {
          const line = this.takeLine(MAX_CHUNK_LINE, 'Chunk size line too long');
          if (line === null) return null;
          const hex = line.split(';')[0].trim();
          if (!/^[0-9a-fA-F]{1,12}$/.test(hex)) throw new ParseFailure('Invalid chunk size');
          const size = parseInt(hex, 16);
          this.state = size === 0 ? { kind: 'trailers', size: 0 } : { kind: 'chunk-data', remaining: size };
          continue;
        }
        case 'chunk-data': {
          const n = Math.min(state.remaining, bufSize(this.buf));
          if (n === 0) return null;
          state.remaining -= n;
          if (state.remaining === 0) this.state = { kind: 'chunk-data-end' };
          return this.emitBody(bufTake(this.buf, n));
        }
        case 'chunk-data-end': {
          const view = bufView(this.buf);
          if (this.opts.lenient && view.length >= 1 && view[0] === 0x0a) {
            bufPop(this.buf, 1);
            this.pendingFraming += 1;
          } else {
            if (view.length < 2) return null;
            if (view[0] !== 0x0d || view[1] !== 0x0a) throw new ParseFailure('Missing CRLF after chunk data');
            bufPop(this.buf, 2);
            this.pendingFraming += 2;
          }
          this.state = { kind: 'chunk-size' };
          continue;
        }
        case 'trailers': {
          const before = this.pendingFraming;
          const line = this.takeLine(this.limits.maxHeadSize, 'Trailer section too large');
          if (line === null) return null;
          state.size += this.pendingFraming - before;
          if (state.size > this.limits.maxHeadSize) throw new ParseFailure('Trailer section too large', 431);
          if (line.length > 0) continue;
          this.state = { kind: 'head' };
          return this.emitEnd();
        }
      }
    }
  }

  /** Remove one line from the buffer; its bytes count as framing. */
  private takeLine(limit: number, tooLong: string): string | null {
    const view = bufView(this.buf);
    const lf = view.indexOf(0x0a);
    if (lf < 0) {
      if (view.length > limit) throw new ParseFailure(tooLong, 431);
      return null;
    }
    let end = lf;
    if (end > 0 && view[end - 1] === 0x0d) end--;
    else if (!this.opts.lenient) throw new ParseFailure('Bare LF in line ending');
    const line = view.subarray(0, end).toString('latin1');
    bufPop(this.buf, lf + 1);
    this.pendingFraming += lf + 1;
    return line;
  }

  private emitBody(data: Buffer): ParseEvent {
    const size = data.length + this.pendingFraming;
    this.pendingFraming = 0;
    return { type: 'body', data, size };
  }

  private emitEnd(): ParseEvent {
    const size = this.pendingFraming;
    this.pendingFraming = 0;
    return { type: 'end', size };
  }

  private findHeadEnd(view: Buffer): number {
    if (!this.opts.lenient) {
      const idx = view.indexOf('\r\n\r\n', 0, 'latin1');
      return idx < 0 ? -1 : idx + 4;
    }
    for (let p = view.indexOf(0x0a); p >= 0; p = view.indexOf(0x0a, p + 1)) {
      if (view[p + 1] === 0x0a) return p + 2;
      if (view[p + 1] === 0x0d && view[p + 2] === 0x0a) return p + 3;
    }
    return -1;
  }

  private parseHead(): ParseEvent | null {
    // empty lines ahead of a request line are skipped (RFC 9112 section 2.2)
    const view0 = bufView(this.buf);
    let skip = 0;
    while (skip < view0.length && (view0[skip] === 0x0d || view0[skip] === 0x0a)) skip++;
    if (skip > 0) {
      bufPop(this.buf, skip);
      this.pendingFraming += skip;
    }

    const view = bufView(this.buf);
    if (view.length === 0) return null;
    const end = this.findHeadEnd(view);
    if (end < 0) {
      if (view.length > this.limits.maxHeadSize) throw new ParseFailure('Request header block too large', 431);
      return null;
    }
    if (end > this.limits.maxHeadSize) throw new ParseFailure('Request header block too large', 431);

    const text = view.subarray(0, end).toString('latin1');
    let lines: string[];
    if (this.opts.lenient) {
      lines = text.split(/\r?\n/);
    } else {
      lines = text.slice(0, -4).split('\r\n');
      if (lines.some((l) => l.includes('\n'))) throw new ParseFailure('Bare LF in request head');
    }
    while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

    const requestLine = lines.shift() ?? '';
    const m = REQUEST_LINE.exec(requestLine);
    if (!m) throw new ParseFailure('Invalid request line');
    const [, method, target, major, minor] = m;
    if (major !== '1' || (minor !== '0' && minor !== '1')) throw new ParseFailure('Unsupported HTTP version');
    const httpVersion = minor === '0' ? '1.0' : '1.1';

    const headers: HeaderPair[] = [];
    const raw: Array<[string, string]> = [];
    for (const line of lines) {
      if (line.startsWith(' ') || line.startsWith('\t')) {
        const last = raw[raw.length - 1];
        if (!this.opts.lenient || !last) throw new ParseFailure('Obsolete line folding in header');
        last[1] = `${last[1]} ${line.trim()}`;
        continue;
      }
      const colon = line.indexOf(':');
      if (colon <= 0) throw new ParseFailure('Invalid header line');
      const name = line.slice(0, colon);
      if (!TOKEN.test(name)) throw new ParseFailure('Invalid header name');
      raw.push([name.toLowerCase(), line.slice(colon + 1).replace(/^[ \t]+|[ \t]+$/g, '')]);
    }
    for (const [name, value] of raw) {
      if (INVALID_VALUE.test(value)) throw new ParseFailure('Invalid header value');
      headers.push([Buffer.from(name, 'latin1'), Buffer.from(value, 'latin1')]);
    }

    const te = headerTokens(headers, 'transfer-encoding');
    const clHeaders = headers.filter(([k]) => k.toString('latin1') === 'content-length');
    let contentLength = 0;
    if (te.length > 0) {
      if (clHeaders.length > 0) throw new ParseFailure('Both Transfer-Encoding and Content-Length present');
      if (te.some((t) => t !== 'chunked') || te.length !== 1) throw new ParseFailure('Unsupported Transfer-Encoding');
      contentLength = -1;
    } else if (clHeaders.length > 0) {
      const values = new Set<string>();
      for (const [, v] of clHeaders) {
        for (const part of v.toString('latin1').split(',')) values.add(part.trim());
      }
      const [only] = values;
      if (values.size !== 1 || !/^\d{1,15}$/.test(only)) throw new ParseFailure('Invalid Content-Length');
      contentLength = Number(only);
    }

    const connection = headerTokens(headers, 'connection');
    const keepAlive = httpVersion === '1.1'
      ? !connection.includes('close')
      : connection.includes('keep-alive') && !connection.includes('close');
    const expect = headerTokens(headers, 'expect');

    const head: RequestHead = {
      method,
      target: Buffer.from(target, 'latin1'),
      httpVersion,
      headers,
      keepAlive,
      expectContinue: httpVersion === '1.1' && expect.includes('100-continue'),
      upgrade: connection.includes('upgrade') && hasHeader(headers, 'upgrade'),
      contentLength,
    };

    bufPop(this.buf, end);
    const size = end + this.pendingFraming;
    this.pendingFraming = 0;
    this.state = contentLength < 0 ? { kind: 'chunk-size' } : { kind: 'length', remaining: contentLength };
    return { type: 'head', head, size };
  }
}

type Framing = 'none' | 'length' | 'chunked' | 'close';

function toBuffer(v: string | Buffer): Buffer {
  return typeof v === 'string' ? Buffer.from(v, 'latin1') : v;
}

export class H1ResponseEncoder implements ResponseEncoder {
  private state: 'start' | 'body' | 'done' = 'start';
  private framing: Framing = 'none';
  private remaining = 0;
  private _keepAlive: boolean;

  constructor(private ctx: ResponseContext) {
    this._keepAlive = ctx.keepAlive;
  }

  get keepAlive(): boolean { return this._keepAlive; }
  get headersSent(): boolean { return this.state !== 'start'; }
  get complete(): boolean { return this.state === 'done'; }

  encodeResponseEvent(event: ResponseStartEvent | ResponseBodyEvent): Buffer {
    if (event.type === 'http.response.start') return this.encodeStart(event);
    return this.encodeBody(event);
  }

  private encodeStart(event: ResponseStartEvent): Buffer {
    if (this.state !== 'start') throw new ProtocolViolation('Response already started');
    const status = event.status;
    if (!Number.isInteger(status) || status < 200 || status > 599) {
      throw new ProtocolViolation(`Invalid response status: ${String(status)}`);
    }

    const appHeaders: Array<[string, Buffer]> = [];
    for (const [k, v] of event.headers ?? []) {
      const name = toBuffer(k).toString('latin1').toLowerCase();
      const value = toBuffer(v);
      if (!TOKEN.test(name)) throw new ProtocolViolation(`Invalid HTTP header name: ${name}`);
      if (INVALID_VALUE.test(value.toString('latin1'))) throw new ProtocolViolation(`Invalid HTTP header value for ${name}`);
      appHeaders.push([name, value]);
    }
    const names = new Set(appHeaders.map(([k]) => k));
    const tokens = (name: string) => appHeaders
      .filter(([k]) => k === name)
      .flatMap(([, v]) => v.toString('latin1').split(','))
      .map((t) => t.trim().toLowerCase())
      .filter((t) => t.length > 0);

    const connection = tokens('connection');
    if (connection.includes('close')) this._keepAlive = false;

    const te = tokens('transfer-encoding');
    const cl = appHeaders.filter(([k]) => k === 'content-length');
    if (te.length > 0 && cl.length > 0) throw new ProtocolViolation('Both Transfer-Encoding and Content-Length set');
    if (te.length > 0 && (te.length !== 1 || te[0] !== 'chunked')) {
      throw new ProtocolViolation('Only chunked Transfer-Encoding is supported');
    }
    let declared = -1;
    if (cl.length > 0) {
      const v = cl[cl.length - 1][1].toString('latin1').trim();
      if (!/^\d+$/.test(v)) throw new ProtocolViolation(`Invalid Content-Length: ${v}`);
      declared = Number(v);
    }

    const extra: Array<[string, Buffer]> = [];
    const bodyless = this.ctx.method === 'HEAD' || status === 204 || status === 304;
    if (bodyless) {
      this.framing = 'none';
    } else if (declared >= 0) {
      this.framing = 'length';
      this.remaining = declared;
    } else if (te.length > 0) {
      this.framing = 'chunked';
    } else if (this.ctx.httpVersion === '1.1') {
      this.framing = 'chunked';
      extra.push(['transfer-encoding', Buffer.from('chunked')]);
    } else {
      this.framing = 'close';
      this._keepAlive = false;
    }
    if (!this._keepAlive && !connection.includes('close')) extra.push(['connection', Buffer.from('close')]);
    if (this._keepAlive && this.ctx.httpVersion === '1.0' && !connection.includes('keep-alive')) {
      extra.push(['connection', Buffer.from('keep-alive')]);
    }

    const parts: Buffer[] = [Buffer.from(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\n`, 'latin1')];
    const line = (name: string | Buffer, value: Buffer) => {
      parts.push(toBuffer(name), Buffer.from(': '), value, CRLF);
    };
    for (const [k, v] of this.ctx.defaultHeaders) {
      if (!names.has(k.toString('latin1'))) line(k, v);
    }
    for (const [k, v] of appHeaders) line(k, v);
    for (const [k, v] of extra) line(k, v);
    parts.push(CRLF);

    this.state = 'body';
    return Buffer.concat(parts);
  }

  private encodeBody(event: ResponseBodyEvent): Buffer {
    if (this.state === 'start') throw new ProtocolViolation('Response body sent before response start');
    if (this.state === 'done') throw new ProtocolViolation('Response already completed');
    const data = event.body ? Buffer.from(event.body.buffer, event.body.byteOffset, event.body.byteLength) : Buffer.alloc(0);
    const more = event.moreBody ?? false;
    let out = data;

    switch (this.framing) {
      case 'none':
        out = Buffer.alloc(0);
        break;
      case 'length':
        if (data.length > this.remaining) throw new ProtocolViolation('Response content longer than Content-Length');
        this.remaining -= data.length;
        if (!more && this.remaining > 0) throw new ProtocolViolation('Response content shorter than Content-Length');
        break;
      case 'chunked': {
        const chunks: Buffer[] = [];
        if (data.length > 0) chunks.push(Buffer.from(`${data.length.toString(16)}\r\n`, 'latin1'), data, CRLF);
        if (!more) chunks.push(LAST_CHUNK);
        out = Buffer.concat(chunks);
        break;
      }
      case 'close':
        break;
    }

    if (!more) this.state = 'done';
    return out;
  }
}

export function createH1Codec(name: string, opts: H1Options): WireCodec {
  return {
    name,
    createParser: (limits) => new H1Parser(limits, opts),
    createEncoder: (ctx) => new H1ResponseEncoder(ctx),
    encodeInterim: (status) => Buffer.from(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\n\r\n`, 'latin1'),
  };
}

export const h1Codec = createH1Codec('h1', { lenient: false });
export const h1LenientCodec = createH1Codec('h1-lenient', { lenient: true });
