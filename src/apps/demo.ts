import busboy from 'busboy';
import { once } from 'events';
import { pack } from 'msgpackr';
import { currentContext } from '../connectors/task.js';
import { getLogger } from '../logging/logger.js';
import type { Application, HttpScope, LifespanScope, Receive, Send } from '../types.js';

const logger = getLogger('demo');

interface BodyCodec {
  name: string;
  contentTypes: string[];
  encode(obj: unknown): Uint8Array;
}

const jsonCodec: BodyCodec = {
  name: 'json',
  contentTypes: ['application/json', 'text/json'],
  encode: (obj) => Buffer.from(JSON.stringify(obj), 'utf8'),
};

const msgpackCodec: BodyCodec = {
  name: 'msgpack',
  contentTypes: ['application/msgpack', 'application/vnd.msgpack', 'application/x-msgpack'],
  encode: (obj) => pack(obj),
};

interface MediaRange {
  type: string;
  q: number;
}

function parseAccept(accept: string): MediaRange[] {
  return accept
    .toLowerCase()
    .split(',')
    .map((part) => {
      const [type, ...params] = part.split(';').map((p) => p.trim());
      const q = params.find((p) => p.startsWith('q='));
      const weight = q === undefined ? 1 : Number(q.slice(2));
      return { type, q: Number.isFinite(weight) ? weight : 1 };
    })
    .filter((range) => range.type.length > 0);
}

function rangeMatches(range: string, codec: BodyCodec): boolean {
  if (range === '*/*' || range === 'application/*') return true;
  if (codec === jsonCodec && range.endsWith('+json')) return true;
  return codec.contentTypes.includes(range);
}

function quality(ranges: MediaRange[], codec: BodyCodec): number {
  return ranges.reduce((best, range) => (rangeMatches(range.type, codec) ? Math.max(best, range.q) : best), 0);
}

/** MessagePack only when the client ranks it above JSON; JSON otherwise. */
export function chooseBodyCodec(accept?: string): BodyCodec {
  if (!accept) return jsonCodec;
  const ranges = parseAccept(accept);
  return quality(ranges, msgpackCodec) > quality(ranges, jsonCodec) ? msgpackCodec : jsonCodec;
}

export function headerValue(scope: HttpScope, name: string): string | undefined {
  for (const [k, v] of scope.headers) {
    if (k.toString('latin1') === name) return v.toString('latin1');
  }
  return undefined;
}

async function readBody(receive: Receive): Promise<Buffer | null> {
  const chunks: Buffer[] = [];
  for (;;) {
    const event = await receive();
    if (event.type === 'http.disconnect') return null;
    if (event.type !== 'http.request') continue;
    chunks.push(event.body);
    if (!event.moreBody) return Buffer.concat(chunks);
  }
}

async function sendBytes(send: Send, status: number, contentType: string, body: Uint8Array) {
  await send({
    type: 'http.response.start',
    status,
    headers: [
      ['content-type', contentType],
      ['content-length', String(body.byteLength)],
    ],
  });
  await send({ type: 'http.response.body', body, moreBody: false });
}

function sendText(send: Send, status: number, text: string) {
  return sendBytes(send, status, 'text/plain; charset=utf-8', Buffer.from(text, 'utf8'));
}

function sendJson(send: Send, status: number, obj: unknown) {
  return sendBytes(send, status, 'application/json', jsonCodec.encode(obj));
}

async function echo(scope: HttpScope, receive: Receive, send: Send) {
  let started = false;
  for (;;) {
    const event = await receive();
    if (event.type === 'http.disconnect') return;
    if (event.type !== 'http.request') continue;
    if (!started) {
      started = true;
      await send({
        type: 'http.response.start',
        status: 200,
        headers: [['content-type', headerValue(scope, 'content-type') ?? 'application/octet-stream']],
      });
    }
    await send({ type: 'http.response.body', body: event.body, moreBody: event.moreBody });
    if (!event.moreBody) return;
  }
}

interface UploadedPart {
  field: string;
  filename: string;
  mimeType: string;
  size: number;
}

async function upload(scope: HttpScope, receive: Receive, send: Send) {
  const contentType = headerValue(scope, 'content-type');
  if (!contentType || !contentType.toLowerCase().startsWith('multipart/form-data')) {
    await sendJson(send, 415, { error: 'Expected multipart/form-data' });
    return;
  }

  const maxParts = Number(process.env.TIDEWATER_DEMO_MAX_PARTS || 10);
  const bb = busboy({ headers: { 'content-type': contentType }, limits: { files: maxParts } });
  const files: UploadedPart[] = [];
  const fields: Record<string, string> = {};

  bb.on('field', (name, value) => {
    fields[name] = value;
  });
  bb.on('file', (field, file, info) => {
    const part: UploadedPart = { field, filename: info.filename, mimeType: info.mimeType, size: 0 };
    files.push(part);
    file.on('data', (chunk: Buffer) => {
      part.size += chunk.length;
    });
  });
  const finished = new Promise<Error | null>((resolve) => {
    bb.on('close', () => resolve(null));
    bb.on('error', (err: unknown) => resolve(err instanceof Error ? err : new Error(String(err))));
  });

  for (;;) {
    const event = await receive();
    if (event.type === 'http.disconnect') {
      bb.destroy();
      return;
    }
    if (event.type !== 'http.request') continue;
    if (!bb.write(event.body)) await once(bb, 'drain');
    if (!event.moreBody) break;
  }
  bb.end();
  const failure = await finished;

  if (failure) {
    logger.warn(`Upload rejected: ${failure.message}`, { path: scope.path });
    await sendJson(send, 400, { error: 'Malformed multipart body' });
    return;
  }
  logger.info(`Received ${files.length} file(s)`, { path: scope.path, files: files.length });
  await sendJson(send, 200, { files, fields });
}

async function info(scope: HttpScope, send: Send) {
  const codec = chooseBodyCodec(headerValue(scope, 'accept'));
  const summary = {
    method: scope.method,
    path: scope.path,
    query: scope.queryString.toString('latin1'),
    httpVersion: scope.httpVersion,
    client: scope.client ? `${scope.client[0]}:${scope.client[1]}` : null,
    requestId: currentContext()?.requestId ?? null,
    startedAt: scope.state.startedAt ?? null,
  };
  await sendBytes(send, 200, codec.contentTypes[0], codec.encode(summary));
}

async function lifespan(scope: LifespanScope, receive: Receive, send: Send) {
  for (;;) {
    const event = await receive();
    if (event.type === 'lifespan.startup') {
      scope.state.startedAt = new Date().toISOString();
      await send({ type: 'lifespan.startup.complete' });
    } else if (event.type === 'lifespan.shutdown') {
      await send({ type: 'lifespan.shutdown.complete' });
      return;
    }
  }
}

export const demoApp: Application = async (scope, receive, send) => {
  if (scope.type === 'lifespan') {
    await lifespan(scope, receive, send);
    return;
  }
  const route = `${scope.method} ${scope.path}`;
  switch (route) {
    case 'GET /':
    case 'HEAD /':
      await sendText(send, 200, 'Hello, world!');
      return;
    case 'POST /echo':
      await echo(scope, receive, send);
      return;
    case 'POST /upload':
      await upload(scope, receive, send);
      return;
    case 'GET /info':
      await info(scope, send);
      return;
    default: {
      // drain so the connection can be reused
      const body = await readBody(receive);
      if (body === null) return;
      await sendText(send, 404, 'Not Found');
    }
  }
};

export default demoApp;
