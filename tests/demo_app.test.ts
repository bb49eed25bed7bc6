import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';
import { unpack } from 'msgpackr';
import { chooseBodyCodec, demoApp } from '../src/apps/demo.js';
import { header, rawRequest, startTestServer, type TestServer } from './harness.js';

let ts: TestServer;

before(async () => {
  ts = await startTestServer(demoApp, { lifespan: 'on' });
});

after(async () => {
  await ts.stop();
});

function request(raw: string, opts: { head?: boolean } = {}) {
  return rawRequest(ts.port, raw, opts);
}

describe('demo application', () => {
  it('greets on GET /', async () => {
    const res = await request('GET / HTTP/1.1\r\n\r\n');
    assert.equal(res.status, 200);
    assert.equal(res.body.toString(), 'Hello, world!');
  });

  it('answers HEAD / without a body', async () => {
    const res = await request('HEAD / HTTP/1.1\r\n\r\n', { head: true });
    assert.equal(res.status, 200);
    assert.equal(header(res, 'content-length'), '13');
    assert.equal(res.body.length, 0);
  });

  it('streams the request body back on POST /echo', async () => {
    const res = await request('POST /echo HTTP/1.1\r\nContent-Type: text/plain\r\nContent-Length: 4\r\n\r\nping');
    assert.equal(res.status, 200);
    assert.equal(header(res, 'content-type'), 'text/plain');
    assert.equal(header(res, 'transfer-encoding'), 'chunked');
    assert.equal(res.body.toString(), 'ping');
  });

  it('reports multipart parts on POST /upload', async () => {
    const body = [
      '--XyZ',
      'Content-Disposition: form-data; name="note"',
      '',
      'hi',
      '--XyZ',
      'Content-Disposition: form-data; name="doc"; filename="a.txt"',
      'Content-Type: text/plain',
      '',
      'hello',
      '--XyZ--',
      '',
    ].join('\r\n');
    const res = await request(
      'POST /upload HTTP/1.1\r\nContent-Type: multipart/form-data; boundary=XyZ\r\n'
        + `Content-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`,
    );
    assert.equal(res.status, 200);
    assert.deepEqual(JSON.parse(res.body.toString()), {
      files: [{ field: 'doc', filename: 'a.txt', mimeType: 'text/plain', size: 5 }],
      fields: { note: 'hi' },
    });
  });

  it('refuses uploads that are not multipart', async () => {
    const res = await request('POST /upload HTTP/1.1\r\nContent-Type: text/plain\r\nContent-Length: 2\r\n\r\nhi');
    assert.equal(res.status, 415);
  });

  it('summarizes the request as JSON by default', async () => {
    const res = await request('GET /info?x=1 HTTP/1.1\r\n\r\n');
    assert.equal(header(res, 'content-type'), 'application/json');
    const info: unknown = JSON.parse(res.body.toString());
    assert.ok(info !== null && typeof info === 'object');
    assert.equal(Reflect.get(info, 'path'), '/info');
    assert.equal(Reflect.get(info, 'query'), 'x=1');
    assert.equal(typeof Reflect.get(info, 'requestId'), 'string');
    assert.equal(typeof Reflect.get(info, 'startedAt'), 'string');
  });

  it('answers MessagePack when the client prefers it', async () => {
    const res = await request('GET /info HTTP/1.1\r\nAccept: application/json;q=0.5, application/msgpack\r\n\r\n');
    assert.equal(header(res, 'content-type'), 'application/msgpack');
    const info: unknown = unpack(res.body);
    assert.ok(info !== null && typeof info === 'object');
    assert.equal(Reflect.get(info, 'method'), 'GET');
    assert.equal(Reflect.get(info, 'httpVersion'), '1.1');
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request('GET /missing HTTP/1.1\r\n\r\n');
    assert.equal(res.status, 404);
    assert.equal(res.body.toString(), 'Not Found');
  });
});

describe('chooseBodyCodec', () => {
  it('honours q values and +json suffixes', () => {
    assert.equal(chooseBodyCodec('application/json;q=0.5, application/msgpack').name, 'msgpack');
    assert.equal(chooseBodyCodec('application/vnd.api+json').name, 'json');
    assert.equal(chooseBodyCodec('text/html').name, 'json');
    assert.equal(chooseBodyCodec(undefined).name, 'json');
  });

  it('keeps JSON on a tie and lets wildcards rank below an explicit type', () => {
    assert.equal(chooseBodyCodec('*/*').name, 'json');
    assert.equal(chooseBodyCodec('application/x-msgpack;q=0.8, application/json;q=0.8').name, 'json');
    assert.equal(chooseBodyCodec('application/vnd.msgpack, */*;q=0.1').name, 'msgpack');
    assert.equal(chooseBodyCodec('application/msgpack;q=0').name, 'json');
  });
});
