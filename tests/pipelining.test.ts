import assert from 'node:assert/strict';
import { afterEach, describe, it } from 'node:test';
import type { Application } from '../src/types.js';
import { RawClient, delay, readAll, respond, startTestServer, type TestServer } from './harness.js';

let running: TestServer | null = null;

afterEach(async () => {
  const ts = running;
  running = null;
  if (ts) await ts.stop();
});

/** Records how many request heads the server had parsed when each handler began. */
function recordingApp(seen: Array<{ path: string; parsed: number }>, getParsed: () => number): Application {
  return async (scope, receive, send) => {
    if (scope.type !== 'http') return;
    seen.push({ path: scope.path, parsed: getParsed() });
    await readAll(receive);
    // the first request is the slowest; order must still hold
    if (scope.path === '/1') await delay(30);
    await respond(send, 200, scope.path);
  };
}

const threeRequests = 'GET /1 HTTP/1.1\r\n\r\nGET /2 HTTP/1.1\r\n\r\nGET /3 HTTP/1.1\r\n\r\n';

describe('pipelined requests', () => {
  it('answers in request order without reading ahead at depth 1', async () => {
    const seen: Array<{ path: string; parsed: number }> = [];
    const ts = await startTestServer(recordingApp(seen, () => ts.server.state.totalRequests));
    running = ts;
    const client = await RawClient.connect(ts.port);
    client.write(threeRequests);
    const bodies: string[] = [];
    for (let i = 0; i < 3; i++) bodies.push((await client.readResponse()).body.toString());
    assert.deepEqual(bodies, ['/1', '/2', '/3']);
    assert.deepEqual(seen, [
      { path: '/1', parsed: 1 },
      { path: '/2', parsed: 2 },
      { path: '/3', parsed: 3 },
    ]);
    client.destroy();
  });

  it('parses up to pipelineDepth heads ahead but still runs one handler at a time', async () => {
    const seen: Array<{ path: string; parsed: number }> = [];
    const ts = await startTestServer(recordingApp(seen, () => ts.server.state.totalRequests), { pipelineDepth: 2 });
    running = ts;
    const client = await RawClient.connect(ts.port);
    client.write(threeRequests);
    const bodies: string[] = [];
    for (let i = 0; i < 3; i++) bodies.push((await client.readResponse()).body.toString());
    assert.deepEqual(bodies, ['/1', '/2', '/3']);
    assert.deepEqual(seen[0], { path: '/1', parsed: 2 });
    assert.deepEqual(seen.map((s) => s.path), ['/1', '/2', '/3']);
    client.destroy();
  });

  it('does not serve requests pipelined behind connection: close', async () => {
    const seen: Array<{ path: string; parsed: number }> = [];
    const ts = await startTestServer(recordingApp(seen, () => ts.server.state.totalRequests), { pipelineDepth: 2 });
    running = ts;
    const client = await RawClient.connect(ts.port);
    client.write('GET /1 HTTP/1.1\r\nConnection: close\r\n\r\nGET /2 HTTP/1.1\r\n\r\n');
    const res = await client.readResponse();
    assert.equal(res.body.toString(), '/1');
    await client.waitClosed();
    assert.deepEqual(seen.map((s) => s.path), ['/1']);
  });

  it('finishes the in-flight response before answering a broken follow-up', async () => {
    const ts = await startTestServer(async (scope, receive, send) => {
      if (scope.type !== 'http') return;
      await readAll(receive);
      await delay(20);
      await respond(send, 200, 'first');
    }, { pipelineDepth: 2 });
    running = ts;
    const client = await RawClient.connect(ts.port);
    client.write('GET /1 HTTP/1.1\r\n\r\nBROKEN\r\n\r\n');
    const first = await client.readResponse();
    assert.equal(first.status, 200);
    assert.equal(first.body.toString(), 'first');
    const second = await client.readResponse();
    assert.equal(second.status, 400);
    await client.waitClosed();
  });
});
