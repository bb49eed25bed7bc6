import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { LifecycleFailure } from '../src/errors.js';
import type { Application } from '../src/types.js';
import { RawClient, header, messages, readAll, respond, startTestServer, textApp, waitFor } from './harness.js';

function gate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

/** Reads the body, then waits for the gate before answering. */
function gatedApp(opened: Promise<void>): Application {
  return async (scope, receive, send) => {
    if (scope.type !== 'http') return;
    await readAll(receive);
    await opened;
    await respond(send, 200, 'finished');
  };
}

/** Reads the body and then waits on receive() until the server gives up on it. */
const stuckApp: Application = async (scope, receive) => {
  if (scope.type !== 'http') return;
  await readAll(receive);
  await receive();
};

describe('Server lifecycle', () => {
  it('binds an ephemeral port and reports running', async () => {
    const ts = await startTestServer(textApp('ok'));
    assert.equal(ts.server.phase, 'running');
    assert.ok(ts.port > 0);
    assert.ok(messages(ts.logs, 'info').includes(`Listening on http://127.0.0.1:${ts.port} (Press CTRL+C to quit)`));
    await ts.stop();
    assert.equal(ts.server.phase, 'stopped');
  });

  it('stops by itself after limitMaxRequests requests', async () => {
    const ts = await startTestServer(textApp('only one'), { limitMaxRequests: 1 });
    const client = await RawClient.connect(ts.port);
    client.write('GET / HTTP/1.1\r\n\r\n');
    const res = await client.readResponse();
    assert.equal(res.body.toString(), 'only one');
    // a second request may still be answered or be cut off by the shutdown
    client.write('GET /second HTTP/1.1\r\n\r\n');
    await ts.served;
    await client.waitClosed();
    const warnings = messages(ts.logs, 'warn');
    assert.deepEqual(warnings, ['Maximum request limit of 1 exceeded. Terminating process.']);
    assert.equal(ts.server.phase, 'stopped');
  });

  it('finishes the in-flight response after a termination signal, then closes', async () => {
    const { opened, open } = gate();
    const ts = await startTestServer(gatedApp(opened), { signals: ['SIGTERM'] });
    const client = await RawClient.connect(ts.port);
    client.write('GET / HTTP/1.1\r\n\r\n');
    await waitFor(() => ts.server.state.tasks.size === 1);

    ts.signals.emit('SIGTERM', 'SIGTERM');
    await waitFor(() => ts.server.phase === 'stopping');
    open();

    const res = await client.readResponse();
    assert.equal(res.status, 200);
    assert.equal(res.body.toString(), 'finished');
    assert.equal(header(res, 'connection'), 'close');
    await client.waitClosed();
    await ts.served;
    assert.equal(ts.server.signal, 'SIGTERM');
    assert.ok(messages(ts.logs, 'info').includes('Waiting for connections to close. (CTRL+C to force quit)'));
  });

  it('forces closure on a second signal', async () => {
    const ts = await startTestServer(stuckApp, { signals: ['SIGINT'] });
    const client = await RawClient.connect(ts.port);
    client.write('GET / HTTP/1.1\r\n\r\n');
    await waitFor(() => ts.server.state.tasks.size === 1);
    ts.signals.emit('SIGINT', 'SIGINT');
    ts.signals.emit('SIGINT', 'SIGINT');
    await ts.served;
    await client.waitClosed();
    assert.equal(client.pending, 0);
    await waitFor(() => ts.server.state.tasks.size === 0);
  });

  it('cancels handlers when the graceful shutdown timeout passes', async () => {
    const ts = await startTestServer(stuckApp, { timeoutGracefulShutdownMs: 50 });
    const client = await RawClient.connect(ts.port);
    client.write('GET / HTTP/1.1\r\n\r\n');
    await waitFor(() => ts.server.state.tasks.size === 1);
    await ts.stop();
    await client.waitClosed();
    assert.deepEqual(messages(ts.logs, 'warn'), [
      'Cancel 1 running task(s), timeout graceful shutdown exceeded (50 ms)',
    ]);
  });

  it('closes idle keep-alive connections when stopping', async () => {
    const ts = await startTestServer(textApp('ok'));
    const client = await RawClient.connect(ts.port);
    client.write('GET / HTTP/1.1\r\n\r\n');
    await client.readResponse();
    await ts.stop();
    await client.waitClosed();
    assert.equal(ts.server.state.connections.size, 0);
  });

  it('fails startup when the port is taken', async () => {
    const first = await startTestServer(textApp('ok'));
    try {
      await assert.rejects(startTestServer(textApp('ok'), { port: first.port }), LifecycleFailure);
    } finally {
      await first.stop();
    }
  });
});
