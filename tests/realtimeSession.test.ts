import assert from 'node:assert/strict';
import { test } from 'node:test';
import { FakeRealtimeSocket, flush } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

interface OpenOptions {
  socket?: FakeRealtimeSocket;
  setupTimeoutMs?: number;
  autoOpen?: boolean;
}

async function openSession(options: OpenOptions = {}) {
  const { RealtimeSession } = await import('../src/ai/realtimeSession');
  const { buildSessionConfiguration } = await import('../src/ai/sessionConfig');
  const { PCMU_8K } = await import('../src/media/types');

  const socket = options.socket ?? new FakeRealtimeSocket();
  const opened: Array<{ url: string; headers: Record<string, string> }> = [];
  const pending = RealtimeSession.open({
    callId: 'call-1',
    config: buildSessionConfiguration({ audioFormat: PCMU_8K }),
    setupTimeoutMs: options.setupTimeoutMs ?? 1000,
    closeGraceMs: 30,
    socketFactory: (url, headers) => {
      opened.push({ url, headers });
      return socket;
    },
  });
  if (options.autoOpen !== false) {
    socket.open();
  }
  return { pending, socket, opened };
}

function audioDelta(itemId: string, bytes: number[]) {
  return {
    type: 'response.audio.delta',
    item_id: itemId,
    content_index: 0,
    delta: Buffer.from(bytes).toString('base64'),
  };
}

test('builds the websocket url and auth headers', async () => {
  const { buildAuthHeaders, buildRealtimeUrl } = await import('../src/ai/realtimeSession');

  assert.equal(
    buildRealtimeUrl('https://realtime.example.test/openai/realtime?api-version=2025-04-01-preview', 'gpt-4o-mini'),
    'wss://realtime.example.test/openai/realtime?api-version=2025-04-01-preview&model=gpt-4o-mini',
  );
  assert.equal(buildRealtimeUrl('http://localhost:9000/rt?model=custom', 'gpt-4o-mini'), 'ws://localhost:9000/rt?model=custom');
  assert.deepEqual(buildAuthHeaders('bearer', 'test-secret'), { Authorization: 'Bearer test-secret' });
  assert.deepEqual(buildAuthHeaders('api-key', 'test-secret'), { 'api-key': 'test-secret' });
});

test('configures the session before anything else and greets first', async () => {
  const { pending, socket, opened } = await openSession();
  const session = await pending;

  assert.equal(session.state, 'Configured');
  assert.deepEqual(opened[0]?.headers, { 'api-key': 'test-secret' });

  const [update, greet] = socket.messages();
  assert.equal(update?.type, 'session.update');
  const sessionBody = update?.session;
  assert.ok(typeof sessionBody === 'object' && sessionBody !== null && 'input_audio_format' in sessionBody);
  assert.equal(sessionBody.input_audio_format, 'g711_ulaw');
  assert.deepEqual(greet, { type: 'response.create' });
  await session.close();
});

test('rejects with SessionSetupError when the endpoint never opens', async () => {
  const { SessionSetupError } = await import('../src/errors');
  const { pending, socket } = await openSession({ autoOpen: false, setupTimeoutMs: 30 });

  await assert.rejects(
    pending,
    (error: unknown) =>
      error instanceof SessionSetupError && error.message === 'realtime session not ready within 30 ms',
  );
  assert.equal(socket.terminateCalls, 1);
});

test('reports the http status of a rejected handshake', async () => {
  const { SessionSetupError } = await import('../src/errors');
  const { pending, socket } = await openSession({ autoOpen: false });
  socket.emit('unexpected-response', {}, { statusCode: 401 });

  await assert.rejects(pending, (error: unknown) => error instanceof SessionSetupError && error.status === 401);
});

test('sends caller audio in order and marks the session streaming', async () => {
  const { PCMU_8K } = await import('../src/media/types');
  const { pending, socket } = await openSession();
  const session = await pending;

  for (let sequence = 0; sequence < 3; sequence += 1) {
    assert.equal(
      session.sendAudio({ source: 'caller', sequence, format: PCMU_8K, payload: Buffer.from([sequence]) }),
      true,
    );
  }
  await flush();

  assert.equal(session.state, 'Streaming');
  assert.deepEqual(
    socket.messagesOfType('input_audio_buffer.append').map((message) => message.audio),
    ['AA==', 'AQ==', 'Ag=='],
  );
  await session.close();
});

test('surfaces assistant audio with its item and a running sequence', async () => {
  const { pending, socket } = await openSession();
  const session = await pending;
  const events = session.receiveEvents()[Symbol.asyncIterator]();
  assert.equal(session.state, 'Configured');

  socket.serverSend(audioDelta('item-1', [1, 2]));
  socket.serverSend(audioDelta('item-1', [3]));

  const first = await events.next();
  const second = await events.next();
  assert.ok(!first.done && first.value.type === 'audio');
  assert.ok(!second.done && second.value.type === 'audio');
  assert.deepEqual(first.value.frame.payload, Buffer.from([1, 2]));
  assert.equal(first.value.frame.itemId, 'item-1');
  assert.equal(first.value.frame.contentIndex, 0);
  assert.equal(first.value.frame.sequence, 0);
  assert.equal(second.value.frame.sequence, 1);
  assert.deepEqual(first.value.frame.format, { encoding: 'mulaw', sampleRateHz: 8000 });
  assert.equal(session.state, 'Streaming');
  await session.close();
});

test('tool results are accepted once per observed request id', async () => {
  const { UnknownRequestIdError } = await import('../src/errors');
  const { pending, socket } = await openSession();
  const session = await pending;
  const events = session.receiveEvents()[Symbol.asyncIterator]();

  socket.serverSend({
    type: 'response.function_call_arguments.done',
    call_id: 'call_a',
    name: 'lookup_client',
    arguments: '{"client_id":"123"}',
  });
  socket.serverSend({ type: 'response.function_call_arguments.done', call_id: 'call_b', name: 'lookup_client', arguments: '{}' });

  const requested = await events.next();
  assert.deepEqual(requested.value, {
    type: 'tool_call_requested',
    requestId: 'call_a',
    name: 'lookup_client',
    arguments: { client_id: '123' },
  });
  assert.equal(session.pendingToolRequests, 2);
  assert.throws(() => session.submitToolResult('call_x', {}), UnknownRequestIdError);

  const before = socket.sent.length;
  session.submitToolResult('call_a', { ok: 1 });
  assert.deepEqual(socket.messages().slice(before), [
    { type: 'conversation.item.create', item: { type: 'function_call_output', call_id: 'call_a', output: '{"ok":1}' } },
  ]);

  session.submitToolResult('call_b', 'done');
  assert.deepEqual(socket.messages().slice(before + 1), [
    { type: 'conversation.item.create', item: { type: 'function_call_output', call_id: 'call_b', output: 'done' } },
    { type: 'response.create' },
  ]);
  assert.throws(() => session.submitToolResult('call_a', {}), UnknownRequestIdError);
  await session.close();
});

test('truncate cancels the response and trims the item', async () => {
  const { pending, socket } = await openSession();
  const session = await pending;

  session.truncate({ itemId: 'item-1', contentIndex: 0, playedMs: 120.7 });
  const [cancel, truncate] = socket.messages().slice(2);

  assert.equal(cancel?.type, 'response.cancel');
  assert.match(String(cancel?.event_id), /^evt_/);
  assert.equal(truncate?.type, 'conversation.item.truncate');
  assert.equal(truncate?.item_id, 'item-1');
  assert.equal(truncate?.content_index, 0);
  assert.equal(truncate?.audio_end_ms, 120);

  socket.serverSend({ type: 'error', error: { message: 'no active response', event_id: cancel?.event_id } });
  socket.serverSend({ type: 'error', error: { message: 'something else' } });
  await flush();
  assert.equal(session.state, 'Configured');
  await session.close();
});

test('an unexpected close fails the session and ends the event stream', async () => {
  const { PCMU_8K } = await import('../src/media/types');
  const { pending, socket } = await openSession();
  const session = await pending;
  const events = session.receiveEvents()[Symbol.asyncIterator]();

  socket.drop(1006);

  assert.deepEqual((await events.next()).value, {
    type: 'session_error',
    message: 'realtime socket closed unexpectedly (code 1006)',
  });
  assert.equal((await events.next()).done, true);
  assert.equal(session.state, 'Failed');
  assert.equal(session.sendAudio({ source: 'caller', sequence: 0, format: PCMU_8K, payload: Buffer.from([0]) }), false);
  await session.close();
  assert.equal(session.state, 'Failed');
});

test('close is idempotent and ends the event stream', async () => {
  const { pending, socket } = await openSession();
  const session = await pending;
  const events = session.receiveEvents()[Symbol.asyncIterator]();

  const first = session.close();
  const second = session.close();
  assert.equal(first, second);
  await first;

  assert.equal(session.state, 'Closed');
  assert.equal(socket.closeCalls, 1);
  assert.equal((await events.next()).done, true);
});

test('terminates a socket that ignores the close handshake', async () => {
  const socket = new FakeRealtimeSocket({ ignoreClose: true });
  const { pending } = await openSession({ socket });
  const session = await pending;

  await session.close();

  assert.equal(socket.terminateCalls, 1);
  assert.equal(session.state, 'Closed');
});
