import assert from 'node:assert/strict';
import { test } from 'node:test';
import { FakeMediaSocket, deferred, fakeCollaborators } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

async function makeBridge(callId: string) {
  const { VoiceBridge } = await import('../src/calls/voiceBridge');
  const { BrowserTransport } = await import('../src/transport/browserTransport');
  const { ToolDispatcher } = await import('../src/tools/dispatcher');
  const { createToolRegistry } = await import('../src/tools/handlers');

  return new VoiceBridge({
    transport: new BrowserTransport({ socket: new FakeMediaSocket(), id: callId }),
    openSession: async () => {
      throw new Error('not used');
    },
    dispatcher: new ToolDispatcher({
      callId,
      registry: createToolRegistry(),
      collaborators: fakeCollaborators(),
      timeoutMs: 1000,
      maxConcurrent: 4,
    }),
  });
}

test('register rejects a second bridge for a live call id', async () => {
  const { CallRegistry } = await import('../src/calls/callRegistry');
  const { DuplicateCallError } = await import('../src/errors');
  const registry = new CallRegistry();
  const bridge = await makeBridge('call-1');

  registry.register(bridge);
  assert.throws(
    () => registry.register(bridge),
    (error: unknown) => error instanceof DuplicateCallError && error.message === 'call call-1 is already registered',
  );
  assert.equal(registry.lookup('call-1'), bridge);
  assert.equal(registry.size, 1);
  assert.deepEqual(
    registry.list().map((record) => [record.callId, record.state]),
    [['call-1', 'Initiated']],
  );
});

test('deregister only removes the entry owned by the given bridge', async () => {
  const { CallRegistry } = await import('../src/calls/callRegistry');
  const registry = new CallRegistry();
  const bridge = await makeBridge('call-1');
  const stale = await makeBridge('call-1');
  registry.register(bridge);

  assert.equal(registry.deregister('call-1', stale), false);
  assert.equal(registry.size, 1);
  assert.equal(registry.deregister('call-1', bridge), true);
  assert.equal(registry.lookup('call-1'), undefined);
  assert.equal(registry.deregister('call-1'), false);
});

test('withKey runs tasks for one id in submission order', async () => {
  const { CallRegistry } = await import('../src/calls/callRegistry');
  const registry = new CallRegistry();
  const gate = deferred<void>();
  const order: string[] = [];

  const first = registry.withKey('call-1', async () => {
    await gate.promise;
    order.push('first');
  });
  const second = registry.withKey('call-1', () => {
    order.push('second');
  });
  const other = registry.withKey('call-2', () => {
    order.push('other');
  });

  await other;
  assert.deepEqual(order, ['other']);
  gate.resolve();
  await Promise.all([first, second]);
  assert.deepEqual(order, ['other', 'first', 'second']);
});

test('a failed task does not block the next one for the same id', async () => {
  const { CallRegistry } = await import('../src/calls/callRegistry');
  const registry = new CallRegistry();

  await assert.rejects(
    registry.withKey('call-1', () => {
      throw new Error('boom');
    }),
    /boom/,
  );
  assert.equal(await registry.withKey('call-1', () => 7), 7);
});

test('closeAll terminates every bridge with the shutdown reason', async () => {
  const { CallRegistry } = await import('../src/calls/callRegistry');
  const registry = new CallRegistry();
  const a = await makeBridge('call-a');
  const b = await makeBridge('call-b');
  registry.register(a);
  registry.register(b);

  const records = await registry.closeAll();

  assert.deepEqual(
    records.map((record) => [record.callId, record.state, record.terminationReason]),
    [
      ['call-a', 'Terminated', 'Shutdown'],
      ['call-b', 'Terminated', 'Shutdown'],
    ],
  );
  assert.equal(registry.size, 0);
  assert.equal((await a.done).terminationReason, 'Shutdown');
});
