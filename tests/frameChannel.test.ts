import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

async function drain<T>(channel: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of channel) {
    items.push(item);
  }
  return items;
}

test('delivers items in push order', async () => {
  const { FrameChannel } = await import('../src/audio/frameChannel');
  const channel = new FrameChannel<number>({ capacity: 10 });
  channel.push(1);
  channel.push(2);
  channel.push(3);
  channel.close();

  assert.deepEqual(await drain(channel), [1, 2, 3]);
});

test('evicts the oldest item when full', async () => {
  const { FrameChannel } = await import('../src/audio/frameChannel');
  const overflow: Array<[number, number]> = [];
  const channel = new FrameChannel<number>({
    capacity: 2,
    onOverflow: (dropped, depth) => overflow.push([dropped, depth]),
  });
  channel.push(1);
  channel.push(2);
  channel.push(3);
  channel.close();

  assert.deepEqual(overflow, [[1, 2]]);
  assert.equal(channel.dropped, 1);
  assert.deepEqual(await drain(channel), [2, 3]);
});

test('hands an item straight to a waiting consumer', async () => {
  const { FrameChannel } = await import('../src/audio/frameChannel');
  const channel = new FrameChannel<number>({ capacity: 1 });
  const pending = channel.next();
  channel.push(5);

  assert.deepEqual(await pending, { value: 5, done: false });
  assert.equal(channel.size, 0);
});

test('clear reports how many items were discarded', async () => {
  const { FrameChannel } = await import('../src/audio/frameChannel');
  const channel = new FrameChannel<number>({ capacity: 4 });
  channel.push(1);
  channel.push(2);

  assert.equal(channel.clear(), 2);
  assert.equal(channel.size, 0);
});

test('close with discard ends iteration immediately', async () => {
  const { FrameChannel } = await import('../src/audio/frameChannel');
  const channel = new FrameChannel<number>({ capacity: 4 });
  channel.push(1);
  channel.close({ discard: true });

  assert.equal((await channel.next()).done, true);
  assert.equal(channel.push(2), false);
});

test('close releases a waiting consumer', async () => {
  const { FrameChannel } = await import('../src/audio/frameChannel');
  const channel = new FrameChannel<number>({ capacity: 4 });
  const pending = channel.next();
  channel.close();

  assert.equal((await pending).done, true);
});

test('rejects a second concurrent consumer', async () => {
  const { FrameChannel } = await import('../src/audio/frameChannel');
  const channel = new FrameChannel<number>({ capacity: 4 });
  const first = channel.next();

  await assert.rejects(channel.next(), /frame channel supports a single consumer/);
  channel.push(1);
  assert.deepEqual(await first, { value: 1, done: false });
});
