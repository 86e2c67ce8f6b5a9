import { EventChannel } from './channel.js';

async function drain<T>(channel: EventChannel<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const value of channel) out.push(value);
  return out;
}

describe('EventChannel', () => {
  it('delivers buffered values in order, then ends on close', async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();
    expect(await drain(channel)).toEqual([1, 2]);
  });

  it('wakes a waiting consumer on push and on close', async () => {
    const channel = new EventChannel<string>();
    const drained = drain(channel);
    await Promise.resolve();
    channel.push('a');
    await Promise.resolve();
    channel.push('b');
    channel.close();
    expect(await drained).toEqual(['a', 'b']);
  });

  it('rejects a push after close', () => {
    const channel = new EventChannel<number>();
    channel.close();
    expect(channel.isClosed).toBe(true);
    expect(() => channel.push(1)).toThrow('EventChannel: push after close');
  });

  it('can only be iterated once', () => {
    const channel = new EventChannel<number>();
    channel[Symbol.asyncIterator]();
    expect(() => channel[Symbol.asyncIterator]()).toThrow('EventChannel: already consumed');
  });
});
