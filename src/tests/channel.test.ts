import { describe, expect, it } from 'vitest';
import { ChannelClosedError } from '../errors.ts';
import { Channel } from '../pipeline/channel.ts';

async function collect<T>(channel: Channel<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const value of channel) out.push(value);
  return out;
}

describe('Channel', () => {
  it('hands out values in the order they were sent', async () => {
    const channel = new Channel<string>(3);
    await channel.send('a');
    await channel.send('b');
    await channel.send('c');
    channel.close();

    expect(await collect(channel)).toEqual(['a', 'b', 'c']);
  });

  it('holds a sender back while the buffer is full', async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);

    let accepted = false;
    const pending = channel.send(2).then(() => {
      accepted = true;
    });
    await Promise.resolve();
    expect(accepted).toBe(false);

    expect(await channel.receive()).toEqual({ done: false, value: 1 });
    await pending;
    expect(accepted).toBe(true);
    expect(channel.size).toBe(1);
  });

  it('at capacity 0 only accepts once a receiver takes the value', async () => {
    const channel = new Channel<string>(0);
    let accepted = false;
    const pending = channel.send('x').then(() => {
      accepted = true;
    });
    await Promise.resolve();
    expect(accepted).toBe(false);

    expect(await channel.receive()).toEqual({ done: false, value: 'x' });
    await pending;
    expect(accepted).toBe(true);
  });

  it('wakes a waiting receiver on send', async () => {
    const channel = new Channel<string>(1);
    const next = channel.receive();
    await channel.send('late');
    expect(await next).toEqual({ done: false, value: 'late' });
    expect(channel.size).toBe(0);
  });

  it('still drains buffered and blocked values after close', async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);
    channel.close();

    expect(await collect(channel)).toEqual([1, 2]);
    await expect(blocked).resolves.toBeUndefined();
  });

  it('ends iteration for a waiting receiver when closed', async () => {
    const channel = new Channel<number>();
    const next = channel.receive();
    channel.close();
    expect(await next).toEqual({ done: true, value: undefined });
  });

  it('rejects sends after close', async () => {
    const channel = new Channel<number>();
    channel.close();
    expect(channel.isClosed).toBe(true);
    await expect(channel.send(1)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it('rejects a negative capacity', () => {
    expect(() => new Channel(-1)).toThrow(RangeError);
  });
});
