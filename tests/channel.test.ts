/**
 * Tests for Channel
 */

import { describe, it, expect } from 'vitest';
import { Channel } from '../src/utils/channel.js';

describe('Channel', () => {
  it('should deliver values in FIFO order', async () => {
    const channel = new Channel<number>(3);
    await channel.send(1);
    await channel.send(2);
    await channel.send(3);
    channel.close();

    const received: number[] = [];
    for await (const value of channel) {
      received.push(value);
    }
    expect(received).toEqual([1, 2, 3]);
  });

  it('should hold a sender while the buffer is full', async () => {
    const channel = new Channel<string>(1);
    await channel.send('a');

    let accepted: boolean | undefined;
    const pending = channel.send('b').then((result) => {
      accepted = result;
    });
    await Promise.resolve();
    expect(accepted).toBeUndefined();
    expect(channel.length).toBe(1);

    expect(await channel.receive()).toEqual({ value: 'a', done: false });
    await pending;
    expect(accepted).toBe(true);
    expect(await channel.receive()).toEqual({ value: 'b', done: false });
  });

  it('should refuse senders once closed but keep buffered values readable', async () => {
    const channel = new Channel<string>(1);
    await channel.send('kept');
    const waiting = channel.send('refused');

    channel.close();

    expect(await waiting).toBe(false);
    expect(await channel.send('late')).toBe(false);
    expect(await channel.receive()).toEqual({ value: 'kept', done: false });
    expect((await channel.receive()).done).toBe(true);
  });

  it('should release a waiting sender when its signal aborts', async () => {
    const channel = new Channel<string>(0);
    const controller = new AbortController();
    const waiting = channel.send('value', controller.signal);

    controller.abort();

    expect(await waiting).toBe(false);
    channel.close();
    expect((await channel.receive()).done).toBe(true);
  });

  it('should wake a waiting receiver on send and on close', async () => {
    const channel = new Channel<number>(0);
    const first = channel.receive();
    await channel.send(7);
    expect(await first).toEqual({ value: 7, done: false });

    const second = channel.receive();
    channel.close();
    expect((await second).done).toBe(true);
  });

  it('should reject a negative capacity', () => {
    expect(() => new Channel<number>(-1)).toThrow(RangeError);
  });
});
