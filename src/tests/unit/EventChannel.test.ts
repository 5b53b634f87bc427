import { describe, it, expect } from 'vitest';
import { EventChannel } from '../../core/dispatcher/EventChannel.js';

interface Item {
  producer: string;
  seq: number;
}

describe('EventChannel', () => {
  it('should deliver buffered items in push order', async () => {
    const channel = new EventChannel<Item>();
    channel.push({ producer: 'a', seq: 1 });
    channel.push({ producer: 'a', seq: 2 });

    expect(channel.size).toBe(2);
    expect(await channel.receive()).toEqual({ value: { producer: 'a', seq: 1 }, done: false });
    expect(await channel.receive()).toEqual({ value: { producer: 'a', seq: 2 }, done: false });
    expect(channel.size).toBe(0);
  });

  it('should hand a pushed item straight to a waiting consumer', async () => {
    const channel = new EventChannel<Item>();
    const pending = channel.receive();
    channel.push({ producer: 'b', seq: 1 });

    expect(await pending).toEqual({ value: { producer: 'b', seq: 1 }, done: false });
    expect(channel.size).toBe(0);
  });

  it('should reject a second concurrent consumer', async () => {
    const channel = new EventChannel<Item>();
    const first = channel.receive();

    await expect(channel.receive()).rejects.toThrow('EventChannel already has a waiting consumer');

    channel.close();
    expect(await first).toEqual({ value: undefined, done: true });
  });

  it('should drain buffered items after close, then end', async () => {
    const channel = new EventChannel<Item>();
    channel.push({ producer: 'a', seq: 1 });
    channel.close();

    expect(channel.push({ producer: 'a', seq: 2 })).toBe(false);

    const received: Item[] = [];
    for await (const item of channel) {
      received.push(item);
    }
    expect(received).toEqual([{ producer: 'a', seq: 1 }]);
    expect(channel.isClosed).toBe(true);
  });

  it('should keep per-producer order with interleaved async producers', async () => {
    const channel = new EventChannel<Item>();

    const produce = async (producer: string, count: number): Promise<void> => {
      for (let seq = 1; seq <= count; seq++) {
        await Promise.resolve();
        channel.push({ producer, seq });
      }
    };

    const consumed = (async () => {
      const received: Item[] = [];
      for await (const item of channel) {
        received.push(item);
      }
      return received;
    })();

    await Promise.all([produce('a', 5), produce('b', 5), produce('c', 5)]);
    channel.close();
    const received = await consumed;

    expect(received).toHaveLength(15);
    for (const producer of ['a', 'b', 'c']) {
      const sequence = received.filter((item) => item.producer === producer).map((item) => item.seq);
      expect(sequence).toEqual([1, 2, 3, 4, 5]);
    }
  });
});
