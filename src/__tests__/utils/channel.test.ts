/**
 * Tests for the async event channel.
 */

import { describe, it, expect } from "vitest";
import { Channel, Queue } from "@/utils/channel";

describe("Queue", () => {
  it("dequeues in insertion order", () => {
    const queue = new Queue<number>();
    queue.enqueue(1);
    queue.enqueue(2);

    expect(queue.dequeue()).toBe(1);
    expect(queue.getSize()).toBe(1);
    expect(queue.dequeue()).toBe(2);
    expect(queue.dequeue()).toBeUndefined();
  });
});

describe("Channel", () => {
  it("delivers buffered values after close, then ends", async () => {
    const channel = new Channel<string>();
    channel.push("a");
    channel.push("b");
    channel.close();

    const received: string[] = [];
    for await (const value of channel) received.push(value);

    expect(received).toEqual(["a", "b"]);
  });

  it("wakes a waiting consumer", async () => {
    const channel = new Channel<number>();
    const next = channel.next();

    channel.push(7);

    expect(await next).toEqual({ value: 7, done: false });
  });

  it("ends a waiting consumer on close and refuses later pushes", async () => {
    const channel = new Channel<number>();
    const next = channel.next();

    channel.close();

    expect(await next).toEqual({ value: undefined, done: true });
    expect(channel.push(1)).toBe(false);
    expect(channel.closed).toBe(true);
    expect(channel.pending).toBe(0);
  });
});
