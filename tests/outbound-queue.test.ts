/**
 * Tests for the bounded outbound queue
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { BoundedQueue } from "../src/tak/index.ts";

describe("BoundedQueue", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should reject a capacity below one", () => {
    expect(() => new BoundedQueue<string>(0)).toThrow(RangeError);
    expect(() => new BoundedQueue<string>(1.5)).toThrow(RangeError);
  });

  it("should deliver items in FIFO order", async () => {
    const queue = new BoundedQueue<string>(3);
    queue.tryOffer("a");
    queue.tryOffer("b");
    queue.tryOffer("c");

    expect(await queue.take()).toBe("a");
    expect(await queue.take()).toBe("b");
    expect(await queue.take()).toBe("c");
    expect(queue.size).toBe(0);
  });

  it("should refuse tryOffer when full", () => {
    const queue = new BoundedQueue<string>(1);

    expect(queue.tryOffer("a")).toBe(true);
    expect(queue.tryOffer("b")).toBe(false);
    expect(queue.size).toBe(1);
  });

  it("should track the high-water mark", async () => {
    const queue = new BoundedQueue<number>(5);
    queue.tryOffer(1);
    queue.tryOffer(2);
    queue.tryOffer(3);
    await queue.take();
    await queue.take();

    expect(queue.size).toBe(1);
    expect(queue.maxSize).toBe(3);
  });

  it("should time out an offer when no space opens", async () => {
    vi.useFakeTimers();
    const queue = new BoundedQueue<string>(1);
    queue.tryOffer("a");

    const pending = queue.offer("b", 100);
    await vi.advanceTimersByTimeAsync(100);

    expect(await pending).toBe("timeout");
    expect(queue.size).toBe(1);
  });

  it("should admit a waiting producer once space opens", async () => {
    const queue = new BoundedQueue<string>(1);
    queue.tryOffer("a");

    const pending = queue.offer("b", 1000);
    expect(await queue.take()).toBe("a");

    expect(await pending).toBe("accepted");
    expect(await queue.take()).toBe("b");
  });

  it("should hand an item straight to a waiting consumer", async () => {
    const queue = new BoundedQueue<string>(1);
    const taken = queue.take();

    expect(await queue.offer("a", 10)).toBe("accepted");
    expect(await taken).toBe("a");
    expect(queue.size).toBe(0);
  });

  it("should reject a waiting take when aborted", async () => {
    const queue = new BoundedQueue<string>(1);
    const controller = new AbortController();
    const taken = queue.take(controller.signal);

    controller.abort(new Error("stopped"));

    await expect(taken).rejects.toThrow("stopped");
    // The aborted consumer no longer receives items
    queue.tryOffer("a");
    expect(queue.size).toBe(1);
  });

  it("should reject immediately when already aborted", async () => {
    const queue = new BoundedQueue<string>(1);
    await expect(queue.take(AbortSignal.abort(new Error("gone")))).rejects.toThrow("gone");
  });

  it("should discard items and release producers on drain", async () => {
    const queue = new BoundedQueue<string>(2);
    queue.tryOffer("a");
    queue.tryOffer("b");
    const pending = queue.offer("c", 10_000);

    expect(queue.drain()).toBe(2);
    expect(await pending).toBe("closed");
    expect(queue.size).toBe(0);
  });
});
