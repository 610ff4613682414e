import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { InputQueue } from "../src/terminal/input-queue.js";
import type { InputEvent } from "../src/types.js";

const keyQ: InputEvent = {
  type: "key",
  kind: "press",
  code: { kind: "char", char: "q" },
};
const resize: InputEvent = { type: "resize", columns: 100, rows: 40 };

describe("InputQueue", () => {
  let queue: InputQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    queue = new InputQueue();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("resolves with null once the timeout passes", async () => {
    const next = queue.next(500);
    vi.advanceTimersByTime(500);

    await expect(next).resolves.toBeNull();
  });

  test("an event short-circuits the timeout", async () => {
    const settled = vi.fn();
    const next = queue.next(500);
    void next.then(settled);

    vi.advanceTimersByTime(499);
    await Promise.resolve();
    expect(settled).not.toHaveBeenCalled();

    queue.push(keyQ);
    await expect(next).resolves.toEqual(keyQ);
    expect(vi.getTimerCount()).toBe(0);
  });

  test("hands out buffered events in order without waiting", async () => {
    queue.push(resize);
    queue.push(keyQ);

    await expect(queue.next(500)).resolves.toEqual(resize);
    await expect(queue.next(500)).resolves.toEqual(keyQ);
    expect(vi.getTimerCount()).toBe(0);
  });

  test("allows only one pending wait", async () => {
    const first = queue.next(500);
    await expect(queue.next(500)).rejects.toThrow(
      "InputQueue.next() is already pending"
    );

    queue.push(keyQ);
    await expect(first).resolves.toEqual(keyQ);
  });

  test("close releases a pending wait and drops buffered events", async () => {
    const next = queue.next(500);
    queue.close();
    await expect(next).resolves.toBeNull();

    queue.push(keyQ);
    queue.close();
    const after = queue.next(500);
    vi.advanceTimersByTime(500);
    await expect(after).resolves.toBeNull();
  });
});
