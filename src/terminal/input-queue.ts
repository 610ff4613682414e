import type { InputEvent, InputSource } from "../types.js";

interface Waiter {
  resolve: (event: InputEvent | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * Buffers input events pushed by the UI and hands them to the event loop.
 * Only one `next` call may be pending at a time.
 */
export class InputQueue implements InputSource {
  private events: InputEvent[] = [];
  private waiter: Waiter | null = null;

  push(event: InputEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(event);
      return;
    }
    this.events.push(event);
  }

  next(timeoutMs: number): Promise<InputEvent | null> {
    const buffered = this.events.shift();
    if (buffered) {
      return Promise.resolve(buffered);
    }
    if (this.waiter) {
      return Promise.reject(new Error("InputQueue.next() is already pending"));
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = { resolve, timer };
    });
  }

  /** Resolves a pending wait with null and drops buffered events. */
  close(): void {
    const waiter = this.waiter;
    this.waiter = null;
    this.events = [];
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }
}
