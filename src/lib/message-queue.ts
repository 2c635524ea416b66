/**
 * message-queue.ts — FIFO hand-off from the voice listener to the UI loop.
 *
 * The listener pushes from its async loop; the render loop drains everything
 * once per frame. Nothing else crosses between the two.
 */

import type { ListenerMessage } from "./voice-types.ts";

export class MessageQueue {
  private items: ListenerMessage[] = [];

  push(message: ListenerMessage) {
    this.items.push(message);
  }

  /** Remove and return every queued message, oldest first. Never blocks. */
  drain(): ListenerMessage[] {
    if (this.items.length === 0) return [];
    const out = this.items;
    this.items = [];
    return out;
  }

  get size(): number {
    return this.items.length;
  }
}
