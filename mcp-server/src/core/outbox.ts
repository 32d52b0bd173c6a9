// src/core/outbox.ts
import { renderDirective, type MessageView } from "../adapters/directive_view.js";
import { DirectiveZod, type Directive } from "../contracts/directives.js";
import type { UserId } from "../contracts/events.js";

export type OutboxMessage = {
  seq: number;
  directive: Directive;
  view: MessageView;
};

/** Where the core hands finished directives, in the order they were produced. */
export interface DirectiveSink {
  deliver(userId: UserId, directives: readonly Directive[]): void;
}

/**
 * Per-user FIFO of rendered directives. Tool calls drain it, so directives
 * produced outside a request (debounced flushes, reminders) reach the client
 * on its next call.
 */
export class Outbox implements DirectiveSink {
  private readonly queues = new Map<UserId, OutboxMessage[]>();
  private seq = 0;

  constructor(private readonly maxPerUser = 100) {}

  deliver(userId: UserId, directives: readonly Directive[]): void {
    if (!directives.length) return;
    const queue = this.queues.get(userId) ?? [];
    for (const raw of directives) {
      const directive = DirectiveZod.parse(raw);
      queue.push({ seq: ++this.seq, directive, view: renderDirective(directive) });
    }
    if (queue.length > this.maxPerUser) {
      const dropped = queue.splice(0, queue.length - this.maxPerUser);
      console.warn(`[outbox] user_id=${userId} dropped ${dropped.length} undelivered message(s)`);
    }
    this.queues.set(userId, queue);
  }

  drain(userId: UserId): OutboxMessage[] {
    const queue = this.queues.get(userId) ?? [];
    this.queues.delete(userId);
    return queue;
  }

  peek(userId: UserId): readonly OutboxMessage[] {
    return this.queues.get(userId) ?? [];
  }

  clear(userId: UserId): void {
    this.queues.delete(userId);
  }
}
