// src/core/input_accumulator.ts
import type { UserId } from "../contracts/events.js";
import { safeString } from "../server_safe_string.js";
import type { KeyedSerialQueue } from "./user_queue.js";

export const DEFAULT_DEBOUNCE_MS = 500;
export const PART_SEPARATOR = "\n";

export type AccumulatorOptions = {
  queue: KeyedSerialQueue<UserId>;
  /** Receives the merged answer, already inside the user's queue slot. */
  onFlush: (userId: UserId, text: string) => Promise<unknown>;
  /** Answer the wizard is currently holding for the user, used as the first part of a new buffer. */
  seed?: (userId: UserId) => string | null;
  delayMs?: number;
};

type PendingBuffer = {
  parts: string[];
  generation: number;
  timer: ReturnType<typeof setTimeout>;
};

/**
 * Debounces bursts of input chunks into one answer per user.
 *
 * Each submit restarts the user's timer. A firing timer only queues a flush
 * tagged with its generation; the buffer stays in place until that flush
 * reaches the user's queue slot. Work queued ahead of it can still cancel,
 * take or extend the buffer, and the flush then finds a different generation
 * and does nothing.
 */
export class InputAccumulator {
  private readonly buffers = new Map<UserId, PendingBuffer>();
  private readonly delayMs: number;
  private generation = 0;

  constructor(private readonly options: AccumulatorOptions) {
    this.delayMs = options.delayMs ?? DEFAULT_DEBOUNCE_MS;
  }

  submit(userId: UserId, chunk: string): void {
    const text = chunk.trim();
    if (!text) return;

    const existing = this.buffers.get(userId);
    const parts = existing ? existing.parts : this.seedParts(userId);
    if (existing) clearTimeout(existing.timer);
    parts.push(text);

    const generation = ++this.generation;
    const timer = setTimeout(() => this.fire(userId, generation), this.delayMs);
    this.buffers.set(userId, { parts, generation, timer });
  }

  /** Drops the user's buffer and timer. Returns whether anything was pending. */
  cancel(userId: UserId): boolean {
    const buffer = this.buffers.get(userId);
    if (!buffer) return false;
    clearTimeout(buffer.timer);
    this.buffers.delete(userId);
    console.log(`[accumulator] cancelled user_id=${userId} parts=${buffer.parts.length}`);
    return true;
  }

  /** Removes the user's buffer without flushing and returns the merged text. */
  take(userId: UserId): string | null {
    const buffer = this.buffers.get(userId);
    if (!buffer) return null;
    clearTimeout(buffer.timer);
    this.buffers.delete(userId);
    return buffer.parts.join(PART_SEPARATOR);
  }

  peek(userId: UserId): string | null {
    const buffer = this.buffers.get(userId);
    return buffer ? buffer.parts.join(PART_SEPARATOR) : null;
  }

  hasPending(userId: UserId): boolean {
    return this.buffers.has(userId);
  }

  shutdown(): void {
    for (const buffer of this.buffers.values()) clearTimeout(buffer.timer);
    this.buffers.clear();
  }

  private seedParts(userId: UserId): string[] {
    const seeded = this.options.seed?.(userId)?.trim();
    return seeded ? [seeded] : [];
  }

  private fire(userId: UserId, generation: number): void {
    if (this.buffers.get(userId)?.generation !== generation) return;
    void this.options.queue
      .run(userId, () => this.flush(userId, generation))
      .catch((err: unknown) => {
        console.error(`[accumulator] flush failed user_id=${userId}`, safeString(err));
      });
  }

  private async flush(userId: UserId, generation: number): Promise<void> {
    const buffer = this.buffers.get(userId);
    if (!buffer || buffer.generation !== generation) return;
    this.buffers.delete(userId);
    await this.options.onFlush(userId, buffer.parts.join(PART_SEPARATOR));
  }
}
