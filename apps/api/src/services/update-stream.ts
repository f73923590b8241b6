import type { FastifyBaseLogger } from "fastify";
import type { UpdateEvent } from "../domain/types.js";

export type UpdateListener = (event: UpdateEvent) => void | Promise<void>;

type Slot = {
  key: string | null;
  event: UpdateEvent;
};

/**
 * Single-subscriber channel between the orchestrator and the presentation layer.
 *
 * Delivery is asynchronous and in publish order. While the subscriber is busy (its
 * listener returned a pending promise), queued `server_updated` events for the same
 * address collapse into the newest one, so the queue holds at most one update per server
 * plus the lifecycle markers.
 */
export class UpdateStream {
  private listener: UpdateListener | null = null;
  private generation = 0;
  private readonly queue: Slot[] = [];
  private readonly pendingByKey = new Map<string, Slot>();
  private draining: Promise<void> | null = null;
  private closed = false;

  constructor(private readonly logger: FastifyBaseLogger | null = null) {}

  /** Replaces the current subscriber. Returns an unsubscribe function for this subscriber only. */
  subscribe(listener: UpdateListener): () => void {
    this.listener = listener;
    this.scheduleDrain();
    return () => {
      if (this.listener === listener) {
        this.listener = null;
      }
    };
  }

  get activeGeneration(): number {
    return this.generation;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Starts a new generation; queued events from older generations are dropped. */
  open(generation: number): void {
    if (generation <= this.generation) {
      return;
    }
    this.generation = generation;

    const kept = this.queue.filter((slot) => slot.event.generation === generation);
    this.queue.length = 0;
    this.pendingByKey.clear();
    for (const slot of kept) {
      this.queue.push(slot);
      if (slot.key) {
        this.pendingByKey.set(slot.key, slot);
      }
    }
  }

  /** Returns false when the event belongs to a superseded generation and was dropped. */
  publish(event: UpdateEvent): boolean {
    if (this.closed || event.generation !== this.generation) {
      return false;
    }

    if (event.kind === "server_updated") {
      const key = event.record.address;
      const queued = this.pendingByKey.get(key);
      if (queued) {
        queued.event = event;
      } else {
        const slot: Slot = { key, event };
        this.queue.push(slot);
        this.pendingByKey.set(key, slot);
      }
    } else {
      this.queue.push({ key: null, event });
    }

    this.scheduleDrain();
    return true;
  }

  /** Resolves once every queued event has been handed to the subscriber (or there is none). */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  close(): void {
    this.closed = true;
    this.listener = null;
    this.queue.length = 0;
    this.pendingByKey.clear();
  }

  private scheduleDrain(): void {
    if (this.draining || !this.listener || this.queue.length === 0) {
      return;
    }

    this.draining = this.drain().finally(() => {
      this.draining = null;
      this.scheduleDrain();
    });
  }

  private async drain(): Promise<void> {
    await Promise.resolve();

    while (this.listener) {
      const slot = this.queue.shift();
      if (!slot) {
        return;
      }
      if (slot.key && this.pendingByKey.get(slot.key) === slot) {
        this.pendingByKey.delete(slot.key);
      }
      if (slot.event.generation !== this.generation) {
        continue;
      }

      try {
        await this.listener(slot.event);
      } catch (error) {
        this.logger?.warn({ err: error, kind: slot.event.kind }, "update subscriber failed");
      }
    }
  }
}
