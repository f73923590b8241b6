import { describe, expect, it, vi } from "vitest";
import type { UpdateEvent } from "../src/domain/types.js";
import { UpdateStream } from "../src/services/update-stream.js";
import { Deferred, makeRecord, silentLogger } from "./helpers/fixtures.js";

function updated(generation: number, index: number, playerCount: number): UpdateEvent {
  return { kind: "server_updated", generation, record: makeRecord(index, { playerCount }) };
}

function describeEvent(event: UpdateEvent): string {
  return event.kind === "server_updated"
    ? `${String(event.generation)}:${event.record.address}:${String(event.record.playerCount)}`
    : `${String(event.generation)}:${event.kind}`;
}

describe("update stream", () => {
  it("delivers events asynchronously and in order", async () => {
    const stream = new UpdateStream(silentLogger);
    const seen: string[] = [];
    stream.subscribe((event) => {
      seen.push(describeEvent(event));
    });
    stream.open(1);

    stream.publish(updated(1, 1, 5));
    stream.publish({ kind: "partial_ready", generation: 1, resolved: 1, total: 2 });
    stream.publish(updated(1, 2, 6));
    expect(seen).toEqual([]);

    await stream.flush();
    expect(seen).toEqual(["1:10.0.0.1:2302:5", "1:partial_ready", "1:10.0.0.2:2302:6"]);
  });

  it("coalesces updates for the same server while the subscriber is busy", async () => {
    const stream = new UpdateStream(silentLogger);
    const gate = new Deferred<void>();
    const seen: string[] = [];
    stream.open(1);
    stream.subscribe(async (event) => {
      seen.push(describeEvent(event));
      if (seen.length === 1) {
        await gate.promise;
      }
    });

    stream.publish(updated(1, 1, 1));
    await vi.waitFor(() => expect(seen).toHaveLength(1));

    stream.publish(updated(1, 1, 2));
    stream.publish(updated(1, 2, 9));
    stream.publish(updated(1, 1, 3));
    expect(stream.pending).toBe(2);

    gate.resolve();
    await stream.flush();
    expect(seen).toEqual(["1:10.0.0.1:2302:1", "1:10.0.0.1:2302:3", "1:10.0.0.2:2302:9"]);
  });

  it("drops events of superseded generations", async () => {
    const stream = new UpdateStream(silentLogger);
    const seen: string[] = [];
    stream.open(1);
    stream.publish(updated(1, 1, 1));

    stream.open(2);
    expect(stream.publish(updated(1, 2, 2))).toBe(false);
    expect(stream.publish({ kind: "complete", generation: 2, resolved: 0, unreachable: 0, total: 0 })).toBe(true);

    stream.subscribe((event) => {
      seen.push(describeEvent(event));
    });
    await stream.flush();
    expect(seen).toEqual(["2:complete"]);
  });

  it("replaces the previous subscriber", async () => {
    const stream = new UpdateStream(silentLogger);
    const first = vi.fn();
    const second = vi.fn();
    stream.open(1);

    const unsubscribeFirst = stream.subscribe(first);
    stream.subscribe(second);
    unsubscribeFirst();

    stream.publish(updated(1, 1, 1));
    await stream.flush();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it("keeps delivering after a subscriber throws", async () => {
    const stream = new UpdateStream(silentLogger);
    const seen: string[] = [];
    stream.open(1);
    stream.subscribe((event) => {
      if (event.kind === "partial_ready") {
        throw new Error("render failed");
      }
      seen.push(describeEvent(event));
    });

    stream.publish({ kind: "partial_ready", generation: 1, resolved: 0, total: 0 });
    stream.publish({ kind: "complete", generation: 1, resolved: 0, unreachable: 0, total: 0 });
    await stream.flush();

    expect(seen).toEqual(["1:complete"]);
  });
});
