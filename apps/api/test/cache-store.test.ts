import Database from "better-sqlite3";
import { describe, expect, it } from "vitest";
import { CacheError } from "../src/domain/errors.js";
import { migrate, openDatabase } from "../src/lib/db.js";
import { MemoryCacheStore, SqliteCacheStore, type CacheStore } from "../src/repositories/cache-store.js";
import { makeRecord } from "./helpers/fixtures.js";

const NOW = 100_000_000;
const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

const factories: Array<[string, (now: () => number) => CacheStore]> = [
  ["sqlite", (now) => new SqliteCacheStore(openDatabase(":memory:"), { now })],
  ["memory", (now) => new MemoryCacheStore({ now })]
];

describe.each(factories)("%s cache store", (_kind, createStore) => {
  const create = () => createStore(() => NOW);

  it("upserts idempotently", () => {
    const cache = create();
    const records = [makeRecord(1, { lastSeenAt: NOW }), makeRecord(2, { lastSeenAt: NOW })];

    cache.upsertBatch(records);
    cache.upsertBatch(records);

    expect(cache.getAll().map((record) => record.address)).toEqual(["10.0.0.2:2302", "10.0.0.1:2302"]);
    expect(cache.stats()).toEqual({ total: 2, active: 2, bySourceKind: { official: 0, community: 2, private: 0 } });
  });

  it("never moves lastSeenAt backwards and keeps a known ping on merge", () => {
    const cache = create();
    cache.upsertBatch([makeRecord(1, { lastSeenAt: NOW, fetchedAt: NOW })]);
    cache.updatePing("10.0.0.1:2302", { pingMs: 35, playerCount: 12 }, NOW - MINUTE);
    cache.upsertBatch([makeRecord(1, { lastSeenAt: NOW - HOUR, fetchedAt: NOW - HOUR, playerCount: 9 })]);

    const [record] = cache.getAll();
    expect(record?.lastSeenAt).toBe(NOW);
    expect(record?.fetchedAt).toBe(NOW);
    expect(record?.pingMs).toBe(35);
    expect(record?.playerCount).toBe(9);
  });

  it("writes probe results back", () => {
    const cache = create();
    cache.upsertBatch([makeRecord(1, { lastSeenAt: NOW - HOUR, maxPlayers: 10, playerCount: 4 })]);

    const reachable = cache.updatePing(
      "10.0.0.1:2302",
      { pingMs: 48, playerCount: 14, map: "enoch", perspective: "1PP" },
      NOW
    );
    expect(reachable).toMatchObject({
      pingMs: 48,
      playerCount: 14,
      maxPlayers: 14,
      map: "enoch",
      perspective: "1PP",
      lastSeenAt: NOW
    });

    const unreachable = cache.updatePing("10.0.0.1:2302", null, NOW + MINUTE);
    expect(unreachable).toMatchObject({ pingMs: null, playerCount: 14, map: "enoch", perspective: "1PP", lastSeenAt: NOW });

    expect(cache.updatePing("10.9.9.9:2302", { pingMs: 20, playerCount: 1 }, NOW)).toBeNull();
  });

  it("keeps a probed perspective when the catalog does not know it", () => {
    const cache = create();
    cache.upsertBatch([makeRecord(1, { lastSeenAt: NOW })]);
    cache.updatePing("10.0.0.1:2302", { pingMs: 30, playerCount: 3, perspective: "1PP/3PP" }, NOW);

    cache.upsertBatch([makeRecord(1, { lastSeenAt: NOW })]);
    expect(cache.getAll()[0]?.perspective).toBe("1PP/3PP");

    cache.upsertBatch([makeRecord(1, { lastSeenAt: NOW, perspective: "3PP" })]);
    expect(cache.getAll()[0]?.perspective).toBe("3PP");
  });

  it("soft-prunes stale rows but keeps them for top-servers reads", () => {
    const cache = create();
    cache.upsertBatch([
      makeRecord(1, { lastSeenAt: NOW - 3 * HOUR, playerCount: 50 }),
      makeRecord(2, { lastSeenAt: NOW - MINUTE, playerCount: 5 })
    ]);

    expect(cache.pruneStale()).toBe(1);
    expect(cache.getAll().map((record) => record.address)).toEqual(["10.0.0.2:2302"]);
    expect(cache.getTopServers(10, "playerCount").map((record) => record.address)).toEqual([
      "10.0.0.1:2302",
      "10.0.0.2:2302"
    ]);
    expect(cache.stats()).toMatchObject({ total: 2, active: 1 });

    cache.upsertBatch([makeRecord(1, { lastSeenAt: NOW })]);
    expect(cache.getAll()).toHaveLength(2);
  });

  it("purges rows unseen for a day", () => {
    const cache = create();
    cache.upsertBatch([makeRecord(1, { lastSeenAt: NOW - 25 * HOUR }), makeRecord(2, { lastSeenAt: NOW })]);

    expect(cache.purgeExpired()).toBe(1);
    expect(cache.getTopServers(10, "name").map((record) => record.address)).toEqual(["10.0.0.2:2302"]);
  });

  it("orders top servers by ping with unknown pings last", () => {
    const cache = create();
    cache.upsertBatch([
      makeRecord(1, { pingMs: null, lastSeenAt: NOW }),
      makeRecord(2, { pingMs: 80, lastSeenAt: NOW }),
      makeRecord(3, { pingMs: 20, lastSeenAt: NOW })
    ]);

    expect(cache.getTopServers(3, "pingMs").map((record) => record.pingMs)).toEqual([20, 80, null]);
    expect(cache.getTopServers(1, "playerCount").map((record) => record.address)).toEqual(["10.0.0.3:2302"]);
  });

  it("filters by criteria and treats LIKE wildcards literally", () => {
    const cache = create();
    cache.upsertBatch([
      makeRecord(1, { name: "100% Vanilla", lastSeenAt: NOW }),
      makeRecord(2, { name: "Vanilla Plus", country: "US", lastSeenAt: NOW })
    ]);

    expect(cache.getAll({ search: "%" }).map((record) => record.name)).toEqual(["100% Vanilla"]);
    expect(cache.getAll({ region: "north_america" }).map((record) => record.name)).toEqual(["Vanilla Plus"]);
    expect(cache.getAll({ search: "vanilla" })).toHaveLength(2);
  });

  it("flags entries older than the TTL as stale", () => {
    const cache = create();
    cache.upsertBatch([
      makeRecord(1, { fetchedAt: NOW - 20 * MINUTE, lastSeenAt: NOW }),
      makeRecord(2, { fetchedAt: NOW - 5 * MINUTE, lastSeenAt: NOW })
    ]);

    const entries = cache.getEntries();
    expect(entries.map((entry) => [entry.record.address, entry.isStale])).toEqual([
      ["10.0.0.2:2302", false],
      ["10.0.0.1:2302", true]
    ]);
  });

  it("tracks the latest catalog fetch per criteria key", () => {
    const cache = create();
    expect(cache.getLastFetch("k")).toBeNull();

    cache.recordFetch("k", NOW, []);
    cache.recordFetch("k", NOW - HOUR, []);
    expect(cache.getLastFetch("k")).toBe(NOW);
  });

  it("returns the active members of the last fetch for a criteria key", () => {
    const cache = create();
    cache.upsertBatch([
      makeRecord(1, { lastSeenAt: NOW }),
      makeRecord(2, { lastSeenAt: NOW }),
      makeRecord(3, { lastSeenAt: NOW }),
      makeRecord(4, { lastSeenAt: NOW - 3 * HOUR })
    ]);
    cache.recordFetch("k", NOW, ["10.0.0.1:2302", "10.0.0.3:2302", "10.0.0.4:2302"]);
    cache.pruneStale();

    expect(cache.getFetchedServers("k").map((record) => record.address)).toEqual(["10.0.0.3:2302", "10.0.0.1:2302"]);
    expect(cache.getFetchedServers("other")).toEqual([]);

    cache.recordFetch("k", NOW + MINUTE, ["10.0.0.2:2302"]);
    expect(cache.getFetchedServers("k").map((record) => record.address)).toEqual(["10.0.0.2:2302"]);
  });
});

describe("sqlite cache store", () => {
  it("wraps database failures in CacheError", () => {
    const db = openDatabase(":memory:");
    const cache = new SqliteCacheStore(db);
    db.close();

    expect(() => cache.getAll()).toThrow(CacheError);
  });

  it("adds the perspective column to an existing servers table", () => {
    const db = new Database(":memory:");
    db.exec(`
      CREATE TABLE servers (
        address TEXT PRIMARY KEY, host TEXT NOT NULL, port INTEGER NOT NULL, query_port INTEGER NOT NULL,
        name TEXT NOT NULL, map TEXT NOT NULL, country TEXT NOT NULL, source_kind TEXT NOT NULL,
        mods_present INTEGER NOT NULL, player_count INTEGER NOT NULL, max_players INTEGER NOT NULL,
        ping_ms INTEGER, last_seen_at INTEGER NOT NULL, fetched_at INTEGER NOT NULL, active INTEGER NOT NULL DEFAULT 1
      );
      INSERT INTO servers VALUES ('10.0.0.1:2302', '10.0.0.1', 2302, 2303, 'Old', 'Chernarus', 'DE', 'community', 0, 4, 60, NULL, 5, 5, 1);
    `);

    migrate(db);

    const cache = new SqliteCacheStore(db, { now: () => NOW });
    expect(cache.getTopServers(1, "name")[0]?.perspective).toBe("unknown");
    cache.close();
  });
});
