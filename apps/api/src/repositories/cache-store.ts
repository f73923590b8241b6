import { matchesCriteria, resolveCountries } from "../domain/criteria.js";
import { CacheError, errorMessage } from "../domain/errors.js";
import type {
  CacheEntry,
  CacheStats,
  FilterCriteria,
  Perspective,
  PingReading,
  ServerRecord,
  SourceKind,
  TopServerSortKey
} from "../domain/types.js";
import { closeDb, type SqliteDatabase } from "../lib/db.js";

export const CACHE_TTL_MS = 15 * 60 * 1000;
export const STALE_AFTER_MS = 2 * 60 * 60 * 1000;
export const PURGE_AFTER_MS = 24 * 60 * 60 * 1000;

export interface CacheStore {
  readonly kind: "sqlite" | "memory";
  upsertBatch(records: ServerRecord[]): void;
  /** `null` records an unreachable probe: the ping is cleared and nothing else changes. */
  updatePing(address: string, reading: PingReading | null, observedAt: number): ServerRecord | null;
  getAll(filter?: FilterCriteria): ServerRecord[];
  /** Active rows among the addresses the last catalog fetch for `criteriaKey` returned. */
  getFetchedServers(criteriaKey: string): ServerRecord[];
  getEntries(filter?: FilterCriteria): CacheEntry[];
  getTopServers(limit: number, sortKey: TopServerSortKey): ServerRecord[];
  pruneStale(maxAgeMs?: number): number;
  purgeExpired(maxAgeMs?: number): number;
  recordFetch(criteriaKey: string, at: number, addresses: string[]): void;
  getLastFetch(criteriaKey: string): number | null;
  stats(): CacheStats;
  close(): void;
}

export type CacheStoreOptions = {
  ttlMs?: number;
  now?: () => number;
};

type RawServer = {
  address: string;
  host: string;
  port: number;
  query_port: number;
  name: string;
  map: string;
  country: string;
  source_kind: SourceKind;
  mods_present: number;
  perspective: Perspective;
  player_count: number;
  max_players: number;
  ping_ms: number | null;
  last_seen_at: number;
  fetched_at: number;
  active: number;
};

function toServer(row: RawServer): ServerRecord {
  return {
    address: row.address,
    host: row.host,
    port: row.port,
    queryPort: row.query_port,
    name: row.name,
    map: row.map,
    country: row.country,
    sourceKind: row.source_kind,
    modsPresent: row.mods_present === 1,
    perspective: row.perspective,
    playerCount: row.player_count,
    maxPlayers: row.max_players,
    pingMs: row.ping_ms,
    lastSeenAt: row.last_seen_at,
    fetchedAt: row.fetched_at
  };
}

function toRow(record: ServerRecord) {
  return {
    address: record.address,
    host: record.host,
    port: record.port,
    queryPort: record.queryPort,
    name: record.name,
    map: record.map,
    country: record.country,
    sourceKind: record.sourceKind,
    modsPresent: record.modsPresent ? 1 : 0,
    perspective: record.perspective,
    playerCount: record.playerCount,
    maxPlayers: Math.max(record.maxPlayers, record.playerCount),
    pingMs: record.pingMs,
    lastSeenAt: record.lastSeenAt,
    fetchedAt: record.fetchedAt
  };
}

function toEntry(record: ServerRecord, now: number, ttlMs: number): CacheEntry {
  return {
    record,
    fetchedAt: record.fetchedAt,
    isStale: now - record.fetchedAt > ttlMs
  };
}

const topOrderSql: Record<TopServerSortKey, string> = {
  playerCount: "player_count DESC, name ASC",
  pingMs: "ping_ms IS NULL, ping_ms ASC, name ASC",
  lastSeenAt: "last_seen_at DESC, name ASC",
  name: "name ASC"
};

export function compareForTop(sortKey: TopServerSortKey): (a: ServerRecord, b: ServerRecord) => number {
  const byName = (a: ServerRecord, b: ServerRecord) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

  switch (sortKey) {
    case "playerCount":
      return (a, b) => b.playerCount - a.playerCount || byName(a, b);
    case "pingMs":
      return (a, b) => {
        if (a.pingMs === null || b.pingMs === null) {
          return a.pingMs === b.pingMs ? byName(a, b) : a.pingMs === null ? 1 : -1;
        }
        return a.pingMs - b.pingMs || byName(a, b);
      };
    case "lastSeenAt":
      return (a, b) => b.lastSeenAt - a.lastSeenAt || byName(a, b);
    case "name":
      return byName;
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function emptyKindCounts(): Record<SourceKind, number> {
  return { official: 0, community: 0, private: 0 };
}

export class SqliteCacheStore implements CacheStore {
  readonly kind = "sqlite";
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly db: SqliteDatabase,
    options: CacheStoreOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  upsertBatch(records: ServerRecord[]): void {
    if (records.length === 0) {
      return;
    }

    this.guard("upsertBatch", () => {
      const statement = this.db.prepare(`
        INSERT INTO servers (
          address, host, port, query_port, name, map, country, source_kind, mods_present, perspective,
          player_count, max_players, ping_ms, last_seen_at, fetched_at, active
        ) VALUES (
          @address, @host, @port, @queryPort, @name, @map, @country, @sourceKind, @modsPresent, @perspective,
          @playerCount, @maxPlayers, @pingMs, @lastSeenAt, @fetchedAt, 1
        )
        ON CONFLICT(address) DO UPDATE SET
          host = excluded.host,
          port = excluded.port,
          query_port = excluded.query_port,
          name = excluded.name,
          map = excluded.map,
          country = excluded.country,
          source_kind = excluded.source_kind,
          mods_present = excluded.mods_present,
          perspective = CASE WHEN excluded.perspective = 'unknown' THEN servers.perspective ELSE excluded.perspective END,
          player_count = excluded.player_count,
          max_players = excluded.max_players,
          ping_ms = COALESCE(excluded.ping_ms, servers.ping_ms),
          last_seen_at = MAX(servers.last_seen_at, excluded.last_seen_at),
          fetched_at = MAX(servers.fetched_at, excluded.fetched_at),
          active = 1
      `);

      const upsertAll = this.db.transaction((rows: ServerRecord[]) => {
        for (const record of rows) {
          statement.run(toRow(record));
        }
      });

      upsertAll(records);
    });
  }

  updatePing(address: string, reading: PingReading | null, observedAt: number): ServerRecord | null {
    return this.guard("updatePing", () => {
      if (reading === null) {
        this.db.prepare("UPDATE servers SET ping_ms = NULL WHERE address = ?").run(address);
      } else {
        this.db
          .prepare(
            `UPDATE servers
             SET ping_ms = @pingMs,
                 player_count = COALESCE(@playerCount, player_count),
                 max_players = MAX(max_players, COALESCE(@playerCount, player_count)),
                 map = COALESCE(@map, map),
                 perspective = COALESCE(@perspective, perspective),
                 last_seen_at = MAX(last_seen_at, @observedAt),
                 active = 1
             WHERE address = @address`
          )
          .run({
            address,
            observedAt,
            pingMs: reading.pingMs,
            playerCount: reading.playerCount,
            map: reading.map ? reading.map : null,
            perspective: reading.perspective ?? null
          });
      }

      const row = this.db.prepare("SELECT * FROM servers WHERE address = ?").get(address) as RawServer | undefined;
      return row ? toServer(row) : null;
    });
  }

  getAll(filter?: FilterCriteria): ServerRecord[] {
    return this.guard("getAll", () => {
      const clauses = ["active = 1"];
      const params: Array<string | number> = [];

      const countries = filter ? resolveCountries(filter) : null;
      if (countries) {
        clauses.push(`UPPER(country) IN (${countries.map(() => "?").join(", ")})`);
        params.push(...countries);
      }

      if (filter?.serverType) {
        clauses.push("source_kind = ?");
        params.push(filter.serverType);
      }

      if (filter?.mods !== undefined) {
        clauses.push("mods_present = ?");
        params.push(filter.mods ? 1 : 0);
      }

      if (filter?.search) {
        const pattern = `%${escapeLike(filter.search.toLowerCase())}%`;
        clauses.push("(LOWER(name) LIKE ? ESCAPE '\\' OR LOWER(map) LIKE ? ESCAPE '\\')");
        params.push(pattern, pattern);
      }

      const rows = this.db
        .prepare(`SELECT * FROM servers WHERE ${clauses.join(" AND ")} ORDER BY player_count DESC, name ASC`)
        .all(...params) as RawServer[];
      return rows.map(toServer);
    });
  }

  getFetchedServers(criteriaKey: string): ServerRecord[] {
    return this.guard("getFetchedServers", () => {
      const rows = this.db
        .prepare(
          `SELECT servers.* FROM servers
           JOIN catalog_fetch_members AS members ON members.address = servers.address
           WHERE members.criteria_key = ? AND servers.active = 1
           ORDER BY servers.player_count DESC, servers.name ASC`
        )
        .all(criteriaKey) as RawServer[];
      return rows.map(toServer);
    });
  }

  getEntries(filter?: FilterCriteria): CacheEntry[] {
    const now = this.now();
    return this.getAll(filter).map((record) => toEntry(record, now, this.ttlMs));
  }

  getTopServers(limit: number, sortKey: TopServerSortKey): ServerRecord[] {
    return this.guard("getTopServers", () => {
      const rows = this.db
        .prepare(`SELECT * FROM servers ORDER BY ${topOrderSql[sortKey]} LIMIT ?`)
        .all(Math.max(0, limit)) as RawServer[];
      return rows.map(toServer);
    });
  }

  pruneStale(maxAgeMs = STALE_AFTER_MS): number {
    const cutoff = this.now() - maxAgeMs;
    return this.guard("pruneStale", () => {
      const result = this.db.prepare("UPDATE servers SET active = 0 WHERE active = 1 AND last_seen_at < ?").run(cutoff);
      return result.changes;
    });
  }

  purgeExpired(maxAgeMs = PURGE_AFTER_MS): number {
    const cutoff = this.now() - maxAgeMs;
    return this.guard("purgeExpired", () => {
      const result = this.db.prepare("DELETE FROM servers WHERE last_seen_at < ?").run(cutoff);
      this.db.prepare("DELETE FROM catalog_fetch_members WHERE address NOT IN (SELECT address FROM servers)").run();
      return result.changes;
    });
  }

  recordFetch(criteriaKey: string, at: number, addresses: string[]): void {
    this.guard("recordFetch", () => {
      const touch = this.db.prepare(
        `INSERT INTO catalog_fetches (criteria_key, fetched_at) VALUES (?, ?)
         ON CONFLICT(criteria_key) DO UPDATE SET fetched_at = MAX(catalog_fetches.fetched_at, excluded.fetched_at)`
      );
      const clear = this.db.prepare("DELETE FROM catalog_fetch_members WHERE criteria_key = ?");
      const insert = this.db.prepare("INSERT OR IGNORE INTO catalog_fetch_members (criteria_key, address) VALUES (?, ?)");

      const record = this.db.transaction(() => {
        touch.run(criteriaKey, at);
        clear.run(criteriaKey);
        for (const address of addresses) {
          insert.run(criteriaKey, address);
        }
      });

      record();
    });
  }

  getLastFetch(criteriaKey: string): number | null {
    return this.guard("getLastFetch", () => {
      const row = this.db.prepare("SELECT fetched_at FROM catalog_fetches WHERE criteria_key = ?").get(criteriaKey) as
        | { fetched_at: number }
        | undefined;
      return row?.fetched_at ?? null;
    });
  }

  stats(): CacheStats {
    return this.guard("stats", () => {
      const rows = this.db
        .prepare("SELECT source_kind, COUNT(*) AS total, SUM(active) AS active FROM servers GROUP BY source_kind")
        .all() as Array<{ source_kind: SourceKind; total: number; active: number }>;

      const stats: CacheStats = { total: 0, active: 0, bySourceKind: emptyKindCounts() };
      for (const row of rows) {
        stats.total += row.total;
        stats.active += row.active;
        stats.bySourceKind[row.source_kind] = row.active;
      }
      return stats;
    });
  }

  close(): void {
    closeDb(this.db);
  }

  private guard<T>(operation: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      throw new CacheError(`Cache ${operation} failed: ${errorMessage(error)}`, error);
    }
  }
}

type MemoryRow = {
  record: ServerRecord;
  active: boolean;
};

/** Process-local store used when the SQLite file cannot be used. */
export class MemoryCacheStore implements CacheStore {
  readonly kind = "memory";
  private readonly rows = new Map<string, MemoryRow>();
  private readonly fetches = new Map<string, { at: number; addresses: string[] }>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: CacheStoreOptions = {}, seed: ServerRecord[] = []) {
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.upsertBatch(seed);
  }

  upsertBatch(records: ServerRecord[]): void {
    for (const incoming of records) {
      const existing = this.rows.get(incoming.address)?.record;
      const record: ServerRecord = {
        ...incoming,
        perspective: incoming.perspective === "unknown" ? (existing?.perspective ?? "unknown") : incoming.perspective,
        maxPlayers: Math.max(incoming.maxPlayers, incoming.playerCount),
        pingMs: incoming.pingMs ?? existing?.pingMs ?? null,
        lastSeenAt: Math.max(existing?.lastSeenAt ?? incoming.lastSeenAt, incoming.lastSeenAt),
        fetchedAt: Math.max(existing?.fetchedAt ?? incoming.fetchedAt, incoming.fetchedAt)
      };
      this.rows.set(incoming.address, { record, active: true });
    }
  }

  updatePing(address: string, reading: PingReading | null, observedAt: number): ServerRecord | null {
    const row = this.rows.get(address);
    if (!row) {
      return null;
    }

    if (reading === null) {
      row.record = { ...row.record, pingMs: null };
      return row.record;
    }

    const players = reading.playerCount ?? row.record.playerCount;
    row.record = {
      ...row.record,
      pingMs: reading.pingMs,
      map: reading.map ? reading.map : row.record.map,
      perspective: reading.perspective ?? row.record.perspective,
      playerCount: players,
      maxPlayers: Math.max(row.record.maxPlayers, players),
      lastSeenAt: Math.max(row.record.lastSeenAt, observedAt)
    };
    row.active = true;
    return row.record;
  }

  getAll(filter?: FilterCriteria): ServerRecord[] {
    return [...this.rows.values()]
      .filter((row) => row.active && matchesCriteria(row.record, filter))
      .map((row) => row.record)
      .sort(compareForTop("playerCount"));
  }

  getFetchedServers(criteriaKey: string): ServerRecord[] {
    const rows: ServerRecord[] = [];
    for (const address of this.fetches.get(criteriaKey)?.addresses ?? []) {
      const row = this.rows.get(address);
      if (row?.active) {
        rows.push(row.record);
      }
    }
    return rows.sort(compareForTop("playerCount"));
  }

  getEntries(filter?: FilterCriteria): CacheEntry[] {
    const now = this.now();
    return this.getAll(filter).map((record) => toEntry(record, now, this.ttlMs));
  }

  getTopServers(limit: number, sortKey: TopServerSortKey): ServerRecord[] {
    return [...this.rows.values()]
      .map((row) => row.record)
      .sort(compareForTop(sortKey))
      .slice(0, Math.max(0, limit));
  }

  pruneStale(maxAgeMs = STALE_AFTER_MS): number {
    const cutoff = this.now() - maxAgeMs;
    let changed = 0;
    for (const row of this.rows.values()) {
      if (row.active && row.record.lastSeenAt < cutoff) {
        row.active = false;
        changed += 1;
      }
    }
    return changed;
  }

  purgeExpired(maxAgeMs = PURGE_AFTER_MS): number {
    const cutoff = this.now() - maxAgeMs;
    let deleted = 0;
    for (const [address, row] of this.rows) {
      if (row.record.lastSeenAt < cutoff) {
        this.rows.delete(address);
        deleted += 1;
      }
    }
    return deleted;
  }

  recordFetch(criteriaKey: string, at: number, addresses: string[]): void {
    const previous = this.fetches.get(criteriaKey)?.at ?? at;
    this.fetches.set(criteriaKey, { at: Math.max(previous, at), addresses: [...new Set(addresses)] });
  }

  getLastFetch(criteriaKey: string): number | null {
    return this.fetches.get(criteriaKey)?.at ?? null;
  }

  stats(): CacheStats {
    const stats: CacheStats = { total: 0, active: 0, bySourceKind: emptyKindCounts() };
    for (const row of this.rows.values()) {
      stats.total += 1;
      if (row.active) {
        stats.active += 1;
        stats.bySourceKind[row.record.sourceKind] += 1;
      }
    }
    return stats;
  }

  close(): void {
    this.rows.clear();
    this.fetches.clear();
  }
}
