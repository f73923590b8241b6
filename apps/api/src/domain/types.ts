export type SourceKind = "official" | "community" | "private";

export type Region = "europe" | "north_america" | "oceania";

export type Perspective = "1PP" | "3PP" | "1PP/3PP" | "unknown";

export type ServerRecord = {
  address: string;
  host: string;
  port: number;
  queryPort: number;
  name: string;
  map: string;
  country: string;
  sourceKind: SourceKind;
  modsPresent: boolean;
  perspective: Perspective;
  playerCount: number;
  maxPlayers: number;
  pingMs: number | null;
  lastSeenAt: number;
  fetchedAt: number;
};

export type FilterCriteria = {
  region?: Region;
  countries?: string[];
  serverType?: SourceKind;
  search?: string;
  mods?: boolean;
};

export type CacheEntry = {
  record: ServerRecord;
  fetchedAt: number;
  isStale: boolean;
};

export type TopServerSortKey = "playerCount" | "pingMs" | "lastSeenAt" | "name";

export type CacheStats = {
  total: number;
  active: number;
  bySourceKind: Record<SourceKind, number>;
};

export type ProbeTarget = {
  address: string;
  host: string;
  queryPort: number;
};

export type ProbeOutcome =
  | {
      kind: "reachable";
      pingMs: number;
      playerCount: number;
      maxPlayers: number;
      map?: string;
      perspective?: Perspective;
    }
  | {
      kind: "unreachable";
      reason: string;
    };

/** What a successful probe writes back onto a cached row. */
export type PingReading = {
  pingMs: number;
  playerCount: number | null;
  map?: string;
  perspective?: Perspective;
};

export type ProbeResult = {
  target: ProbeTarget;
  outcome: ProbeOutcome;
  observedAt: number;
};

export type CycleState =
  | "idle"
  | "deciding"
  | "fetching"
  | "cache_warm"
  | "merging"
  | "probing"
  | "partial_ready"
  | "complete"
  | "failed"
  | "superseded";

export type FailureKind = "network" | "rate_limited" | "internal";

export type UpdateEvent =
  | { kind: "server_updated"; generation: number; record: ServerRecord }
  | { kind: "partial_ready"; generation: number; resolved: number; total: number }
  | { kind: "complete"; generation: number; resolved: number; unreachable: number; total: number }
  | { kind: "failed"; generation: number; failure: FailureKind; message: string };

export type CycleResult = {
  generation: number;
  state: "complete" | "failed" | "superseded";
  failure: FailureKind | null;
  servers: number;
  resolved: number;
  unreachable: number;
};

export function addressKey(host: string, port: number): string {
  return `${host}:${String(port)}`;
}
