import type { FastifyBaseLogger } from "fastify";
import { criteriaKey, parseFilterCriteria } from "../domain/criteria.js";
import { CacheError, NetworkError, RateLimitError, errorMessage } from "../domain/errors.js";
import type {
  CacheEntry,
  CacheStats,
  CycleResult,
  CycleState,
  FailureKind,
  FilterCriteria,
  PingReading,
  ProbeResult,
  ServerRecord,
  TopServerSortKey,
  UpdateEvent
} from "../domain/types.js";
import { CACHE_TTL_MS, MemoryCacheStore, compareForTop, type CacheStore } from "../repositories/cache-store.js";
import type { CatalogSource } from "./catalog-client.js";
import type { ProbeRunner } from "./liveness-prober.js";
import type { UpdateStream } from "./update-stream.js";

export type RefreshOptions = {
  ttlMs: number;
  catalogLimit: number;
  probeConcurrency: number;
  probeTimeoutMs: number;
  cycleTimeoutMs: number;
  readinessThreshold: number;
  rateLimitCooldownMs: number;
  fallbackLimit: number;
};

export const defaultRefreshOptions: RefreshOptions = {
  ttlMs: CACHE_TTL_MS,
  catalogLimit: 300,
  probeConcurrency: 64,
  probeTimeoutMs: 1500,
  cycleTimeoutMs: 20_000,
  readinessThreshold: 0.6,
  rateLimitCooldownMs: 60_000,
  fallbackLimit: 150
};

export type RefreshHandle = {
  generation: number;
  completion: Promise<CycleResult>;
};

export type MaintenanceResult = {
  pruned: number;
  purged: number;
};

type RefreshCycle = {
  generation: number;
  criteria: FilterCriteria;
  key: string;
  force: boolean;
  state: CycleState;
};

function applyOutcome(record: ServerRecord, result: ProbeResult): ServerRecord {
  if (result.outcome.kind === "unreachable") {
    return { ...record, pingMs: null };
  }
  return {
    ...record,
    pingMs: result.outcome.pingMs,
    playerCount: result.outcome.playerCount,
    maxPlayers: Math.max(record.maxPlayers, result.outcome.playerCount),
    map: result.outcome.map ? result.outcome.map : record.map,
    perspective: result.outcome.perspective ?? record.perspective,
    lastSeenAt: Math.max(record.lastSeenAt, result.observedAt)
  };
}

const terminalStates = new Set<CycleState>(["complete", "failed", "superseded"]);
const TIMED_OUT = Symbol("timed-out");

/**
 * Drives refresh cycles: cache-or-catalog decision, merge, bounded probing and event emission.
 * Only the newest generation may write probe results back or publish events.
 */
export class RefreshOrchestrator {
  private readonly catalog: CatalogSource;
  private readonly prober: ProbeRunner;
  private readonly stream: UpdateStream;
  private readonly logger: FastifyBaseLogger;
  private readonly options: RefreshOptions;
  private readonly now: () => number;
  private cache: CacheStore;
  private generation = 0;
  private active: { cycle: RefreshCycle; completion: Promise<CycleResult> } | null = null;
  private snapshot = new Map<string, ServerRecord>();
  private cooldownUntil = 0;
  private readonly drains = new Set<Promise<void>>();
  private shutDown = false;

  constructor(deps: {
    catalog: CatalogSource;
    cache: CacheStore;
    prober: ProbeRunner;
    stream: UpdateStream;
    logger: FastifyBaseLogger;
    options?: Partial<RefreshOptions>;
    now?: () => number;
  }) {
    this.catalog = deps.catalog;
    this.cache = deps.cache;
    this.prober = deps.prober;
    this.stream = deps.stream;
    this.logger = deps.logger;
    this.options = { ...defaultRefreshOptions, ...deps.options };
    this.now = deps.now ?? Date.now;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  get cacheKind(): CacheStore["kind"] {
    return this.cache.kind;
  }

  get catalogCooldownUntil(): number | null {
    return this.cooldownUntil > this.now() ? this.cooldownUntil : null;
  }

  get activeState(): CycleState {
    return this.active?.cycle.state ?? "idle";
  }

  /**
   * Validates the criteria (throwing ConfigError before any cycle starts), supersedes the
   * active cycle and starts a new one.
   */
  requestRefresh(input: unknown, force = false): RefreshHandle {
    if (this.shutDown) {
      throw new Error("Refresh orchestrator has been shut down");
    }

    const criteria = parseFilterCriteria(input);
    this.generation += 1;

    const previous = this.active?.cycle;
    if (previous && !terminalStates.has(previous.state)) {
      this.logger.info({ generation: previous.generation, state: previous.state }, "refresh cycle superseded");
      previous.state = "superseded";
    }

    const cycle: RefreshCycle = {
      generation: this.generation,
      criteria,
      key: criteriaKey(criteria),
      force,
      state: "idle"
    };

    this.stream.open(cycle.generation);
    const completion = this.runCycle(cycle);
    this.active = { cycle, completion };
    return { generation: cycle.generation, completion };
  }

  currentServers(): ServerRecord[] {
    return [...this.snapshot.values()].sort(compareForTop("playerCount"));
  }

  cachedEntries(criteria?: FilterCriteria): CacheEntry[] {
    return this.withCache((cache) => cache.getEntries(criteria));
  }

  topServers(limit: number, sortKey: TopServerSortKey): ServerRecord[] {
    return this.withCache((cache) => cache.getTopServers(limit, sortKey));
  }

  cacheStats(): CacheStats {
    return this.withCache((cache) => cache.stats());
  }

  maintainCache(): MaintenanceResult {
    return this.withCache((cache) => ({
      pruned: cache.pruneStale(),
      purged: cache.purgeExpired()
    }));
  }

  /** Stops emitting, waits for the active cycle and in-flight probes, then releases the cache. */
  async shutdown(): Promise<void> {
    if (this.shutDown) {
      return;
    }
    this.shutDown = true;
    this.generation += 1;

    if (this.active) {
      if (!terminalStates.has(this.active.cycle.state)) {
        this.active.cycle.state = "superseded";
      }
      await this.active.completion;
    }

    while (this.drains.size > 0) {
      await Promise.all([...this.drains]);
    }
    await this.prober.idle();

    this.stream.close();
    this.cache.close();
  }

  private async runCycle(cycle: RefreshCycle): Promise<CycleResult> {
    let result: CycleResult;
    try {
      result = await this.executeCycle(cycle);
    } catch (error) {
      if (this.isSuperseded(cycle)) {
        result = this.supersededResult(cycle);
      } else {
        this.logger.error({ err: error, generation: cycle.generation }, "refresh cycle failed unexpectedly");
        result = this.fail(cycle, "internal", errorMessage(error));
      }
    }

    if (result.state !== "superseded") {
      await this.stream.flush();
    }
    return result;
  }

  private async executeCycle(cycle: RefreshCycle): Promise<CycleResult> {
    this.transition(cycle, "deciding");

    let candidates: ServerRecord[] | null = null;
    if (!cycle.force) {
      const lastFetch = this.withCache((cache) => cache.getLastFetch(cycle.key));
      if (lastFetch !== null && this.now() - lastFetch <= this.options.ttlMs) {
        this.transition(cycle, "cache_warm");
        candidates = this.withCache((cache) => cache.getFetchedServers(cycle.key));
      }
    }

    if (!candidates) {
      this.transition(cycle, "fetching");

      const cooldownUntil = this.catalogCooldownUntil;
      if (cooldownUntil !== null) {
        return this.fail(cycle, "rate_limited", `Catalog is cooling down for ${String(cooldownUntil - this.now())}ms`);
      }

      let fetched: ServerRecord[];
      try {
        fetched = await this.catalog.fetchCatalog(cycle.criteria, this.options.catalogLimit);
      } catch (error) {
        if (error instanceof RateLimitError) {
          this.cooldownUntil = this.now() + Math.max(this.options.rateLimitCooldownMs, error.retryAfterMs ?? 0);
          return this.fail(cycle, "rate_limited", error.message);
        }
        if (error instanceof NetworkError) {
          return this.fail(cycle, "network", error.message);
        }
        throw error;
      }

      if (this.isSuperseded(cycle)) {
        return this.supersededResult(cycle);
      }

      this.transition(cycle, "merging");
      this.withCache((cache) => cache.upsertBatch(fetched));
      const fetchedAt = this.now();
      const addresses = fetched.map((record) => record.address);
      this.withCache((cache) => cache.recordFetch(cycle.key, fetchedAt, addresses));
      candidates = fetched;
    }

    if (this.isSuperseded(cycle)) {
      return this.supersededResult(cycle);
    }

    this.snapshot = new Map(candidates.map((record) => [record.address, record]));
    return this.probeCandidates(cycle, candidates);
  }

  private async probeCandidates(cycle: RefreshCycle, candidates: ServerRecord[]): Promise<CycleResult> {
    this.transition(cycle, "probing");

    const total = candidates.length;
    const readyAt = total === 0 ? 0 : Math.max(1, Math.ceil(total * this.options.readinessThreshold - 1e-9));
    const unresolved = new Map(candidates.map((record) => [record.address, record]));
    let resolved = 0;
    let unreachable = 0;
    let partialSent = false;

    const markReady = () => {
      if (!partialSent && resolved >= readyAt) {
        partialSent = true;
        this.transition(cycle, "partial_ready");
        this.emit(cycle, { kind: "partial_ready", generation: cycle.generation, resolved, total });
      }
    };

    markReady();

    const iterator = this.prober
      .probeAll(
        candidates.map((record) => ({ address: record.address, host: record.host, queryPort: record.queryPort })),
        { timeoutMs: this.options.probeTimeoutMs, concurrency: this.options.probeConcurrency }
      )
      [Symbol.asyncIterator]();

    let expire = () => {};
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      expire = () => resolve(TIMED_OUT);
    });
    const timer = setTimeout(() => expire(), this.options.cycleTimeoutMs);

    try {
      while (unresolved.size > 0) {
        const pendingNext = iterator.next();
        const next = await Promise.race([pendingNext, deadline]);

        if (next === TIMED_OUT) {
          this.logger.warn({ generation: cycle.generation, unresolved: unresolved.size }, "refresh cycle timed out");
          this.drainInBackground(iterator, pendingNext);
          break;
        }

        if (next.done) {
          break;
        }

        if (this.isSuperseded(cycle)) {
          this.drainInBackground(iterator);
          return this.supersededResult(cycle);
        }

        const known = unresolved.get(next.value.target.address);
        if (!known) {
          continue;
        }
        unresolved.delete(known.address);
        this.applyProbeResult(cycle, next.value, known);
        resolved += 1;
        if (next.value.outcome.kind === "unreachable") {
          unreachable += 1;
        }
        markReady();
      }

      if (unresolved.size === 0) {
        this.drainInBackground(iterator);
      }
    } finally {
      clearTimeout(timer);
    }

    if (this.isSuperseded(cycle)) {
      return this.supersededResult(cycle);
    }

    const observedAt = this.now();
    for (const record of unresolved.values()) {
      this.applyProbeResult(
        cycle,
        {
          target: { address: record.address, host: record.host, queryPort: record.queryPort },
          outcome: { kind: "unreachable", reason: "cycle timeout" },
          observedAt
        },
        record
      );
      resolved += 1;
      unreachable += 1;
    }
    unresolved.clear();
    markReady();

    this.transition(cycle, "complete");
    this.emit(cycle, { kind: "complete", generation: cycle.generation, resolved, unreachable, total });
    this.logger.info({ generation: cycle.generation, total, unreachable }, "refresh cycle complete");

    return {
      generation: cycle.generation,
      state: "complete",
      failure: null,
      servers: total,
      resolved,
      unreachable
    };
  }

  private applyProbeResult(cycle: RefreshCycle, result: ProbeResult, known: ServerRecord): void {
    const { target, outcome, observedAt } = result;
    const reading: PingReading | null =
      outcome.kind === "reachable"
        ? { pingMs: outcome.pingMs, playerCount: outcome.playerCount, map: outcome.map, perspective: outcome.perspective }
        : null;
    const stored = this.withCache((cache) => cache.updatePing(target.address, reading, observedAt));

    const record = stored ?? applyOutcome(known, result);
    this.snapshot.set(record.address, record);
    this.emit(cycle, { kind: "server_updated", generation: cycle.generation, record });
  }

  private fail(cycle: RefreshCycle, failure: FailureKind, message: string): CycleResult {
    if (this.isSuperseded(cycle)) {
      return this.supersededResult(cycle);
    }

    this.transition(cycle, "failed");
    this.logger.warn({ generation: cycle.generation, failure, message }, "refresh cycle failed; serving cached fallback");

    let fallback: ServerRecord[] = [];
    try {
      fallback = this.withCache((cache) => cache.getTopServers(this.options.fallbackLimit, "playerCount"));
    } catch (error) {
      this.logger.error({ err: error }, "cache fallback unavailable");
    }

    if (fallback.length > 0) {
      this.snapshot = new Map(fallback.map((record) => [record.address, record]));
    }
    for (const record of fallback) {
      this.emit(cycle, { kind: "server_updated", generation: cycle.generation, record });
    }
    this.emit(cycle, { kind: "failed", generation: cycle.generation, failure, message });

    return {
      generation: cycle.generation,
      state: "failed",
      failure,
      servers: fallback.length,
      resolved: 0,
      unreachable: 0
    };
  }

  private supersededResult(cycle: RefreshCycle): CycleResult {
    cycle.state = "superseded";
    return {
      generation: cycle.generation,
      state: "superseded",
      failure: null,
      servers: 0,
      resolved: 0,
      unreachable: 0
    };
  }

  private emit(cycle: RefreshCycle, event: UpdateEvent): void {
    if (this.isSuperseded(cycle)) {
      return;
    }
    this.stream.publish(event);
  }

  private isSuperseded(cycle: RefreshCycle): boolean {
    return cycle.state === "superseded" || cycle.generation !== this.generation;
  }

  private transition(cycle: RefreshCycle, state: CycleState): void {
    if (terminalStates.has(cycle.state)) {
      return;
    }
    cycle.state = state;
    this.logger.debug({ generation: cycle.generation, state }, "refresh cycle transition");
  }

  /** Lets probes of a finished or superseded cycle settle without admitting queued ones. */
  private drainInBackground(
    iterator: AsyncIterator<ProbeResult>,
    pendingNext?: Promise<IteratorResult<ProbeResult>>
  ): void {
    const drain = (async () => {
      try {
        if (pendingNext) {
          await pendingNext;
        }
        await iterator.return?.();
      } catch (error) {
        this.logger.warn({ err: error }, "probe drain failed");
      }
    })();

    this.drains.add(drain);
    void drain.finally(() => {
      this.drains.delete(drain);
    });
  }

  /** Runs a cache operation; on CacheError the store is swapped for an in-memory one for good. */
  private withCache<T>(operation: (cache: CacheStore) => T): T {
    try {
      return operation(this.cache);
    } catch (error) {
      if (!(error instanceof CacheError) || this.cache.kind === "memory") {
        throw error;
      }

      this.logger.warn({ err: error }, "persistent cache failed; continuing with in-memory cache");
      const failed = this.cache;
      this.cache = new MemoryCacheStore({ ttlMs: this.options.ttlMs, now: this.now }, [...this.snapshot.values()]);
      try {
        failed.close();
      } catch (closeError) {
        this.logger.warn({ err: closeError }, "failed to close persistent cache");
      }
      return operation(this.cache);
    }
  }
}
