import http from "node:http";
import { pino } from "pino";
import type { FastifyBaseLogger } from "fastify";
import type { FilterCriteria, ProbeOutcome, ProbeTarget, ServerRecord } from "../../src/domain/types.js";
import type { CatalogSource } from "../../src/services/catalog-client.js";
import { LivenessProber } from "../../src/services/liveness-prober.js";

export const silentLogger: FastifyBaseLogger = pino({ level: "silent" });

export function makeRecord(index: number, overrides: Partial<ServerRecord> = {}): ServerRecord {
  const host = `10.0.0.${String(index)}`;
  const port = 2302;
  return {
    address: `${host}:${String(port)}`,
    host,
    port,
    queryPort: port + 1,
    name: `Test Server ${String(index)}`,
    map: "Chernarus",
    country: "DE",
    sourceKind: "community",
    modsPresent: false,
    perspective: "unknown",
    playerCount: index,
    maxPlayers: 60,
    pingMs: null,
    lastSeenAt: 1_000,
    fetchedAt: 1_000,
    ...overrides
  };
}

export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => {};
  reject: (error: unknown) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Catalog stand-in that records every call and answers through `respond`. */
export class FakeCatalog implements CatalogSource {
  readonly calls: Array<{ criteria: FilterCriteria; limit: number }> = [];

  constructor(private readonly respond: (criteria: FilterCriteria, call: number) => Promise<ServerRecord[]>) {}

  fetchCatalog(criteria: FilterCriteria, limit: number): Promise<ServerRecord[]> {
    this.calls.push({ criteria, limit });
    return this.respond(criteria, this.calls.length);
  }
}

export type ScriptedProbe = { delayMs: number; outcome: ProbeOutcome };

/** Real prober pool driven by per-address scripted outcomes instead of UDP. */
export function scriptedProber(
  script: (target: ProbeTarget) => ScriptedProbe,
  now: () => number = Date.now
): LivenessProber {
  return new LivenessProber({
    now,
    probe: async (target) => {
      const { delayMs, outcome } = script(target);
      await sleep(delayMs);
      return outcome;
    }
  });
}

export type StartedServer = {
  baseUrl: string;
  requests: string[];
  close: () => Promise<void>;
};

export async function startServer(
  handler: (req: http.IncomingMessage, res: http.ServerResponse<http.IncomingMessage>, baseUrl: string) => void
): Promise<StartedServer> {
  const requests: string[] = [];
  let baseUrl = "";
  const server = http.createServer((req, res) => {
    requests.push(req.url ?? "");
    handler(req, res, baseUrl);
  });
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Failed to start test server");
  }
  baseUrl = `http://127.0.0.1:${String(address.port)}`;

  return {
    baseUrl,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      })
  };
}

export function sendJson(res: http.ServerResponse, statusCode: number, body: unknown, headers: Record<string, string> = {}): void {
  res.writeHead(statusCode, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(body));
}
