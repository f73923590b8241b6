import os from "node:os";
import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApiApp, type ApiServices } from "../src/app.js";
import { matchesCriteria } from "../src/domain/criteria.js";
import type { AppConfig } from "../src/lib/config.js";
import { FakeCatalog, makeRecord, scriptedProber } from "./helpers/fixtures.js";

const config: AppConfig = {
  host: "127.0.0.1",
  port: 0,
  dataDir: os.tmpdir(),
  dbPath: ":memory:",
  catalogBaseUrl: "http://127.0.0.1:9",
  game: "dayz",
  catalogLimit: 300,
  probeConcurrency: 8,
  probeTimeoutMs: 100,
  cycleTimeoutMs: 1000,
  readinessThreshold: 0.6,
  rateLimitCooldownMs: 60_000,
  pruneCron: "*/10 * * * *"
};

let app: FastifyInstance;
let services: ApiServices;
const seenAt = Date.now();
const records = [
  makeRecord(1, { country: "DE", lastSeenAt: seenAt, fetchedAt: seenAt }),
  makeRecord(2, { country: "NL", lastSeenAt: seenAt, fetchedAt: seenAt }),
  makeRecord(3, { country: "US", lastSeenAt: seenAt, fetchedAt: seenAt })
];
const catalog = new FakeCatalog(async (criteria) => records.filter((record) => matchesCriteria(record, criteria)));

beforeAll(async () => {
  const created = await createApiApp({
    config,
    startBackgroundWorkers: false,
    catalog,
    prober: scriptedProber((target) => ({
      delayMs: 1,
      outcome: { kind: "reachable", pingMs: 40, playerCount: Number(target.host.split(".").at(-1)) * 10, maxPlayers: 60 }
    })),
    logLevel: "silent"
  });

  app = created.app;
  services = created.services;
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

describe("api integration", () => {
  it("returns health before any refresh", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      ok: true,
      generation: 0,
      state: "idle",
      cache: "sqlite",
      catalogCooldownUntil: null,
      lastMaintenance: null
    });
  });

  it("rejects invalid refresh criteria with a config error", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/refresh",
      payload: { criteria: { region: "mars" } }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: "config_error" });
    expect(services.orchestrator.currentGeneration).toBe(0);
  });

  it("streams a refresh cycle to the websocket subscriber", async () => {
    const socket = await app.injectWS("/stream");
    const messages: unknown[] = [];
    socket.on("message", (data) => {
      const parsed: unknown = JSON.parse(String(data));
      messages.push(parsed);
    });

    const response = await app.inject({
      method: "POST",
      url: "/refresh",
      payload: { criteria: { region: "europe" } }
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ generation: 1 });

    await vi.waitFor(() => expect(messages.at(-1)).toMatchObject({ kind: "complete", generation: 1 }));
    expect(messages).toHaveLength(4);
    expect(messages).toContainEqual({ kind: "partial_ready", generation: 1, resolved: 2, total: 2 });
    socket.terminate();
    expect(catalog.calls).toHaveLength(1);
  });

  it("lists current, cached and top servers", async () => {
    const current = await app.inject({ method: "GET", url: "/servers" });
    expect(current.statusCode).toBe(200);
    expect(current.json()).toMatchObject({ generation: 1 });
    expect(current.json().servers).toHaveLength(2);

    const cached = await app.inject({ method: "GET", url: "/servers/cached?countries=nl" });
    expect(cached.statusCode).toBe(200);
    expect(cached.json().entries).toHaveLength(1);
    expect(cached.json().entries[0]).toMatchObject({ isStale: false, record: { address: "10.0.0.2:2302", pingMs: 40 } });

    const top = await app.inject({ method: "GET", url: "/servers/top?limit=2&sort=playerCount" });
    expect(top.statusCode).toBe(200);
    expect(top.json().servers.map((server: { address: string }) => server.address)).toEqual(["10.0.0.2:2302", "10.0.0.1:2302"]);
  });

  it("reports cache statistics", async () => {
    const response = await app.inject({ method: "GET", url: "/cache/stats" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ total: 2, active: 2, bySourceKind: { official: 0, community: 2, private: 0 } });
  });

  it("accepts an empty JSON refresh body", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/refresh",
      headers: { "content-type": "application/json" },
      payload: ""
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ generation: 2 });
    await vi.waitFor(() => expect(services.orchestrator.activeState).toBe("complete"));
  });

  it("validates query parameters", async () => {
    const response = await app.inject({ method: "GET", url: "/servers/top?sort=bogus" });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: "validation_error" });
  });
});
