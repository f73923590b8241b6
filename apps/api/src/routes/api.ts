import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { parseFilterCriteria } from "../domain/criteria.js";
import type { UpdateEvent } from "../domain/types.js";
import type { ApiServices } from "../app.js";

const csv = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean)
  );

const criteriaQuerySchema = z.object({
  region: z.string().optional(),
  countries: csv.optional(),
  serverType: z.string().optional(),
  search: z.string().optional(),
  mods: z.enum(["true", "false"]).optional()
});

const topQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
  sort: z.enum(["playerCount", "pingMs", "lastSeenAt", "name"]).default("playerCount")
});

const refreshBodySchema = z.object({
  criteria: z.unknown().optional(),
  force: z.boolean().default(false)
});

function criteriaFromQuery(query: unknown) {
  const parsed = criteriaQuerySchema.parse(query ?? {});
  return parseFilterCriteria({
    region: parsed.region,
    countries: parsed.countries && parsed.countries.length > 0 ? parsed.countries : undefined,
    serverType: parsed.serverType,
    search: parsed.search,
    mods: parsed.mods === undefined ? undefined : parsed.mods === "true"
  });
}

export async function registerApiRoutes(app: FastifyInstance, deps: ApiServices): Promise<void> {
  const { orchestrator, stream, maintenance } = deps;

  app.get("/health", async () => ({
    ok: true,
    generation: orchestrator.currentGeneration,
    state: orchestrator.activeState,
    cache: orchestrator.cacheKind,
    catalogCooldownUntil: orchestrator.catalogCooldownUntil,
    lastMaintenance: maintenance.lastOutcome
  }));

  app.get("/servers", async () => ({
    generation: orchestrator.currentGeneration,
    servers: orchestrator.currentServers()
  }));

  app.get("/servers/cached", async (request) => {
    const criteria = criteriaFromQuery(request.query);
    return { entries: orchestrator.cachedEntries(criteria) };
  });

  app.get("/servers/top", async (request) => {
    const query = topQuerySchema.parse(request.query ?? {});
    return { servers: orchestrator.topServers(query.limit, query.sort) };
  });

  app.get("/cache/stats", async () => orchestrator.cacheStats());

  app.post("/refresh", async (request, reply) => {
    const body = refreshBodySchema.parse(request.body ?? {});
    const { generation, completion } = orchestrator.requestRefresh(body.criteria ?? {}, body.force);
    void completion.then((result) => {
      request.log.info({ ...result }, "refresh cycle settled");
    });
    return reply.code(202).send({ generation });
  });

  app.get("/stream", { websocket: true }, (socket, request) => {
    const send = (event: UpdateEvent) =>
      new Promise<void>((resolve) => {
        if (socket.readyState !== socket.OPEN) {
          resolve();
          return;
        }
        socket.send(JSON.stringify(event), (error) => {
          if (error) {
            request.log.warn({ err: error }, "stream send failed");
          }
          resolve();
        });
      });

    const unsubscribe = stream.subscribe(send);
    socket.on("close", () => unsubscribe());
  });
}
