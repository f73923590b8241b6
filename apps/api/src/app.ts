import cors from "@fastify/cors";
import sensible from "@fastify/sensible";
import websocket from "@fastify/websocket";
import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { ConfigError, ScoutError } from "./domain/errors.js";
import { loadConfig, type AppConfig } from "./lib/config.js";
import { openDatabase } from "./lib/db.js";
import { SqliteCacheStore, type CacheStore } from "./repositories/cache-store.js";
import { registerApiRoutes } from "./routes/api.js";
import { CacheMaintenanceService } from "./services/cache-maintenance.js";
import { CatalogClient, type CatalogSource } from "./services/catalog-client.js";
import { LivenessProber, type ProbeRunner } from "./services/liveness-prober.js";
import { RefreshOrchestrator } from "./services/refresh-orchestrator.js";
import { UpdateStream } from "./services/update-stream.js";

export type ApiServices = {
  orchestrator: RefreshOrchestrator;
  stream: UpdateStream;
  maintenance: CacheMaintenanceService;
};

export type CreateApiAppResult = {
  app: FastifyInstance;
  config: AppConfig;
  services: ApiServices;
};

const localhostHosts = new Set(["localhost", "127.0.0.1", "[::1]", "::1"]);

function isLoopbackOrigin(origin: string): boolean {
  try {
    return localhostHosts.has(new URL(origin).hostname);
  } catch {
    return false;
  }
}

function statusCodeOf(error: FastifyError | Error): number {
  const statusCode = "statusCode" in error && typeof error.statusCode === "number" ? error.statusCode : 500;
  return statusCode >= 400 && statusCode <= 599 ? statusCode : 500;
}

export async function createApiApp(options?: {
  config?: AppConfig;
  startBackgroundWorkers?: boolean;
  cache?: CacheStore;
  catalog?: CatalogSource;
  prober?: ProbeRunner;
  logLevel?: string;
}): Promise<CreateApiAppResult> {
  const config = options?.config ?? loadConfig();
  const startBackgroundWorkers = options?.startBackgroundWorkers ?? true;

  const app = Fastify({
    logger: {
      level: options?.logLevel ?? process.env.LOG_LEVEL ?? "info"
    }
  });

  // Some clients send `content-type: application/json` with an empty POST body.
  app.removeContentTypeParser("application/json");
  app.addContentTypeParser("application/json", { parseAs: "string" }, (request, body, done) => {
    const raw = (typeof body === "string" ? body : body.toString("utf8")).trim();
    if (!raw) {
      done(null, {});
      return;
    }

    try {
      done(null, JSON.parse(raw));
    } catch {
      done(app.httpErrors.badRequest("Invalid JSON body"));
    }
  });

  await app.register(cors, {
    origin(origin, callback) {
      callback(null, !origin || isLoopbackOrigin(origin));
    }
  });
  await app.register(sensible);
  await app.register(websocket);

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (reply.sent) {
      return;
    }

    let statusCode = statusCodeOf(error);
    let code = typeof error.code === "string" && error.code ? error.code : "";
    let message = error.message || "Request failed";
    let details: Record<string, unknown> | undefined;

    if (error instanceof ZodError) {
      statusCode = 400;
      code = "validation_error";
      message = error.issues.map((issue) => issue.message).join("; ") || "Validation failed";
      details = {
        issues: error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
          code: issue.code
        }))
      };
    } else if (error instanceof ConfigError) {
      statusCode = 400;
      details = { issues: error.issues };
    } else if (error instanceof ScoutError) {
      statusCode = error.code === "rate_limited" ? 429 : 502;
    }

    if (!code) {
      code = statusCode >= 500 ? "internal_error" : "request_error";
    }

    const payload: {
      code: string;
      message: string;
      details?: Record<string, unknown>;
      error: string;
    } = {
      code,
      message,
      error: message
    };
    if (details) {
      payload.details = details;
    }

    if (statusCode >= 500) {
      request.log.error({ err: error, code, statusCode }, "request failed");
    } else {
      request.log.warn({ err: error, code, statusCode }, "request rejected");
    }
    return reply.code(statusCode).send(payload);
  });

  const cache = options?.cache ?? new SqliteCacheStore(openDatabase(config.dbPath));
  const stream = new UpdateStream(app.log.child({ component: "stream" }));
  const catalog =
    options?.catalog ??
    new CatalogClient({
      baseUrl: config.catalogBaseUrl,
      game: config.game,
      logger: app.log.child({ component: "catalog" })
    });
  const prober = options?.prober ?? new LivenessProber({ logger: app.log.child({ component: "prober" }) });

  const orchestrator = new RefreshOrchestrator({
    catalog,
    cache,
    prober,
    stream,
    logger: app.log.child({ component: "refresh" }),
    options: {
      catalogLimit: config.catalogLimit,
      probeConcurrency: config.probeConcurrency,
      probeTimeoutMs: config.probeTimeoutMs,
      cycleTimeoutMs: config.cycleTimeoutMs,
      readinessThreshold: config.readinessThreshold,
      rateLimitCooldownMs: config.rateLimitCooldownMs
    }
  });
  const maintenance = new CacheMaintenanceService(orchestrator, config.pruneCron, app.log.child({ component: "maintenance" }));

  const services: ApiServices = {
    orchestrator,
    stream,
    maintenance
  };

  await registerApiRoutes(app, services);

  if (startBackgroundWorkers) {
    maintenance.start();
  }

  app.addHook("onClose", async () => {
    maintenance.stop();
    await orchestrator.shutdown();
  });

  return {
    app,
    config,
    services
  };
}
