export { createApiApp, type ApiServices, type CreateApiAppResult } from "./app.js";
export { buildCatalogQuery, criteriaKey, matchesCriteria, parseFilterCriteria, regionCountries } from "./domain/criteria.js";
export { CacheError, ConfigError, NetworkError, RateLimitError, ScoutError } from "./domain/errors.js";
export type * from "./domain/types.js";
export { loadConfig, type AppConfig } from "./lib/config.js";
export { openDatabase } from "./lib/db.js";
export { MemoryCacheStore, SqliteCacheStore, type CacheStore } from "./repositories/cache-store.js";
export { CacheMaintenanceService } from "./services/cache-maintenance.js";
export { CatalogClient, type CatalogSource } from "./services/catalog-client.js";
export { LivenessProber, queryServerInfo, type ProbeRunner } from "./services/liveness-prober.js";
export { RefreshOrchestrator, type RefreshHandle, type RefreshOptions } from "./services/refresh-orchestrator.js";
export { UpdateStream, type UpdateListener } from "./services/update-stream.js";
