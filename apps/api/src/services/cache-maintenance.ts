import cron, { type ScheduledTask } from "node-cron";
import type { FastifyBaseLogger } from "fastify";
import { errorMessage } from "../domain/errors.js";
import type { MaintenanceResult } from "./refresh-orchestrator.js";

export interface MaintenanceTarget {
  maintainCache(): MaintenanceResult;
}

/** Periodically hides servers unseen for two hours and deletes rows unseen for a day. */
export class CacheMaintenanceService {
  private task: ScheduledTask | null = null;
  private lastRun: { at: number; result: MaintenanceResult | null; error: string | null } | null = null;

  constructor(
    private readonly target: MaintenanceTarget,
    private readonly cronExpr: string,
    private readonly logger: FastifyBaseLogger,
    private readonly now: () => number = Date.now
  ) {}

  get lastOutcome() {
    return this.lastRun;
  }

  start(): void {
    if (this.task) {
      return;
    }
    this.task = cron.schedule(this.cronExpr, () => {
      this.runOnce();
    });
  }

  stop(): void {
    if (!this.task) {
      return;
    }
    this.task.stop();
    this.task = null;
  }

  runOnce(): MaintenanceResult | null {
    try {
      const result = this.target.maintainCache();
      this.lastRun = { at: this.now(), result, error: null };
      if (result.pruned > 0 || result.purged > 0) {
        this.logger.info(result, "cache maintenance pruned servers");
      }
      return result;
    } catch (error) {
      this.lastRun = { at: this.now(), result: null, error: errorMessage(error) };
      this.logger.error({ err: error }, "cache maintenance failed");
      return null;
    }
  }
}
