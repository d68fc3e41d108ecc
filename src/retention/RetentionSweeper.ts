import { Cron } from "croner";

import type { ConfigProvider } from "../config/loader.js";
import { createLoggerFacade, type LoggerFacade } from "../shared/logging/logger.js";
import type { WorkflowStore } from "../workflow/store.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PurgeResult {
  cutoff: string;
  deleted: string[];
  failed: string[];
}

/**
 * 过期工作流清理
 *
 * createdAt 早于 retentionDays 的工作流连同其提交记录一起删除。
 * start() 之后按 retentionCron 定时执行。
 */
export class RetentionSweeper {
  private readonly logger: LoggerFacade = createLoggerFacade("retention");
  private job: Cron | null = null;

  constructor(
    private readonly store: WorkflowStore,
    private readonly config: ConfigProvider
  ) {}

  cutoffFor(now: Date = new Date()): Date {
    return new Date(now.getTime() - this.config.current().retentionDays * DAY_MS);
  }

  async purge(now: Date = new Date()): Promise<PurgeResult> {
    const cutoff = this.cutoffFor(now);
    const expired = await this.store.listExpired(cutoff);
    const result: PurgeResult = { cutoff: cutoff.toISOString(), deleted: [], failed: [] };

    for (const workflow of expired) {
      try {
        await this.store.delete(workflow.id);
        result.deleted.push(workflow.id);
      } catch (error) {
        result.failed.push(workflow.id);
        this.logger.error("Failed to delete expired workflow", error, { workflowId: workflow.id });
      }
    }

    this.logger.info("Retention purge finished", {
      cutoff: result.cutoff,
      deleted: result.deleted.length,
      failed: result.failed.length
    });
    return result;
  }

  start(): void {
    if (this.job) {
      return;
    }
    const pattern = this.config.current().retentionCron;
    this.job = new Cron(pattern, { protect: true }, async () => {
      try {
        await this.purge();
      } catch (error) {
        this.logger.error("Scheduled retention purge failed", error);
      }
    });
    this.logger.info("Retention schedule started", {
      cron: pattern,
      nextRun: this.job.nextRun()?.toISOString() ?? null
    });
  }

  get running(): boolean {
    return this.job !== null;
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }
}
