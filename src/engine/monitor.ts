import { EventEmitter } from "node:events";

import type { BackendRegistry } from "../backends/registry.js";
import type { PollResult } from "../backends/types.js";
import type { ConfigProvider } from "../config/loader.js";
import type { MonitorConfig } from "../config/schema.js";
import { createLoggerFacade, type LoggerFacade } from "../shared/logging/logger.js";
import { retryWithBackoff } from "../shared/retry/retryWithBackoff.js";
import {
  submissionId,
  type BuildStatus,
  type BuildSubmission,
  type SubmissionStatus
} from "../workflow/model.js";
import { canTransition, isTerminal } from "../workflow/status.js";
import type { WorkflowStore } from "../workflow/store.js";
import type { AdmissionController, ReleaseSlot } from "./admission.js";
import type { CompletionChecker } from "./completion.js";
import { MonitorTimeout, PollTransientError } from "./errors.js";

export interface RegisterOptions {
  project: string;
  /**
   * 监控结束时释放的准入槽位
   */
  release?: ReleaseSlot;
}

export interface SubmissionStatusEvent {
  workflowId: string;
  backend: BuildSubmission["backend"];
  service: string;
  from: SubmissionStatus;
  to: BuildStatus;
}

interface ActiveLoop {
  submission: BuildSubmission;
  project: string;
}

/**
 * 构建状态监控
 *
 * 每个提交一个独立的异步轮询循环，以 (workflowId, backend, service) 去重。
 * 状态变化先写入存储（以上次观测值做 CAS），再做其他处理；
 * 首次观测到终态即停止，超出 maxPolls 或 maxDurationMs 时记为 Aborted（MonitorTimeout）。
 * 状态写入失败时保留上次观测值，下个周期重新写。
 */
export class BuildMonitor extends EventEmitter {
  private readonly active = new Map<string, ActiveLoop>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly sleepers = new Set<() => void>();
  private readonly logger: LoggerFacade = createLoggerFacade("monitor");
  private stopped = false;

  constructor(
    private readonly store: WorkflowStore,
    private readonly registry: BackendRegistry,
    private readonly config: ConfigProvider,
    private readonly completion: CompletionChecker,
    private readonly admission: AdmissionController
  ) {
    super();
  }

  /**
   * 已在监控中返回 false（不会启动第二个循环）
   */
  register(submission: BuildSubmission, options: RegisterOptions): boolean {
    const key = submissionId(submission);
    if (this.active.has(key)) {
      options.release?.();
      this.logger.info("Submission already monitored", { workflowId: submission.workflowId, key });
      return false;
    }
    if (this.stopped) {
      options.release?.();
      return false;
    }
    const loop: ActiveLoop = { submission, project: options.project };
    this.active.set(key, loop);
    const done: Promise<void> = this.run(loop)
      .catch((error: unknown) => {
        this.logger.error("Monitor loop crashed", error, { workflowId: submission.workflowId, key });
      })
      .finally(() => {
        this.active.delete(key);
        options.release?.();
      })
      .then(() => this.completeWorkflow(submission.workflowId))
      .finally(() => {
        this.inflight.delete(done);
      });
    this.inflight.add(done);
    return true;
  }

  /**
   * 从存储重建工作集：继续监控所有未终态的提交，并补完已全部终态但没有合成结果的工作流。
   * 恢复的提交在后端上仍在运行，各自占用一个准入槽位（可超过上限），新提交排在其后。
   * stop() 之后再次调用会重新接受注册。
   */
  async recover(): Promise<{ resumed: number; settled: number }> {
    this.stopped = false;
    const pending = await this.store.listNonTerminalSubmissions();
    let resumed = 0;
    for (const submission of pending) {
      const workflow = await this.store.getWorkflow(submission.workflowId);
      if (!workflow) {
        this.logger.warn("Orphan submission skipped", { workflowId: submission.workflowId });
        continue;
      }
      const release = this.admission.claim(workflow.project, submission.backend);
      if (this.register(submission, { project: workflow.project, release })) {
        resumed += 1;
      }
    }

    let settled = 0;
    const unsettled = await this.store.listWorkflows({ approval: "Approved", settled: false });
    for (const workflow of unsettled) {
      if (workflow.dispatch !== "Dispatched") {
        continue;
      }
      if ((await this.completion.check(workflow.id)) !== null) {
        settled += 1;
      }
    }
    this.logger.info("Monitor recovered", { resumed, settled });
    return { resumed, settled };
  }

  isMonitoring(submission: Pick<BuildSubmission, "workflowId" | "backend" | "service">): boolean {
    return this.active.has(submissionId(submission));
  }

  get size(): number {
    return this.active.size;
  }

  /**
   * 等待当前所有循环（包括期间新注册的）结束
   */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  /**
   * 停止所有循环：唤醒等待中的轮询，循环在下一次检查时退出
   */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const wake of this.sleepers) {
      wake();
    }
    await this.idle();
  }

  private async run(loop: ActiveLoop): Promise<void> {
    const { submission } = loop;
    const key = submissionId(submission);
    const logger = createLoggerFacade("monitor", {
      workflowId: submission.workflowId,
      project: loop.project,
      backend: submission.backend
    });
    const startedAt = Date.parse(submission.submittedAt);
    let current: SubmissionStatus = submission.status;
    let polls = 0;

    while (!this.stopped) {
      const settings = this.config.current().monitor;
      const observed = await this.pollOnce(loop, settings, logger);
      polls += 1;

      if (observed && observed.status !== current && canTransition(current, observed.status)) {
        try {
          current = await this.applyStatus(submission, current, observed, logger);
        } catch (error) {
          logger.error("Failed to persist build status, retrying next cycle", error, {
            key,
            to: observed.status
          });
        }
      }

      if (isTerminal(current)) {
        return;
      }

      const elapsed = Date.now() - startedAt;
      if (
        (polls >= settings.maxPolls || elapsed >= settings.maxDurationMs) &&
        (await this.markTimedOut(loop, current, logger))
      ) {
        return;
      }

      await this.sleep(settings.pollIntervalMs);
    }
  }

  /**
   * 以 current 为期望值写入新状态，返回写入后（或 CAS 失败时存储中）的状态
   */
  private async applyStatus(
    submission: BuildSubmission,
    current: SubmissionStatus,
    observed: PollResult,
    logger: LoggerFacade
  ): Promise<SubmissionStatus> {
    const updated = await this.store.updateBuildStatus(submission, current, observed.status, {
      observedAt: new Date().toISOString(),
      detail: observed.detail
    });
    if (!updated) {
      // CAS 失败：以存储为准
      const fresh = await this.store.getBuildSubmission(submission);
      return fresh?.status ?? current;
    }
    this.emit("submission.status", {
      workflowId: submission.workflowId,
      backend: submission.backend,
      service: submission.service,
      from: current,
      to: observed.status
    } satisfies SubmissionStatusEvent);
    logger.info("Build status changed", { key: submissionId(submission), from: current, to: observed.status });
    return updated.status;
  }

  private async pollOnce(
    loop: ActiveLoop,
    settings: MonitorConfig,
    logger: LoggerFacade
  ): Promise<PollResult | null> {
    const { submission } = loop;
    try {
      const client = this.registry.client(loop.project, submission.backend);
      return await retryWithBackoff(() => client.pollStatus(submission.reference), {
        retries: settings.pollRetries,
        baseDelay: settings.pollBackoffMs,
        maxDelay: settings.pollBackoffMaxMs,
        onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
          logger.warn("Poll attempt failed, retrying", {
            reference: submission.reference,
            attemptNumber,
            retriesLeft,
            error: error.message
          });
        }
      });
    } catch (error) {
      const failure = new PollTransientError(submission.reference, error);
      logger.warn("Poll cycle failed", {
        code: failure.code,
        reference: submission.reference,
        error: failure.message
      });
      return null;
    }
  }

  /**
   * 写入超时结果；写入失败返回 false，循环继续并在下个周期重试
   */
  private async markTimedOut(
    loop: ActiveLoop,
    current: SubmissionStatus,
    logger: LoggerFacade
  ): Promise<boolean> {
    const { submission } = loop;
    const timeout = new MonitorTimeout(submission.reference, current);
    let updated: BuildSubmission | null;
    try {
      updated = await this.store.updateBuildStatus(submission, current, "Aborted", {
        observedAt: new Date().toISOString(),
        reason: "MonitorTimeout"
      });
    } catch (error) {
      logger.error("Failed to persist monitor timeout, retrying next cycle", error, {
        reference: submission.reference
      });
      return false;
    }
    logger.warn("Monitoring timed out", {
      code: timeout.code,
      reference: submission.reference,
      lastStatus: current,
      written: updated !== null
    });
    if (updated) {
      this.emit("submission.status", {
        workflowId: submission.workflowId,
        backend: submission.backend,
        service: submission.service,
        from: current,
        to: "Aborted"
      } satisfies SubmissionStatusEvent);
    }
    return true;
  }

  private async completeWorkflow(workflowId: string): Promise<void> {
    try {
      await this.completion.check(workflowId);
    } catch (error) {
      this.logger.error("Completion check failed", error, { workflowId });
    }
  }

  private sleep(ms: number): Promise<void> {
    if (this.stopped) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.sleepers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.sleepers.add(wake);
    });
  }
}
