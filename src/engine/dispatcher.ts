import type { BackendRegistry } from "../backends/registry.js";
import { isConnectionError, type SubmissionRequest, type SubmitResult } from "../backends/types.js";
import { createLoggerFacade } from "../shared/logging/logger.js";
import { retryWithBackoff } from "../shared/retry/retryWithBackoff.js";
import {
  submissionId,
  type BackendKind,
  type BuildSubmission,
  type DispatchFailure,
  type ServiceTarget,
  type WorkflowRecord
} from "../workflow/model.js";
import type { WorkflowStore } from "../workflow/store.js";
import type { AdmissionController } from "./admission.js";
import type { CompletionChecker } from "./completion.js";
import { DispatchError, SubmissionError, describeCause } from "./errors.js";
import type { BuildMonitor } from "./monitor.js";
import type { Notifier } from "./notifier.js";

export interface DispatchReport {
  workflowId: string;
  backends: BackendKind[];
  accepted: BuildSubmission[];
  failures: DispatchFailure[];
}

export interface DispatcherOptions {
  /**
   * 连接级错误重试一次前的等待
   */
  submitRetryDelayMs?: number;
}

/**
 * 派发：已批准工作流 → 每个 (后端, 服务) 一次提交
 *
 * 各次提交相互独立、并发执行，先经过准入闸门。成功则持久化 Submitted 记录并交给 Monitor，
 * 失败则记录 DispatchFailure。全部结束后把派发阶段置为 Dispatched，再做一次完成判定。
 * 存储错误不算提交失败：等所有尝试结束后原样抛出，不发通知也不推进派发阶段。
 */
export class Dispatcher {
  private readonly logger = createLoggerFacade("dispatcher");
  private readonly submitRetryDelayMs: number;

  constructor(
    private readonly store: WorkflowStore,
    private readonly registry: BackendRegistry,
    private readonly admission: AdmissionController,
    private readonly monitor: BuildMonitor,
    private readonly notifier: Notifier,
    private readonly completion: CompletionChecker,
    options: DispatcherOptions = {}
  ) {
    this.submitRetryDelayMs = options.submitRetryDelayMs ?? 1_000;
  }

  async dispatch(workflow: WorkflowRecord): Promise<DispatchReport> {
    const logger = createLoggerFacade("dispatcher", {
      workflowId: workflow.id,
      project: workflow.project
    });
    const backends = this.registry.enabledKinds(workflow.project);
    const report: DispatchReport = { workflowId: workflow.id, backends, accepted: [], failures: [] };

    if (backends.length === 0) {
      logger.warn("No build backend enabled for project, nothing dispatched");
      await this.store.setDispatchPhase(workflow.id, "Dispatched");
      return report;
    }

    await this.store.setDispatchPhase(workflow.id, "Dispatching");

    const attempts = backends.flatMap((backend) =>
      workflow.services.map((target) => ({ backend, target }))
    );
    logger.info("Dispatching builds", { backends, attempts: attempts.length });

    const results = await Promise.allSettled(
      attempts.map(({ backend, target }) => this.attempt(workflow, backend, target))
    );

    const submissionErrors: SubmissionError[] = [];
    for (const result of results) {
      if (result.status === "fulfilled") {
        report.accepted.push(result.value);
      } else if (result.reason instanceof SubmissionError) {
        submissionErrors.push(result.reason);
      } else {
        logger.error("Dispatch aborted by store failure", result.reason, {
          accepted: report.accepted.length
        });
        throw result.reason;
      }
    }

    const latest = (await this.store.getWorkflow(workflow.id)) ?? workflow;
    report.failures = latest.dispatchFailures;

    if (report.accepted.length === 0) {
      await this.notifier.notify(latest, { type: "DispatchFailed", failures: report.failures });
    } else {
      await this.notifier.notify(latest, {
        type: "SubmissionResult",
        accepted: report.accepted,
        failures: report.failures
      });
    }

    await this.store.setDispatchPhase(workflow.id, "Dispatched");
    await this.completion.check(workflow.id);

    logger.info("Dispatch finished", {
      accepted: report.accepted.length,
      failed: submissionErrors.length
    });
    if (report.accepted.length === 0) {
      throw new DispatchError(workflow.id, submissionErrors);
    }
    return report;
  }

  private async attempt(
    workflow: WorkflowRecord,
    backend: BackendKind,
    target: ServiceTarget
  ): Promise<BuildSubmission> {
    const release = await this.admission.acquire(workflow.project, backend);
    const request: SubmissionRequest = {
      workflowId: workflow.id,
      project: workflow.project,
      environment: workflow.environment,
      branch: workflow.branch,
      service: target.service,
      commitHash: target.commitHash,
      releaseNotes: workflow.releaseNotes,
      approver: workflow.approval.decidedBy ?? workflow.requester
    };

    let result: SubmitResult;
    try {
      const client = this.registry.client(workflow.project, backend);
      result = await retryWithBackoff(() => client.submit(request), {
        retries: 1,
        baseDelay: this.submitRetryDelayMs,
        shouldRetry: ({ error }) => isConnectionError(error),
        onFailedAttempt: ({ error }) => {
          this.logger.warn("Submission failed with connection error, retrying once", {
            workflowId: workflow.id,
            backend,
            service: target.service,
            error: error.message
          });
        }
      });
    } catch (error) {
      release();
      const failure = new SubmissionError(backend, target.service, error);
      this.logger.error("Submission failed", failure, {
        workflowId: workflow.id,
        backend,
        service: target.service
      });
      await this.store.recordDispatchFailure(workflow.id, {
        backend,
        service: target.service,
        error: describeCause(error),
        failedAt: new Date().toISOString()
      });
      throw failure;
    }

    const submittedAt = new Date().toISOString();
    const submission: BuildSubmission = {
      id: submissionId({ workflowId: workflow.id, backend, service: target.service }),
      workflowId: workflow.id,
      backend,
      service: target.service,
      commitHash: target.commitHash,
      reference: result.reference,
      submittedAt,
      status: "Submitted",
      statusHistory: [{ status: "Submitted", observedAt: submittedAt }],
      detail: result.detail
    };
    try {
      await this.store.saveBuildSubmission(submission);
    } catch (error) {
      release();
      this.logger.error("Accepted build could not be persisted", error, {
        workflowId: workflow.id,
        backend,
        service: target.service,
        reference: result.reference
      });
      throw error;
    }

    this.logger.info("Submission accepted", {
      workflowId: workflow.id,
      backend,
      service: target.service,
      reference: submission.reference
    });
    this.monitor.register(submission, { project: workflow.project, release });
    return submission;
  }
}
