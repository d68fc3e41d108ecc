import { join } from "node:path";

import { joinStatePath } from "../shared/environment/pathResolver.js";
import { createLoggerFacade } from "../shared/logging/logger.js";
import {
  submissionId,
  type ApprovalRecord,
  type ApprovalState,
  type BuildStatus,
  type BuildSubmission,
  type CompositeState,
  type DispatchFailure,
  type DispatchPhase,
  type SubmissionKey,
  type SubmissionStatus,
  type WorkflowRecord
} from "./model.js";
import { SubmissionsRepository } from "./repositories/SubmissionsRepository.js";
import { WorkflowsRepository } from "./repositories/WorkflowsRepository.js";
import { canTransition } from "./status.js";
import type { StatusUpdateExtras, WorkflowQuery, WorkflowStore } from "./store.js";

export interface FileWorkflowStoreOptions {
  /**
   * 状态根目录，默认 <home>/state
   */
  directory?: string;
}

/**
 * 基于 JsonFileStore 的工作流存储
 *
 * 比较并交换依赖 JsonFileStore.mutate 的按 ID 串行化，只在单进程内成立。
 */
export class FileWorkflowStore implements WorkflowStore {
  private readonly workflows: WorkflowsRepository;
  private readonly submissions: SubmissionsRepository;
  private readonly logger = createLoggerFacade("store");

  constructor(options: FileWorkflowStoreOptions = {}) {
    const root = options.directory ?? joinStatePath();
    this.workflows = new WorkflowsRepository({ directory: join(root, "workflows") });
    this.submissions = new SubmissionsRepository({ directory: join(root, "submissions") });
  }

  async initialize(): Promise<void> {
    await this.workflows.initialize();
    await this.submissions.initialize();
  }

  async createWorkflow(record: WorkflowRecord): Promise<WorkflowRecord> {
    return this.workflows.create(record);
  }

  async getWorkflow(id: string): Promise<WorkflowRecord | null> {
    return this.workflows.read(id);
  }

  async listWorkflows(query: WorkflowQuery = {}): Promise<WorkflowRecord[]> {
    const all = query.project
      ? await this.workflows.findByProject(query.project)
      : await this.workflows.list();
    return all
      .filter((workflow) => !query.approval || workflow.approval.state === query.approval)
      .filter((workflow) =>
        query.settled === undefined ? true : (workflow.composite !== undefined) === query.settled
      )
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async compareAndSetApproval(
    id: string,
    expected: ApprovalState,
    next: ApprovalRecord
  ): Promise<WorkflowRecord | null> {
    return this.workflows.mutate(id, (current) =>
      current.approval.state === expected ? { ...current, approval: next } : null
    );
  }

  async setDispatchPhase(id: string, phase: DispatchPhase): Promise<WorkflowRecord> {
    return this.requireMutation(id, (current) => ({ ...current, dispatch: phase }));
  }

  async recordDispatchFailure(id: string, failure: DispatchFailure): Promise<WorkflowRecord> {
    return this.requireMutation(id, (current) => ({
      ...current,
      dispatchFailures: [...current.dispatchFailures, failure]
    }));
  }

  async compareAndSetComposite(
    id: string,
    state: CompositeState,
    settledAt: string
  ): Promise<boolean> {
    const result = await this.workflows.mutate(id, (current) =>
      current.composite === undefined ? { ...current, composite: { state, settledAt } } : null
    );
    return result !== null;
  }

  async saveBuildSubmission(submission: BuildSubmission): Promise<BuildSubmission> {
    return this.submissions.create(submission);
  }

  async getBuildSubmission(key: SubmissionKey): Promise<BuildSubmission | null> {
    return this.submissions.read(submissionId(key));
  }

  async updateBuildStatus(
    key: SubmissionKey,
    expected: SubmissionStatus,
    next: BuildStatus,
    extras: StatusUpdateExtras
  ): Promise<BuildSubmission | null> {
    return this.submissions.mutate(submissionId(key), (current) => {
      if (current.status !== expected || !canTransition(current.status, next)) {
        return null;
      }
      return {
        ...current,
        status: next,
        statusHistory: [...current.statusHistory, { status: next, observedAt: extras.observedAt }],
        lastPolledAt: extras.observedAt,
        reason: extras.reason ?? current.reason,
        detail: extras.detail ? { ...current.detail, ...extras.detail } : current.detail
      };
    });
  }

  async listSubmissions(workflowId: string): Promise<BuildSubmission[]> {
    return this.submissions.findByWorkflow(workflowId);
  }

  async listNonTerminalSubmissions(): Promise<BuildSubmission[]> {
    return this.submissions.findNonTerminal();
  }

  async listExpired(cutoff: Date): Promise<WorkflowRecord[]> {
    return this.workflows.findCreatedBefore(cutoff);
  }

  async delete(id: string): Promise<void> {
    const owned = await this.submissions.findByWorkflow(id);
    for (const submission of owned) {
      await this.submissions.delete(submission.id);
    }
    await this.workflows.delete(id);
    this.logger.info("Workflow deleted", { workflowId: id, submissions: owned.length });
  }

  private async requireMutation(
    id: string,
    change: (current: WorkflowRecord) => WorkflowRecord
  ): Promise<WorkflowRecord> {
    const result = await this.workflows.mutate(id, change);
    if (result === null) {
      throw new Error(`Workflow '${id}' was not updated`);
    }
    return result;
  }
}
