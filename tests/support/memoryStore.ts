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
} from "../../src/workflow/model.js";
import { canTransition, isTerminal } from "../../src/workflow/status.js";
import type { StatusUpdateExtras, WorkflowQuery, WorkflowStore } from "../../src/workflow/store.js";

/**
 * 内存版 WorkflowStore，语义与 FileWorkflowStore 一致；读写都返回副本
 */
export class MemoryWorkflowStore implements WorkflowStore {
  readonly workflows = new Map<string, WorkflowRecord>();
  readonly submissions = new Map<string, BuildSubmission>();

  async createWorkflow(record: WorkflowRecord): Promise<WorkflowRecord> {
    if (this.workflows.has(record.id)) {
      throw new Error(`Workflow '${record.id}' already exists`);
    }
    this.workflows.set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  async getWorkflow(id: string): Promise<WorkflowRecord | null> {
    const found = this.workflows.get(id);
    return found ? structuredClone(found) : null;
  }

  async listWorkflows(query: WorkflowQuery = {}): Promise<WorkflowRecord[]> {
    return Array.from(this.workflows.values())
      .filter((workflow) => !query.project || workflow.project === query.project)
      .filter((workflow) => !query.approval || workflow.approval.state === query.approval)
      .filter((workflow) =>
        query.settled === undefined ? true : (workflow.composite !== undefined) === query.settled
      )
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((workflow) => structuredClone(workflow));
  }

  async compareAndSetApproval(
    id: string,
    expected: ApprovalState,
    next: ApprovalRecord
  ): Promise<WorkflowRecord | null> {
    const current = this.requireWorkflow(id);
    if (current.approval.state !== expected) {
      return null;
    }
    return this.putWorkflow({ ...current, approval: next });
  }

  async setDispatchPhase(id: string, phase: DispatchPhase): Promise<WorkflowRecord> {
    return this.putWorkflow({ ...this.requireWorkflow(id), dispatch: phase });
  }

  async recordDispatchFailure(id: string, failure: DispatchFailure): Promise<WorkflowRecord> {
    const current = this.requireWorkflow(id);
    return this.putWorkflow({ ...current, dispatchFailures: [...current.dispatchFailures, failure] });
  }

  async compareAndSetComposite(id: string, state: CompositeState, settledAt: string): Promise<boolean> {
    const current = this.requireWorkflow(id);
    if (current.composite) {
      return false;
    }
    this.putWorkflow({ ...current, composite: { state, settledAt } });
    return true;
  }

  async saveBuildSubmission(submission: BuildSubmission): Promise<BuildSubmission> {
    if (this.submissions.has(submission.id)) {
      throw new Error(`Submission '${submission.id}' already exists`);
    }
    this.submissions.set(submission.id, structuredClone(submission));
    return structuredClone(submission);
  }

  async getBuildSubmission(key: SubmissionKey): Promise<BuildSubmission | null> {
    const found = this.submissions.get(submissionId(key));
    return found ? structuredClone(found) : null;
  }

  async updateBuildStatus(
    key: SubmissionKey,
    expected: SubmissionStatus,
    next: BuildStatus,
    extras: StatusUpdateExtras
  ): Promise<BuildSubmission | null> {
    const id = submissionId(key);
    const current = this.submissions.get(id);
    if (!current) {
      throw new Error(`Submission '${id}' not found`);
    }
    if (current.status !== expected || !canTransition(current.status, next)) {
      return null;
    }
    const updated: BuildSubmission = {
      ...current,
      status: next,
      statusHistory: [...current.statusHistory, { status: next, observedAt: extras.observedAt }],
      lastPolledAt: extras.observedAt,
      reason: extras.reason ?? current.reason,
      detail: extras.detail ? { ...current.detail, ...extras.detail } : current.detail
    };
    this.submissions.set(id, updated);
    return structuredClone(updated);
  }

  async listSubmissions(workflowId: string): Promise<BuildSubmission[]> {
    return Array.from(this.submissions.values())
      .filter((submission) => submission.workflowId === workflowId)
      .map((submission) => structuredClone(submission));
  }

  async listNonTerminalSubmissions(): Promise<BuildSubmission[]> {
    return Array.from(this.submissions.values())
      .filter((submission) => !isTerminal(submission.status))
      .map((submission) => structuredClone(submission));
  }

  async listExpired(cutoff: Date): Promise<WorkflowRecord[]> {
    return Array.from(this.workflows.values())
      .filter((workflow) => Date.parse(workflow.createdAt) < cutoff.getTime())
      .map((workflow) => structuredClone(workflow));
  }

  async delete(id: string): Promise<void> {
    this.requireWorkflow(id);
    for (const [key, submission] of this.submissions) {
      if (submission.workflowId === id) {
        this.submissions.delete(key);
      }
    }
    this.workflows.delete(id);
  }

  private requireWorkflow(id: string): WorkflowRecord {
    const found = this.workflows.get(id);
    if (!found) {
      throw new Error(`Workflow '${id}' not found`);
    }
    return found;
  }

  private putWorkflow(record: WorkflowRecord): WorkflowRecord {
    this.workflows.set(record.id, record);
    return structuredClone(record);
  }
}
