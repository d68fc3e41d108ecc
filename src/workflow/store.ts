import type {
  ApprovalRecord,
  ApprovalState,
  BuildStatus,
  BuildSubmission,
  CompositeState,
  DispatchFailure,
  DispatchPhase,
  SubmissionDetail,
  SubmissionKey,
  SubmissionStatus,
  WorkflowRecord
} from "./model.js";

export interface WorkflowQuery {
  project?: string;
  approval?: ApprovalState;
  /**
   * 只返回已有合成结果（true）或尚无合成结果（false）的工作流
   */
  settled?: boolean;
}

export interface StatusUpdateExtras {
  observedAt: string;
  reason?: "MonitorTimeout";
  detail?: SubmissionDetail;
}

/**
 * 工作流存储
 *
 * 所有 compareAndSet* / updateBuildStatus 都在实体级别原子执行：
 * 当前值与 expected 不符时不写入，返回 null / false。
 */
export interface WorkflowStore {
  createWorkflow(record: WorkflowRecord): Promise<WorkflowRecord>;
  getWorkflow(id: string): Promise<WorkflowRecord | null>;
  listWorkflows(query?: WorkflowQuery): Promise<WorkflowRecord[]>;

  compareAndSetApproval(
    id: string,
    expected: ApprovalState,
    next: ApprovalRecord
  ): Promise<WorkflowRecord | null>;
  setDispatchPhase(id: string, phase: DispatchPhase): Promise<WorkflowRecord>;
  recordDispatchFailure(id: string, failure: DispatchFailure): Promise<WorkflowRecord>;
  /**
   * 仅在尚无合成结果时写入
   */
  compareAndSetComposite(id: string, state: CompositeState, settledAt: string): Promise<boolean>;

  saveBuildSubmission(submission: BuildSubmission): Promise<BuildSubmission>;
  getBuildSubmission(key: SubmissionKey): Promise<BuildSubmission | null>;
  updateBuildStatus(
    key: SubmissionKey,
    expected: SubmissionStatus,
    next: BuildStatus,
    extras: StatusUpdateExtras
  ): Promise<BuildSubmission | null>;
  listSubmissions(workflowId: string): Promise<BuildSubmission[]>;
  listNonTerminalSubmissions(): Promise<BuildSubmission[]>;

  listExpired(cutoff: Date): Promise<WorkflowRecord[]>;
  /**
   * 删除工作流及其全部提交记录
   */
  delete(id: string): Promise<void>;
}
