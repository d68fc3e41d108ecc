import type {
  Actor,
  BackendKind,
  BuildStatus,
  SubmissionDetail
} from "../workflow/model.js";

export interface SubmissionRequest {
  workflowId: string;
  project: string;
  environment: string;
  branch: string;
  service: string;
  commitHash: string;
  releaseNotes: string;
  /**
   * 审计用：批准该工作流的人
   */
  approver: Actor;
}

export interface SubmitResult {
  reference: string;
  detail?: SubmissionDetail;
}

export interface PollResult {
  status: BuildStatus;
  detail?: SubmissionDetail;
}

/**
 * 构建后端：无状态的请求/响应包装
 */
export interface BackendClient {
  readonly kind: BackendKind;
  submit(request: SubmissionRequest): Promise<SubmitResult>;
  pollStatus(reference: string): Promise<PollResult>;
}

/**
 * connection：网络错误、超时、5xx，可重试；rejected：后端明确拒绝，不重试
 */
export type BackendErrorKind = "connection" | "rejected";

export class BackendRequestError extends Error {
  constructor(
    message: string,
    public readonly kind: BackendErrorKind,
    public readonly statusCode?: number,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = "BackendRequestError";
  }
}

export function isConnectionError(error: unknown): boolean {
  return error instanceof BackendRequestError && error.kind === "connection";
}
