import type { BackendKind, BuildStatus } from "../workflow/model.js";

export type EngineErrorCode =
  | "workflow_not_found"
  | "unauthorized_actor"
  | "already_decided"
  | "submission_failed"
  | "dispatch_failed"
  | "poll_transient"
  | "monitor_timeout"
  | "notify_delivery_failed";

/**
 * 引擎错误基类
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = "EngineError";
  }
}

export class WorkflowNotFound extends EngineError {
  constructor(public readonly workflowId: string) {
    super(`工作流不存在：${workflowId}`, "workflow_not_found");
    this.name = "WorkflowNotFound";
  }
}

export class UnauthorizedActor extends EngineError {
  constructor(
    public readonly workflowId: string,
    public readonly actorId: string
  ) {
    super(`用户 ${actorId} 无权审批工作流 ${workflowId}`, "unauthorized_actor");
    this.name = "UnauthorizedActor";
  }
}

export class AlreadyDecided extends EngineError {
  constructor(public readonly workflowId: string) {
    super(`工作流 ${workflowId} 已被审批`, "already_decided");
    this.name = "AlreadyDecided";
  }
}

/**
 * 单个 (backend, service) 提交失败
 */
export class SubmissionError extends EngineError {
  constructor(
    public readonly backend: BackendKind,
    public readonly service: string,
    cause: unknown
  ) {
    super(`${backend}/${service} 提交失败：${describeCause(cause)}`, "submission_failed", cause);
    this.name = "SubmissionError";
  }
}

/**
 * 全部提交都失败
 */
export class DispatchError extends EngineError {
  constructor(
    public readonly workflowId: string,
    public readonly failures: readonly SubmissionError[]
  ) {
    super(`工作流 ${workflowId} 全部提交失败（${failures.length} 个）`, "dispatch_failed");
    this.name = "DispatchError";
  }
}

export class PollTransientError extends EngineError {
  constructor(
    public readonly reference: string,
    cause: unknown
  ) {
    super(`轮询 ${reference} 失败：${describeCause(cause)}`, "poll_transient", cause);
    this.name = "PollTransientError";
  }
}

export class MonitorTimeout extends EngineError {
  constructor(
    public readonly reference: string,
    public readonly lastStatus: BuildStatus | "Submitted"
  ) {
    super(`监控 ${reference} 超时，最后状态 ${lastStatus}`, "monitor_timeout");
    this.name = "MonitorTimeout";
  }
}

export class NotifyDeliveryError extends EngineError {
  constructor(
    public readonly chatId: string,
    cause: unknown
  ) {
    super(`发送消息到 ${chatId} 失败：${describeCause(cause)}`, "notify_delivery_failed", cause);
    this.name = "NotifyDeliveryError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
