import type { ChatDelivery } from "../chat/types.js";
import type { ConfigProvider } from "../config/loader.js";
import { createLoggerFacade } from "../shared/logging/logger.js";
import type {
  BuildSubmission,
  CompositeState,
  DispatchFailure,
  SubmissionStatus,
  WorkflowRecord
} from "../workflow/model.js";
import { NotifyDeliveryError } from "./errors.js";
import {
  renderApprovalDecision,
  renderBuildTerminal,
  renderDispatchFailed,
  renderRejected,
  renderSubmissionResult
} from "./templates.js";

export type NotificationEvent =
  | {
      type: "SubmissionResult";
      accepted: readonly BuildSubmission[];
      failures: readonly DispatchFailure[];
    }
  | { type: "DispatchFailed"; failures: readonly DispatchFailure[] }
  | {
      type: "BuildTerminal";
      composite: CompositeState;
      submissions: readonly BuildSubmission[];
      failures: readonly DispatchFailure[];
    }
  | { type: "Rejected" };

export interface RenderedNotification {
  chatId: string;
  text: string;
  mentions: string[];
}

/**
 * 通知投递：目标为工作流的来源会话。投递失败只记日志，不影响状态。
 */
export class Notifier {
  private readonly logger = createLoggerFacade("notifier");

  constructor(
    private readonly chat: ChatDelivery,
    private readonly config: ConfigProvider
  ) {}

  render(workflow: WorkflowRecord, event: NotificationEvent): RenderedNotification {
    return {
      chatId: workflow.originChatId,
      text: renderEvent(workflow, event),
      mentions: this.mentionsFor(workflow, event)
    };
  }

  /**
   * 返回是否投递成功
   */
  async notify(workflow: WorkflowRecord, event: NotificationEvent): Promise<boolean> {
    const { chatId, text, mentions } = this.render(workflow, event);
    try {
      await this.chat.sendMessage(chatId, text, mentions);
      this.logger.info("Notification delivered", {
        workflowId: workflow.id,
        event: event.type,
        mentions: mentions.length
      });
      return true;
    } catch (error) {
      const failure = new NotifyDeliveryError(chatId, error);
      this.logger.error("Notification delivery failed", failure, {
        workflowId: workflow.id,
        event: event.type,
        code: failure.code
      });
      return false;
    }
  }

  async updateApprovalMessage(workflow: WorkflowRecord): Promise<boolean> {
    const target = workflow.approvalMessage;
    if (!target) {
      return false;
    }
    try {
      await this.chat.updateMessage(target.chatId, target.messageId, renderApprovalDecision(workflow));
      return true;
    } catch (error) {
      const failure = new NotifyDeliveryError(target.chatId, error);
      this.logger.error("Approval message update failed", failure, {
        workflowId: workflow.id,
        code: failure.code
      });
      return false;
    }
  }

  /**
   * 事件包含 notifyOpsOn 中的状态时 @ 项目运维；整体派发失败总是 @ 运维
   */
  mentionsFor(workflow: WorkflowRecord, event: NotificationEvent): string[] {
    const ops = this.config.project(workflow.project)?.ops ?? [];
    if (ops.length === 0) {
      return [];
    }
    if (event.type === "DispatchFailed") {
      return [...ops];
    }
    if (event.type !== "BuildTerminal") {
      return [];
    }
    const watched = new Set<SubmissionStatus>(this.config.current().notifyOpsOn);
    const hit = event.submissions.some((submission) => watched.has(submission.status));
    return hit ? [...ops] : [];
  }
}

function renderEvent(workflow: WorkflowRecord, event: NotificationEvent): string {
  switch (event.type) {
    case "SubmissionResult":
      return renderSubmissionResult(workflow, event.accepted, event.failures);
    case "DispatchFailed":
      return renderDispatchFailed(workflow, event.failures);
    case "BuildTerminal":
      return renderBuildTerminal(workflow, event.composite, event.submissions, event.failures);
    case "Rejected":
      return renderRejected(workflow);
  }
}
