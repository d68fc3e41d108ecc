import type { Authorizer } from "../chat/types.js";
import { createLoggerFacade } from "../shared/logging/logger.js";
import type { Actor, ApprovalState, WorkflowRecord } from "../workflow/model.js";
import type { WorkflowStore } from "../workflow/store.js";
import type { DispatchReport, Dispatcher } from "./dispatcher.js";
import { AlreadyDecided, UnauthorizedActor, WorkflowNotFound } from "./errors.js";
import type { Notifier } from "./notifier.js";

export const DECISION_ACTIONS = ["Approve", "Reject"] as const;
export type DecisionAction = (typeof DECISION_ACTIONS)[number];

export interface DecisionOutcome {
  workflow: WorkflowRecord;
  state: Exclude<ApprovalState, "PendingApproval">;
  /**
   * 仅 Approve：后台派发的结果。不会 reject，派发失败时为 null。
   */
  dispatch?: Promise<DispatchReport | null>;
}

/**
 * 审批状态机：PendingApproval → Approved | Rejected，每个工作流至多决策一次
 */
export class ApprovalStateMachine {
  private readonly logger = createLoggerFacade("engine.approval");

  constructor(
    private readonly store: WorkflowStore,
    private readonly authorizer: Authorizer,
    private readonly notifier: Notifier,
    private readonly dispatcher: Dispatcher
  ) {}

  async decide(
    workflowId: string,
    action: DecisionAction,
    actor: Actor,
    comment?: string
  ): Promise<DecisionOutcome> {
    const existing = await this.store.getWorkflow(workflowId);
    if (!existing) {
      throw new WorkflowNotFound(workflowId);
    }
    const allowed =
      this.authorizer.isAuthorized(existing.project, actor, "approver") ||
      this.authorizer.isAuthorized(existing.project, actor, "ops");
    if (!allowed) {
      this.logger.warn("Unauthorized decision attempt", {
        workflowId,
        actorId: actor.id,
        action
      });
      throw new UnauthorizedActor(workflowId, actor.id);
    }

    const state = action === "Approve" ? "Approved" : "Rejected";
    const trimmed = comment?.trim();
    const workflow = await this.store.compareAndSetApproval(workflowId, "PendingApproval", {
      state,
      decidedBy: actor,
      decidedAt: new Date().toISOString(),
      ...(trimmed ? { comment: trimmed } : {})
    });
    if (!workflow) {
      throw new AlreadyDecided(workflowId);
    }
    this.logger.info("Workflow decided", {
      workflowId,
      project: workflow.project,
      state,
      actorId: actor.id
    });

    await this.notifier.updateApprovalMessage(workflow);

    if (state === "Rejected") {
      await this.notifier.notify(workflow, { type: "Rejected" });
      return { workflow, state };
    }

    const dispatch = this.dispatcher.dispatch(workflow).catch((error: unknown) => {
      this.logger.error("Dispatch failed", error, { workflowId });
      return null;
    });
    return { workflow, state, dispatch };
  }
}
