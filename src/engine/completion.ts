import { EventEmitter } from "node:events";

import { createLoggerFacade } from "../shared/logging/logger.js";
import type { CompositeState } from "../workflow/model.js";
import { computeCompositeState, isTerminal } from "../workflow/status.js";
import type { WorkflowStore } from "../workflow/store.js";
import type { Notifier } from "./notifier.js";

export interface SettledWorkflow {
  workflowId: string;
  composite: CompositeState;
}

/**
 * 工作流完成判定
 *
 * 只处理已派发完毕（dispatch = Dispatched）且尚无合成结果的工作流；
 * 合成结果通过 CAS 写入，只有写入成功的一方发送终态通知。
 * 没有任何提交（全部派发失败）时直接记 Failed，失败通知已由派发阶段发出。
 */
export class CompletionChecker extends EventEmitter {
  private readonly logger = createLoggerFacade("engine.completion");

  constructor(
    private readonly store: WorkflowStore,
    private readonly notifier: Notifier
  ) {
    super();
  }

  async check(workflowId: string): Promise<CompositeState | null> {
    const workflow = await this.store.getWorkflow(workflowId);
    if (!workflow || workflow.dispatch !== "Dispatched" || workflow.composite) {
      return null;
    }
    const submissions = await this.store.listSubmissions(workflowId);
    if (submissions.length === 0 && workflow.dispatchFailures.length === 0) {
      return null;
    }
    if (!submissions.every((submission) => isTerminal(submission.status))) {
      return null;
    }

    const composite = computeCompositeState(
      submissions.map((submission) => submission.status),
      workflow.dispatchFailures.length > 0
    );
    const settledAt = new Date().toISOString();
    const won = await this.store.compareAndSetComposite(workflowId, composite, settledAt);
    if (!won) {
      return null;
    }

    this.logger.info("Workflow settled", { workflowId, composite, submissions: submissions.length });
    this.emit("workflow.settled", { workflowId, composite } satisfies SettledWorkflow);

    if (submissions.length > 0) {
      await this.notifier.notify(workflow, {
        type: "BuildTerminal",
        composite,
        submissions,
        failures: workflow.dispatchFailures
      });
    }
    return composite;
  }
}
