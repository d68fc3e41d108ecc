import { EventEmitter } from "node:events";

import type { ConfigProvider } from "../config/loader.js";
import type { RetentionSweeper } from "../retention/RetentionSweeper.js";
import { createLoggerFacade } from "../shared/logging/logger.js";
import {
  buildWorkflowRecord,
  type Actor,
  type BuildSubmission,
  type NewWorkflowInput,
  type WorkflowRecord
} from "../workflow/model.js";
import type { WorkflowQuery, WorkflowStore } from "../workflow/store.js";
import type { CompletionChecker, SettledWorkflow } from "./completion.js";
import { WorkflowNotFound } from "./errors.js";
import type { BuildMonitor, SubmissionStatusEvent } from "./monitor.js";
import type { ApprovalStateMachine, DecisionAction, DecisionOutcome } from "./stateMachine.js";

export interface WorkflowView {
  workflow: WorkflowRecord;
  submissions: BuildSubmission[];
}

export interface EngineStartOptions {
  /**
   * 是否启动过期清理的定时任务
   */
  retention?: boolean;
}

/**
 * 引擎门面：聊天前端与 CLI 只和这里打交道
 *
 * 事件：
 * - workflow.created    新工作流已落盘
 * - workflow.decided    审批完成
 * - submission.status   某个构建状态变化
 * - workflow.settled    工作流得出合成结果
 */
export class ShipgateEngine extends EventEmitter {
  private readonly logger = createLoggerFacade("engine");
  private started = false;

  constructor(
    private readonly store: WorkflowStore,
    private readonly config: ConfigProvider,
    private readonly approvals: ApprovalStateMachine,
    private readonly monitor: BuildMonitor,
    private readonly completion: CompletionChecker,
    private readonly retention: RetentionSweeper
  ) {
    super();
    this.monitor.on("submission.status", (event: SubmissionStatusEvent) => {
      this.emit("submission.status", event);
    });
    this.completion.on("workflow.settled", (event: SettledWorkflow) => {
      this.emit("workflow.settled", event);
    });
  }

  async start(options: EngineStartOptions = {}): Promise<{ resumed: number; settled: number }> {
    await this.config.load();
    const recovered = await this.monitor.recover();
    if (options.retention ?? true) {
      this.retention.start();
    }
    this.started = true;
    this.logger.info("Engine started", recovered);
    return recovered;
  }

  async stop(): Promise<void> {
    this.retention.stop();
    await this.monitor.stop();
    if (this.started) {
      this.logger.info("Engine stopped");
    }
    this.started = false;
  }

  async createWorkflow(input: NewWorkflowInput): Promise<WorkflowRecord> {
    const config = await this.config.load();
    if (!config.projects[input.project]) {
      throw new Error(`未配置项目 ${input.project}`);
    }
    const record = await this.store.createWorkflow(buildWorkflowRecord(input));
    this.logger.info("Workflow created", {
      workflowId: record.id,
      project: record.project,
      services: record.services.length
    });
    this.emit("workflow.created", record);
    return record;
  }

  async decide(
    workflowId: string,
    action: DecisionAction,
    actor: Actor,
    comment?: string
  ): Promise<DecisionOutcome> {
    const outcome = await this.approvals.decide(workflowId, action, actor, comment);
    this.emit("workflow.decided", outcome.workflow);
    return outcome;
  }

  async getWorkflow(workflowId: string): Promise<WorkflowView> {
    const workflow = await this.store.getWorkflow(workflowId);
    if (!workflow) {
      throw new WorkflowNotFound(workflowId);
    }
    return { workflow, submissions: await this.store.listSubmissions(workflowId) };
  }

  listWorkflows(query?: WorkflowQuery): Promise<WorkflowRecord[]> {
    return this.store.listWorkflows(query);
  }

  /**
   * 等待所有监控循环与完成判定结束
   */
  idle(): Promise<void> {
    return this.monitor.idle();
  }
}
