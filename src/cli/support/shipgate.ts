import { Flags } from "@oclif/core";
import type { AwilixContainer } from "awilix";

import { createShipgateContainer, disposeContainer, type ShipgateCradle } from "../../di/container.js";
import { backendLabel, formatDuration } from "../../engine/templates.js";
import { setLogEventPublisher } from "../../shared/logging/logger.js";
import type { LogsAppendedPayload } from "../../shared/logging/events.js";
import type { BuildSubmission, WorkflowRecord } from "../../workflow/model.js";

export const sharedFlags = {
  config: Flags.string({
    char: "c",
    description: "配置文件路径（默认读取 SHIPGATE_CONFIG_PATH 或 <home>/config/shipgate.config.json）"
  }),
  verbose: Flags.boolean({
    char: "v",
    description: "在终端输出运行日志",
    default: false
  })
} as const;

export interface SharedFlagValues {
  config?: string;
  verbose: boolean;
}

export function formatLogEvent(payload: LogsAppendedPayload): string {
  const context = payload.context ?? {};
  const workflowId = typeof context.workflowId === "string" ? ` ${context.workflowId}` : "";
  return `[${payload.level}] ${payload.category}${workflowId}: ${payload.message}`;
}

/**
 * 打开容器并在 task 结束后释放。verbose 时把日志事件回显到 stderr。
 */
export async function withShipgate<T>(
  flags: SharedFlagValues,
  task: (container: AwilixContainer<ShipgateCradle>) => Promise<T>
): Promise<T> {
  if (flags.verbose) {
    setLogEventPublisher((payload) => {
      process.stderr.write(`${formatLogEvent(payload)}\n`);
    });
  }
  const container = await createShipgateContainer({ configPath: flags.config });
  try {
    return await task(container);
  } finally {
    await disposeContainer(container);
    setLogEventPublisher(null);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatWorkflowLine(workflow: WorkflowRecord): string {
  const services = workflow.services.map((target) => target.service).join(",");
  const outcome = workflow.composite?.state ?? workflow.dispatch;
  return `- ${workflow.id} | ${workflow.project}/${workflow.environment} | ${workflow.branch} | ${services} | ${workflow.approval.state} | ${outcome}`;
}

export function formatSubmissionLine(submission: BuildSubmission): string {
  const duration =
    submission.detail?.durationMs !== undefined ? ` (${formatDuration(submission.detail.durationMs)})` : "";
  const reason = submission.reason ? ` [${submission.reason}]` : "";
  return `  ${backendLabel(submission.backend)} ${submission.service} -> ${submission.status}${reason}${duration} ref=${submission.reference}`;
}

export function formatWorkflowDetail(
  workflow: WorkflowRecord,
  submissions: readonly BuildSubmission[]
): string[] {
  const approval = workflow.approval;
  const lines = [
    `工作流: ${workflow.id}`,
    `项目: ${workflow.project}（${workflow.environment}）`,
    `分支: ${workflow.branch}`,
    `申请人: ${workflow.requester.username || workflow.requester.id}`,
    `创建时间: ${workflow.createdAt}`,
    `审批: ${approval.state}${approval.decidedBy ? ` by ${approval.decidedBy.username || approval.decidedBy.id}` : ""}`,
    `派发: ${workflow.dispatch}`,
    `结果: ${workflow.composite ? `${workflow.composite.state} @ ${workflow.composite.settledAt}` : "-"}`,
    "服务:"
  ];
  for (const target of workflow.services) {
    lines.push(`  ${target.service} @ ${target.commitHash}`);
  }
  if (submissions.length > 0) {
    lines.push("构建:");
    lines.push(...submissions.map(formatSubmissionLine));
  }
  if (workflow.dispatchFailures.length > 0) {
    lines.push("提交失败:");
    for (const failure of workflow.dispatchFailures) {
      lines.push(`  ${backendLabel(failure.backend)} ${failure.service}: ${failure.error}`);
    }
  }
  return lines;
}
