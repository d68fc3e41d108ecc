import {
  BACKEND_KINDS,
  type Actor,
  type BackendKind,
  type BuildSubmission,
  type CompositeState,
  type DispatchFailure,
  type SubmissionStatus,
  type WorkflowRecord
} from "../workflow/model.js";

/**
 * 通知文案（Telegram HTML 解析模式）。用户输入一律转义。
 */

const BACKEND_LABELS: Record<BackendKind, string> = {
  sso: "SSO",
  jenkins: "Jenkins"
};

const STATUS_WORDING: Record<SubmissionStatus, readonly [string, string]> = {
  Submitted: ["⏳", "已提交"],
  Pending: ["⏳", "排队中"],
  Running: ["⏳", "构建中"],
  Success: ["✅", "部署完成"],
  Failure: ["❌", "构建失败"],
  Aborted: ["⚠️", "构建已终止"],
  Unstable: ["⚠️", "构建不稳定（可能有测试失败）"]
};

const COMPOSITE_HEADERS: Record<CompositeState, readonly [string, string]> = {
  Completed: ["✅", "全部服务部署完成"],
  PartiallyFailed: ["⚠️", "部分服务未成功"],
  Failed: ["❌", "部署失败"]
};

export function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function backendLabel(kind: BackendKind): string {
  return BACKEND_LABELS[kind];
}

/**
 * 65000 -> "1分5秒"
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  return `${Math.floor(totalSeconds / 60)}分${totalSeconds % 60}秒`;
}

export function actorHandle(actor: Actor): string {
  return `@${escapeHtml(actor.username || actor.id)}`;
}

function projectLine(workflow: WorkflowRecord): string {
  return `📦 项目: ${escapeHtml(workflow.project)}（${escapeHtml(workflow.environment)}）`;
}

function idLine(workflow: WorkflowRecord): string {
  return `🆔 工作流ID: <code>${escapeHtml(workflow.id)}</code>`;
}

export function renderServiceLine(submission: BuildSubmission): string {
  const label = `[${backendLabel(submission.backend)}] ${escapeHtml(submission.service)}`;
  if (submission.reason === "MonitorTimeout") {
    return `⚠️ ${label}：监控超时，已标记为终止`;
  }
  const [icon, wording] = STATUS_WORDING[submission.status];
  const duration = submission.detail?.durationMs
    ? `（耗时 ${formatDuration(submission.detail.durationMs)}）`
    : "";
  return `${icon} ${label}：${wording}${duration}`;
}

export function renderFailureLine(failure: DispatchFailure): string {
  return `❌ [${backendLabel(failure.backend)}] ${escapeHtml(failure.service)}：提交失败（${escapeHtml(failure.error)}）`;
}

export function renderSubmissionResult(
  workflow: WorkflowRecord,
  accepted: readonly BuildSubmission[],
  failures: readonly DispatchFailure[]
): string {
  const lines = [
    failures.length === 0 ? "✅ 工作流已通过，构建已提交" : "⚠️ 工作流已通过，部分构建提交失败",
    idLine(workflow),
    projectLine(workflow),
    ""
  ];
  for (const kind of BACKEND_KINDS) {
    const group = accepted.filter((submission) => submission.backend === kind);
    if (group.length === 0) {
      continue;
    }
    lines.push(`🚀 ${BACKEND_LABELS[kind]} 已提交:`);
    for (const submission of group) {
      lines.push(`  • ${escapeHtml(submission.service)}`);
    }
  }
  for (const failure of failures) {
    lines.push(renderFailureLine(failure));
  }
  lines.push("", "⏳ 构建正在进行中，完成后将自动通知...");
  return lines.join("\n");
}

export function renderDispatchFailed(
  workflow: WorkflowRecord,
  failures: readonly DispatchFailure[]
): string {
  return [
    "❌ 构建提交失败",
    idLine(workflow),
    projectLine(workflow),
    "",
    ...failures.map(renderFailureLine),
    "",
    "请检查配置或联系管理员"
  ].join("\n");
}

export function renderBuildTerminal(
  workflow: WorkflowRecord,
  composite: CompositeState,
  submissions: readonly BuildSubmission[],
  failures: readonly DispatchFailure[]
): string {
  const [icon, wording] = COMPOSITE_HEADERS[composite];
  return [
    `${icon} 工作流${wording}`,
    idLine(workflow),
    projectLine(workflow),
    `🌿 分支: ${escapeHtml(workflow.branch)}`,
    "",
    ...submissions.map(renderServiceLine),
    ...failures.map(renderFailureLine)
  ].join("\n");
}

export function renderRejected(workflow: WorkflowRecord): string {
  const approval = workflow.approval;
  return [
    "❌ 工作流已被拒绝",
    idLine(workflow),
    `❌ 审批人: ${approval.decidedBy ? actorHandle(approval.decidedBy) : "未知"}`,
    `💬 审批意见: ${escapeHtml(approval.comment ?? "") || "无"}`
  ].join("\n");
}

/**
 * 审批消息在决策后的内容（替换掉按钮）
 */
export function renderApprovalDecision(workflow: WorkflowRecord): string {
  const approval = workflow.approval;
  const approver = approval.decidedBy ? actorHandle(approval.decidedBy) : "未知";
  const lines = [
    `📋 发版申请 <code>${escapeHtml(workflow.id)}</code>`,
    projectLine(workflow),
    `🌿 分支: ${escapeHtml(workflow.branch)}`,
    `🚀 服务: ${workflow.services.map((target) => escapeHtml(target.service)).join(", ")}`,
    `👤 申请人: ${actorHandle(workflow.requester)}`,
    ""
  ];
  if (approval.state === "Approved") {
    lines.push(`✅ 已通过，审批人 ${approver}`);
  } else if (approval.state === "Rejected") {
    lines.push(`❌ 已拒绝，审批人 ${approver}`);
    if (approval.comment) {
      lines.push(`💬 审批意见: ${escapeHtml(approval.comment)}`);
    }
  } else {
    lines.push("⏳ 待审批");
  }
  return lines.join("\n");
}
