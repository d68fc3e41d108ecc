import { normalizeProxyType } from "../backends/proxy.js";
import { BACKEND_KINDS, type BackendKind } from "../workflow/model.js";
import type { ProjectConfig } from "./schema.js";

export interface ProjectConfigSummary {
  line: string;
  enabled: BackendKind[];
  issues: string[];
}

const LABELS: Record<BackendKind, string> = { sso: "SSO", jenkins: "Jenkins" };

/**
 * 配置检查用的项目概要；issues 为可运行但大概率有问题的配置
 */
export function describeProjectConfig(name: string, project: ProjectConfig): ProjectConfigSummary {
  const enabled = BACKEND_KINDS.filter((kind) => project[kind].enabled);
  const issues: string[] = [];

  if (enabled.length === 0) {
    issues.push("未启用任何构建后端，审批通过后不会提交构建");
  }
  if (project.approvers.length === 0 && project.ops.length === 0) {
    issues.push("没有审批人与运维，工作流无法被审批");
  }
  if (project.jenkins.enabled && (!project.jenkins.username || !project.jenkins.apiToken)) {
    issues.push("Jenkins 缺少 username 或 apiToken");
  }
  if (project.sso.enabled && !project.sso.authToken) {
    issues.push("SSO 缺少 authToken");
  }

  const ceilings = enabled
    .filter((kind) => project[kind].maxConcurrentBuilds > 0)
    .map((kind) => `${LABELS[kind]}≤${project[kind].maxConcurrentBuilds}`);
  const proxy = project.proxy.enabled
    ? `${normalizeProxyType(project.proxy.type)}://${project.proxy.host}:${project.proxy.port ?? "?"}`
    : "无";

  const line = [
    `- ${name}`,
    `后端: ${enabled.length > 0 ? enabled.map((kind) => LABELS[kind]).join(", ") : "无"}`,
    `审批人 ${project.approvers.length}`,
    `运维 ${project.ops.length}`,
    `并发: ${ceilings.length > 0 ? ceilings.join(" ") : "不限"}`,
    `代理: ${proxy}`
  ].join(" | ");

  return { line, enabled, issues };
}
