import { describe, expect, it } from "vitest";

import {
  escapeHtml,
  formatDuration,
  renderApprovalDecision,
  renderBuildTerminal,
  renderDispatchFailed,
  renderRejected,
  renderServiceLine,
  renderSubmissionResult
} from "../../src/engine/templates.js";
import type { DispatchFailure, WorkflowRecord } from "../../src/workflow/model.js";
import { approver, makeSubmission, makeWorkflow } from "../support/fixtures.js";

function decided(state: "Approved" | "Rejected", comment?: string): WorkflowRecord {
  const workflow = makeWorkflow();
  return {
    ...workflow,
    approval: { state, decidedBy: approver, decidedAt: "2026-01-10T08:30:00.000Z", comment }
  };
}

const failure: DispatchFailure = {
  backend: "sso",
  service: "api",
  error: "boom <x>",
  failedAt: "2026-01-10T09:00:00.000Z"
};

describe("templates", () => {
  it("escapes html", () => {
    expect(escapeHtml("a < b && c > d")).toBe("a &lt; b &amp;&amp; c &gt; d");
  });

  it("formats durations as minutes and seconds", () => {
    expect(formatDuration(65_000)).toBe("1分5秒");
    expect(formatDuration(999)).toBe("0分0秒");
  });

  it("renders service lines", () => {
    expect(
      renderServiceLine(makeSubmission({ status: "Success", detail: { durationMs: 65_000 } }))
    ).toBe("✅ [Jenkins] api：部署完成（耗时 1分5秒）");
    expect(renderServiceLine(makeSubmission({ status: "Unstable" }))).toBe(
      "⚠️ [Jenkins] api：构建不稳定（可能有测试失败）"
    );
    expect(
      renderServiceLine(makeSubmission({ backend: "sso", service: "web", status: "Aborted", reason: "MonitorTimeout" }))
    ).toBe("⚠️ [SSO] web：监控超时，已标记为终止");
  });

  it("groups accepted submissions by backend", () => {
    const text = renderSubmissionResult(
      makeWorkflow(),
      [makeSubmission({ backend: "jenkins", service: "api" }), makeSubmission({ backend: "sso", service: "web" })],
      []
    );

    expect(text.split("\n")).toEqual([
      "✅ 工作流已通过，构建已提交",
      "🆔 工作流ID: <code>wf-1</code>",
      "📦 项目: demo（uat）",
      "",
      "🚀 SSO 已提交:",
      "  • web",
      "🚀 Jenkins 已提交:",
      "  • api",
      "",
      "⏳ 构建正在进行中，完成后将自动通知..."
    ]);
  });

  it("names failed pairs in a partial submission result", () => {
    const lines = renderSubmissionResult(makeWorkflow(), [makeSubmission()], [failure]).split("\n");

    expect(lines[0]).toBe("⚠️ 工作流已通过，部分构建提交失败");
    expect(lines).toContain("❌ [SSO] api：提交失败（boom &lt;x&gt;）");
  });

  it("renders a dispatch failure", () => {
    expect(renderDispatchFailed(makeWorkflow(), [failure])).toBe(
      [
        "❌ 构建提交失败",
        "🆔 工作流ID: <code>wf-1</code>",
        "📦 项目: demo（uat）",
        "",
        "❌ [SSO] api：提交失败（boom &lt;x&gt;）",
        "",
        "请检查配置或联系管理员"
      ].join("\n")
    );
  });

  it("renders the terminal summary", () => {
    const text = renderBuildTerminal(
      makeWorkflow(),
      "PartiallyFailed",
      [makeSubmission({ status: "Success" }), makeSubmission({ service: "web", status: "Failure" })],
      []
    );

    expect(text.split("\n")).toEqual([
      "⚠️ 工作流部分服务未成功",
      "🆔 工作流ID: <code>wf-1</code>",
      "📦 项目: demo（uat）",
      "🌿 分支: release/1.2",
      "",
      "✅ [Jenkins] api：部署完成",
      "❌ [Jenkins] web：构建失败"
    ]);
  });

  it("renders a rejection with and without a comment", () => {
    expect(renderRejected(decided("Rejected", "<no>")).split("\n")).toEqual([
      "❌ 工作流已被拒绝",
      "🆔 工作流ID: <code>wf-1</code>",
      "❌ 审批人: @lead",
      "💬 审批意见: &lt;no&gt;"
    ]);
    expect(renderRejected(decided("Rejected")).split("\n")[3]).toBe("💬 审批意见: 无");
  });

  it("renders the approval message after a decision", () => {
    expect(renderApprovalDecision(decided("Approved")).split("\n")).toEqual([
      "📋 发版申请 <code>wf-1</code>",
      "📦 项目: demo（uat）",
      "🌿 分支: release/1.2",
      "🚀 服务: api, web",
      "👤 申请人: @dev",
      "",
      "✅ 已通过，审批人 @lead"
    ]);
    expect(renderApprovalDecision(makeWorkflow()).split("\n").at(-1)).toBe("⏳ 待审批");
  });
});
