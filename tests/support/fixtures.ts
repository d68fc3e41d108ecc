import { ShipgateConfigSchema, type ShipgateConfig } from "../../src/config/schema.js";
import {
  buildWorkflowRecord,
  submissionId,
  type BuildSubmission,
  type NewWorkflowInput,
  type WorkflowRecord
} from "../../src/workflow/model.js";

export const approver = { id: "1001", username: "lead" };
export const requester = { id: "2002", username: "dev" };
export const stranger = { id: "3003", username: "guest" };

/**
 * 默认项目 demo：两个后端都启用，审批人 lead，运维 oncall
 */
export function makeConfig(overrides: Record<string, unknown> = {}): ShipgateConfig {
  return ShipgateConfigSchema.parse({
    projects: {
      demo: {
        approvers: ["@lead"],
        ops: ["oncall"],
        jenkins: {
          enabled: true,
          url: "http://jenkins.test",
          username: "bot",
          apiToken: "test-secret"
        },
        sso: {
          enabled: true,
          url: "http://sso.test",
          authToken: "test-secret",
          authorization: "test-secret"
        }
      }
    },
    monitor: {
      pollIntervalMs: 5,
      maxPolls: 50,
      maxDurationMs: 60_000,
      pollRetries: 2,
      pollBackoffMs: 1,
      pollBackoffMaxMs: 4
    },
    ...overrides
  });
}

export function makeWorkflow(overrides: Partial<NewWorkflowInput> = {}): WorkflowRecord {
  return buildWorkflowRecord({
    id: "wf-1",
    project: "demo",
    environment: "uat",
    branch: "release/1.2",
    services: ["api", "web"],
    commitHashes: ["abc123", "def456"],
    releaseNotes: "fix checkout",
    requester,
    originChatId: "-100",
    approvalMessage: { chatId: "-100", messageId: "42" },
    createdAt: "2026-01-10T08:00:00.000Z",
    ...overrides
  });
}

export function makeSubmission(overrides: Partial<BuildSubmission> = {}): BuildSubmission {
  const workflowId = overrides.workflowId ?? "wf-1";
  const backend = overrides.backend ?? "jenkins";
  const service = overrides.service ?? "api";
  const status = overrides.status ?? "Submitted";
  const submittedAt = overrides.submittedAt ?? "2026-01-10T09:00:00.000Z";
  return {
    id: submissionId({ workflowId, backend, service }),
    commitHash: "abc123",
    reference: `${backend}-${service}`,
    statusHistory: [{ status, observedAt: submittedAt }],
    ...overrides,
    workflowId,
    backend,
    service,
    status,
    submittedAt
  };
}
