import { z } from "zod";

export const APPROVAL_STATES = ["PendingApproval", "Approved", "Rejected"] as const;
export type ApprovalState = (typeof APPROVAL_STATES)[number];

export const BUILD_STATUSES = ["Pending", "Running", "Success", "Failure", "Aborted", "Unstable"] as const;
export type BuildStatus = (typeof BUILD_STATUSES)[number];

/**
 * 提交记录的状态：刚提交时为 Submitted，之后由 Monitor 写入 BuildStatus
 */
export const SUBMISSION_STATUSES = ["Submitted", ...BUILD_STATUSES] as const;
export type SubmissionStatus = (typeof SUBMISSION_STATUSES)[number];

export const BACKEND_KINDS = ["sso", "jenkins"] as const;
export type BackendKind = (typeof BACKEND_KINDS)[number];

export const COMPOSITE_STATES = ["Completed", "PartiallyFailed", "Failed"] as const;
export type CompositeState = (typeof COMPOSITE_STATES)[number];

export const DISPATCH_PHASES = ["NotStarted", "Dispatching", "Dispatched"] as const;
export type DispatchPhase = (typeof DISPATCH_PHASES)[number];

export const ActorSchema = z.object({
  id: z.string().min(1),
  username: z.string()
});
export type Actor = z.infer<typeof ActorSchema>;

export const ServiceTargetSchema = z.object({
  service: z.string().min(1),
  commitHash: z.string().min(1)
});
export type ServiceTarget = z.infer<typeof ServiceTargetSchema>;

const ApprovalRecordSchema = z.object({
  state: z.enum(APPROVAL_STATES),
  decidedBy: ActorSchema.optional(),
  decidedAt: z.string().optional(),
  comment: z.string().optional()
});
export type ApprovalRecord = z.infer<typeof ApprovalRecordSchema>;

export const DispatchFailureSchema = z.object({
  backend: z.enum(BACKEND_KINDS),
  service: z.string().min(1),
  error: z.string(),
  failedAt: z.string()
});
export type DispatchFailure = z.infer<typeof DispatchFailureSchema>;

export const WorkflowRecordSchema = z.object({
  id: z.string().min(1),
  project: z.string().min(1),
  environment: z.string().min(1),
  branch: z.string().min(1),
  services: z.array(ServiceTargetSchema).min(1),
  releaseNotes: z.string(),
  requester: ActorSchema,
  originChatId: z.string().min(1),
  approvalMessage: z
    .object({ chatId: z.string().min(1), messageId: z.string().min(1) })
    .optional(),
  createdAt: z.string(),
  approval: ApprovalRecordSchema,
  dispatch: z.enum(DISPATCH_PHASES),
  dispatchFailures: z.array(DispatchFailureSchema),
  composite: z
    .object({ state: z.enum(COMPOSITE_STATES), settledAt: z.string() })
    .optional()
});
export type WorkflowRecord = z.infer<typeof WorkflowRecordSchema>;

export const SubmissionDetailSchema = z.object({
  jobName: z.string().optional(),
  url: z.string().optional(),
  durationMs: z.number().nonnegative().optional()
});
export type SubmissionDetail = z.infer<typeof SubmissionDetailSchema>;

export const BuildSubmissionSchema = z.object({
  id: z.string().min(1),
  workflowId: z.string().min(1),
  backend: z.enum(BACKEND_KINDS),
  service: z.string().min(1),
  commitHash: z.string(),
  reference: z.string().min(1),
  submittedAt: z.string(),
  status: z.enum(SUBMISSION_STATUSES),
  statusHistory: z.array(
    z.object({ status: z.enum(SUBMISSION_STATUSES), observedAt: z.string() })
  ),
  reason: z.literal("MonitorTimeout").optional(),
  lastPolledAt: z.string().optional(),
  detail: SubmissionDetailSchema.optional()
});
export type BuildSubmission = z.infer<typeof BuildSubmissionSchema>;

export interface SubmissionKey {
  readonly workflowId: string;
  readonly backend: BackendKind;
  readonly service: string;
}

export function submissionId(key: SubmissionKey): string {
  return `${key.workflowId}:${key.backend}:${key.service}`;
}

/**
 * 前端收集到的新工作流。服务与 hash 以两个列表给出，按下标一一对应。
 */
export interface NewWorkflowInput {
  id: string;
  project: string;
  environment: string;
  branch: string;
  services: readonly string[];
  commitHashes: readonly string[];
  releaseNotes: string;
  requester: Actor;
  originChatId: string;
  approvalMessage?: { chatId: string; messageId: string };
  createdAt?: string;
}

export function buildWorkflowRecord(input: NewWorkflowInput): WorkflowRecord {
  if (input.services.length !== input.commitHashes.length) {
    throw new Error(
      `服务数量 (${input.services.length}) 与 hash 数量 (${input.commitHashes.length}) 不一致`
    );
  }
  const seen = new Set<string>();
  for (const service of input.services) {
    if (seen.has(service)) {
      throw new Error(`重复的服务：${service}`);
    }
    seen.add(service);
  }
  return WorkflowRecordSchema.parse({
    id: input.id,
    project: input.project,
    environment: input.environment,
    branch: input.branch,
    services: input.services.map((service, index) => ({
      service,
      commitHash: input.commitHashes[index]
    })),
    releaseNotes: input.releaseNotes,
    requester: input.requester,
    originChatId: input.originChatId,
    approvalMessage: input.approvalMessage,
    createdAt: input.createdAt ?? new Date().toISOString(),
    approval: { state: "PendingApproval" },
    dispatch: "NotStarted",
    dispatchFailures: []
  });
}
