import { z } from "zod";

import type { ProxyConfig, SsoConfig } from "../config/schema.js";
import { createLoggerFacade, type LoggerFacade } from "../shared/logging/logger.js";
import type { BuildStatus, SubmissionDetail } from "../workflow/model.js";
import { BackendHttpClient } from "./http.js";
import { buildSsoOrder } from "./ssoOrder.js";
import {
  BackendRequestError,
  type BackendClient,
  type PollResult,
  type SubmissionRequest,
  type SubmitResult
} from "./types.js";

export interface SsoClientOptions {
  project: string;
  config: SsoConfig;
  proxy?: ProxyConfig;
  timeoutMs?: number;
  /**
   * 工单提交后等待发布 ID 的间隔与上限（默认 2s / 60s）
   */
  releasePollIntervalMs?: number;
  releaseTimeoutMs?: number;
}

const JobListSchema = z.object({
  data: z
    .array(z.object({ jobId: z.union([z.string(), z.number()]), jobName: z.string().default("") }))
    .default([])
});

const StartOrderSchema = z.object({
  object: z
    .object({ processInstanceId: z.union([z.string(), z.number()]).optional() })
    .nullable()
    .optional()
});

const ReleaseIdsSchema = z.object({
  object: z.array(z.union([z.string(), z.number()])).nullable().optional()
});

const BuildDetailSchema = z.object({
  data: z
    .object({
      publishStatus: z.string().optional(),
      jobName: z.string().optional(),
      buildUrl: z.string().optional(),
      duration: z.number().optional()
    })
    .nullable()
    .optional()
});

/**
 * SSO publishStatus 映射：SUCCESS/FAILURE/ABORTED 终态，BUILDING/RUNNING 进行中，其余视为排队
 */
export function mapPublishStatus(publishStatus: string | undefined): BuildStatus {
  switch ((publishStatus ?? "").toUpperCase()) {
    case "SUCCESS":
      return "Success";
    case "FAILURE":
      return "Failure";
    case "ABORTED":
      return "Aborted";
    case "BUILDING":
    case "RUNNING":
      return "Running";
    default:
      return "Pending";
  }
}

export class SsoBackendClient implements BackendClient {
  readonly kind = "sso" as const;

  private readonly http: BackendHttpClient;
  private readonly logger: LoggerFacade;
  private readonly releasePollIntervalMs: number;
  private readonly releaseTimeoutMs: number;

  constructor(private readonly options: SsoClientOptions) {
    if (!options.config.url) {
      throw new Error(`项目 ${options.project} 未配置 SSO 地址`);
    }
    this.http = new BackendHttpClient({
      baseUrl: options.config.url,
      timeoutMs: options.timeoutMs ?? 30_000,
      proxy: options.proxy,
      headers: {
        "Content-Type": "application/json; charset=UTF-8",
        "Auth-token": options.config.authToken,
        Authorization: options.config.authorization
      },
      logCategory: "backend.sso"
    });
    this.logger = createLoggerFacade("backend.sso", { project: options.project, backend: "sso" });
    this.releasePollIntervalMs = options.releasePollIntervalMs ?? 2_000;
    this.releaseTimeoutMs = options.releaseTimeoutMs ?? 60_000;
  }

  async submit(request: SubmissionRequest): Promise<SubmitResult> {
    const job = await this.findJob(request);

    const order = buildSsoOrder({
      project: request.project,
      environment: request.environment,
      jobId: String(job.jobId),
      service: request.service,
      commitHash: request.commitHash,
      branch: request.branch,
      releaseNotes: request.releaseNotes,
      approver: request.approver.username || request.approver.id,
      userId: this.options.config.userId
    });

    const started = StartOrderSchema.safeParse(
      (await this.http.request("/api/flow/task/startnew/dcAutoReleaseProcess", {
        method: "POST",
        json: order
      })).body
    );
    const processInstanceId = started.success ? started.data.object?.processInstanceId : undefined;
    if (processInstanceId === undefined) {
      throw new BackendRequestError("SSO 提交响应中未找到 processInstanceId", "rejected");
    }
    this.logger.info("SSO order submitted", {
      workflowId: request.workflowId,
      service: request.service,
      processInstanceId
    });

    const releaseId = await this.waitForReleaseId(String(processInstanceId));
    const detail: SubmissionDetail = { jobName: job.jobName };
    return { reference: releaseId, detail };
  }

  async pollStatus(reference: string): Promise<PollResult> {
    const response = await this.http.request("/api/flow/publish/hisitory/buildDetail", {
      searchParams: { id: reference }
    });
    const parsed = BuildDetailSchema.safeParse(response.body);
    if (!parsed.success || !parsed.data.data) {
      throw new BackendRequestError(`SSO 构建详情为空：${reference}`, "connection");
    }
    const data = parsed.data.data;
    const detail: SubmissionDetail = {};
    if (data.jobName) {
      detail.jobName = data.jobName;
    }
    if (data.buildUrl) {
      detail.url = data.buildUrl;
    }
    if (data.duration && data.duration > 0) {
      detail.durationMs = data.duration;
    }
    return { status: mapPublishStatus(data.publishStatus), detail };
  }

  private async findJob(request: SubmissionRequest): Promise<{ jobId: string | number; jobName: string }> {
    const response = await this.http.request("/api/publish3/publish/jenkinsJob/queryOaSameJob", {
      searchParams: { env: request.environment, projects: request.project }
    });
    const parsed = JobListSchema.safeParse(response.body);
    const jobs = parsed.success ? parsed.data.data : [];
    const job = jobs.find((candidate) => candidate.jobName.includes(request.service));
    if (!job) {
      throw new BackendRequestError(
        `SSO 中未找到服务 ${request.service} 对应的 Job（${request.project}/${request.environment}）`,
        "rejected"
      );
    }
    return job;
  }

  /**
   * 工单创建后发布 ID 可能稍后才生成；超时视为拒绝，避免重复建单
   */
  private async waitForReleaseId(processInstanceId: string): Promise<string> {
    const deadline = Date.now() + this.releaseTimeoutMs;
    do {
      const response = await this.http.request("/api/flow/publish/hisitory/getReleaseId", {
        searchParams: { proId: processInstanceId }
      });
      const parsed = ReleaseIdsSchema.safeParse(response.body);
      const ids = parsed.success ? (parsed.data.object ?? []) : [];
      const first = ids.find((id) => String(id).length > 0);
      if (first !== undefined) {
        return String(first);
      }
      await sleep(this.releasePollIntervalMs);
    } while (Date.now() < deadline);
    throw new BackendRequestError(`SSO 工单 ${processInstanceId} 未生成发布 ID`, "rejected");
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
