import { z } from "zod";

import type { JenkinsConfig, ProxyConfig } from "../config/schema.js";
import { createLoggerFacade, type LoggerFacade } from "../shared/logging/logger.js";
import type { BuildStatus, SubmissionDetail } from "../workflow/model.js";
import { BackendHttpClient } from "./http.js";
import {
  BackendRequestError,
  type BackendClient,
  type PollResult,
  type SubmissionRequest,
  type SubmitResult
} from "./types.js";

export interface JenkinsClientOptions {
  project: string;
  config: JenkinsConfig;
  proxy?: ProxyConfig;
  timeoutMs?: number;
  /**
   * 队列项轮询间隔与上限（默认 2s / 60s）
   */
  queuePollIntervalMs?: number;
  queueTimeoutMs?: number;
}

const JobInfoSchema = z.object({
  nextBuildNumber: z.number().int().optional()
});

const QueueItemSchema = z.object({
  cancelled: z.boolean().optional(),
  executable: z
    .object({ number: z.number().int(), url: z.string().optional() })
    .nullable()
    .optional()
});

const BuildInfoSchema = z.object({
  building: z.boolean().optional(),
  result: z.string().nullable().optional(),
  duration: z.number().optional(),
  url: z.string().optional()
});

const RESULT_STATUS: Record<string, BuildStatus> = {
  SUCCESS: "Success",
  FAILURE: "Failure",
  ABORTED: "Aborted",
  UNSTABLE: "Unstable"
};

/**
 * "uat/web-api" -> "job/uat/job/web-api"
 */
export function jobPath(jobName: string): string {
  return jobName
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => `job/${encodeURIComponent(segment)}`)
    .join("/");
}

/**
 * 环境名对应的 Jenkins 目录：先精确匹配，再忽略大小写，最后用小写环境名
 */
export function resolveEnvKey(environment: string, envKeys: Record<string, string>): string {
  const exact = envKeys[environment];
  if (exact) {
    return exact;
  }
  const lowered = environment.toLowerCase();
  for (const [key, value] of Object.entries(envKeys)) {
    if (key.toLowerCase() === lowered) {
      return value;
    }
  }
  return lowered;
}

export function formatJenkinsReference(jobName: string, buildNumber: number): string {
  return `${jobName}#${buildNumber}`;
}

export function parseJenkinsReference(reference: string): { jobName: string; buildNumber: number } {
  const index = reference.lastIndexOf("#");
  const buildNumber = index > 0 ? Number(reference.slice(index + 1)) : Number.NaN;
  if (!Number.isInteger(buildNumber) || buildNumber <= 0) {
    throw new BackendRequestError(`无效的 Jenkins 构建引用：${reference}`, "rejected");
  }
  return { jobName: reference.slice(0, index), buildNumber };
}

export function mapJenkinsBuild(info: z.infer<typeof BuildInfoSchema>): BuildStatus {
  if (info.building) {
    return "Running";
  }
  const mapped = info.result ? RESULT_STATUS[info.result] : undefined;
  return mapped ?? "Pending";
}

export class JenkinsBackendClient implements BackendClient {
  readonly kind = "jenkins" as const;

  private readonly http: BackendHttpClient;
  private readonly logger: LoggerFacade;
  private readonly queuePollIntervalMs: number;
  private readonly queueTimeoutMs: number;

  constructor(private readonly options: JenkinsClientOptions) {
    if (!options.config.url) {
      throw new Error(`项目 ${options.project} 未配置 Jenkins 地址`);
    }
    this.http = new BackendHttpClient({
      baseUrl: options.config.url,
      timeoutMs: options.timeoutMs ?? 30_000,
      proxy: options.proxy,
      basicAuth: { username: options.config.username, password: options.config.apiToken },
      logCategory: "backend.jenkins"
    });
    this.logger = createLoggerFacade("backend.jenkins", { project: options.project, backend: "jenkins" });
    this.queuePollIntervalMs = options.queuePollIntervalMs ?? 2_000;
    this.queueTimeoutMs = options.queueTimeoutMs ?? 60_000;
  }

  async submit(request: SubmissionRequest): Promise<SubmitResult> {
    const envKey = resolveEnvKey(request.environment, this.options.config.envKeys);
    const jobName = `${envKey}/${request.service}`;
    const path = jobPath(jobName);

    const jobInfo = JobInfoSchema.safeParse((await this.http.request(`${path}/api/json`)).body);
    const nextBuildNumber = jobInfo.success ? jobInfo.data.nextBuildNumber : undefined;

    const triggered = await this.http.request(`${path}/buildWithParameters`, {
      method: "POST",
      form: {
        action_type: "gray",
        gitBranch: request.branch,
        check_commitID: request.commitHash,
        WORKFLOW_ID: request.workflowId,
        APPROVER: request.approver.username || request.approver.id
      }
    });

    const queueId = parseQueueId(triggered.headers.location);
    this.logger.info("Jenkins build triggered", {
      workflowId: request.workflowId,
      jobName,
      queueId,
      nextBuildNumber
    });

    const buildNumber = (queueId !== null ? await this.waitForExecutable(queueId) : null) ?? nextBuildNumber;
    if (buildNumber === undefined) {
      throw new BackendRequestError(`Jenkins 未返回 ${jobName} 的构建编号`, "rejected");
    }
    const detail: SubmissionDetail = { jobName };
    return { reference: formatJenkinsReference(jobName, buildNumber), detail };
  }

  async pollStatus(reference: string): Promise<PollResult> {
    const { jobName, buildNumber } = parseJenkinsReference(reference);
    const response = await this.http.request(`${jobPath(jobName)}/${buildNumber}/api/json`);
    const parsed = BuildInfoSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new BackendRequestError(`Jenkins 构建信息格式错误：${reference}`, "connection");
    }
    const info = parsed.data;
    const detail: SubmissionDetail = { jobName };
    if (info.url) {
      detail.url = info.url;
    }
    if (info.duration && info.duration > 0) {
      detail.durationMs = info.duration;
    }
    return { status: mapJenkinsBuild(info), detail };
  }

  /**
   * 轮询队列项直到拿到构建编号；超时返回 null，由调用方回退到 nextBuildNumber
   */
  private async waitForExecutable(queueId: number): Promise<number | null> {
    const deadline = Date.now() + this.queueTimeoutMs;
    while (Date.now() < deadline) {
      const item = await this.lookupQueueItem(queueId);
      if (item?.executable) {
        return item.executable.number;
      }
      if (item?.cancelled) {
        throw new BackendRequestError(`Jenkins 队列项 ${queueId} 已取消`, "rejected");
      }
      await sleep(this.queuePollIntervalMs);
    }
    this.logger.warn("Timed out waiting for build to start", { queueId });
    return null;
  }

  private async lookupQueueItem(queueId: number): Promise<z.infer<typeof QueueItemSchema> | null> {
    try {
      const response = await this.http.request(`queue/item/${queueId}/api/json`);
      const parsed = QueueItemSchema.safeParse(response.body);
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.logger.warn("Queue item lookup failed", {
        queueId,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }
}

/**
 * Location: https://jenkins/queue/item/42/ -> 42
 */
export function parseQueueId(location: string | undefined): number | null {
  if (!location) {
    return null;
  }
  const match = /queue\/item\/(\d+)/.exec(location);
  return match ? Number(match[1]) : null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
