import { z } from "zod";

import { BUILD_STATUSES } from "../workflow/model.js";

export const PROXY_TYPES = ["http", "https", "socks5", "socks5h"] as const;
export type ProxyType = (typeof PROXY_TYPES)[number];

const ProxySchema = z
  .object({
    enabled: z.boolean().default(false),
    type: z.enum(PROXY_TYPES).default("socks5h"),
    host: z.string().default(""),
    port: z.number().int().positive().max(65535).optional(),
    username: z.string().optional(),
    password: z.string().optional()
  })
  .superRefine((proxy, ctx) => {
    if (!proxy.enabled) {
      return;
    }
    if (proxy.host.trim().length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["host"], message: "启用代理时 host 必填" });
    }
    if (proxy.port === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["port"], message: "启用代理时 port 必填" });
    }
  });

const JenkinsSchema = z
  .object({
    enabled: z.boolean().default(false),
    url: z.string().url({ message: "jenkins.url 必须为有效的 URL" }).optional(),
    username: z.string().default(""),
    apiToken: z.string().default(""),
    /**
     * 环境名 -> Jenkins 目录名，例如 { "uat": "UAT" }
     */
    envKeys: z.record(z.string(), z.string()).default({}),
    maxConcurrentBuilds: z.number().int().nonnegative().default(0)
  })
  .superRefine((jenkins, ctx) => {
    if (jenkins.enabled && !jenkins.url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["url"], message: "启用 Jenkins 时 url 必填" });
    }
  });

const SsoSchema = z
  .object({
    enabled: z.boolean().default(false),
    url: z.string().url({ message: "sso.url 必须为有效的 URL" }).optional(),
    authToken: z.string().default(""),
    authorization: z.string().default(""),
    /**
     * 工单提交人的 SSO 用户 ID
     */
    userId: z.string().default(""),
    maxConcurrentBuilds: z.number().int().nonnegative().default(0)
  })
  .superRefine((sso, ctx) => {
    if (sso.enabled && !sso.url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["url"], message: "启用 SSO 时 url 必填" });
    }
  });

export const ProjectConfigSchema = z.object({
  /**
   * 审批人：用户 ID 或用户名（可带 @）
   */
  approvers: z.array(z.string().min(1)).default([]),
  /**
   * 运维：同样可审批；失败通知时 @ 提醒
   */
  ops: z.array(z.string().min(1)).default([]),
  jenkins: JenkinsSchema.default({}),
  sso: SsoSchema.default({}),
  proxy: ProxySchema.default({})
});
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type JenkinsConfig = ProjectConfig["jenkins"];
export type SsoConfig = ProjectConfig["sso"];
export type ProxyConfig = ProjectConfig["proxy"];

const MonitorSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(10_000),
  maxPolls: z.number().int().positive().default(60),
  maxDurationMs: z.number().int().positive().default(30 * 60_000),
  pollRetries: z.number().int().nonnegative().default(2),
  pollBackoffMs: z.number().int().positive().default(1_000),
  pollBackoffMaxMs: z.number().int().positive().default(8_000)
});
export type MonitorConfig = z.infer<typeof MonitorSchema>;

export const ShipgateConfigSchema = z.object({
  projects: z.record(z.string().min(1), ProjectConfigSchema).default({}),
  monitor: MonitorSchema.default({}),
  retentionDays: z.number().int().positive().default(60),
  retentionCron: z.string().min(1).default("0 3 * * *"),
  notifyOpsOn: z.array(z.enum(BUILD_STATUSES)).default(["Failure", "Aborted"]),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  telegram: z
    .object({
      botToken: z.string().default(""),
      apiBaseUrl: z.string().url().default("https://api.telegram.org")
    })
    .default({})
});
export type ShipgateConfig = z.infer<typeof ShipgateConfigSchema>;

/**
 * 覆盖项：按项目存储的部分配置，reload 时合并到文件配置之上
 */
export const ProjectOverrideSchema = z.object({
  project: z.string().min(1),
  updatedAt: z.string(),
  sso: z
    .object({
      authToken: z.string().optional(),
      authorization: z.string().optional(),
      enabled: z.boolean().optional()
    })
    .optional(),
  jenkins: z
    .object({
      apiToken: z.string().optional(),
      enabled: z.boolean().optional()
    })
    .optional()
});
export type ProjectOverride = z.infer<typeof ProjectOverrideSchema>;
