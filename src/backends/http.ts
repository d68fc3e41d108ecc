import type { IncomingHttpHeaders } from "node:http";

import got, {
  RequestError,
  type ExtendOptions,
  type Got,
  type Method,
  type OptionsOfTextResponseBody,
  type Response
} from "got";

import type { ProxyConfig } from "../config/schema.js";
import { createLoggerFacade, type LoggerFacade } from "../shared/logging/logger.js";
import { BackendRequestError } from "./types.js";
import { createProxyAgents } from "./proxy.js";

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  proxy?: ProxyConfig;
  basicAuth?: { username: string; password: string };
  logCategory?: string;
}

export interface HttpRequestOptions {
  method?: Method;
  searchParams?: Record<string, string | number>;
  json?: unknown;
  form?: Record<string, string>;
}

export interface HttpResponse {
  statusCode: number;
  headers: IncomingHttpHeaders;
  body: unknown;
}

/**
 * 后端 HTTP 包装：got 实例 + 代理 + 错误分类
 *
 * got 自身不重试（retry.limit = 0），重试策略由调用方决定。
 * 网络错误、超时与 5xx 归为 connection；4xx 归为 rejected。
 */
export class BackendHttpClient {
  private readonly client: Got;
  private readonly logger: LoggerFacade;

  constructor(options: HttpClientOptions) {
    this.logger = createLoggerFacade(options.logCategory ?? "backend.http");
    const extend: ExtendOptions = {
      prefixUrl: options.baseUrl,
      timeout: { request: options.timeoutMs },
      retry: { limit: 0 },
      throwHttpErrors: false
    };
    if (options.headers) {
      extend.headers = options.headers;
    }
    const agent = options.proxy ? createProxyAgents(options.proxy) : undefined;
    if (agent) {
      extend.agent = agent;
    }
    if (options.basicAuth) {
      extend.username = options.basicAuth.username;
      extend.password = options.basicAuth.password;
    }
    this.client = got.extend(extend);
  }

  async request(path: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const method = options.method ?? "GET";
    const target = path.replace(/^\/+/, "");
    const gotOptions: OptionsOfTextResponseBody = { method, responseType: "text" };
    if (options.searchParams) {
      gotOptions.searchParams = options.searchParams;
    }
    if (options.json !== undefined) {
      gotOptions.json = options.json;
    } else if (options.form) {
      gotOptions.form = options.form;
    }

    const response = await this.send(method, target, gotOptions);
    const body = parseBody(response.body);
    if (response.statusCode >= 500) {
      throw new BackendRequestError(
        `${method} ${target} 返回 ${response.statusCode}`,
        "connection",
        response.statusCode
      );
    }
    if (response.statusCode >= 400) {
      throw new BackendRequestError(
        `${method} ${target} 被拒绝（${response.statusCode}）：${truncate(response.body)}`,
        "rejected",
        response.statusCode
      );
    }
    return { statusCode: response.statusCode, headers: response.headers, body };
  }

  private async send(
    method: Method,
    target: string,
    options: OptionsOfTextResponseBody
  ): Promise<Response<string>> {
    try {
      return await this.client(target, options);
    } catch (error) {
      if (error instanceof RequestError) {
        this.logger.warn("Backend request failed", { method, path: target, error: error.message });
        throw new BackendRequestError(
          `${method} ${target} 请求失败：${error.message}`,
          "connection",
          undefined,
          error
        );
      }
      throw error;
    }
  }
}

function parseBody(raw: string): unknown {
  if (raw.length === 0) {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
