import type { ConfigProvider } from "../config/loader.js";
import type { ProjectConfig } from "../config/schema.js";
import { BACKEND_KINDS, type BackendKind } from "../workflow/model.js";
import { JenkinsBackendClient } from "./jenkins.js";
import { SsoBackendClient } from "./sso.js";
import type { BackendClient } from "./types.js";

export type BackendClientFactory = (
  kind: BackendKind,
  project: string,
  config: ProjectConfig,
  timeoutMs: number
) => BackendClient;

export const createBackendClient: BackendClientFactory = (kind, project, config, timeoutMs) => {
  switch (kind) {
    case "jenkins":
      return new JenkinsBackendClient({ project, config: config.jenkins, proxy: config.proxy, timeoutMs });
    case "sso":
      return new SsoBackendClient({ project, config: config.sso, proxy: config.proxy, timeoutMs });
  }
};

interface CachedClient {
  config: ProjectConfig;
  client: BackendClient;
}

/**
 * 按 (项目, 后端) 提供客户端；配置 reload 后项目配置对象变化，客户端随之重建
 */
export class BackendRegistry {
  private readonly clients = new Map<string, CachedClient>();

  constructor(
    private readonly config: ConfigProvider,
    private readonly factory: BackendClientFactory = createBackendClient
  ) {}

  enabledKinds(project: string): BackendKind[] {
    const projectConfig = this.config.project(project);
    if (!projectConfig) {
      return [];
    }
    return BACKEND_KINDS.filter((kind) => projectConfig[kind].enabled);
  }

  /**
   * 0 表示不限
   */
  ceiling(project: string, kind: BackendKind): number {
    return this.config.project(project)?.[kind].maxConcurrentBuilds ?? 0;
  }

  client(project: string, kind: BackendKind): BackendClient {
    const projectConfig = this.config.project(project);
    if (!projectConfig) {
      throw new Error(`未配置项目 ${project}`);
    }
    const key = `${project}:${kind}`;
    const cached = this.clients.get(key);
    if (cached && cached.config === projectConfig) {
      return cached.client;
    }
    const client = this.factory(kind, project, projectConfig, this.config.current().requestTimeoutMs);
    this.clients.set(key, { config: projectConfig, client });
    return client;
  }
}
