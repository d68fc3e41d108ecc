import type { ConfigProvider } from "../config/loader.js";
import type { Actor } from "../workflow/model.js";
import type { Authorizer, ProjectRole } from "./types.js";

function normalize(entry: string): string {
  return entry.trim().replace(/^@/, "").toLowerCase();
}

/**
 * 配置项可以是用户 ID 或用户名（可带 @，忽略大小写）
 */
export function matchesActor(entries: readonly string[], actor: Actor): boolean {
  const id = actor.id.trim();
  const username = normalize(actor.username);
  return entries.some((entry) => {
    if (entry.trim() === id) {
      return true;
    }
    return username.length > 0 && normalize(entry) === username;
  });
}

export class ConfigAuthorizer implements Authorizer {
  constructor(private readonly config: ConfigProvider) {}

  isAuthorized(project: string, actor: Actor, role: ProjectRole): boolean {
    const projectConfig = this.config.project(project);
    if (!projectConfig) {
      return false;
    }
    const entries = role === "approver" ? projectConfig.approvers : projectConfig.ops;
    return matchesActor(entries, actor);
  }
}
