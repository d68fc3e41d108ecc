import { JsonFileStore } from "../shared/persistence/JsonFileStore.js";
import { joinStatePath } from "../shared/environment/pathResolver.js";
import { ProjectOverrideSchema, type ProjectOverride } from "./schema.js";

export interface OverridesRepositoryOptions {
  /**
   * 存储目录，默认 <home>/state/overrides
   */
  directory?: string;
}

/**
 * 项目级配置覆盖，每个项目一个文件（例如轮换后的 SSO token）
 */
export class OverridesRepository extends JsonFileStore<ProjectOverride> {
  constructor(options: OverridesRepositoryOptions = {}) {
    super({
      directory: options.directory ?? joinStatePath("overrides"),
      schema: ProjectOverrideSchema,
      idField: "project",
      logCategory: "store.overrides"
    });
  }

  /**
   * 合并写入：已有覆盖项时按字段叠加
   */
  async upsert(override: ProjectOverride): Promise<ProjectOverride> {
    const existing = await this.read(override.project);
    if (!existing) {
      return this.create(override);
    }
    return this.update(override.project, {
      project: override.project,
      updatedAt: override.updatedAt,
      sso: existing.sso || override.sso ? { ...existing.sso, ...override.sso } : undefined,
      jenkins:
        existing.jenkins || override.jenkins ? { ...existing.jenkins, ...override.jenkins } : undefined
    });
  }
}
