import { JsonFileStore } from "../../shared/persistence/JsonFileStore.js";
import { joinStatePath } from "../../shared/environment/pathResolver.js";
import { WorkflowRecordSchema, type WorkflowRecord } from "../model.js";

export interface WorkflowsRepositoryOptions {
  /**
   * 存储目录，默认 <home>/state/workflows
   */
  directory?: string;
}

/**
 * 工作流记录仓库，每个工作流一个 JSON 文件
 */
export class WorkflowsRepository extends JsonFileStore<WorkflowRecord> {
  constructor(options: WorkflowsRepositoryOptions = {}) {
    super({
      directory: options.directory ?? joinStatePath("workflows"),
      schema: WorkflowRecordSchema,
      idField: "id",
      logCategory: "store.workflows"
    });
  }

  async findByProject(project: string): Promise<WorkflowRecord[]> {
    const all = await this.list();
    return all.filter((workflow) => workflow.project === project);
  }

  /**
   * createdAt 早于 cutoff 的记录
   */
  async findCreatedBefore(cutoff: Date): Promise<WorkflowRecord[]> {
    const threshold = cutoff.getTime();
    const all = await this.list();
    return all.filter((workflow) => Date.parse(workflow.createdAt) < threshold);
  }
}
