import { JsonFileStore } from "../../shared/persistence/JsonFileStore.js";
import { joinStatePath } from "../../shared/environment/pathResolver.js";
import { BuildSubmissionSchema, type BuildSubmission } from "../model.js";
import { isTerminal } from "../status.js";

export interface SubmissionsRepositoryOptions {
  /**
   * 存储目录，默认 <home>/state/submissions
   */
  directory?: string;
}

/**
 * 构建提交记录仓库，键为 workflowId:backend:service
 */
export class SubmissionsRepository extends JsonFileStore<BuildSubmission> {
  constructor(options: SubmissionsRepositoryOptions = {}) {
    super({
      directory: options.directory ?? joinStatePath("submissions"),
      schema: BuildSubmissionSchema,
      idField: "id",
      logCategory: "store.submissions"
    });
  }

  async findByWorkflow(workflowId: string): Promise<BuildSubmission[]> {
    const all = await this.list();
    return all.filter((submission) => submission.workflowId === workflowId);
  }

  async findNonTerminal(): Promise<BuildSubmission[]> {
    const all = await this.list();
    return all.filter((submission) => !isTerminal(submission.status));
  }
}
