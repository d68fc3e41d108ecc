import { Command, Flags } from "@oclif/core";

import { describeError, sharedFlags, withShipgate } from "../../support/shipgate.js";

export default class RetentionPurge extends Command {
  static summary = "删除过期工作流";

  static description = "删除创建时间早于保留期（retentionDays）的工作流及其构建记录。";

  static flags = {
    ...sharedFlags,
    "dry-run": Flags.boolean({ description: "只列出将被删除的工作流", default: false })
  } as const;

  async run(): Promise<void> {
    const { flags } = await this.parse(RetentionPurge);

    try {
      await withShipgate(flags, async (container) => {
        const retention = container.resolve("retention");
        if (flags["dry-run"]) {
          const cutoff = retention.cutoffFor();
          const expired = await container.resolve("store").listExpired(cutoff);
          this.log(`截止 ${cutoff.toISOString()}，共 ${expired.length} 个过期工作流`);
          for (const workflow of expired) {
            this.log(`- ${workflow.id} (${workflow.createdAt})`);
          }
          return;
        }
        const result = await retention.purge();
        this.log(`已删除 ${result.deleted.length} 个工作流（截止 ${result.cutoff}）`);
        if (result.failed.length > 0) {
          this.warn(`删除失败：${result.failed.join(", ")}`);
        }
      });
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
  }
}
