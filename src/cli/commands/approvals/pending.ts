import { Command, Flags } from "@oclif/core";

import { describeError, formatWorkflowLine, sharedFlags, withShipgate } from "../../support/shipgate.js";

export default class ApprovalsPending extends Command {
  static override summary = "列出待审批的工作流";

  static override flags = {
    ...sharedFlags,
    project: Flags.string({ description: "只看指定项目" })
  } as const;

  override async run(): Promise<void> {
    const { flags } = await this.parse(ApprovalsPending);

    try {
      const pending = await withShipgate(flags, (container) =>
        container.resolve("engine").listWorkflows({ project: flags.project, approval: "PendingApproval" })
      );
      if (pending.length === 0) {
        this.log("暂无待审批工作流。");
        return;
      }
      for (const workflow of pending) {
        this.log(formatWorkflowLine(workflow));
      }
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
  }
}
