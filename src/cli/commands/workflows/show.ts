import { Args, Command } from "@oclif/core";

import { describeError, formatWorkflowDetail, sharedFlags, withShipgate } from "../../support/shipgate.js";

export default class WorkflowsShow extends Command {
  static summary = "查看工作流详情与各构建状态";

  static args = {
    id: Args.string({ description: "工作流 ID", required: true })
  } as const;

  static flags = {
    ...sharedFlags
  } as const;

  async run(): Promise<void> {
    const { args, flags } = await this.parse(WorkflowsShow);

    try {
      const view = await withShipgate(flags, (container) => container.resolve("engine").getWorkflow(args.id));
      for (const line of formatWorkflowDetail(view.workflow, view.submissions)) {
        this.log(line);
      }
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
  }
}
