import { Command, Flags } from "@oclif/core";

import { APPROVAL_STATES } from "../../../workflow/model.js";
import { describeError, formatWorkflowLine, sharedFlags, withShipgate } from "../../support/shipgate.js";

export default class WorkflowsList extends Command {
  static override summary = "列出工作流";

  static override description = "按创建时间列出工作流，可按项目、审批状态、是否已完成过滤。";

  static override flags = {
    ...sharedFlags,
    project: Flags.string({ description: "项目名" }),
    state: Flags.string({ description: "审批状态", options: [...APPROVAL_STATES] }),
    settled: Flags.boolean({ description: "只看已得出结果的（--no-settled 只看未完成的）", allowNo: true }),
    limit: Flags.integer({ description: "最多显示条数（取最新的）", min: 1 })
  } as const;

  override async run(): Promise<void> {
    const { flags } = await this.parse(WorkflowsList);
    const state = APPROVAL_STATES.find((candidate) => candidate === flags.state);

    try {
      const workflows = await withShipgate(flags, (container) =>
        container.resolve("engine").listWorkflows({
          project: flags.project,
          approval: state,
          settled: flags.settled
        })
      );
      const shown = flags.limit ? workflows.slice(-flags.limit) : workflows;
      if (shown.length === 0) {
        this.log("没有匹配的工作流。");
        return;
      }
      for (const workflow of shown) {
        this.log(formatWorkflowLine(workflow));
      }
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
  }
}
