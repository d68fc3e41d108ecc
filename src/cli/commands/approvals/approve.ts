import { Args, Command, Flags } from "@oclif/core";

import { describeError, sharedFlags, withShipgate } from "../../support/shipgate.js";

export default class ApprovalsApprove extends Command {
  static summary = "通过发版工作流并提交构建";

  static description =
    "以给定身份审批通过工作流，随后向项目启用的构建后端提交构建。默认在提交完成后退出，构建由 monitor:resume 继续跟踪；--wait 时等待所有构建结束。";

  static args = {
    id: Args.string({ description: "工作流 ID", required: true })
  } as const;

  static flags = {
    ...sharedFlags,
    "actor-id": Flags.string({ description: "审批人 ID", required: true }),
    "actor-name": Flags.string({ description: "审批人用户名", default: "" }),
    comment: Flags.string({ description: "审批意见" }),
    wait: Flags.boolean({ description: "等待构建全部结束", default: false })
  } as const;

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ApprovalsApprove);

    try {
      await withShipgate(flags, async (container) => {
        const engine = container.resolve("engine");
        const outcome = await engine.decide(
          args.id,
          "Approve",
          { id: flags["actor-id"], username: flags["actor-name"] },
          flags.comment
        );
        this.log(`已通过：${args.id}`);

        const report = outcome.dispatch ? await outcome.dispatch : null;
        if (!report) {
          this.log("构建提交失败，详见日志");
          return;
        }
        this.log(`已提交 ${report.accepted.length} 个构建，失败 ${report.failures.length} 个`);
        if (flags.wait && report.accepted.length > 0) {
          await engine.idle();
          const { workflow } = await engine.getWorkflow(args.id);
          this.log(`结果：${workflow.composite?.state ?? "未完成"}`);
        }
      });
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
  }
}
