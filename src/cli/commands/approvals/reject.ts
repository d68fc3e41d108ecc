import { Args, Command, Flags } from "@oclif/core";

import { describeError, sharedFlags, withShipgate } from "../../support/shipgate.js";

export default class ApprovalsReject extends Command {
  static summary = "拒绝发版工作流";

  static description = "以给定身份拒绝工作流，并向发起会话发送拒绝通知。";

  static args = {
    id: Args.string({ description: "工作流 ID", required: true })
  } as const;

  static flags = {
    ...sharedFlags,
    "actor-id": Flags.string({ description: "审批人 ID", required: true }),
    "actor-name": Flags.string({ description: "审批人用户名", default: "" }),
    comment: Flags.string({ description: "拒绝理由" })
  } as const;

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ApprovalsReject);

    try {
      await withShipgate(flags, async (container) => {
        await container
          .resolve("engine")
          .decide(args.id, "Reject", { id: flags["actor-id"], username: flags["actor-name"] }, flags.comment);
      });
      this.log(`已拒绝：${args.id}`);
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
  }
}
