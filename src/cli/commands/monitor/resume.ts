import { Command, Flags } from "@oclif/core";

import type { SettledWorkflow } from "../../../engine/completion.js";
import type { SubmissionStatusEvent } from "../../../engine/monitor.js";
import { describeError, sharedFlags, withShipgate } from "../../support/shipgate.js";

export default class MonitorResume extends Command {
  static summary = "恢复对未完成构建的监控";

  static description =
    "从存储中找出所有未到终态的构建继续轮询，并补完已全部终态但尚无结果的工作流；直到所有监控结束后退出。";

  static flags = {
    ...sharedFlags,
    detach: Flags.boolean({ description: "只做恢复与补完，不等待监控结束", default: false })
  } as const;

  async run(): Promise<void> {
    const { flags } = await this.parse(MonitorResume);

    try {
      await withShipgate(flags, async (container) => {
        const engine = container.resolve("engine");
        engine.on("submission.status", (event: SubmissionStatusEvent) => {
          this.log(`${event.workflowId} ${event.backend}/${event.service}: ${event.from} -> ${event.to}`);
        });
        engine.on("workflow.settled", (event: SettledWorkflow) => {
          this.log(`${event.workflowId} 完成：${event.composite}`);
        });

        const { resumed, settled } = await engine.start({ retention: false });
        this.log(`恢复监控 ${resumed} 个构建，补完 ${settled} 个工作流`);
        if (!flags.detach) {
          await engine.idle();
        }
      });
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
  }
}
