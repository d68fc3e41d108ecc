import { Command } from "@oclif/core";

import { ConfigProvider } from "../../../config/loader.js";
import { OverridesRepository } from "../../../config/OverridesRepository.js";
import { describeProjectConfig } from "../../../config/describe.js";
import { describeError, sharedFlags } from "../../support/shipgate.js";

export default class ConfigCheck extends Command {
  static summary = "校验配置文件并输出各项目概要";

  static description = "读取配置与覆盖项，校验失败时以非零状态退出；输出每个项目启用的后端、审批人与运维数量以及需要注意的问题。";

  static flags = {
    ...sharedFlags
  } as const;

  async run(): Promise<void> {
    const { flags } = await this.parse(ConfigCheck);
    const provider = new ConfigProvider({ filePath: flags.config, overrides: new OverridesRepository() });

    let warnings = 0;
    try {
      const config = await provider.load();
      this.log(`配置文件：${provider.path ?? "<inline>"}`);
      const names = Object.keys(config.projects);
      if (names.length === 0) {
        this.warn("未配置任何项目");
        return;
      }
      for (const name of names) {
        const summary = describeProjectConfig(name, config.projects[name]);
        this.log(summary.line);
        for (const issue of summary.issues) {
          warnings += 1;
          this.warn(`${name}: ${issue}`);
        }
      }
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
    this.log(warnings === 0 ? "配置检查通过" : `配置检查完成，${warnings} 个提示`);
  }
}
