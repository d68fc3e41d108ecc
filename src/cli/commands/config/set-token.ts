import { Args, Command, Flags } from "@oclif/core";

import { OverridesRepository } from "../../../config/OverridesRepository.js";
import type { ProjectOverride } from "../../../config/schema.js";
import { describeError } from "../../support/shipgate.js";

export default class ConfigSetToken extends Command {
  static summary = "更新项目的后端凭据";

  static description =
    "把轮换后的 SSO / Jenkins 凭据写入项目覆盖项（<home>/state/overrides），下次加载配置时叠加到配置文件之上。";

  static args = {
    project: Args.string({ description: "项目名", required: true })
  } as const;

  static flags = {
    "sso-auth-token": Flags.string({ description: "SSO Auth-token" }),
    "sso-authorization": Flags.string({ description: "SSO Authorization" }),
    "jenkins-api-token": Flags.string({ description: "Jenkins API token" })
  } as const;

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ConfigSetToken);
    const override: ProjectOverride = { project: args.project, updatedAt: new Date().toISOString() };

    if (flags["sso-auth-token"] !== undefined || flags["sso-authorization"] !== undefined) {
      override.sso = {
        ...(flags["sso-auth-token"] !== undefined ? { authToken: flags["sso-auth-token"] } : {}),
        ...(flags["sso-authorization"] !== undefined ? { authorization: flags["sso-authorization"] } : {})
      };
    }
    if (flags["jenkins-api-token"] !== undefined) {
      override.jenkins = { apiToken: flags["jenkins-api-token"] };
    }
    if (!override.sso && !override.jenkins) {
      this.error("至少需要提供一个凭据参数", { exit: 2 });
    }

    try {
      const repository = new OverridesRepository();
      await repository.initialize();
      await repository.upsert(override);
      this.log(`已更新 ${args.project} 的凭据覆盖项`);
    } catch (error) {
      this.error(describeError(error), { exit: 1 });
    }
  }
}
