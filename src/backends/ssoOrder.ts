/**
 * SSO 发版工单（dcAutoReleaseProcess）的请求体
 */

export interface SsoOrderItem {
  project_name: string;
  env: string;
  job_id: string;
  name: string;
  parameters: {
    check_commitID: string;
    action_type: "gray";
    gitBranch: string;
    canRollback: string;
    rollback_ver: string;
  };
}

type DetailField =
  | { status: string }
  | { id: string; name: string; value: string | boolean }
  | {
      id: "application";
      name: string;
      children: SsoOrderItem[][];
      account_data: SsoOrderItem[];
      job_status: boolean;
    };

export interface SsoOrder {
  detail: string;
  draftId: string;
  endType: string;
  processStatus: string;
  publishVersion: string;
  title: string;
  type: "dcAutoReleaseProcess";
  userId: string;
}

export interface SsoOrderInput {
  project: string;
  environment: string;
  jobId: string;
  service: string;
  commitHash: string;
  branch: string;
  releaseNotes: string;
  approver: string;
  userId: string;
  now?: Date;
}

export function buildOrderItem(input: SsoOrderInput): SsoOrderItem {
  return {
    project_name: input.project,
    env: input.environment,
    job_id: input.jobId,
    name: input.service,
    parameters: {
      check_commitID: input.commitHash,
      action_type: "gray",
      gitBranch: input.branch,
      canRollback: "不支持",
      rollback_ver: ""
    }
  };
}

/**
 * 工单 detail 字段需序列化为 JSON 字符串
 */
export function buildSsoOrder(input: SsoOrderInput): SsoOrder {
  const item = buildOrderItem(input);
  const detail: DetailField[][] = [
    [
      { status: "申请详情" },
      { id: "projectName", name: "项目名称", value: input.project },
      { id: "releaseType", name: "发布类型", value: "常规发布" },
      { id: "category", name: "依赖业务", value: "" },
      { id: "environment", name: "上线环境", value: "预发环境" },
      { id: "releaseTime", name: "上线时间", value: formatLocalTime(input.now ?? new Date()) },
      { id: "repository", name: "仓库地址", value: "" },
      { id: "codeBranch", name: "代码分支", value: input.branch },
      { id: "onlineVersion", name: "上线版本", value: input.commitHash },
      { id: "updateContent", name: "更新内容", value: input.releaseNotes },
      { id: "sqlUpdate", name: "SQL更新", value: false },
      { id: "configUpdate", name: "配置文件更新", value: false },
      { id: "rollbackInstructions", name: "回滚说明", value: "" },
      { id: "mainBusiness", name: "是否主线业务", value: false },
      { id: "needTest", name: "是否需要测试", value: false },
      { id: "ifUploadJT", name: "截图审批", value: false },
      {
        id: "application",
        name: "发布应用",
        children: [[item]],
        account_data: [item],
        job_status: true
      },
      { id: "approver", name: "审批人", value: input.approver }
    ]
  ];

  return {
    detail: JSON.stringify(detail),
    draftId: "",
    endType: "0",
    processStatus: "0",
    publishVersion: "0",
    title: `${input.project}预发发版`,
    type: "dcAutoReleaseProcess",
    userId: input.userId
  };
}

// YYYY-MM-DD HH:mm:ss，本地时区
function formatLocalTime(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
