import type { BuildStatus, CompositeState, SubmissionStatus } from "./model.js";

const TERMINAL: ReadonlySet<SubmissionStatus> = new Set<SubmissionStatus>([
  "Success",
  "Failure",
  "Aborted",
  "Unstable"
]);

const FAILED: ReadonlySet<SubmissionStatus> = new Set<SubmissionStatus>(["Failure", "Aborted"]);

export function isTerminal(status: SubmissionStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * 合法边：Submitted → 任意；Pending → Running；Pending/Running → 终态。
 * 相同状态不算迁移。
 */
export function canTransition(from: SubmissionStatus, to: BuildStatus): boolean {
  if (from === to) {
    return false;
  }
  if (from === "Submitted") {
    return true;
  }
  if (TERMINAL.has(from)) {
    return false;
  }
  if (from === "Pending") {
    return to === "Running" || TERMINAL.has(to);
  }
  // Running
  return TERMINAL.has(to);
}

/**
 * 由全部提交状态计算合成结果，调用方保证均已终态。
 * 存在派发失败时，全部成功降级为 PartiallyFailed；没有任何提交（全部派发失败）为 Failed。
 */
export function computeCompositeState(
  statuses: readonly SubmissionStatus[],
  hasDispatchFailures = false
): CompositeState {
  if (statuses.length === 0) {
    return "Failed";
  }
  if (statuses.every((status) => status === "Success")) {
    return hasDispatchFailures ? "PartiallyFailed" : "Completed";
  }
  if (statuses.every((status) => FAILED.has(status))) {
    return "Failed";
  }
  return "PartiallyFailed";
}
