export type LogEventCategory = "app" | "engine" | "backend" | "store";
export type LogEventLevel = "debug" | "info" | "warn" | "error";

/**
 * 每条经 facade 写出的日志都会以此形状转发给发布者（CLI 的 --verbose 用它回显）
 */
export interface LogsAppendedPayload {
  readonly category: LogEventCategory;
  readonly level: LogEventLevel;
  readonly message: string;
  readonly context?: Record<string, unknown>;
}
