import { join } from "node:path";

import pino, { type Logger } from "pino";

import { getShipgateLogsDirectory } from "../environment/pathResolver.js";
import type { LogEventCategory, LogEventLevel, LogsAppendedPayload } from "./events.js";

export type LogPublisher = (payload: LogsAppendedPayload) => void;

// 全部进程共用一个 JSONL 文件：<home>/logs/app.jsonl
const root: Logger = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination({ dest: join(getShipgateLogsDirectory(), "app.jsonl"), mkdir: true, sync: false })
);

let publisher: LogPublisher | null = null;

export function setLogEventPublisher(next: LogPublisher | null): void {
  publisher = next;
}

export interface LoggerContext {
  workflowId?: string;
  project?: string;
  backend?: string;
  /**
   * 显式指定事件流；缺省按类别前缀推断
   */
  stream?: LogEventCategory;
  [key: string]: unknown;
}

export interface LoggerFacade {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

const STREAM_PREFIXES: ReadonlyArray<readonly [string, LogEventCategory]> = [
  ["engine", "engine"],
  ["dispatcher", "engine"],
  ["monitor", "engine"],
  ["notifier", "engine"],
  ["backend", "backend"],
  ["chat", "backend"],
  ["store", "store"],
  ["retention", "store"]
];

function streamFor(category: string): LogEventCategory {
  const lower = category.toLowerCase();
  return STREAM_PREFIXES.find(([prefix]) => lower.startsWith(prefix))?.[1] ?? "app";
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

/**
 * 按类别创建日志门面：写 pino 子 logger，同时转发给已注册的发布者
 */
export function createLoggerFacade(category: string, context: LoggerContext = {}): LoggerFacade {
  const { stream, ...fields } = context;
  const child = root.child({ category, ...fields });
  const resolvedStream = stream ?? streamFor(category);
  const baseContext: Record<string, unknown> = { ...fields, category };

  const write = (level: LogEventLevel, message: string, extra: Record<string, unknown>): void => {
    child[level](extra, message);
    publisher?.({
      category: resolvedStream,
      level,
      message,
      context: Object.keys(extra).length > 0 ? { ...baseContext, ...extra } : baseContext
    });
  };

  return {
    debug: (message, extra = {}) => write("debug", message, extra),
    info: (message, extra = {}) => write("info", message, extra),
    warn: (message, extra = {}) => write("warn", message, extra),
    error: (message, error, extra = {}) =>
      write("error", message, error === undefined || error === null ? extra : { ...extra, error: serializeError(error) })
  };
}
