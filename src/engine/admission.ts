import pLimit from "p-limit";

import { createLoggerFacade } from "../shared/logging/logger.js";
import type { BackendKind } from "../workflow/model.js";

export type ReleaseSlot = () => void;

export type CeilingResolver = (project: string, backend: BackendKind) => number;

interface Gate {
  ceiling: number;
  limit: ReturnType<typeof pLimit>;
}

const logger = createLoggerFacade("engine.admission");

const noop: ReleaseSlot = () => {};

/**
 * 按 (项目, 后端) 的 FIFO 计数闸门
 *
 * acquire() 在拿到槽位后返回释放函数，槽位一直占用到调用方释放
 * （提交失败时立即释放，提交成功则在监控结束时释放）。claim() 供恢复的提交占位。
 * 上限为 0 表示不限。
 */
export class AdmissionController {
  private readonly gates = new Map<string, Gate>();

  constructor(private readonly ceilingOf: CeilingResolver) {}

  acquire(project: string, backend: BackendKind): Promise<ReleaseSlot> {
    const gate = this.gateFor(project, backend);
    if (!gate) {
      return Promise.resolve(noop);
    }
    if (gate.limit.activeCount >= gate.ceiling) {
      logger.info("Waiting for build slot", {
        project,
        backend,
        ceiling: gate.ceiling,
        queued: gate.limit.pendingCount + 1
      });
    }
    return new Promise<ReleaseSlot>((resolveAcquire) => {
      gate
        .limit(
          () =>
            new Promise<void>((freeSlot) => {
              resolveAcquire(once(freeSlot));
            })
        )
        .catch((error: unknown) => {
          logger.error("Admission gate failed", error, { project, backend });
        });
    });
  }

  /**
   * 为已经在后端运行的构建（重启后恢复的提交）占位，不等待。
   * 占位排在闸门队列里：槽位空闲时立即生效，否则排在此后的 acquire() 之前，
   * 新提交要等它释放后才能进入。
   */
  claim(project: string, backend: BackendKind): ReleaseSlot {
    const gate = this.gateFor(project, backend);
    if (!gate) {
      return noop;
    }
    let released = false;
    let freeSlot: (() => void) | null = null;
    gate
      .limit(
        () =>
          new Promise<void>((free) => {
            if (released) {
              free();
            } else {
              freeSlot = free;
            }
          })
      )
      .catch((error: unknown) => {
        logger.error("Admission gate failed", error, { project, backend });
      });
    return once(() => {
      released = true;
      freeSlot?.();
    });
  }

  activeCount(project: string, backend: BackendKind): number {
    return this.gates.get(gateKey(project, backend))?.limit.activeCount ?? 0;
  }

  pendingCount(project: string, backend: BackendKind): number {
    return this.gates.get(gateKey(project, backend))?.limit.pendingCount ?? 0;
  }

  private gateFor(project: string, backend: BackendKind): Gate | null {
    const ceiling = this.ceilingOf(project, backend);
    if (ceiling <= 0) {
      return null;
    }
    const key = gateKey(project, backend);
    const existing = this.gates.get(key);
    if (existing && existing.ceiling === ceiling) {
      return existing;
    }
    // 上限变化后新请求走新闸门，旧闸门上的持有者照常释放
    const gate: Gate = { ceiling, limit: pLimit(ceiling) };
    this.gates.set(key, gate);
    return gate;
  }
}

function gateKey(project: string, backend: BackendKind): string {
  return `${project}:${backend}`;
}

function once(fn: () => void): ReleaseSlot {
  let called = false;
  return () => {
    if (called) {
      return;
    }
    called = true;
    fn();
  };
}
