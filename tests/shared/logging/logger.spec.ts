import { afterEach, describe, expect, it } from "vitest";

import { createLoggerFacade, setLogEventPublisher } from "../../../src/shared/logging/logger.js";
import type { LogsAppendedPayload } from "../../../src/shared/logging/events.js";

describe("logging facade", () => {
  const captured: LogsAppendedPayload[] = [];

  afterEach(() => {
    captured.length = 0;
    setLogEventPublisher(null);
  });

  function capture() {
    setLogEventPublisher((payload) => {
      captured.push(payload);
    });
  }

  it("maps category prefixes to event streams", () => {
    capture();
    createLoggerFacade("dispatcher").info("a");
    createLoggerFacade("backend.jenkins").info("b");
    createLoggerFacade("store.workflows").info("c");
    createLoggerFacade("retention").info("d");
    createLoggerFacade("cli").info("e");

    expect(captured.map((payload) => payload.category)).toEqual(["engine", "backend", "store", "store", "app"]);
  });

  it("allows explicit stream override", () => {
    capture();
    createLoggerFacade("custom-category", { stream: "engine" }).info("override");
    expect(captured.at(-1)?.category).toBe("engine");
  });

  it("merges base context with per-call context", () => {
    capture();
    const facade = createLoggerFacade("monitor", { workflowId: "wf-1" });
    facade.warn("slow", { attempt: 2 });

    expect(captured.at(-1)).toEqual({
      category: "engine",
      level: "warn",
      message: "slow",
      context: { workflowId: "wf-1", category: "monitor", attempt: 2 }
    });
  });

  it("serializes errors into the context", () => {
    capture();
    createLoggerFacade("notifier").error("failed", new Error("boom"), { chatId: "-1" });

    const context = captured.at(-1)?.context ?? {};
    expect(context.chatId).toBe("-1");
    expect(context.error).toMatchObject({ name: "Error", message: "boom" });
  });

  it("leaves the error field out when no error is given", () => {
    capture();
    createLoggerFacade("store.overrides").error("gave up", undefined, { project: "shop" });

    expect(captured.at(-1)).toEqual({
      category: "store",
      level: "error",
      message: "gave up",
      context: { category: "store.overrides", project: "shop" }
    });
  });

  it("publishes debug events even when pino filters the level", () => {
    capture();
    createLoggerFacade("backend.sso").debug("token cached");

    expect(captured.at(-1)).toEqual({
      category: "backend",
      level: "debug",
      message: "token cached",
      context: { category: "backend.sso" }
    });
  });

  it("publishes nothing without a publisher", () => {
    createLoggerFacade("engine").info("quiet");
    expect(captured).toEqual([]);
  });
});
