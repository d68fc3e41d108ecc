import { describe, expect, it } from "vitest";

import { ConfigProvider } from "../../src/config/loader.js";
import { Notifier } from "../../src/engine/notifier.js";
import type { DispatchFailure } from "../../src/workflow/model.js";
import { RecordingChat } from "../support/fakes.js";
import { makeConfig, makeSubmission, makeWorkflow } from "../support/fixtures.js";

const failure: DispatchFailure = {
  backend: "jenkins",
  service: "web",
  error: "boom",
  failedAt: "2026-01-10T09:00:00.000Z"
};

function setup(config = makeConfig()) {
  const chat = new RecordingChat();
  const notifier = new Notifier(chat, ConfigProvider.fromValue(config));
  return { chat, notifier };
}

describe("Notifier", () => {
  it("always mentions ops when nothing could be dispatched", () => {
    const { notifier } = setup();

    expect(notifier.mentionsFor(makeWorkflow(), { type: "DispatchFailed", failures: [failure] })).toEqual([
      "oncall"
    ]);
  });

  it("mentions ops on terminal summaries only for watched statuses", () => {
    const { notifier } = setup();
    const terminal = (status: "Success" | "Failure" | "Unstable") => ({
      type: "BuildTerminal" as const,
      composite: "PartiallyFailed" as const,
      submissions: [makeSubmission({ status: "Success" }), makeSubmission({ service: "web", status })],
      failures: []
    });

    expect(notifier.mentionsFor(makeWorkflow(), terminal("Failure"))).toEqual(["oncall"]);
    expect(notifier.mentionsFor(makeWorkflow(), terminal("Unstable"))).toEqual([]);
    expect(notifier.mentionsFor(makeWorkflow(), terminal("Success"))).toEqual([]);
  });

  it("follows a custom notifyOpsOn list", () => {
    const { notifier } = setup(makeConfig({ notifyOpsOn: ["Unstable"] }));

    const mentions = notifier.mentionsFor(makeWorkflow(), {
      type: "BuildTerminal",
      composite: "PartiallyFailed",
      submissions: [makeSubmission({ status: "Unstable" })],
      failures: []
    });

    expect(mentions).toEqual(["oncall"]);
  });

  it("does not mention anyone on submission results or for projects without ops", () => {
    const { notifier } = setup();
    expect(
      notifier.mentionsFor(makeWorkflow(), { type: "SubmissionResult", accepted: [], failures: [failure] })
    ).toEqual([]);

    const { notifier: quiet } = setup(
      makeConfig({ projects: { demo: { approvers: ["lead"] } } })
    );
    expect(quiet.mentionsFor(makeWorkflow(), { type: "DispatchFailed", failures: [failure] })).toEqual([]);
  });

  it("delivers to the originating chat", async () => {
    const { chat, notifier } = setup();

    const delivered = await notifier.notify(makeWorkflow(), { type: "DispatchFailed", failures: [failure] });

    expect(delivered).toBe(true);
    expect(chat.sent).toHaveLength(1);
    expect(chat.sent[0]?.chatId).toBe("-100");
    expect(chat.sent[0]?.mentions).toEqual(["oncall"]);
    expect(chat.sent[0]?.text.startsWith("❌ 构建提交失败\n")).toBe(true);
  });

  it("reports delivery failures without throwing", async () => {
    const { chat, notifier } = setup();
    chat.failSends = true;

    await expect(notifier.notify(makeWorkflow(), { type: "Rejected" })).resolves.toBe(false);
  });

  it("edits the approval message when one is known", async () => {
    const { chat, notifier } = setup();

    await expect(notifier.updateApprovalMessage(makeWorkflow())).resolves.toBe(true);
    await expect(notifier.updateApprovalMessage(makeWorkflow({ approvalMessage: undefined }))).resolves.toBe(
      false
    );

    expect(chat.updated).toHaveLength(1);
    expect(chat.updated[0]).toMatchObject({ chatId: "-100", messageId: "42" });
  });
});
