import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FileWorkflowStore } from "../../src/workflow/fileStore.js";
import type { BuildSubmission } from "../../src/workflow/model.js";
import { approver, makeWorkflow } from "../support/fixtures.js";

function makeSubmission(overrides: Partial<BuildSubmission> = {}): BuildSubmission {
  return {
    id: "wf-1:jenkins:api",
    workflowId: "wf-1",
    backend: "jenkins",
    service: "api",
    commitHash: "abc123",
    reference: "UAT/api#7",
    submittedAt: "2026-01-10T08:05:00.000Z",
    status: "Submitted",
    statusHistory: [{ status: "Submitted", observedAt: "2026-01-10T08:05:00.000Z" }],
    ...overrides
  };
}

const key = { workflowId: "wf-1", backend: "jenkins", service: "api" } as const;

describe("FileWorkflowStore", () => {
  let root: string;
  let store: FileWorkflowStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "shipgate-store-"));
    store = new FileWorkflowStore({ directory: root });
    await store.initialize();
    await store.createWorkflow(makeWorkflow());
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("persists one file per workflow", async () => {
    expect(await readdir(join(root, "workflows"))).toEqual(["wf-1.json"]);
    const loaded = await store.getWorkflow("wf-1");
    expect(loaded?.services.map((target) => target.service)).toEqual(["api", "web"]);
    expect(await store.getWorkflow("missing")).toBeNull();
  });

  it("decides at most once under concurrent compare-and-set", async () => {
    const decision = (comment: string) =>
      store.compareAndSetApproval("wf-1", "PendingApproval", {
        state: "Approved",
        decidedBy: approver,
        decidedAt: "2026-01-10T08:01:00.000Z",
        comment
      });

    const results = await Promise.all([decision("first"), decision("second"), decision("third")]);
    const winners = results.filter((result) => result !== null);

    expect(winners).toHaveLength(1);
    const stored = await store.getWorkflow("wf-1");
    expect(stored?.approval.comment).toBe(winners[0]?.approval.comment);
  });

  it("records dispatch phase and failures", async () => {
    await store.setDispatchPhase("wf-1", "Dispatching");
    await store.recordDispatchFailure("wf-1", {
      backend: "sso",
      service: "web",
      error: "boom",
      failedAt: "2026-01-10T08:02:00.000Z"
    });

    const stored = await store.getWorkflow("wf-1");
    expect(stored?.dispatch).toBe("Dispatching");
    expect(stored?.dispatchFailures).toEqual([
      { backend: "sso", service: "web", error: "boom", failedAt: "2026-01-10T08:02:00.000Z" }
    ]);
  });

  it("writes the composite state only once", async () => {
    expect(await store.compareAndSetComposite("wf-1", "Completed", "2026-01-10T09:00:00.000Z")).toBe(true);
    expect(await store.compareAndSetComposite("wf-1", "Failed", "2026-01-10T09:01:00.000Z")).toBe(false);
    expect((await store.getWorkflow("wf-1"))?.composite).toEqual({
      state: "Completed",
      settledAt: "2026-01-10T09:00:00.000Z"
    });
  });

  it("guards status writes with the expected prior status", async () => {
    await store.saveBuildSubmission(makeSubmission());

    const running = await store.updateBuildStatus(key, "Submitted", "Running", {
      observedAt: "2026-01-10T08:06:00.000Z",
      detail: { jobName: "UAT/api" }
    });
    expect(running?.status).toBe("Running");

    // 期望值过期
    const stale = await store.updateBuildStatus(key, "Submitted", "Success", {
      observedAt: "2026-01-10T08:07:00.000Z"
    });
    expect(stale).toBeNull();

    // 回退不合法
    const backwards = await store.updateBuildStatus(key, "Running", "Pending", {
      observedAt: "2026-01-10T08:07:00.000Z"
    });
    expect(backwards).toBeNull();

    const done = await store.updateBuildStatus(key, "Running", "Success", {
      observedAt: "2026-01-10T08:08:00.000Z",
      detail: { durationMs: 90_000 }
    });
    expect(done).toMatchObject({
      status: "Success",
      lastPolledAt: "2026-01-10T08:08:00.000Z",
      detail: { jobName: "UAT/api", durationMs: 90_000 }
    });
    expect(done?.statusHistory.map((entry) => entry.status)).toEqual(["Submitted", "Running", "Success"]);
  });

  it("lists non-terminal submissions and submissions per workflow", async () => {
    await store.saveBuildSubmission(makeSubmission());
    await store.saveBuildSubmission(
      makeSubmission({ id: "wf-1:sso:web", backend: "sso", service: "web", reference: "r-1", status: "Success" })
    );

    expect((await store.listNonTerminalSubmissions()).map((submission) => submission.id)).toEqual([
      "wf-1:jenkins:api"
    ]);
    expect(await store.listSubmissions("wf-1")).toHaveLength(2);
    expect(await store.listSubmissions("other")).toEqual([]);
  });

  it("filters workflows by project, approval and settlement", async () => {
    await store.createWorkflow(
      makeWorkflow({ id: "wf-2", project: "other", createdAt: "2026-01-09T00:00:00.000Z" })
    );
    await store.compareAndSetComposite("wf-1", "Completed", "2026-01-10T09:00:00.000Z");

    expect((await store.listWorkflows()).map((workflow) => workflow.id)).toEqual(["wf-2", "wf-1"]);
    expect((await store.listWorkflows({ project: "other" })).map((workflow) => workflow.id)).toEqual(["wf-2"]);
    expect((await store.listWorkflows({ settled: true })).map((workflow) => workflow.id)).toEqual(["wf-1"]);
    expect((await store.listWorkflows({ approval: "Approved" }))).toEqual([]);
  });

  it("finds expired workflows and deletes them with their submissions", async () => {
    await store.saveBuildSubmission(makeSubmission());
    await store.createWorkflow(makeWorkflow({ id: "wf-new", createdAt: "2026-03-01T00:00:00.000Z" }));

    const expired = await store.listExpired(new Date("2026-02-01T00:00:00.000Z"));
    expect(expired.map((workflow) => workflow.id)).toEqual(["wf-1"]);

    await store.delete("wf-1");
    expect(await store.getWorkflow("wf-1")).toBeNull();
    expect(await store.listSubmissions("wf-1")).toEqual([]);
    expect(await store.getWorkflow("wf-new")).not.toBeNull();
  });
});
