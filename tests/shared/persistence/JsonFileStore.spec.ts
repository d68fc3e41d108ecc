import { mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";

import { JsonFileStore, JsonFileStoreError } from "../../../src/shared/persistence/JsonFileStore.js";

const ReleaseSchema = z.object({
  id: z.string().min(1),
  project: z.string(),
  state: z.enum(["open", "approved", "rejected"]),
  attempts: z.number().int().nonnegative()
});

type Release = z.infer<typeof ReleaseSchema>;

class ReleaseStore extends JsonFileStore<Release> {
  constructor(directory: string) {
    super({ directory, schema: ReleaseSchema, idField: "id", logCategory: "store.releases" });
  }

  classify(error: Error): boolean {
    return this.isTransientError({ error, attemptNumber: 1, retriesLeft: 1 });
  }
}

function release(id: string, overrides: Partial<Release> = {}): Release {
  return { id, project: "shop", state: "open", attempts: 0, ...overrides };
}

function fsError(code: string): Error {
  return Object.assign(new Error(code), { code });
}

describe("JsonFileStore", () => {
  let directory: string;
  let store: ReleaseStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "shipgate-jsonstore-"));
    store = new ReleaseStore(directory);
    await store.initialize();
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("initialize creates nested directories", async () => {
    const nested = join(directory, "state", "releases");
    await new ReleaseStore(nested).initialize();

    expect((await stat(nested)).isDirectory()).toBe(true);
  });

  describe("create / read", () => {
    it("writes one pretty-printed file per entity", async () => {
      await store.create(release("r-1"));

      const raw = await readFile(join(directory, "r-1.json"), "utf-8");
      expect(raw).toBe(`${JSON.stringify(release("r-1"), null, 2)}\n`);
      expect(await store.read("r-1")).toEqual(release("r-1"));
    });

    it("refuses to overwrite an existing entity", async () => {
      await store.create(release("r-1"));

      await expect(store.create(release("r-1", { attempts: 5 }))).rejects.toMatchObject({
        code: "entity_exists"
      });
      expect((await store.read("r-1"))?.attempts).toBe(0);
    });

    it("rejects entities the schema does not accept", async () => {
      await expect(store.create(release("r-1", { attempts: -1 }))).rejects.toMatchObject({
        code: "validation_failed"
      });
      expect(await readdir(directory)).toEqual([]);
    });

    it("rejects an empty id", async () => {
      await expect(store.create(release(""))).rejects.toBeInstanceOf(JsonFileStoreError);
    });

    it("returns null for unknown ids", async () => {
      expect(await store.read("missing")).toBeNull();
    });

    it("reports corrupt files as read failures", async () => {
      await writeFile(join(directory, "broken.json"), "{ not json", "utf-8");

      await expect(store.read("broken")).rejects.toMatchObject({ code: "read_failed" });
    });
  });

  describe("file names", () => {
    it("replaces separators so ids cannot escape the directory", async () => {
      await store.create(release("wf-1:jenkins:../a/b"));

      expect(await readdir(directory)).toEqual(["wf-1_jenkins____a_b.json"]);
      expect((await store.read("wf-1:jenkins:../a/b"))?.project).toBe("shop");
    });

    it("keeps non-Latin letters", async () => {
      await store.create(release("商城", { project: "商城" }));

      expect(await readdir(directory)).toEqual(["商城.json"]);
    });

    it("truncates long ids to 160 characters", async () => {
      await store.create(release("r".repeat(200)));

      expect(await readdir(directory)).toEqual([`${"r".repeat(160)}.json`]);
    });
  });

  describe("update", () => {
    it("replaces an existing entity", async () => {
      await store.create(release("r-1"));

      await store.update("r-1", release("r-1", { state: "approved" }));

      expect((await store.read("r-1"))?.state).toBe("approved");
    });

    it("fails for unknown ids", async () => {
      await expect(store.update("r-9", release("r-9"))).rejects.toMatchObject({ code: "entity_not_found" });
    });

    it("fails when the entity id differs from the target", async () => {
      await store.create(release("r-1"));

      await expect(store.update("r-1", release("r-2"))).rejects.toMatchObject({ code: "id_mismatch" });
    });
  });

  describe("mutate", () => {
    it("writes and returns the changed entity", async () => {
      await store.create(release("r-1"));

      const next = await store.mutate("r-1", (current) => ({ ...current, attempts: current.attempts + 1 }));

      expect(next?.attempts).toBe(1);
      expect((await store.read("r-1"))?.attempts).toBe(1);
    });

    it("writes nothing when the change returns null", async () => {
      await store.create(release("r-1"));
      const before = await readFile(join(directory, "r-1.json"), "utf-8");

      expect(await store.mutate("r-1", () => null)).toBeNull();
      expect(await readFile(join(directory, "r-1.json"), "utf-8")).toBe(before);
    });

    it("serializes concurrent read-modify-write on one id", async () => {
      await store.create(release("r-1"));

      await Promise.all(
        Array.from({ length: 25 }, () =>
          store.mutate("r-1", (current) => ({ ...current, attempts: current.attempts + 1 }))
        )
      );

      expect((await store.read("r-1"))?.attempts).toBe(25);
    });

    it("lets exactly one compare-and-set win", async () => {
      await store.create(release("r-1"));

      const results = await Promise.all(
        (["approved", "rejected", "approved"] as const).map((state) =>
          store.mutate("r-1", (current) => (current.state === "open" ? { ...current, state } : null))
        )
      );

      expect(results.filter((result) => result !== null)).toHaveLength(1);
      expect(results[0]?.state).toBe("approved");
    });

    it("fails for unknown ids", async () => {
      await expect(store.mutate("r-9", (current) => current)).rejects.toMatchObject({
        code: "entity_not_found"
      });
    });

    it("refuses to move an entity to another id", async () => {
      await store.create(release("r-1"));

      await expect(store.mutate("r-1", (current) => ({ ...current, id: "r-2" }))).rejects.toMatchObject({
        code: "id_mismatch"
      });
    });
  });

  describe("delete / list", () => {
    it("removes the file", async () => {
      await store.create(release("r-1"));

      await store.delete("r-1");

      expect(await store.read("r-1")).toBeNull();
      expect(await readdir(directory)).toEqual([]);
    });

    it("fails for unknown ids", async () => {
      await expect(store.delete("r-9")).rejects.toMatchObject({ code: "entity_not_found" });
    });

    it("can recreate an id after deleting it", async () => {
      await store.create(release("r-1"));
      await store.delete("r-1");

      await store.create(release("r-1", { attempts: 3 }));

      expect((await store.read("r-1"))?.attempts).toBe(3);
    });

    it("lists valid entities in file name order and skips the rest", async () => {
      await Promise.all(["r-3", "r-1", "r-2"].map((id) => store.create(release(id))));
      await writeFile(join(directory, "r-0.json"), "{ bad", "utf-8");
      await writeFile(join(directory, "r-4.json"), JSON.stringify({ id: "r-4" }), "utf-8");
      await writeFile(join(directory, "notes.txt"), "ignored", "utf-8");

      const listed = await store.list();

      expect(listed.map((entity) => entity.id)).toEqual(["r-1", "r-2", "r-3"]);
    });

    it("lists nothing in a directory that does not exist yet", async () => {
      expect(await new ReleaseStore(join(directory, "later")).list()).toEqual([]);
    });
  });

  describe("transient errors", () => {
    it("retries busy and exhausted-descriptor failures", () => {
      expect(store.classify(fsError("EBUSY"))).toBe(true);
      expect(store.classify(fsError("EMFILE"))).toBe(true);
    });

    it("looks through store errors at their cause", () => {
      expect(store.classify(new JsonFileStoreError("Atomic write failed", "write_failed", fsError("EAGAIN")))).toBe(
        true
      );
      expect(store.classify(new JsonFileStoreError("Failed to read", "read_failed", fsError("ENOENT")))).toBe(false);
    });

    it("does not retry validation failures or plain errors", () => {
      expect(store.classify(new JsonFileStoreError("Entity validation failed", "validation_failed"))).toBe(false);
      expect(store.classify(new Error("boom"))).toBe(false);
    });
  });
});
