import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { FileStore, MemoryStore, getPermutationStore, ruleDifference } from "./store";
import { AlreadyExistsError, CorruptStateError } from "@/engine/errors";
import { makeState, testConfig } from "@/engine/testing/fixtures";

describe("ruleDifference", () => {
  it("ignores created_at and names the first differing field", () => {
    const a = makeState("p1");
    expect(ruleDifference(a, { ...a, created_at: "2030-01-01T00:00:00.000Z" })).toBeNull();
    expect(ruleDifference(a, { ...a, seed: "other" })).toBe("seed");
    expect(ruleDifference(a, { ...a, permutation: a.permutation.slice().reverse() })).toBe("permutation");
  });
});

describe("MemoryStore", () => {
  it("returns null for unknown participants", async () => {
    expect(await new MemoryStore().load("nobody")).toBeNull();
  });

  it("saves once, accepts an identical save and refuses a different one", async () => {
    const store = new MemoryStore();
    const state = makeState("p1");
    expect(await store.save(state)).toBe("created");
    expect(await store.save({ ...state, created_at: "2031-01-01T00:00:00.000Z" })).toBe("unchanged");
    await expect(store.save({ ...state, seed: "tampered" })).rejects.toThrow(AlreadyExistsError);
    expect(await store.load("p1")).toEqual(state);
  });

  it("hands out copies", async () => {
    const store = new MemoryStore();
    await store.save(makeState("p1"));
    const loaded = await store.load("p1");
    loaded?.permutation.reverse();
    expect(await store.load("p1")).toEqual(makeState("p1"));
  });
});

describe("FileStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "scramble-store-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates participant 42 once and loads the identical record afterwards", async () => {
    const config = testConfig({ rule: { numObjects: 6 } });
    const first = await new FileStore(dir).loadOrCreate("42", () => makeState("42", config));
    expect(first.created).toBe(true);
    expect(first.state.num_objects).toBe(6);

    // a later process: fresh store instance, and a creator that must not be used
    const second = await new FileStore(dir).loadOrCreate("42", () => makeState("42", testConfig()));
    expect(second.created).toBe(false);
    expect(second.state).toEqual(first.state);
  });

  it("writes one pretty-printed JSON document per participant", async () => {
    const store = new FileStore(dir);
    const state = makeState("p7");
    await store.save(state);
    const text = await fs.readFile(path.join(dir, "participants", "participant_p7.json"), "utf8");
    expect(text).toBe(JSON.stringify(state, null, 2) + "\n");
  });

  it("refuses to overwrite a different record and leaves no temp files behind", async () => {
    const store = new FileStore(dir);
    const state = makeState("p1");
    await store.save(state);
    expect(await store.save({ ...state, created_at: "2040-01-01T00:00:00.000Z" })).toBe("unchanged");
    await expect(store.save({ ...state, mode: "canonical" })).rejects.toThrow(AlreadyExistsError);
    expect(await fs.readdir(path.join(dir, "participants"))).toEqual(["participant_p1.json"]);
    expect(await store.load("p1")).toEqual(state);
  });

  it("lets exactly one of two concurrent creators win", async () => {
    const state = makeState("p3");
    const [a, b] = await Promise.all([
      new FileStore(dir).loadOrCreate("p3", () => state),
      new FileStore(dir).loadOrCreate("p3", () => state),
    ]);
    expect([a.created, b.created].filter(Boolean)).toHaveLength(1);
    expect(a.state).toEqual(b.state);
  });

  it("raises CorruptStateError for unreadable or invalid records", async () => {
    const store = new FileStore(dir);
    await fs.mkdir(store.dir, { recursive: true });

    await fs.writeFile(store.fileFor("bad"), "{ not json", "utf8");
    await expect(store.load("bad")).rejects.toThrow(CorruptStateError);

    await fs.writeFile(store.fileFor("thin"), JSON.stringify({ participant_id: "thin" }), "utf8");
    await expect(store.load("thin")).rejects.toThrow(CorruptStateError);

    // never silently regenerated
    await expect(store.loadOrCreate("bad", () => makeState("bad"))).rejects.toThrow(CorruptStateError);
  });

  it("is chosen by backend name", () => {
    expect(getPermutationStore({ backend: "file", dataDir: dir })).toBeInstanceOf(FileStore);
    expect(getPermutationStore({ backend: "memory", dataDir: dir })).toBeInstanceOf(MemoryStore);
  });
});
