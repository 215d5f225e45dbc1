// engine/session/store.ts
import fs from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import type { PersistedState } from "@/types/experiment";
import { PHASES } from "@/types/experiment";
import { AlreadyExistsError, CorruptStateError } from "@/engine/errors";
import { validatePersistedStateOrThrow } from "@/engine/kernel/validation";

export type SaveOutcome = "created" | "unchanged";

/** Write-once store of per-participant rule state. `load` returns null when nothing exists (NotFound). */
export interface PermutationStore {
  load(participantId: string): Promise<PersistedState | null>;
  save(state: PersistedState): Promise<SaveOutcome>;
  loadOrCreate(participantId: string, create: () => PersistedState): Promise<{ state: PersistedState; created: boolean }>;
}

/** Name of the first rule-bearing field that differs, or null. `created_at` is bookkeeping and never compared. */
export function ruleDifference(a: PersistedState, b: PersistedState): string | null {
  if (a.participant_id !== b.participant_id) return "participant_id";
  if (a.mode !== b.mode) return "mode";
  if (a.num_objects !== b.num_objects) return "num_objects";
  if (a.sequence_count !== b.sequence_count) return "sequence_count";
  if (a.seed !== b.seed) return "seed";
  if (a.permutation.length !== b.permutation.length || a.permutation.some((p, i) => p !== b.permutation[i])) return "permutation";
  for (const phase of PHASES) {
    const x = a.object_assignment[phase];
    const y = b.object_assignment[phase];
    const keys = new Set([...Object.keys(x), ...Object.keys(y)]);
    for (const k of keys) if (x[k] !== y[k]) return `object_assignment.${phase}`;
  }
  return null;
}

abstract class BaseStore implements PermutationStore {
  abstract load(participantId: string): Promise<PersistedState | null>;
  abstract save(state: PersistedState): Promise<SaveOutcome>;

  async loadOrCreate(participantId: string, create: () => PersistedState) {
    const existing = await this.load(participantId);
    if (existing) return { state: existing, created: false };

    const fresh = create();
    const outcome = await this.save(fresh);
    if (outcome === "created") return { state: fresh, created: true };

    // Lost a create race to an identical record: hand back the stored copy
    const stored = await this.load(participantId);
    if (!stored) throw new CorruptStateError(participantId, "record vanished after an idempotent save");
    return { state: stored, created: false };
  }

  protected compareOrThrow(existing: PersistedState, incoming: PersistedState): SaveOutcome {
    const diff = ruleDifference(existing, incoming);
    if (diff) throw new AlreadyExistsError(incoming.participant_id, `${diff} differs`);
    return "unchanged";
  }
}

// -------- In-memory backend (tests / dry runs) --------
export class MemoryStore extends BaseStore {
  private map = new Map<string, PersistedState>();

  async load(participantId: string) {
    const s = this.map.get(participantId);
    return s ? structuredClone(s) : null;
  }

  async save(state: PersistedState): Promise<SaveOutcome> {
    const existing = this.map.get(state.participant_id);
    if (existing) return this.compareOrThrow(existing, state);
    this.map.set(state.participant_id, structuredClone(state));
    return "created";
  }
}

// -------- File backend: one pretty JSON document per participant --------
export class FileStore extends BaseStore {
  readonly dir: string;

  constructor(dataDir: string) {
    super();
    this.dir = path.join(dataDir, "participants");
  }

  fileFor(participantId: string): string {
    return path.join(this.dir, `participant_${participantId}.json`);
  }

  async load(participantId: string): Promise<PersistedState | null> {
    const file = this.fileFor(participantId);
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (e: unknown) {
      if (isErrnoCode(e, "ENOENT")) return null;
      throw e;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e: unknown) {
      throw new CorruptStateError(participantId, `${file} is not valid JSON`, e);
    }
    return validatePersistedStateOrThrow(raw, participantId);
  }

  /**
   * Atomic create: write a temp file, then hard-link it to the final name.
   * link() fails with EEXIST when the record already exists, so two creators never interleave.
   */
  async save(state: PersistedState): Promise<SaveOutcome> {
    await fs.mkdir(this.dir, { recursive: true });
    const file = this.fileFor(state.participant_id);
    const tmp = `${file}.${randomUUID()}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(state, null, 2) + "\n", { encoding: "utf8", flag: "wx" });
    try {
      await fs.link(tmp, file);
      return "created";
    } catch (e: unknown) {
      if (!isErrnoCode(e, "EEXIST")) throw e;
      const existing = await this.load(state.participant_id);
      if (!existing) throw new CorruptStateError(state.participant_id, `${file} exists but could not be read`);
      return this.compareOrThrow(existing, state);
    } finally {
      await fs.rm(tmp, { force: true });
    }
  }
}

function isErrnoCode(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

export function getPermutationStore(opts: { backend: "file" | "memory"; dataDir: string }): PermutationStore {
  if (opts.backend === "memory") return new MemoryStore();
  return new FileStore(opts.dataDir);
}
