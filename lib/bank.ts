// lib/bank.ts
import fs from "fs/promises";
import type { StimulusBank } from "@/types/experiment";
import { ConfigError } from "@/engine/errors";
import { validateStimulusBankOrThrow } from "@/engine/kernel/validation";

let _cache: { file: string; bank: StimulusBank } | null = null;

/** Load and validate the stimulus pools; the last bank read is reused for the same file. */
export async function loadStimulusBank(file: string): Promise<StimulusBank> {
  if (_cache && _cache.file === file) return _cache.bank;

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, "utf8"));
  } catch (e: unknown) {
    throw new ConfigError(`Failed to read stimulus bank '${file}'`, [e instanceof Error ? e.message : String(e)]);
  }
  const bank = validateStimulusBankOrThrow(raw, file);
  _cache = { file, bank };
  return bank;
}

/** Test-only reset */
export function __resetBankCacheForTests__() {
  _cache = null;
}
