// lib/config.ts
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { ExperimentConfigSchema, type ExperimentConfig } from "@/types/records";
import { ConfigError } from "@/engine/errors";
import { deepMerge, isPlain } from "@/engine/utils/deepMerge";

export const REPO_ROOT = fileURLToPath(new URL("..", import.meta.url));
export const DEFAULT_CONFIG_FILE = path.join(REPO_ROOT, "data", "experiment.json");

// Fields holding file-system paths; relative values resolve against the layer that set them
const PATH_KEYS = ["dataDir", "stimuliFile"] as const;

export interface LoadConfigOptions {
  /** optional override file, deep-merged over the defaults */
  configFile?: string;
  /** programmatic overrides applied last (CLI flags, tests) */
  overrides?: Record<string, unknown>;
  env?: NodeJS.ProcessEnv;
  defaultsFile?: string;
}

async function readJsonLayer(file: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e: unknown) {
    throw new ConfigError(`Cannot read config file '${file}'`, [e instanceof Error ? e.message : String(e)]);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e: unknown) {
    throw new ConfigError(`Config file '${file}' is not valid JSON`, [e instanceof Error ? e.message : String(e)]);
  }
  if (!isPlain(parsed)) throw new ConfigError(`Config file '${file}' must contain a JSON object`);
  return resolvePaths(parsed, path.dirname(file));
}

function resolvePaths(layer: Record<string, unknown>, baseDir: string): Record<string, unknown> {
  const out = { ...layer };
  for (const key of PATH_KEYS) {
    const v = out[key];
    if (typeof v === "string" && v.length > 0) out[key] = path.resolve(baseDir, v);
  }
  return out;
}

function flag(v: string | undefined): boolean | undefined {
  if (v === undefined || v === "") return undefined;
  return /^(1|true|yes|on)$/i.test(v.trim());
}

/** Environment layer; only variables that are set contribute. */
export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  const rule: Record<string, unknown> = {};
  if (env.EXPERIMENT_DATA_DIR) layer.dataDir = env.EXPERIMENT_DATA_DIR;
  if (env.EXPERIMENT_STIMULI_FILE) layer.stimuliFile = env.EXPERIMENT_STIMULI_FILE;
  if (env.EXPERIMENT_STORE_BACKEND) layer.store = { backend: env.EXPERIMENT_STORE_BACKEND };
  if (env.EXPERIMENT_SEED) rule.seed = env.EXPERIMENT_SEED;
  if (env.EXPERIMENT_RULE_MODE) rule.mode = env.EXPERIMENT_RULE_MODE;
  if (Object.keys(rule).length) layer.rule = rule;
  const skip = flag(env.EXPERIMENT_SKIP_PREREQUISITES);
  if (skip !== undefined) layer.allowSkipPrerequisites = skip;
  if (env.LOG_LEVEL) layer.logLevel = env.LOG_LEVEL.trim().toLowerCase();
  return resolvePaths(layer, process.cwd());
}

/**
 * Layers, lowest precedence first: defaults file, override file, environment, programmatic overrides.
 * Objects merge key by key; arrays and scalars replace.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<ExperimentConfig> {
  const layers: unknown[] = [await readJsonLayer(opts.defaultsFile ?? DEFAULT_CONFIG_FILE)];
  if (opts.configFile) layers.push(await readJsonLayer(path.resolve(opts.configFile)));
  layers.push(envOverrides(opts.env ?? process.env));
  if (opts.overrides) layers.push(resolvePaths(opts.overrides, process.cwd()));

  const merged = layers.reduce((acc, layer) => deepMerge(acc, layer), {});
  return parseConfigOrThrow(merged);
}

export function parseConfigOrThrow(raw: unknown): ExperimentConfig {
  const parsed = ExperimentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid experiment configuration", parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`));
  }
  return parsed.data;
}
