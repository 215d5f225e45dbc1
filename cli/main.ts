// cli/main.ts
import { parseArgs } from "util";
import type { LogFn, Presentation } from "@/types/experiment";
import { COMPLETED_STATUSES } from "@/types/experiment";
import { ParticipantIdSchema, RunArgsSchema, type RunArgs } from "@/types/records";
import { ConfigError, isExperimentError } from "@/engine/errors";
import { SessionOrchestrator, type SessionReport } from "@/engine/session/orchestrator";
import { getPermutationStore } from "@/engine/session/store";
import { registryHealth } from "@/engine/registry";
import { JsonlResultsLog, MemoryResultsLog, type ResultsLog } from "@/engine/session/resultsLog";
import { loadConfig } from "@/lib/config";
import { loadStimulusBank } from "@/lib/bank";
import { createLogger, parseLogThreshold } from "@/lib/logger";
import { ScriptedPresentation } from "@/lib/presentation/scripted";
import { TerminalPresentation } from "@/lib/presentation/terminal";

export const USAGE = `Usage:
  scramble-experiment run <selector> <participant_id> [--config <file>] [--data-dir <dir>] [--skip-prerequisites] [--dry-run]
  scramble-experiment show <participant_id> [--config <file>] [--data-dir <dir>]

Selectors: training, structure_learning, applied_learning, session1, session2, all`;

export const EXIT = {
  OK: 0,
  USAGE: 1,
  PREREQUISITE: 2,
  STIMULI: 3,
  STATE: 4,
  PRESENTATION: 5,
  ABORTED: 130,
} as const;

export type CliCommand =
  | { command: "run"; args: RunArgs }
  | { command: "show"; participantId: string; configFile?: string; dataDir?: string }
  | { command: "help" };

function issuesOf(e: { issues: Array<{ path: Array<string | number>; message: string }> }): string[] {
  return e.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        config: { type: "string" },
        "data-dir": { type: "string" },
        "skip-prerequisites": { type: "boolean" },
        "dry-run": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (e: unknown) {
    throw new ConfigError("Invalid command line", [e instanceof Error ? e.message : String(e)]);
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgv(argv);
  const [command, ...rest] = positionals;
  if (values.help || command === undefined || command === "help") return { command: "help" };

  if (command === "run") {
    if (rest.length !== 2) throw new ConfigError("run takes exactly <selector> <participant_id>");
    const args = RunArgsSchema.safeParse({
      selector: rest[0],
      participantId: rest[1],
      configFile: values.config,
      dataDir: values["data-dir"],
      skipPrerequisites: values["skip-prerequisites"],
      dryRun: values["dry-run"],
    });
    if (!args.success) throw new ConfigError("Invalid arguments", issuesOf(args.error));
    return { command: "run", args: args.data };
  }

  if (command === "show") {
    if (rest.length !== 1) throw new ConfigError("show takes exactly <participant_id>");
    const id = ParticipantIdSchema.safeParse(rest[0]);
    if (!id.success) throw new ConfigError("Invalid arguments", issuesOf(id.error));
    return { command: "show", participantId: id.data, configFile: values.config, dataDir: values["data-dir"] };
  }

  throw new ConfigError(`Unknown command '${command}'`);
}

/** Criterion not met still exits 0; the first phase that did not finish decides otherwise. */
export function exitCodeForReport(report: SessionReport): number {
  const unfinished = report.phases.find(p => !COMPLETED_STATUSES.includes(p.status));
  if (!unfinished) return EXIT.OK;
  return unfinished.status === "presentation_error" ? EXIT.PRESENTATION : EXIT.ABORTED;
}

export function exitCodeForError(e: unknown): number {
  if (isExperimentError(e)) return e.exitCode;
  // file system failures surface as errno errors
  if (e instanceof Error && "code" in e && typeof e.code === "string" && e.code.startsWith("E")) return EXIT.STATE;
  return EXIT.USAGE;
}

export interface CliIO {
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  presentation?: Presentation;
}

export async function main(argv: string[], io: CliIO = {}): Promise<number> {
  const env = io.env ?? process.env;
  const out = io.out ?? ((line: string) => process.stdout.write(line + "\n"));
  let log: LogFn = createLogger(parseLogThreshold(env.LOG_LEVEL));

  let cmd: CliCommand;
  try {
    cmd = parseCliArgs(argv);
  } catch (e: unknown) {
    log("error", e instanceof Error ? e.message : String(e));
    out(USAGE);
    return EXIT.USAGE;
  }
  if (cmd.command === "help") {
    out(USAGE);
    return EXIT.OK;
  }

  const dryRun = cmd.command === "run" && cmd.args.dryRun;
  const configFile = cmd.command === "run" ? cmd.args.configFile : cmd.configFile;
  const dataDir = cmd.command === "run" ? cmd.args.dataDir : cmd.dataDir;
  const participantId = cmd.command === "run" ? cmd.args.participantId : cmd.participantId;

  const ac = new AbortController();
  const onSigint = () => ac.abort();
  process.once("SIGINT", onSigint);
  let terminal: TerminalPresentation | null = null;

  try {
    const overrides: Record<string, unknown> = {};
    if (dataDir) overrides.dataDir = dataDir;
    if (dryRun) overrides.store = { backend: "memory" };
    const config = await loadConfig({ configFile, overrides, env });
    log = createLogger(config.logLevel);

    const results: ResultsLog = config.store.backend === "memory" ? new MemoryResultsLog() : new JsonlResultsLog(config.dataDir, log);
    let presentation = io.presentation;
    if (!presentation) {
      // `show` never presents anything; a dry run answers every trial correctly
      if (dryRun || cmd.command === "show") presentation = new ScriptedPresentation();
      else presentation = terminal = new TerminalPresentation();
    }

    const orchestrator = new SessionOrchestrator({
      config,
      store: getPermutationStore({ backend: config.store.backend, dataDir: config.dataDir }),
      results,
      presentation,
      loadBank: () => loadStimulusBank(config.stimuliFile),
      log,
      signal: ac.signal,
    });

    if (cmd.command === "show") {
      const description = await orchestrator.describe(participantId);
      out(JSON.stringify({ ...description, drivers: registryHealth().drivers }, null, 2));
      return EXIT.OK;
    }

    const report = await orchestrator.run(participantId, cmd.args.selector, { skipPrerequisites: cmd.args.skipPrerequisites });
    for (const p of report.phases) {
      out(`${p.phase}: ${p.status} (${p.blocksRun} blocks, ${p.outcomes.length} trials, accuracy ${p.accuracy === null ? "n/a" : p.accuracy.toFixed(3)})`);
    }
    return exitCodeForReport(report);
  } catch (e: unknown) {
    const context = isExperimentError(e) ? e.context() : { participant_id: participantId };
    log("error", e instanceof Error ? e.message : String(e), context);
    return exitCodeForError(e);
  } finally {
    process.off("SIGINT", onSigint);
    terminal?.close();
  }
}
