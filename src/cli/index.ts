import { loadConfig } from "../config";
import type { AppConfig } from "../config";
import { runBatchCommand, runStatusCommand, runUrlCommand } from "../core/commands";
import type { CommandContext } from "../core/commands";
import type { FetchLike } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import type { LogLevel } from "../observability";

export type CommandName = "batch" | "url" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  positionals: string[];
  resume: boolean;
  geocode: boolean;
  dryRun: boolean;
  quiet: boolean;
  verbose: boolean;
  ignoreHttpsErrors: boolean;
  checkpointEvery?: number;
  configPath?: string;
}

/** Hooks for running the CLI in-process. */
export interface CliRuntime {
  env?: NodeJS.ProcessEnv;
  fetchFn?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

const HELP_TEXT = `
Usage:
  wiki-coords <command> [options]

Commands:
  batch <input.json> <output.json>  Add coordinates to every record without them
  url <wikipedia_url>               Run the extraction pipeline on one article
  status <output.json>              Summarize an output or checkpoint file

Options:
  --config <path>           Optional path to JSON config file
  --resume                  Continue from the output file when it exists (batch)
  --no-geocode              Keep addresses without looking them up
  --checkpoint-every <n>    Processed records between checkpoint writes (batch, default 10)
  --dry-run                 Process records without writing the output file (batch)
  --ignore-https-errors     Ignore TLS certificate errors (use only when required)
  --quiet                   Log warnings and errors only
  --verbose                 Include debug logs (rejected candidates, skipped records)
  -h, --help                Show this help
`;

const VALUE_FLAGS = new Set(["--config", "--checkpoint-every"]);

const REQUIRED_POSITIONALS: Record<CommandName, string[]> = {
  batch: ["<input.json>", "<output.json>"],
  url: ["<wikipedia_url>"],
  status: ["<output.json>"],
};

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "batch" || raw === "url" || raw === "status") {
    return raw;
  }
  return undefined;
}

function flagValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function collectPositionals(args: string[]): string[] {
  const positionals: string[] = [];
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (VALUE_FLAGS.has(arg)) {
      index += 1;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
    }
  }
  return positionals;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const positionals = collectPositionals(argv.slice(1));
  const required = REQUIRED_POSITIONALS[command];
  if (positionals.length < required.length) {
    throw new Error(`${command} expects ${required.join(" ")}`);
  }

  const checkpointRaw = flagValue(argv, "--checkpoint-every");
  const checkpointParsed = checkpointRaw ? Number.parseInt(checkpointRaw, 10) : undefined;
  if (checkpointRaw !== undefined && (checkpointParsed === undefined || !Number.isFinite(checkpointParsed) || checkpointParsed < 1)) {
    throw new Error(`--checkpoint-every expects a positive integer, got "${checkpointRaw}"`);
  }

  return {
    command,
    positionals,
    resume: argv.includes("--resume"),
    geocode: !argv.includes("--no-geocode"),
    dryRun: argv.includes("--dry-run"),
    quiet: argv.includes("--quiet"),
    verbose: argv.includes("--verbose"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    checkpointEvery: checkpointParsed,
    configPath: flagValue(argv, "--config"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    ignoreHttpsErrors: config.ignoreHttpsErrors || parsed.ignoreHttpsErrors,
    checkpointEvery: parsed.checkpointEvery ?? config.checkpointEvery,
    geocoding: {
      ...config.geocoding,
      enabled: config.geocoding.enabled && parsed.geocode,
    },
  };
}

function logLevelFor(parsed: ParsedCliArgs): LogLevel {
  if (parsed.quiet) {
    return "warn";
  }
  return parsed.verbose ? "debug" : "info";
}

export async function runCli(argv: string[], runtime: CliRuntime = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath, runtime.env), parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: logLevelFor(parsed) });
  const context: CommandContext = {
    runId,
    config,
    logger,
    metrics,
    fetchFn: runtime.fetchFn,
    sleep: runtime.sleep,
  };

  logger.info("command_start", {
    command: parsed.command,
    positionals: parsed.positionals,
    resume: parsed.resume,
    geocoding: config.geocoding.enabled,
    dryRun: parsed.dryRun,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "batch": {
        const controller = new AbortController();
        const onSigint = (): void => {
          logger.warn("sigint_received", { message: "stopping after the current record" });
          controller.abort();
        };
        process.once("SIGINT", onSigint);
        try {
          const [inputPath, outputPath] = parsed.positionals;
          const { result } = await runBatchCommand(
            { ...context, logger: logger.child("batch") },
            { inputPath, outputPath, resume: parsed.resume, dryRun: parsed.dryRun, signal: controller.signal },
          );
          logger.info("command_complete", { command: parsed.command, interrupted: result.interrupted });
          return result.interrupted ? 130 : 0;
        } finally {
          process.off("SIGINT", onSigint);
        }
      }
      case "url":
        await runUrlCommand({ ...context, logger: logger.child("url") }, parsed.positionals[0]);
        break;
      case "status":
        await runStatusCommand({ ...context, logger: logger.child("status") }, parsed.positionals[0]);
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    metrics.printSummary();
  }
}
