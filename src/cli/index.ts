import { AppConfig, loadConfig } from "../config";
import { isCleanRun, runFetch, runInspect, runStatus } from "../core/commands";
import { HttpClient } from "../core/fetch";
import { createRunId, errorMessage, Logger, MetricsRegistry } from "../observability";
import { parsePostUrl } from "../resolve";
import { createSink } from "../sink";
import { createStore } from "../store";
import { PostRef } from "../types";

export type CommandName = "fetch" | "inspect" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  urls: string[];
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  concurrency?: number;
  maxAttempts?: number;
  downloadsDir?: string;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  postgrab <command> [options]

Commands:
  fetch <url...>    Resolve posts and download every attachment
  inspect <url...>  Resolve posts and print their metadata
  status            Show download history totals

Options:
  --config <path>         Optional path to JSON config file
  --downloads-dir <dir>   Root directory for post folders (default: downloads)
  --concurrency <n>       Parallel attachment downloads (default: 5)
  --max-attempts <n>      Attempts per fetch before giving up (default: 5)
  --dry-run               Resolve metadata and list planned downloads only
  --ignore-https-errors   Ignore TLS certificate errors (use only when required)
  -h, --help              Show this help
`;

const VALUE_FLAGS = new Set(["--config", "--downloads-dir", "--concurrency", "--max-attempts"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "fetch" || raw === "inspect" || raw === "status") {
    return raw;
  }
  return undefined;
}

function readFlagValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function readPositiveInt(argv: string[], flag: string): number | undefined {
  const raw = readFlagValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function collectPositionals(argv: string[]): string[] {
  const positionals: string[] = [];
  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    if (VALUE_FLAGS.has(arg)) {
      index += 1;
      continue;
    }
    if (arg.startsWith("-")) {
      continue;
    }
    positionals.push(arg);
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

  const urls = collectPositionals(argv);
  if (command !== "status" && urls.length === 0) {
    return "help";
  }

  return {
    command,
    urls,
    dryRun: argv.includes("--dry-run"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    concurrency: readPositiveInt(argv, "--concurrency"),
    maxAttempts: readPositiveInt(argv, "--max-attempts"),
    downloadsDir: readFlagValue(argv, "--downloads-dir"),
    configPath: readFlagValue(argv, "--config"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    downloadConcurrency: parsed.concurrency ?? config.downloadConcurrency,
    maxAttempts: parsed.maxAttempts ?? config.maxAttempts,
    downloadsDir: parsed.downloadsDir ?? config.downloadsDir,
  };
}

function parseRefs(urls: string[], logger: Logger): { refs: PostRef[]; invalid: number } {
  const refs: PostRef[] = [];
  let invalid = 0;
  for (const url of urls) {
    try {
      refs.push(parsePostUrl(url));
    } catch (error) {
      invalid += 1;
      logger.error("post_url_invalid", { url, error: errorMessage(error) });
    }
  }
  return { refs, invalid };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId, filePath: config.logFile });
  const metrics = new MetricsRegistry();
  const sink = createSink(config, runId);
  const store = createStore(config, { inMemory: parsed.dryRun });
  const http = new HttpClient({
    userAgent: config.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
    downloadTimeoutMs: config.downloadTimeoutMs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });
  const context = { runId, config, store, sink, logger, metrics, metadataClient: http, binaryClient: http };

  logger.info("command_start", {
    command: parsed.command,
    urls: parsed.urls.length,
    dryRun: parsed.dryRun,
    downloadsDir: config.downloadsDir,
    concurrency: config.downloadConcurrency,
    maxAttempts: config.maxAttempts,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    let exitCode = 0;
    switch (parsed.command) {
      case "fetch": {
        const { refs, invalid } = parseRefs(parsed.urls, logger);
        const report = await runFetch({ ...context, logger: logger.child("fetch") }, refs, { dryRun: parsed.dryRun });
        exitCode = invalid === 0 && isCleanRun(report) ? 0 : 1;
        break;
      }
      case "inspect": {
        const { refs, invalid } = parseRefs(parsed.urls, logger);
        const resolutions = await runInspect({ ...context, logger: logger.child("inspect") }, refs);
        exitCode = invalid === 0 && resolutions.every((resolution) => resolution.status === "resolved") ? 0 : 1;
        break;
      }
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      default:
        console.error(`Unsupported command: ${parsed.command}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    await store.close();
    metrics.logSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
