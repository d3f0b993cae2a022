import { PlaywrightLauncher } from "../browser";
import type { BrowserLauncher } from "../browser";
import { loadConfig } from "../config";
import type { AppConfig } from "../config";
import { runCrawl, runStatus } from "../core/commands";
import type { CommandContext } from "../core/commands";
import { ExitCode } from "../errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";

export type CommandName = "crawl" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  caseNumber: string;
  resume: boolean;
  headed: boolean;
  ignoreHttpsErrors: boolean;
  outputRoot?: string;
  concurrency?: number;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  case-archive-crawler <command> <caseNumber> [options]

Commands:
  crawl <caseNumber>    Crawl one case, resuming from its checkpoint
  status <caseNumber>   Print the checkpoint summary of a case

Options:
  --out <dir>            Output root (default: output, or OUTPUT_ROOT)
  --no-resume            Start over; the previous checkpoint is kept aside
  --config <path>        Optional path to JSON config file
  --headed               Show the browser window
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --concurrency <n>      Parallel attachment captures
  -h, --help             Show this help

Exit codes:
  0 done, 1 fatal, 2 invalid case number, 3 challenge failed,
  4 rate limited (paused, run again later), 5 case not found or ambiguous,
  130 interrupted
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "crawl" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  const caseNumber = argv[1];
  if (!command || !caseNumber || caseNumber.startsWith("--")) {
    return "help";
  }

  const concurrencyRaw = optionValue(argv, "--concurrency");
  const concurrencyParsed = concurrencyRaw ? Number.parseInt(concurrencyRaw, 10) : undefined;

  return {
    command,
    caseNumber,
    resume: !argv.includes("--no-resume"),
    headed: argv.includes("--headed"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    outputRoot: optionValue(argv, "--out"),
    concurrency: concurrencyParsed !== undefined && Number.isFinite(concurrencyParsed) && concurrencyParsed > 0 ? concurrencyParsed : undefined,
    configPath: optionValue(argv, "--config"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    headless: parsed.headed ? false : config.headless,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    outputRoot: parsed.outputRoot ?? config.outputRoot,
    captureConcurrency: parsed.concurrency ?? config.captureConcurrency,
  };
}

export interface CliDeps {
  launcherFactory?: (config: AppConfig) => BrowserLauncher;
  signal?: AbortSignal;
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return argv.includes("-h") || argv.includes("--help") ? ExitCode.Ok : ExitCode.Fatal;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });

  const controller = new AbortController();
  const onSignal = (): void => {
    logger.warn("interrupt_received", { command: parsed.command });
    controller.abort();
  };
  deps.signal?.addEventListener("abort", onSignal, { once: true });
  process.once("SIGINT", onSignal);

  const context: CommandContext = {
    runId,
    config,
    logger: logger.child(parsed.command),
    metrics,
    launcher: (deps.launcherFactory ?? ((value: AppConfig) => new PlaywrightLauncher(value)))(config),
    signal: controller.signal,
  };

  logger.info("command_start", {
    command: parsed.command,
    caseNumber: parsed.caseNumber,
    resume: parsed.resume,
    outputRoot: config.outputRoot,
    headless: config.headless,
    captureConcurrency: config.captureConcurrency,
  });

  try {
    const exitCode =
      parsed.command === "crawl"
        ? await runCrawl(context, { caseNumber: parsed.caseNumber, resume: parsed.resume, outputRoot: config.outputRoot })
        : await runStatus(context, parsed.caseNumber, config.outputRoot);
    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    process.removeListener("SIGINT", onSignal);
    deps.signal?.removeEventListener("abort", onSignal);
    if (parsed.command === "crawl") {
      metrics.printSummary();
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
