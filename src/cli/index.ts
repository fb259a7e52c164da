import { loadConfig, NamingMode } from "../config";
import { closeFetchDispatchers, runConvert } from "../core";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { InvalidInputError } from "../types";

export type CommandName = "convert";

export interface ParsedCliArgs {
  command: CommandName;
  inputPath: string;
  outputPath: string;
  namingMode?: NamingMode;
  dpi?: number;
  concurrency?: number;
  includeSummary?: boolean;
  verbose: boolean;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  pdf-jpeg-archiver convert <request-file> [options]

The request file is either a JSON request (list of documents, object with
payload fields, or {"pdf_url": ...}) or any other file taken as one payload.

Options:
  --out <path>          Output ZIP path (default: pdf_images.zip)
  --naming <mode>       flat | grouped (default from config)
  --dpi <n>             Default render resolution for documents without one
  --concurrency <n>     Concurrent conversions (capped by the configured ceiling)
  --no-summary          Leave summary.json out of the archive
  --config <path>       Optional path to JSON config file
  --verbose             Emit debug-level diagnostics
  -h, --help            Show this help
`;

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function optionInt(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  if (argv[0] !== "convert" || !argv[1] || argv[1].startsWith("--")) {
    return "help";
  }

  const naming = optionValue(argv, "--naming");
  return {
    command: "convert",
    inputPath: argv[1],
    outputPath: optionValue(argv, "--out") ?? "pdf_images.zip",
    namingMode: naming === "flat" || naming === "grouped" ? naming : undefined,
    dpi: optionInt(argv, "--dpi"),
    concurrency: optionInt(argv, "--concurrency"),
    includeSummary: argv.includes("--no-summary") ? false : undefined,
    verbose: argv.includes("--verbose"),
    configPath: optionValue(argv, "--config"),
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.verbose) {
    config = { ...config, logLevel: "debug" };
  }
  if (parsed.dpi !== undefined) {
    config = { ...config, defaultDpi: parsed.dpi };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  const context = { runId, config, logger: logger.child("convert"), metrics };

  logger.info("command_start", {
    command: parsed.command,
    namingMode: parsed.namingMode ?? config.namingMode,
    defaultDpi: config.defaultDpi,
    concurrency: parsed.concurrency,
  });

  try {
    const ok = await runConvert(context, {
      inputPath: parsed.inputPath,
      outputPath: parsed.outputPath,
      namingMode: parsed.namingMode,
      concurrency: parsed.concurrency,
      includeSummary: parsed.includeSummary,
    });
    logger.info("command_complete", { command: parsed.command, ok });
    return ok ? 0 : 1;
  } catch (error) {
    if (error instanceof InvalidInputError) {
      logger.error("command_invalid_input", { error: error.message });
      return 2;
    }
    throw error;
  } finally {
    await closeFetchDispatchers();
    metrics.logSummary(logger);
  }
}
