import { readFile } from "node:fs/promises";
import { Command, CommanderError, InvalidArgumentError } from "@commander-js/extra-typings";
import { z } from "zod";
import { defaultPathExists } from "./backends.js";
import { runBenchmark, type RunContext } from "./benchmark.js";
import {
  DEFAULT_FFMPEG_PATH,
  loadConfigFile,
  parseStreamList,
  resolveConfig,
  type BenchConfig,
} from "./config.js";
import { BenchError, ExitCode, errorMessage } from "./errors.js";
import { createTrialExecutor } from "./ffmpeg/command.js";
import { runCommand } from "./ffmpeg/process.js";
import { readOsInfo } from "./hardware.js";
import type { ReportWriter } from "./report.js";
import { getLogger, initializeLogger, LogLevel, parseLogLevel, type Logger } from "./utils/logger.js";

const DESCRIPTION = `Measure how many simultaneous real-time transcodes this machine sustains.

Runs FFmpeg trials against each encoder backend available on this system
(software, NVIDIA NVENC, Intel QuickSync, AMD AMF) with an increasing number of
parallel streams, and reports the highest count each backend keeps at or above
real-time speed.

Test videos are downloaded into the --videos directory on first use. Results
are written as JSON to --output, or to standard output when it is "-".
Progress and diagnostics go to standard error.

Hardware detection needs the "lshw" program. Install it with your package
manager first (for example "apt install lshw").

The benchmark is stressful on the system and takes a long time to finish,
especially on lower-end hardware. Run it on a lightly loaded machine and avoid
other heavy work, including video playback, until it is done.`;

export type MainDeps = Omit<RunContext, "config" | "logger" | "tool"> & {
  logger: Logger;
  stderr: ReportWriter;
};

const toolInfoSchema = z.object({ name: z.string(), version: z.string() });

function parseGpuIndex(value: string): number {
  const index = Number(value);
  if (!Number.isInteger(index) || index < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return index;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number of seconds.");
  }
  return parsed;
}

function parseStreams(value: string): number[] {
  try {
    return parseStreamList(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

export function createProgram() {
  return new Command("hwa-bench")
    .description(DESCRIPTION)
    .helpOption("-h, --help", "Show this message and exit.")
    .option("--ffmpeg <path>", `Path to the FFmpeg binary. (default: "${DEFAULT_FFMPEG_PATH}")`)
    .requiredOption("--videos <dir>", "Directory to store the test video files in.")
    .option("--output <file>", 'Path to the output JSON file, "-" for stdout. (default: "-")')
    .option("--gpu <index>", "Index of the GPU to test when several are present.", parseGpuIndex)
    .option("--debug", "Enable additional debug output.")
    .option(
      "--streams <list>",
      "Comma-separated ascending stream counts to try. (default: 1,2,3,4,6,8,12,16,24,32)",
      parseStreams,
    )
    .option("--max-streams <n>", "Highest stream count to try. (default: 32)", parsePositiveInt)
    .option(
      "--timeout <seconds>",
      "Time limit for a single hardware trial. (default: 120)",
      parseSeconds,
    )
    .option(
      "--allow-unknown-hardware",
      "Continue with placeholder values when hardware detection fails.",
    )
    .option("--config <file>", "JSON file with default settings.")
    .option("--log-dir <dir>", "Also write logs to files in this directory.");
}

export async function readToolInfo(): Promise<{ name: string; version: string }> {
  const raw = await readFile(new URL("../package.json", import.meta.url), "utf-8");
  return toolInfoSchema.parse(JSON.parse(raw));
}

function createRunLogger(config: BenchConfig): Logger {
  return initializeLogger({
    level: config.debug ? LogLevel.DEBUG : parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO,
    enableConsole: true,
    enableFile: config.logDir !== null,
    logDir: config.logDir ?? undefined,
  });
}

/**
 * Parse arguments, run the benchmark and map the outcome to a process exit code.
 * Never calls process.exit, so pending log writes can flush.
 */
export async function main(argv: string[], deps: Partial<MainDeps> = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const program = createProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text),
    });

  let opts: ReturnType<typeof program.opts>;
  try {
    opts = program.parse(argv).opts();
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  let logger = deps.logger ?? getLogger();
  try {
    const fileConfig = opts.config === undefined ? {} : await loadConfigFile(opts.config);
    const config = resolveConfig(
      {
        ffmpeg: opts.ffmpeg,
        videos: opts.videos,
        output: opts.output,
        gpu: opts.gpu,
        debug: opts.debug,
        streams: opts.streams,
        maxStreams: opts.maxStreams,
        timeout: opts.timeout,
        allowUnknownHardware: opts.allowUnknownHardware,
        logDir: opts.logDir,
      },
      fileConfig,
    );
    logger = deps.logger ?? createRunLogger(config);
    logger.debug("Resolved configuration", { module: "cli", config });

    await runBenchmark({
      config,
      logger,
      tool: await readToolInfo(),
      exec: deps.exec ?? runCommand,
      fetcher: deps.fetcher ?? ((url) => fetch(url)),
      osInfo: deps.osInfo ?? readOsInfo,
      pathExists: deps.pathExists ?? defaultPathExists,
      executor: deps.executor ?? createTrialExecutor(logger),
      stdout,
      sleep: deps.sleep,
    });
    return ExitCode.SUCCESS;
  } catch (error) {
    if (error instanceof BenchError) {
      logger.error(error.message, { module: "cli", error: error.name });
      return error.exitCode;
    }
    logger.logError(error instanceof Error ? error : errorMessage(error), { module: "cli" });
    return ExitCode.FAILURE;
  }
}
