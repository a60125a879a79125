import fs from "node:fs/promises";
import { assetManifest, ensureAssets, type Fetcher } from "./assets.js";
import { probeBackends } from "./backends.js";
import type { BenchConfig } from "./config.js";
import { TranscoderNotFoundError, errorMessage } from "./errors.js";
import type { TrialExecutor } from "./ffmpeg/command.js";
import { parseFFmpegVersion } from "./ffmpeg/output.js";
import type { CommandResult, CommandRunner } from "./ffmpeg/process.js";
import { inspectHardware } from "./hardware.js";
import { assertDestinationWritable, buildReport, writeReport, type ReportWriter } from "./report.js";
import { runBackends } from "./runner.js";
import type { Logger } from "./utils/logger.js";
import type { OsSummary, Report } from "./types.js";

/**
 * Everything one run needs, passed explicitly to each phase. Tests replace the process,
 * network and device hooks with in-memory fakes.
 */
export interface RunContext {
  config: BenchConfig;
  logger: Logger;
  tool: { name: string; version: string };
  exec: CommandRunner;
  fetcher: Fetcher;
  osInfo: () => Promise<OsSummary>;
  pathExists: (path: string) => boolean;
  executor: TrialExecutor;
  stdout: ReportWriter;
  sleep?: (ms: number) => Promise<unknown>;
}

/** Check the binary can be started and return its version string. */
export async function verifyTranscoder(ffmpegPath: string, exec: CommandRunner): Promise<string> {
  try {
    await fs.access(ffmpegPath, fs.constants.X_OK);
  } catch {
    throw new TranscoderNotFoundError(ffmpegPath, "file does not exist or is not executable");
  }

  let result: CommandResult;
  try {
    result = await exec(ffmpegPath, ["-version"]);
  } catch (error) {
    throw new TranscoderNotFoundError(ffmpegPath, errorMessage(error));
  }
  if (result.exitCode !== 0) {
    throw new TranscoderNotFoundError(ffmpegPath, `"-version" exited with code ${result.exitCode}`);
  }
  return parseFFmpegVersion(result.stdout) ?? "unknown";
}

export async function runBenchmark(ctx: RunContext): Promise<Report> {
  const { config, logger } = ctx;

  logger.info(`Using FFmpeg binary "${config.ffmpegPath}"`);
  logger.info(`Using video directory "${config.videosDir}"`);
  logger.info(`Using JSON output file "${config.output}"`);

  const ffmpegVersion = await verifyTranscoder(config.ffmpegPath, ctx.exec);
  logger.debug(`FFmpeg version ${ffmpegVersion}`, { module: "benchmark" });

  await assertDestinationWritable(config.output);

  const assets = await ensureAssets(config.videosDir, assetManifest(config.assetMirror), {
    fetcher: ctx.fetcher,
    logger,
  });

  const hardware = await inspectHardware(
    {
      ffmpegPath: config.ffmpegPath,
      ffmpegVersion,
      gpuIndex: config.gpuIndex,
      allowUnknownHardware: config.allowUnknownHardware,
    },
    { exec: ctx.exec, osInfo: ctx.osInfo, logger },
  );

  const probe = await probeBackends(config.ffmpegPath, hardware.gpu, {
    exec: ctx.exec,
    pathExists: ctx.pathExists,
    logger,
  });

  const results = await runBackends(
    probe.available,
    assets,
    {
      ffmpegPath: config.ffmpegPath,
      deviceArg: hardware.gpu?.deviceArg ?? "0",
      streamSequence: config.streamSequence,
      trialTimeoutSeconds: config.trialTimeoutSeconds,
      trialPauseMs: config.trialPauseMs,
    },
    { executor: ctx.executor, logger, sleep: ctx.sleep },
  );

  const report = buildReport({
    tool: ctx.tool,
    config,
    hardware: hardware.profile,
    results,
    skipped: probe.unavailable,
  });

  logger.info("Benchmark finished, writing results");
  await writeReport(report, config.output, ctx.stdout);
  return report;
}
