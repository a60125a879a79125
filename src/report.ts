import fs from "node:fs/promises";
import path from "node:path";
import { WriteError, errorMessage, type BackendUnavailableError } from "./errors.js";
import type { BenchConfig } from "./config.js";
import type { BackendResult, HardwareProfile, Report, ReportOptions } from "./types.js";

export const STDOUT_DESTINATION = "-";

export interface ReportWriter {
  write(chunk: string): unknown;
}

export interface ReportInput {
  tool: { name: string; version: string };
  config: BenchConfig;
  hardware: HardwareProfile;
  results: BackendResult[];
  skipped: BackendUnavailableError[];
  now?: Date;
}

export function reportOptions(config: BenchConfig): ReportOptions {
  return {
    ffmpeg: config.ffmpegPath,
    videos: config.videosDir,
    output: config.output,
    gpu: config.gpuIndex,
    stream_sequence: [...config.streamSequence],
    max_streams: config.maxStreams,
    trial_timeout_s: config.trialTimeoutSeconds,
  };
}

export function buildReport(input: ReportInput): Report {
  const backends: Report["backends"] = {};
  for (const result of input.results) {
    backends[result.backend] = result;
  }
  return {
    tool: { ...input.tool },
    timestamp: (input.now ?? new Date()).toISOString(),
    options: reportOptions(input.config),
    hwinfo: input.hardware,
    backends,
    skipped: input.skipped.map((error) => ({ backend: error.backend, reason: error.message })),
  };
}

export function serializeReport(report: Report, indent: number): string {
  return `${JSON.stringify(report, null, indent)}\n`;
}

/**
 * Fail early when the report could not be written, before any long-running work starts.
 */
export async function assertDestinationWritable(destination: string): Promise<void> {
  if (destination === STDOUT_DESTINATION) {
    return;
  }
  try {
    const stats = await fs.stat(destination);
    if (stats.isDirectory()) {
      throw new WriteError(destination, "destination is a directory");
    }
    await fs.access(destination, fs.constants.W_OK);
    return;
  } catch (error) {
    if (error instanceof WriteError) {
      throw error;
    }
    if (!isMissing(error)) {
      throw new WriteError(destination, errorMessage(error), { cause: error });
    }
  }

  const directory = path.dirname(destination);
  try {
    await fs.access(directory, fs.constants.W_OK);
  } catch (error) {
    throw new WriteError(destination, `directory "${directory}" is not writable`, { cause: error });
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function writeReport(
  report: Report,
  destination: string,
  stdout: ReportWriter,
): Promise<void> {
  if (destination === STDOUT_DESTINATION) {
    stdout.write(serializeReport(report, 4));
    return;
  }
  try {
    await fs.writeFile(destination, serializeReport(report, 2), "utf-8");
  } catch (error) {
    throw new WriteError(destination, errorMessage(error), { cause: error });
  }
}
