import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export interface BenchConfig {
  ffmpegPath: string;
  videosDir: string;
  output: string;
  gpuIndex: number | null;
  debug: boolean;
  streamSequence: number[];
  maxStreams: number;
  trialTimeoutSeconds: number;
  trialPauseMs: number;
  allowUnknownHardware: boolean;
  assetMirror: string | null;
  logDir: string | null;
}

/** Values given on the command line; anything left undefined falls back to the file or defaults. */
export interface CliOverrides {
  ffmpeg?: string;
  videos: string;
  output?: string;
  gpu?: number;
  debug?: boolean;
  streams?: number[];
  maxStreams?: number;
  timeout?: number;
  allowUnknownHardware?: boolean;
  logDir?: string;
}

export const DEFAULT_FFMPEG_PATH = "/usr/lib/jellyfin-ffmpeg/ffmpeg";
export const DEFAULT_STREAM_SEQUENCE = [1, 2, 3, 4, 6, 8, 12, 16, 24, 32];

const DEFAULT_CONFIG: Omit<BenchConfig, "videosDir"> = {
  ffmpegPath: DEFAULT_FFMPEG_PATH,
  output: "-",
  gpuIndex: null,
  debug: false,
  streamSequence: DEFAULT_STREAM_SEQUENCE,
  maxStreams: 32,
  trialTimeoutSeconds: 120,
  trialPauseMs: 1000,
  allowUnknownHardware: false,
  assetMirror: null,
  logDir: null,
};

const streamSequenceSchema = z
  .array(z.number().int().positive())
  .min(1)
  .refine((values) => values.every((value, i) => i === 0 || value > values[i - 1]), {
    message: "Stream counts must be strictly ascending",
  });

const fileConfigSchema = z
  .object({
    ffmpegPath: z.string().min(1),
    output: z.string().min(1),
    gpuIndex: z.number().int().nonnegative(),
    debug: z.boolean(),
    streamSequence: streamSequenceSchema,
    maxStreams: z.number().int().positive(),
    trialTimeoutSeconds: z.number().positive(),
    trialPauseMs: z.number().int().nonnegative(),
    allowUnknownHardware: z.boolean(),
    assetMirror: z.string().url(),
    logDir: z.string().min(1),
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function expandHome(target: string): string {
  if (target === "~") {
    return os.homedir();
  }
  if (target.startsWith("~/")) {
    return path.join(os.homedir(), target.slice(2));
  }
  return target;
}

function resolvePath(target: string): string {
  return target === "-" ? target : path.resolve(expandHome(target));
}

export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const resolved = resolvePath(configPath);
  if (!existsSync(resolved)) {
    throw new ConfigError(`Config file not found at ${resolved}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(resolved, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${error.message}`);
    }
    throw error;
  }

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `- ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config file ${resolved}:\n${issues}`);
  }
  return result.data;
}

/** Merge defaults, the optional config file and the command line, in that order. */
export function resolveConfig(cli: CliOverrides, file: FileConfig = {}): BenchConfig {
  const merged: BenchConfig = {
    ...DEFAULT_CONFIG,
    ...file,
    videosDir: cli.videos,
  };

  if (cli.ffmpeg !== undefined) merged.ffmpegPath = cli.ffmpeg;
  if (cli.output !== undefined) merged.output = cli.output;
  if (cli.gpu !== undefined) merged.gpuIndex = cli.gpu;
  if (cli.debug) merged.debug = true;
  if (cli.streams !== undefined) merged.streamSequence = cli.streams;
  if (cli.maxStreams !== undefined) merged.maxStreams = cli.maxStreams;
  if (cli.timeout !== undefined) merged.trialTimeoutSeconds = cli.timeout;
  if (cli.allowUnknownHardware) merged.allowUnknownHardware = true;
  if (cli.logDir !== undefined) merged.logDir = cli.logDir;

  const sequence = streamSequenceSchema.safeParse(merged.streamSequence);
  if (!sequence.success) {
    throw new ConfigError(`Invalid stream sequence: ${sequence.error.issues[0]?.message}`);
  }

  const bounded = merged.streamSequence.filter((streams) => streams <= merged.maxStreams);
  if (bounded.length === 0) {
    throw new ConfigError(
      `--max-streams ${merged.maxStreams} excludes every stream count in ${merged.streamSequence.join(",")}`,
    );
  }

  return {
    ...merged,
    streamSequence: bounded,
    ffmpegPath: resolvePath(merged.ffmpegPath),
    videosDir: resolvePath(merged.videosDir),
    output: resolvePath(merged.output),
    logDir: merged.logDir === null ? null : resolvePath(merged.logDir),
  };
}

/** Parse a comma-separated list of stream counts, e.g. `1,2,4,8`. */
export function parseStreamList(value: string): number[] {
  const streams = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => Number(item));
  const result = streamSequenceSchema.safeParse(streams);
  if (!result.success) {
    throw new ConfigError(
      `"${value}" is not an ascending list of positive stream counts`,
    );
  }
  return result.data;
}
