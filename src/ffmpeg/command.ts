import ffmpeg from "fluent-ffmpeg";
import type { BackendTemplate } from "../backends.js";
import type { Logger } from "../utils/logger.js";
import type { TestCondition } from "../types.js";
import { classifyFFmpegLine } from "./output.js";

export interface TrialInput {
  path: string;
  options: string[];
}

/**
 * One trial is a single FFmpeg process that opens the source once per simulated stream
 * and encodes each copy to its own null output.
 */
export interface TrialPlan {
  ffmpegPath: string;
  globalOptions: string[];
  inputs: TrialInput[];
  outputs: string[][];
  timeoutSeconds?: number;
}

export interface TrialOutput {
  exitCode: number | null;
  lines: string[];
  /** Set when the process could not run to a clean exit */
  error: string | null;
  timedOut: boolean;
}

export type TrialExecutor = (plan: TrialPlan) => Promise<TrialOutput>;

export interface TrialPlanOptions {
  ffmpegPath: string;
  deviceArg: string;
  timeoutSeconds: number;
}

export function buildTrialPlan(
  template: BackendTemplate,
  condition: TestCondition,
  streams: number,
  options: TrialPlanOptions,
): TrialPlan {
  const bitrate = String(condition.bitrate);
  const encoder = template.encoders[condition.codec];

  const inputs = Array.from({ length: streams }, () => ({
    path: condition.asset.path,
    options: template.inputOptions(condition.codec),
  }));
  const outputs = Array.from({ length: streams }, (_, index) => [
    "-map",
    `${index}:v:0`,
    "-autoscale",
    "0",
    "-an",
    "-sn",
    "-vf",
    template.scaleFilter(condition.size),
    "-c:v",
    encoder,
    ...template.encoderOptions(condition.codec),
    "-b:v",
    bitrate,
    "-maxrate",
    bitrate,
    "-f",
    "null",
  ]);

  return {
    ffmpegPath: options.ffmpegPath,
    globalOptions: [...template.globalOptions(options.deviceArg), "-benchmark"],
    inputs,
    outputs,
    timeoutSeconds: template.timed ? options.timeoutSeconds : undefined,
  };
}

const EXIT_CODE_PATTERN = /exited with code (\d+)/;
// fluent-ffmpeg raises this exact message when its own deadline fires
const TIMEOUT_PATTERN = /^process ran into a timeout/;

export function createTrialExecutor(logger: Logger): TrialExecutor {
  return (plan) =>
    new Promise((resolve) => {
      const lines: string[] = [];
      const command = ffmpeg({ timeout: plan.timeoutSeconds });
      command.setFfmpegPath(plan.ffmpegPath);

      plan.inputs.forEach((input, index) => {
        // fluent-ffmpeg has no global option slot, the first input's options come first
        command
          .input(input.path)
          .inputOptions(index === 0 ? [...plan.globalOptions, ...input.options] : input.options);
      });
      for (const output of plan.outputs) {
        command.output("-").outputOptions(output);
      }

      command.on("start", (commandLine: string) => {
        logger.debug(`Spawned FFmpeg: ${commandLine}`, { module: "ffmpeg" });
      });

      command.on("stderr", (line: string) => {
        lines.push(line);
        if (classifyFFmpegLine(line) === "error") {
          logger.debug(`FFmpeg: ${line}`, { module: "ffmpeg", severity: "error" });
        }
      });

      command.on("error", (error: Error) => {
        const exitCode = error.message.match(EXIT_CODE_PATTERN);
        resolve({
          exitCode: exitCode ? Number.parseInt(exitCode[1], 10) : null,
          lines,
          error: error.message,
          timedOut: TIMEOUT_PATTERN.test(error.message),
        });
      });

      command.on("end", () => {
        resolve({ exitCode: 0, lines, error: null, timedOut: false });
      });

      command.run();
    });
}
