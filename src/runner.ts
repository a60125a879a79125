import { setTimeout as delay } from "node:timers/promises";
import { BACKEND_TEMPLATES } from "./backends.js";
import { CODECS, buildConditions } from "./conditions.js";
import { TranscodeInvocationError } from "./errors.js";
import { buildTrialPlan, type TrialExecutor, type TrialOutput } from "./ffmpeg/command.js";
import { extractFailureReason, parseTrialOutput } from "./ffmpeg/output.js";
import type { Logger } from "./utils/logger.js";
import type {
  Backend,
  BackendResult,
  ConditionResult,
  LocalAsset,
  Measurement,
  TestCondition,
} from "./types.js";

export const REALTIME_SPEED = 1.0;

export interface RunnerOptions {
  ffmpegPath: string;
  /** Device selector for hardware backends; ignored by software */
  deviceArg: string;
  streamSequence: number[];
  trialTimeoutSeconds: number;
  trialPauseMs: number;
}

export interface RunnerDeps {
  executor: TrialExecutor;
  logger: Logger;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface TrialEvaluation {
  measurement: Measurement;
  /** Set when FFmpeg could not produce a measurement at all */
  invocationError: string | null;
}

export interface SearchResult {
  runs: Measurement[];
  maxStreams: number;
  invocationError: string | null;
}

export function isPassing(speed: number): boolean {
  return speed >= REALTIME_SPEED;
}

export function evaluateTrial(streams: number, output: TrialOutput): TrialEvaluation {
  const stats = parseTrialOutput(output.lines);
  const base = {
    streams,
    speed: stats.speed,
    frame: stats.frame,
    time_s: stats.time_s,
    rss_kb: stats.rss_kb,
  };

  if (output.error !== null || output.exitCode !== 0) {
    let reason: string;
    if (output.timedOut) {
      reason = "timeout";
    } else if (output.lines.length > 0) {
      reason = extractFailureReason(output.lines);
    } else {
      reason = output.error ?? "generic failure";
    }
    return { measurement: { ...base, passing: false, error: reason }, invocationError: reason };
  }

  if (stats.speed === null) {
    const reason = "no speed= progress in FFmpeg output";
    return { measurement: { ...base, passing: false, error: reason }, invocationError: reason };
  }

  const passing = isPassing(stats.speed);
  return {
    measurement: { ...base, passing, error: passing ? null : "performance" },
    invocationError: null,
  };
}

/**
 * Walk the ascending stream sequence until a trial fails or the sequence ends. The result
 * is the last passing stream count; nothing above a failed count is ever attempted.
 * An invocation failure on the very first trial is reported separately because it means
 * the backend cannot run this condition at all.
 */
export async function searchStreams(
  runTrial: (streams: number) => Promise<TrialOutput>,
  sequence: number[],
  pause: () => Promise<unknown> = async () => undefined,
): Promise<SearchResult> {
  const runs: Measurement[] = [];
  let maxStreams = 0;

  for (const [position, streams] of sequence.entries()) {
    if (position > 0) {
      await pause();
    }
    const { measurement, invocationError } = evaluateTrial(streams, await runTrial(streams));
    runs.push(measurement);

    if (invocationError !== null && position === 0) {
      return { runs, maxStreams: 0, invocationError };
    }
    if (!measurement.passing) {
      break;
    }
    maxStreams = streams;
  }

  return { runs, maxStreams, invocationError: null };
}

function summarizeCondition(
  backend: Backend,
  condition: TestCondition,
  search: SearchResult,
): ConditionResult {
  const single = search.runs.find((run) => run.streams === 1);
  const failureReasons = [
    ...new Set(search.runs.flatMap((run) => (run.error === null ? [] : [run.error]))),
  ];
  return {
    codec: condition.codec,
    encoder: BACKEND_TEMPLATES[backend].encoders[condition.codec],
    scale_from: condition.scaleFrom,
    scale_to: condition.scaleTo,
    bitrate: condition.bitrate,
    runs: search.runs,
    max_streams: search.maxStreams,
    failure_reasons: failureReasons,
    single_stream_speed: single?.speed ?? null,
    single_stream_rss_kb: single?.rss_kb ?? null,
  };
}

/**
 * Run every condition for one backend. The backend summary is the stream count it
 * sustained in all of its conditions.
 */
export async function runBackend(
  backend: Backend,
  assets: LocalAsset[],
  options: RunnerOptions,
  deps: RunnerDeps,
): Promise<BackendResult> {
  const { executor, logger } = deps;
  const sleep = deps.sleep ?? delay;
  const template = BACKEND_TEMPLATES[backend];
  const result: BackendResult = {
    backend,
    max_passing_streams: null,
    error: null,
    conditions: [],
  };

  logger.info(`Running ${backend} encoder tests`, { module: "runner", backend });

  let first = true;
  for (const codec of CODECS) {
    for (const condition of buildConditions(assets, codec)) {
      if (!first) {
        await sleep(options.trialPauseMs);
      }
      first = false;

      logger.info(`Running ${backend} ${condition.label} tests`, {
        module: "runner",
        backend,
        codec,
      });

      const search = await searchStreams(
        (streams) => {
          logger.debug(`Starting trial with ${streams} simultaneous stream(s)`, {
            module: "runner",
            backend,
            streams,
          });
          return executor(
            buildTrialPlan(template, condition, streams, {
              ffmpegPath: options.ffmpegPath,
              deviceArg: options.deviceArg,
              timeoutSeconds: options.trialTimeoutSeconds,
            }),
          );
        },
        options.streamSequence,
        () => sleep(options.trialPauseMs),
      );

      for (const run of search.runs) {
        logger.logTrial({ backend, condition: condition.label, streams: run.streams }, run, {
          module: "runner",
          codec,
        });
      }

      result.conditions.push(summarizeCondition(backend, condition, search));

      if (search.invocationError !== null) {
        const error = new TranscodeInvocationError(backend, search.invocationError, condition.label);
        logger.warn(`${backend} failed to run, aborting further tests with this backend`, {
          module: "runner",
          backend,
          error: error.message,
        });
        result.error = error.reason;
        return result;
      }

      logger.info(
        `Found max streams for ${backend} ${condition.label}: ${search.maxStreams}`,
        { module: "runner", backend, codec },
      );
    }
  }

  if (result.conditions.length > 0) {
    result.max_passing_streams = Math.min(
      ...result.conditions.map((condition) => condition.max_streams),
    );
  }
  return result;
}

export async function runBackends(
  backends: Backend[],
  assets: LocalAsset[],
  options: RunnerOptions,
  deps: RunnerDeps,
): Promise<BackendResult[]> {
  const results: BackendResult[] = [];
  for (const backend of backends) {
    results.push(await runBackend(backend, assets, options, deps));
  }
  return results;
}
