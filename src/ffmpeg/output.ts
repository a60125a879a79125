/**
 * Parsers for the text FFmpeg prints. Everything here is pure so tests can feed canned
 * output without a binary.
 */

export interface ProgressStats {
  frame: number;
  fps: number | null;
  time: string | null;
  speed: number;
}

export interface BenchStats {
  utime_s: number | null;
  stime_s: number | null;
  rtime_s: number | null;
  maxrss_kb: number | null;
}

export interface TrialStats {
  speed: number | null;
  frame: number | null;
  time_s: number | null;
  rss_kb: number | null;
}

export type FFmpegLineLevel = "error" | "warn" | "info" | "debug";

// Progress line: frame= 1234 fps= 98 q=-0.0 size=N/A time=00:00:41.13 bitrate=N/A speed=1.64x
const PROGRESS_PATTERN = /frame=\s*(\d+)(?:.*?fps=\s*([\d.]+))?(?:.*?time=\s*(\S+))?.*?speed=\s*([\d.]+)x/;
const BENCH_TIMES_PATTERN = /^bench: utime=([\d.]+)s\s+stime=([\d.]+)s\s+rtime=([\d.]+)s/;
const BENCH_RSS_PATTERN = /^bench: maxrss=(\d+)(?:kB|KiB)/;
const VERSION_PATTERN = /ffmpeg version (.*) Copyright/;
const VERSION_FALLBACK_PATTERN = /ffmpeg version (\S+)/i;
const ENCODER_PATTERN = /^\s*[VAS][F.][S.][X.][B.][D.]\s+(\S+)/;

export function splitLines(output: string): string[] {
  // Progress updates are separated by carriage returns when stderr is not a TTY
  return output.split(/\r\n|\r|\n/).map((line) => line.trim()).filter((line) => line.length > 0);
}

export function parseProgressLine(line: string): ProgressStats | null {
  const match = line.match(PROGRESS_PATTERN);
  if (!match) {
    return null;
  }
  const [, frame, fps, time, speed] = match;
  return {
    frame: Number.parseInt(frame, 10),
    fps: fps === undefined ? null : Number.parseFloat(fps),
    time: time ?? null,
    speed: Number.parseFloat(speed),
  };
}

/** The last progress line that reports a numeric speed is the final achieved ratio. */
export function parseFinalProgress(lines: string[]): ProgressStats | null {
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    const progress = parseProgressLine(lines[i]);
    if (progress) {
      return progress;
    }
  }
  return null;
}

export function parseBenchStats(lines: string[]): BenchStats {
  const stats: BenchStats = { utime_s: null, stime_s: null, rtime_s: null, maxrss_kb: null };
  for (const line of lines) {
    const times = line.match(BENCH_TIMES_PATTERN);
    if (times) {
      stats.utime_s = Number.parseFloat(times[1]);
      stats.stime_s = Number.parseFloat(times[2]);
      stats.rtime_s = Number.parseFloat(times[3]);
      continue;
    }
    const rss = line.match(BENCH_RSS_PATTERN);
    if (rss) {
      stats.maxrss_kb = Number.parseInt(rss[1], 10);
    }
  }
  return stats;
}

export function parseTrialOutput(lines: string[]): TrialStats {
  const progress = parseFinalProgress(lines);
  const bench = parseBenchStats(lines);
  return {
    speed: progress?.speed ?? null,
    frame: progress?.frame ?? null,
    time_s: bench.rtime_s,
    rss_kb: bench.maxrss_kb,
  };
}

const FAILURE_PATTERNS: Array<{ pattern: RegExp; group: number }> = [
  { pattern: / failed: (.*)\(-?\d+\)/, group: 1 },
  { pattern: / failed -> (.*?): (.*)/, group: 2 },
  { pattern: / failed!: (.*) \(-?\d+\)/, group: 1 },
  { pattern: /^Error (.*)/, group: 1 },
];

/**
 * Pick the canonical reason out of a failed run's stderr. Patterns are tried in order
 * against every line; the first pattern with any match wins.
 */
export function extractFailureReason(lines: string[]): string {
  for (const { pattern, group } of FAILURE_PATTERNS) {
    for (const line of lines) {
      const match = line.match(pattern);
      const reason = match?.[group]?.trim();
      if (reason) {
        return reason;
      }
    }
  }
  return "generic failure";
}

export function parseFFmpegVersion(output: string): string | null {
  const firstLine = splitLines(output)[0] ?? "";
  const match = firstLine.match(VERSION_PATTERN) ?? firstLine.match(VERSION_FALLBACK_PATTERN);
  return match ? match[1].trim() : null;
}

/** Encoder names from `ffmpeg -hide_banner -encoders`. */
export function parseEncoderList(output: string): Set<string> {
  const encoders = new Set<string>();
  let inTable = false;
  for (const line of output.split("\n")) {
    if (line.trim() === "------") {
      inTable = true;
      continue;
    }
    if (!inTable) {
      continue;
    }
    const match = line.match(ENCODER_PATTERN);
    if (match) {
      encoders.add(match[1]);
    }
  }
  return encoders;
}

export function classifyFFmpegLine(line: string): FFmpegLineLevel {
  if (line.includes("Error") || line.includes("failed") || line.includes("Cannot")) {
    return "error";
  }
  if (line.includes("deprecated") || line.includes("Could not find")) {
    return "warn";
  }
  if (line.includes("Input #") || line.includes("Output #")) {
    return "info";
  }
  return "debug";
}
