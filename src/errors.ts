import type { Backend, GpuDevice } from "./types.js";

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  TRANSCODER_NOT_FOUND = 2,
  DOWNLOAD = 3,
  HARDWARE_DETECTION = 4,
  AMBIGUOUS_DEVICE = 5,
  WRITE = 6,
}

/**
 * Base class for every error the benchmark raises on purpose. Fatal errors end the run
 * with `exitCode`; non-fatal ones are recorded in the report instead.
 */
export class BenchError extends Error {
  readonly exitCode: ExitCode;
  readonly fatal: boolean;

  constructor(message: string, exitCode: ExitCode, fatal = true, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
    this.fatal = fatal;
  }
}

export class ConfigError extends BenchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ExitCode.FAILURE, true, options);
  }
}

export class TranscoderNotFoundError extends BenchError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(
      `Could not use FFmpeg binary "${path}": ${reason}. Ensure you specified a valid FFmpeg path with --ffmpeg and try again.`,
      ExitCode.TRANSCODER_NOT_FOUND,
    );
    this.path = path;
  }
}

export class DownloadError extends BenchError {
  readonly url: string;

  constructor(url: string, reason: string, options?: ErrorOptions) {
    super(`Failed to download "${url}": ${reason}`, ExitCode.DOWNLOAD, true, options);
    this.url = url;
  }
}

export class HardwareDetectionError extends BenchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ExitCode.HARDWARE_DETECTION, true, options);
  }
}

export class AmbiguousDeviceError extends BenchError {
  readonly devices: GpuDevice[];

  constructor(headline: string, devices: GpuDevice[]) {
    const listing = devices
      .map((gpu) => `  ${gpu.index}: ${gpu.vendor} ${gpu.product} bus ID ${gpu.businfo}`)
      .join("\n");
    super(
      `${headline}\nPlease re-run the test specifying the desired GPU index number with the "--gpu" option.\n\nFound GPUs:\n${listing}`,
      ExitCode.AMBIGUOUS_DEVICE,
    );
    this.devices = devices;
  }
}

export class BackendUnavailableError extends BenchError {
  readonly backend: Backend;

  constructor(backend: Backend, reason: string) {
    super(reason, ExitCode.SUCCESS, false);
    this.backend = backend;
  }
}

export class TranscodeInvocationError extends BenchError {
  readonly backend: Backend;
  readonly reason: string;

  constructor(backend: Backend, reason: string, detail?: string) {
    super(detail ? `${reason}: ${detail}` : reason, ExitCode.FAILURE, false);
    this.backend = backend;
    this.reason = reason;
  }
}

export class WriteError extends BenchError {
  readonly destination: string;

  constructor(destination: string, reason: string, options?: ErrorOptions) {
    super(`Cannot write report to "${destination}": ${reason}`, ExitCode.WRITE, true, options);
    this.destination = destination;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
