import { existsSync } from "node:fs";
import { BackendUnavailableError, errorMessage } from "./errors.js";
import { parseEncoderList } from "./ffmpeg/output.js";
import type { CommandRunner } from "./ffmpeg/process.js";
import type { SelectedGpu } from "./hardware.js";
import type { Logger } from "./utils/logger.js";
import { BACKENDS, type Backend, type GpuVendor, type VideoCodec } from "./types.js";

/**
 * How one backend is driven. Options are split by where FFmpeg expects them: global
 * options once per process, input options before every `-i`, output options before every
 * `-f null -` target.
 */
export interface BackendTemplate {
  backend: Backend;
  vendor: GpuVendor | null;
  /** Encoder that must be listed by `ffmpeg -encoders` for the backend to be probed available. */
  probeEncoder: string | null;
  encoders: Record<VideoCodec, string>;
  /** Whether trials are bounded by the per-trial timeout */
  timed: boolean;
  globalOptions(deviceArg: string): string[];
  inputOptions(codec: VideoCodec): string[];
  scaleFilter(size: number): string;
  encoderOptions(codec: VideoCodec): string[];
}

const vaapiDevice = (deviceArg: string) => `vaapi=va:/dev/dri/by-path/${deviceArg}-render`;

export const BACKEND_TEMPLATES: Record<Backend, BackendTemplate> = {
  software: {
    backend: "software",
    vendor: null,
    probeEncoder: null,
    encoders: { h264: "libx264", hevc: "libx265" },
    timed: false,
    globalOptions: () => [],
    inputOptions: (codec) => ["-c:v", codec],
    scaleFilter: (size) =>
      `scale=trunc(min(max(iw\\,ih*a)\\,${size})/2)*2:trunc(ow/a/2)*2,format=yuv420p`,
    encoderOptions: () => ["-preset", "veryfast"],
  },
  nvenc: {
    backend: "nvenc",
    vendor: "nvidia",
    probeEncoder: "h264_nvenc",
    encoders: { h264: "h264_nvenc", hevc: "hevc_nvenc" },
    timed: true,
    globalOptions: (deviceArg) => ["-init_hw_device", `cuda=cu:${deviceArg}`],
    inputOptions: (codec) => [
      "-hwaccel",
      "cuda",
      "-hwaccel_output_format",
      "cuda",
      "-c:v",
      `${codec}_cuvid`,
    ],
    scaleFilter: (size) => `scale_cuda=-1:${size}:yuv420p`,
    encoderOptions: () => ["-preset", "p1"],
  },
  qsv: {
    backend: "qsv",
    vendor: "intel",
    probeEncoder: "h264_qsv",
    encoders: { h264: "h264_qsv", hevc: "hevc_qsv" },
    timed: true,
    globalOptions: (deviceArg) => [
      "-init_hw_device",
      vaapiDevice(deviceArg),
      "-init_hw_device",
      "qsv=qs@va",
    ],
    inputOptions: (codec) => [
      "-hwaccel",
      "qsv",
      "-hwaccel_output_format",
      "qsv",
      "-c:v",
      `${codec}_qsv`,
    ],
    scaleFilter: (size) => `scale_qsv=-1:${size}:format=nv12`,
    encoderOptions: () => ["-preset", "veryfast"],
  },
  // AMD hardware is driven through VA-API on Linux
  amf: {
    backend: "amf",
    vendor: "amd",
    probeEncoder: "h264_vaapi",
    encoders: { h264: "h264_vaapi", hevc: "hevc_vaapi" },
    timed: true,
    globalOptions: (deviceArg) => ["-init_hw_device", vaapiDevice(deviceArg)],
    inputOptions: (codec) => [
      "-hwaccel",
      "vaapi",
      "-hwaccel_output_format",
      "vaapi",
      "-c:v",
      codec,
    ],
    scaleFilter: (size) => `scale_vaapi=-1:${size}:format=nv12`,
    encoderOptions: () => [],
  },
};

export interface ProbeDeps {
  exec: CommandRunner;
  pathExists: (path: string) => boolean;
  logger: Logger;
}

export interface ProbeOutcome {
  available: Backend[];
  unavailable: BackendUnavailableError[];
}

const NVIDIA_DEVICE_NODES = ["/dev/nvidiactl", "/dev/nvidia0"];

export const defaultPathExists = (path: string): boolean => existsSync(path);

export async function listEncoders(ffmpegPath: string, exec: CommandRunner): Promise<Set<string>> {
  const result = await exec(ffmpegPath, ["-hide_banner", "-encoders"]);
  if (result.exitCode !== 0) {
    throw new Error(`ffmpeg -encoders exited with code ${result.exitCode}`);
  }
  return parseEncoderList(result.stdout);
}

/** Returns null when the backend can be used, otherwise the reason it cannot. */
export function checkBackend(
  template: BackendTemplate,
  gpu: SelectedGpu | null,
  encoders: Set<string> | null,
  pathExists: (path: string) => boolean,
): string | null {
  if (template.vendor === null) {
    return null;
  }
  if (!gpu) {
    return "no supported GPU detected";
  }
  if (gpu.device.vendorKind !== template.vendor) {
    return `selected GPU "${gpu.device.vendor} ${gpu.device.product}" is not a ${template.vendor} device`;
  }

  const nodes =
    template.vendor === "nvidia"
      ? NVIDIA_DEVICE_NODES
      : [`/dev/dri/by-path/${gpu.deviceArg}-render`];
  const missing = nodes.filter((node) => !pathExists(node));
  if (missing.length > 0) {
    return `device node(s) missing: ${missing.join(", ")}`;
  }

  if (encoders === null) {
    return "could not list FFmpeg encoders";
  }
  if (template.probeEncoder && !encoders.has(template.probeEncoder)) {
    return `FFmpeg was built without the ${template.probeEncoder} encoder`;
  }
  return null;
}

/**
 * Decide which backends can be attempted on this host and binary. Software transcoding
 * is always available; the others need a matching GPU, its device nodes and an encoder
 * compiled into FFmpeg.
 */
export async function probeBackends(
  ffmpegPath: string,
  gpu: SelectedGpu | null,
  deps: ProbeDeps,
): Promise<ProbeOutcome> {
  const { logger } = deps;

  let encoders: Set<string> | null = null;
  try {
    encoders = await listEncoders(ffmpegPath, deps.exec);
  } catch (error) {
    logger.warn("Could not list FFmpeg encoders, hardware backends will be skipped", {
      module: "backends",
      error: errorMessage(error),
    });
  }

  const outcome: ProbeOutcome = { available: [], unavailable: [] };
  for (const backend of BACKENDS) {
    const reason = checkBackend(BACKEND_TEMPLATES[backend], gpu, encoders, deps.pathExists);
    if (reason === null) {
      outcome.available.push(backend);
      logger.debug(`Backend ${backend} is available`, { module: "backends", backend });
    } else {
      outcome.unavailable.push(new BackendUnavailableError(backend, reason));
      logger.info(`Skipping ${backend}: ${reason}`, { module: "backends", backend });
    }
  }
  return outcome;
}
