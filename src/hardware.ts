import si from "systeminformation";
import { z } from "zod";
import { AmbiguousDeviceError, HardwareDetectionError, errorMessage } from "./errors.js";
import type { CommandResult, CommandRunner } from "./ffmpeg/process.js";
import type { Logger } from "./utils/logger.js";
import type { GpuDevice, GpuVendor, HardwareProfile, OsSummary } from "./types.js";

const lshwNodeSchema = z
  .object({
    id: z.string().optional(),
    class: z.string().optional(),
    description: z.string().optional(),
    product: z.string().optional(),
    vendor: z.string().optional(),
    businfo: z.string().optional(),
    size: z.number().optional(),
    configuration: z.record(z.union([z.string(), z.number()])).optional(),
  })
  .passthrough();

export type LshwNode = z.infer<typeof lshwNodeSchema>;

const lshwOutputSchema = z.array(lshwNodeSchema);

// Only these vendors ship encoders we know how to drive
const GPU_VENDORS: Record<string, GpuVendor> = {
  "NVIDIA Corporation": "nvidia",
  "Advanced Micro Devices, Inc. [AMD/ATI]": "amd",
  "Intel Corporation": "intel",
};

export type LshwClass = "cpu" | "memory" | "display";

export interface SelectedGpu {
  device: GpuDevice;
  /** NVIDIA ordinal for CUDA, or the `/dev/dri/by-path` prefix for VA-API and QSV. */
  deviceArg: string;
}

export interface DetectedHardware {
  profile: HardwareProfile;
  gpu: SelectedGpu | null;
}

export interface HardwareDeps {
  exec: CommandRunner;
  osInfo: () => Promise<OsSummary>;
  logger: Logger;
}

export interface HardwareOptions {
  ffmpegPath: string;
  ffmpegVersion: string;
  gpuIndex: number | null;
  allowUnknownHardware: boolean;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Some lshw releases print several objects without commas between them
    return JSON.parse(text.replace(/}\s*{/g, "},{"));
  }
}

/**
 * Parse `lshw -json -class <x>` output. Newer releases print an array; older ones print
 * the matching objects one after another without the surrounding brackets.
 */
export function parseLshw(output: string): LshwNode[] {
  const text = output.trim();
  if (text.length === 0) {
    return [];
  }
  const raw = parseJson(text.startsWith("[") ? text : `[${text}]`);
  const result = lshwOutputSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`unexpected lshw output: ${result.error.issues[0]?.message ?? "invalid shape"}`);
  }
  return result.data;
}

function configNumber(node: LshwNode, key: string): number | null {
  const value = node.configuration?.[key];
  if (value === undefined) {
    return null;
  }
  const parsed = typeof value === "number" ? value : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

export function summarizeCpu(nodes: LshwNode[]): HardwareProfile["cpu"] {
  const cpu = nodes.find((node) => node.class === undefined || node.class === "processor");
  return {
    model: cpu?.product ?? "unknown",
    vendor: cpu?.vendor ?? "unknown",
    cores: cpu ? configNumber(cpu, "cores") : null,
    threads: cpu ? configNumber(cpu, "threads") : null,
  };
}

export function summarizeMemory(nodes: LshwNode[]): HardwareProfile["memory"] {
  const system = nodes.find((node) => node.description === "System Memory");
  if (system?.size !== undefined) {
    return { total_bytes: system.size };
  }
  const banks = nodes.filter((node) => node.id?.startsWith("memory") && node.size !== undefined);
  if (banks.length === 0) {
    return { total_bytes: null };
  }
  return { total_bytes: banks.reduce((sum, node) => sum + (node.size ?? 0), 0) };
}

/** Keep the display adapters from supported vendors, numbered in discovery order. */
export function summarizeGpus(nodes: LshwNode[]): GpuDevice[] {
  const gpus: GpuDevice[] = [];
  for (const node of nodes) {
    const vendorKind = node.vendor ? GPU_VENDORS[node.vendor] : undefined;
    if (!node.vendor || !vendorKind) {
      continue;
    }
    gpus.push({
      index: gpus.length,
      vendor: node.vendor,
      vendorKind,
      product: node.product ?? "unknown",
      businfo: node.businfo ?? "unknown",
    });
  }
  return gpus;
}

export function gpuDeviceArg(gpu: GpuDevice, all: GpuDevice[]): string {
  if (gpu.vendorKind === "nvidia") {
    // CUDA numbers NVIDIA cards on their own
    return String(all.filter((entry) => entry.vendorKind === "nvidia").indexOf(gpu));
  }
  return gpu.businfo.replace("@", "-");
}

export function selectGpu(gpus: GpuDevice[], index: number | null): SelectedGpu | null {
  if (gpus.length === 0) {
    return null;
  }
  if (index === null) {
    if (gpus.length > 1) {
      throw new AmbiguousDeviceError(
        "Your system has more than one viable GPU and we cannot test multiple GPUs simultaneously.",
        gpus,
      );
    }
    return { device: gpus[0], deviceArg: gpuDeviceArg(gpus[0], gpus) };
  }
  const device = gpus[index];
  if (!device) {
    throw new AmbiguousDeviceError(`Invalid GPU index ${index} selected.`, gpus);
  }
  return { device, deviceArg: gpuDeviceArg(device, gpus) };
}

async function runLshw(lshwClass: LshwClass, exec: CommandRunner): Promise<LshwNode[]> {
  let result: CommandResult;
  try {
    result = await exec("lshw", ["-json", "-class", lshwClass]);
  } catch (error) {
    throw new HardwareDetectionError(
      `Could not run 'lshw' (${errorMessage(error)}). The 'lshw' program is needed to gather required system information. Please install it and try again.`,
      { cause: error },
    );
  }
  if (result.exitCode !== 0) {
    throw new HardwareDetectionError(
      `'lshw -class ${lshwClass}' exited with code ${result.exitCode}: ${result.stderr.trim()}`,
    );
  }
  try {
    return parseLshw(result.stdout);
  } catch (error) {
    throw new HardwareDetectionError(
      `Could not parse 'lshw -class ${lshwClass}' output: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

export async function readOsInfo(): Promise<OsSummary> {
  const info = await si.osInfo();
  return {
    platform: info.platform,
    distro: info.distro,
    release: info.release,
    codename: info.codename,
    kernel: info.kernel,
    arch: info.arch,
  };
}

const UNKNOWN_OS: OsSummary = {
  platform: "unknown",
  distro: "unknown",
  release: "unknown",
  codename: "unknown",
  kernel: "unknown",
  arch: "unknown",
};

/**
 * Collect the host description once and pick the GPU to test.
 */
export async function inspectHardware(
  options: HardwareOptions,
  deps: HardwareDeps,
): Promise<DetectedHardware> {
  const { exec, logger } = deps;

  const detect = async <T>(what: string, run: () => Promise<T>, fallback: T): Promise<T> => {
    try {
      return await run();
    } catch (error) {
      if (!options.allowUnknownHardware) {
        throw error instanceof HardwareDetectionError
          ? error
          : new HardwareDetectionError(`${what} detection failed: ${errorMessage(error)}`, {
              cause: error,
            });
      }
      logger.warn(`${what} detection failed, reporting it as unknown`, {
        module: "hardware",
        error: errorMessage(error),
      });
      return fallback;
    }
  };

  const os = await detect("OS", deps.osInfo, UNKNOWN_OS);
  const cpu = await detect(
    "CPU",
    async () => summarizeCpu(await runLshw("cpu", exec)),
    { model: "unknown", vendor: "unknown", cores: null, threads: null },
  );
  const memory = await detect(
    "Memory",
    async () => summarizeMemory(await runLshw("memory", exec)),
    { total_bytes: null },
  );
  const gpus = await detect(
    "GPU",
    async () => summarizeGpus(await runLshw("display", exec)),
    [],
  );

  const gpu = selectGpu(gpus, options.gpuIndex);
  if (gpu) {
    logger.info(`Using GPU "${gpu.device.vendor} ${gpu.device.product}"`, {
      module: "hardware",
      businfo: gpu.device.businfo,
    });
  } else {
    logger.info("No supported GPU detected, only software transcoding will be tested", {
      module: "hardware",
    });
  }

  return {
    profile: {
      os,
      ffmpeg: { path: options.ffmpegPath, version: options.ffmpegVersion },
      cpu,
      memory,
      gpu: gpus,
      selected_gpu: gpu ? gpu.device.index : null,
    },
    gpu,
  };
}
