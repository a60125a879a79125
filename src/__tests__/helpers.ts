import type { CommandResult, CommandRunner } from "../ffmpeg/process.js";
import { Logger, LogLevel } from "../utils/logger.js";
import type { GpuDevice, OsSummary } from "../types.js";

export function silentLogger(): Logger {
  return new Logger({ level: LogLevel.DEBUG, enableConsole: false, enableFile: false });
}

export const ok = (stdout: string): CommandResult => ({ stdout, stderr: "", exitCode: 0 });

/** Answers each command by the first matching key, `file args...`. */
export function scriptedExec(responses: Record<string, CommandResult>): CommandRunner {
  return async (file, args) => {
    const key = [file, ...args].join(" ");
    const response = responses[key];
    if (!response) {
      throw new Error(`unexpected command: ${key}`);
    }
    return response;
  };
}

export const TEST_OS: OsSummary = {
  platform: "linux",
  distro: "Test Linux",
  release: "1.0",
  codename: "test",
  kernel: "6.1.0",
  arch: "x64",
};

export const NVIDIA_GPU: GpuDevice = {
  index: 0,
  vendor: "NVIDIA Corporation",
  vendorKind: "nvidia",
  product: "Test GPU 1000",
  businfo: "pci@0000:01:00.0",
};

export const INTEL_GPU: GpuDevice = {
  index: 1,
  vendor: "Intel Corporation",
  vendorKind: "intel",
  product: "Test Graphics 700",
  businfo: "pci@0000:00:02.0",
};
