import { describe, expect, it } from "vitest";
import { AmbiguousDeviceError, ExitCode, HardwareDetectionError } from "../errors.js";
import {
  gpuDeviceArg,
  inspectHardware,
  parseLshw,
  selectGpu,
  summarizeCpu,
  summarizeGpus,
  summarizeMemory,
} from "../hardware.js";
import type { CommandRunner } from "../ffmpeg/process.js";
import { INTEL_GPU, NVIDIA_GPU, TEST_OS, ok, scriptedExec, silentLogger } from "./helpers.js";

const CPU_JSON = JSON.stringify([
  {
    id: "cpu",
    class: "processor",
    product: "Test CPU 9000",
    vendor: "Test Vendor",
    configuration: { cores: "8", threads: "16" },
  },
]);

const MEMORY_JSON = JSON.stringify([
  { id: "memory", class: "memory", description: "System Memory", size: 17179869184 },
]);

const DISPLAY_LEGACY = [
  '{"id":"display","class":"display","vendor":"NVIDIA Corporation","product":"Test GPU 1000","businfo":"pci@0000:01:00.0"}',
  '{"id":"display","class":"display","vendor":"Matrox Electronics Systems Ltd.","product":"Test VGA","businfo":"pci@0000:03:00.0"}',
].join("\n");

describe("parseLshw", () => {
  it("reads the array form", () => {
    expect(summarizeCpu(parseLshw(CPU_JSON))).toEqual({
      model: "Test CPU 9000",
      vendor: "Test Vendor",
      cores: 8,
      threads: 16,
    });
  });

  it("reads objects printed back to back without brackets", () => {
    const nodes = parseLshw(DISPLAY_LEGACY);
    expect(nodes.map((node) => node.product)).toEqual(["Test GPU 1000", "Test VGA"]);
  });

  it("returns nothing for empty output", () => {
    expect(parseLshw("  \n")).toEqual([]);
  });

  it("rejects output of the wrong shape", () => {
    expect(() => parseLshw('{"size":"large"}')).toThrow(/unexpected lshw output/);
  });
});

describe("summarizeMemory", () => {
  it("uses the system memory node", () => {
    expect(summarizeMemory(parseLshw(MEMORY_JSON))).toEqual({ total_bytes: 17179869184 });
  });

  it("adds up memory banks otherwise", () => {
    expect(
      summarizeMemory([
        { id: "memory:0", size: 1024 },
        { id: "memory:1", size: 2048 },
        { id: "cache:0", size: 4096 },
      ]),
    ).toEqual({ total_bytes: 3072 });
  });

  it("reports unknown when no size is present", () => {
    expect(summarizeMemory([{ id: "firmware" }])).toEqual({ total_bytes: null });
  });
});

describe("summarizeGpus", () => {
  it("keeps supported vendors and numbers them in order", () => {
    expect(summarizeGpus(parseLshw(DISPLAY_LEGACY))).toEqual([NVIDIA_GPU]);
  });
});

describe("gpuDeviceArg", () => {
  it("numbers NVIDIA cards among themselves", () => {
    const second = { ...NVIDIA_GPU, index: 2, businfo: "pci@0000:02:00.0" };
    expect(gpuDeviceArg(second, [NVIDIA_GPU, INTEL_GPU, second])).toBe("1");
  });

  it("uses the PCI path for other vendors", () => {
    expect(gpuDeviceArg(INTEL_GPU, [NVIDIA_GPU, INTEL_GPU])).toBe("pci-0000:00:02.0");
  });
});

describe("selectGpu", () => {
  it("returns null without GPUs", () => {
    expect(selectGpu([], null)).toBeNull();
  });

  it("picks the only GPU without an index", () => {
    expect(selectGpu([INTEL_GPU], null)).toEqual({
      device: INTEL_GPU,
      deviceArg: "pci-0000:00:02.0",
    });
  });

  it("lists every GPU when the choice is ambiguous", () => {
    const gpus = [NVIDIA_GPU, INTEL_GPU];
    let caught: unknown;
    try {
      selectGpu(gpus, null);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AmbiguousDeviceError);
    expect(caught).toMatchObject({ exitCode: ExitCode.AMBIGUOUS_DEVICE, devices: gpus });
    expect(caught instanceof Error ? caught.message : "").toBe(
      [
        "Your system has more than one viable GPU and we cannot test multiple GPUs simultaneously.",
        'Please re-run the test specifying the desired GPU index number with the "--gpu" option.',
        "",
        "Found GPUs:",
        "  0: NVIDIA Corporation Test GPU 1000 bus ID pci@0000:01:00.0",
        "  1: Intel Corporation Test Graphics 700 bus ID pci@0000:00:02.0",
      ].join("\n"),
    );
  });

  it("honours an explicit index", () => {
    expect(selectGpu([NVIDIA_GPU, INTEL_GPU], 0)?.deviceArg).toBe("0");
  });

  it("rejects an index out of range", () => {
    expect(() => selectGpu([NVIDIA_GPU, INTEL_GPU], 5)).toThrow(/^Invalid GPU index 5 selected\./);
  });
});

describe("inspectHardware", () => {
  const options = {
    ffmpegPath: "/opt/ffmpeg/ffmpeg",
    ffmpegVersion: "6.0",
    gpuIndex: null,
    allowUnknownHardware: false,
  };

  it("builds the hardware profile", async () => {
    const exec = scriptedExec({
      "lshw -json -class cpu": ok(CPU_JSON),
      "lshw -json -class memory": ok(MEMORY_JSON),
      "lshw -json -class display": ok(DISPLAY_LEGACY),
    });
    const { profile, gpu } = await inspectHardware(options, {
      exec,
      osInfo: async () => TEST_OS,
      logger: silentLogger(),
    });

    expect(profile).toEqual({
      os: TEST_OS,
      ffmpeg: { path: "/opt/ffmpeg/ffmpeg", version: "6.0" },
      cpu: { model: "Test CPU 9000", vendor: "Test Vendor", cores: 8, threads: 16 },
      memory: { total_bytes: 17179869184 },
      gpu: [NVIDIA_GPU],
      selected_gpu: 0,
    });
    expect(gpu).toEqual({ device: NVIDIA_GPU, deviceArg: "0" });
  });

  const missingLshw: CommandRunner = async () => {
    throw new Error("spawn lshw ENOENT");
  };

  it("fails when lshw cannot run", async () => {
    await expect(
      inspectHardware(options, { exec: missingLshw, osInfo: async () => TEST_OS, logger: silentLogger() }),
    ).rejects.toBeInstanceOf(HardwareDetectionError);
  });

  it("falls back to unknown values when allowed", async () => {
    const { profile, gpu } = await inspectHardware(
      { ...options, allowUnknownHardware: true },
      { exec: missingLshw, osInfo: async () => TEST_OS, logger: silentLogger() },
    );
    expect(profile.cpu).toEqual({ model: "unknown", vendor: "unknown", cores: null, threads: null });
    expect(profile.memory).toEqual({ total_bytes: null });
    expect(profile.gpu).toEqual([]);
    expect(profile.selected_gpu).toBeNull();
    expect(gpu).toBeNull();
  });

  it("reports a failing lshw exit code", async () => {
    const exec = scriptedExec({
      "lshw -json -class cpu": { stdout: "", stderr: "permission denied", exitCode: 1 },
    });
    await expect(
      inspectHardware(options, { exec, osInfo: async () => TEST_OS, logger: silentLogger() }),
    ).rejects.toThrow("'lshw -class cpu' exited with code 1: permission denied");
  });
});
