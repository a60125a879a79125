import { describe, expect, it } from "vitest";
import {
  classifyFFmpegLine,
  extractFailureReason,
  parseBenchStats,
  parseEncoderList,
  parseFFmpegVersion,
  parseFinalProgress,
  parseProgressLine,
  parseTrialOutput,
  splitLines,
} from "../ffmpeg/output.js";

const PROGRESS =
  "frame= 1234 fps= 98 q=-0.0 size=N/A time=00:00:41.13 bitrate=N/A speed=1.64x";

describe("splitLines", () => {
  it("splits on every newline style and drops blank lines", () => {
    expect(splitLines("a\r\nb\rc\n\n  d  ")).toEqual(["a", "b", "c", "d"]);
  });
});

describe("parseProgressLine", () => {
  it("reads frame, fps, time and speed", () => {
    expect(parseProgressLine(PROGRESS)).toEqual({
      frame: 1234,
      fps: 98,
      time: "00:00:41.13",
      speed: 1.64,
    });
  });

  it("ignores lines without a numeric speed", () => {
    expect(
      parseProgressLine("frame=    0 fps=0.0 q=0.0 size=N/A time=N/A bitrate=N/A speed=N/A"),
    ).toBeNull();
    expect(parseProgressLine("Stream mapping:")).toBeNull();
  });
});

describe("parseFinalProgress", () => {
  it("returns the last progress line", () => {
    const lines = [
      "frame=  100 fps= 50 q=-0.0 size=N/A time=00:00:04.00 bitrate=N/A speed=2.01x",
      "frame=  200 fps= 48 q=-0.0 size=N/A time=00:00:08.00 bitrate=N/A speed=0.97x",
      "video:0kB audio:0kB subtitle:0kB",
    ];
    expect(parseFinalProgress(lines)?.speed).toBe(0.97);
    expect(parseFinalProgress(lines)?.frame).toBe(200);
  });

  it("returns null when nothing reports progress", () => {
    expect(parseFinalProgress(["Input #0, matroska,webm"])).toBeNull();
  });
});

describe("parseBenchStats", () => {
  it("reads the -benchmark summary", () => {
    expect(
      parseBenchStats([
        "bench: utime=12.345s stime=1.200s rtime=10.000s",
        "bench: maxrss=204800kB",
      ]),
    ).toEqual({ utime_s: 12.345, stime_s: 1.2, rtime_s: 10, maxrss_kb: 204800 });
  });

  it("leaves missing values null", () => {
    expect(parseBenchStats([])).toEqual({
      utime_s: null,
      stime_s: null,
      rtime_s: null,
      maxrss_kb: null,
    });
  });
});

describe("parseTrialOutput", () => {
  it("combines progress and benchmark figures", () => {
    expect(
      parseTrialOutput([PROGRESS, "bench: utime=1.0s stime=0.5s rtime=25.08s", "bench: maxrss=512KiB"]),
    ).toEqual({ speed: 1.64, frame: 1234, time_s: 25.08, rss_kb: 512 });
  });
});

describe("extractFailureReason", () => {
  it("takes the text before the error code of a failed call", () => {
    expect(
      extractFailureReason([
        "[h264_nvenc @ 0x5581] OpenEncodeSessionEx failed: out of memory (10): (no details)",
      ]),
    ).toBe("out of memory");
  });

  it("falls back to a leading Error line", () => {
    expect(
      extractFailureReason([
        "Device creation failed: -22.",
        "Error parsing global options: Invalid argument",
      ]),
    ).toBe("parsing global options: Invalid argument");
  });

  it("prefers earlier patterns over earlier lines", () => {
    expect(extractFailureReason(["Error opening input", "init failed: bad thing (-5)"])).toBe(
      "bad thing",
    );
  });

  it("reads the detail after an arrow", () => {
    expect(extractFailureReason(["hwupload failed -> init: no device available"])).toBe(
      "no device available",
    );
  });

  it("returns a generic reason when nothing matches", () => {
    expect(extractFailureReason(["Killed"])).toBe("generic failure");
  });
});

describe("parseFFmpegVersion", () => {
  it("reads the version from the banner", () => {
    expect(
      parseFFmpegVersion(
        "ffmpeg version 6.0.1-Jellyfin Copyright (c) 2000-2023 the FFmpeg developers\nbuilt with gcc 12",
      ),
    ).toBe("6.0.1-Jellyfin");
  });

  it("falls back to the first word after the label", () => {
    expect(parseFFmpegVersion("ffmpeg version n7.0 built on a test host")).toBe("n7.0");
  });

  it("returns null for unrelated output", () => {
    expect(parseFFmpegVersion("")).toBeNull();
  });
});

describe("parseEncoderList", () => {
  it("collects names from the encoder table only", () => {
    const output = [
      "Encoders:",
      " V..... = Video",
      " A..... = Audio",
      " ------",
      " V....D libx264              libx264 H.264 / AVC",
      " V....D h264_nvenc           NVIDIA NVENC H.264 encoder (codec h264)",
      " A....D aac                  AAC (Advanced Audio Coding)",
    ].join("\n");
    expect([...parseEncoderList(output)]).toEqual(["libx264", "h264_nvenc", "aac"]);
  });
});

describe("classifyFFmpegLine", () => {
  it("maps FFmpeg chatter to log levels", () => {
    expect(classifyFFmpegLine("Error while decoding stream #0:0")).toBe("error");
    expect(classifyFFmpegLine("pixel format yuvj420p is deprecated")).toBe("warn");
    expect(classifyFFmpegLine("Input #0, matroska,webm, from 'a.mkv':")).toBe("info");
    expect(classifyFFmpegLine("Stream mapping:")).toBe("debug");
  });
});
