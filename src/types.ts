// Transcoding backends, in probe and report order
export const BACKENDS = ["software", "nvenc", "qsv", "amf"] as const;
export type Backend = (typeof BACKENDS)[number];

export type VideoCodec = "h264" | "hevc";
export type Resolution = "2160p" | "1080p" | "720p";

export type GpuVendor = "nvidia" | "amd" | "intel";

export interface TestAsset {
  id: string;
  url: string;
  sizeMb: number;
  codec: VideoCodec;
  resolution: Resolution;
}

export interface LocalAsset extends TestAsset {
  fileName: string;
  path: string;
}

// Hardware profile
export interface GpuDevice {
  index: number;
  vendor: string;
  vendorKind: GpuVendor;
  product: string;
  businfo: string;
}

export interface OsSummary {
  platform: string;
  distro: string;
  release: string;
  codename: string;
  kernel: string;
  arch: string;
}

export interface HardwareProfile {
  os: OsSummary;
  ffmpeg: {
    path: string;
    version: string;
  };
  cpu: {
    model: string;
    vendor: string;
    cores: number | null;
    threads: number | null;
  };
  memory: {
    total_bytes: number | null;
  };
  gpu: GpuDevice[];
  selected_gpu: number | null;
}

// Benchmark results
export interface TestCondition {
  codec: VideoCodec;
  asset: LocalAsset;
  scaleFrom: Resolution;
  scaleTo: Resolution;
  size: number;
  bitrate: number;
  label: string;
}

export interface Measurement {
  streams: number;
  speed: number | null;
  frame: number | null;
  time_s: number | null;
  rss_kb: number | null;
  passing: boolean;
  error: string | null;
}

export interface ConditionResult {
  codec: VideoCodec;
  encoder: string;
  scale_from: Resolution;
  scale_to: Resolution;
  bitrate: number;
  runs: Measurement[];
  max_streams: number;
  failure_reasons: string[];
  single_stream_speed: number | null;
  single_stream_rss_kb: number | null;
}

export interface BackendResult {
  backend: Backend;
  max_passing_streams: number | null;
  error: string | null;
  conditions: ConditionResult[];
}

export interface SkippedBackend {
  backend: Backend;
  reason: string;
}

export interface ReportOptions {
  ffmpeg: string;
  videos: string;
  output: string;
  gpu: number | null;
  stream_sequence: number[];
  max_streams: number;
  trial_timeout_s: number;
}

export interface Report {
  tool: {
    name: string;
    version: string;
  };
  timestamp: string;
  options: ReportOptions;
  hwinfo: HardwareProfile;
  backends: Partial<Record<Backend, BackendResult>>;
  skipped: SkippedBackend[];
}
