import type { LocalAsset, Resolution, TestCondition, VideoCodec } from "./types.js";

interface ScaleTarget {
  resolution: Resolution;
  size: number;
  bitrate: number;
  name: string;
}

export const SCALE_TARGETS: ScaleTarget[] = [
  { resolution: "2160p", size: 2160, bitrate: 79_616_000, name: "2160p @ 80 Mbps" },
  { resolution: "1080p", size: 1080, bitrate: 9_616_000, name: "1080p @ 10 Mbps" },
  { resolution: "720p", size: 720, bitrate: 3_616_000, name: "720p @ 4 Mbps" },
];

export const CODECS: VideoCodec[] = ["h264", "hevc"];

const lines = (resolution: Resolution) => Number.parseInt(resolution, 10);

/**
 * Every source/target pairing for one codec, largest source first. Sources are only
 * scaled down or kept at their resolution, never upscaled.
 */
export function buildConditions(assets: LocalAsset[], codec: VideoCodec): TestCondition[] {
  const conditions: TestCondition[] = [];
  for (const asset of assets) {
    if (asset.codec !== codec) {
      continue;
    }
    for (const target of SCALE_TARGETS) {
      if (lines(target.resolution) > lines(asset.resolution)) {
        continue;
      }
      conditions.push({
        codec,
        asset,
        scaleFrom: asset.resolution,
        scaleTo: target.resolution,
        size: target.size,
        bitrate: target.bitrate,
        label: `${codec} ${asset.resolution} -> ${target.name}`,
      });
    }
  }
  return conditions;
}
