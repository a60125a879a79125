import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { DownloadError, errorMessage } from "./errors.js";
import type { Logger } from "./utils/logger.js";
import type { LocalAsset, TestAsset } from "./types.js";

export type Fetcher = (url: string) => Promise<Response>;

export const DEFAULT_ASSET_MIRROR = "https://repo.jellyfin.org/jellyfish/media";

const MIB = 1024 * 1024;

const ASSET_FILES: Array<Omit<TestAsset, "url"> & { fileName: string }> = [
  {
    id: "2160p-hevc",
    fileName: "jellyfish-120-mbps-4k-uhd-hevc-10bit.mkv",
    sizeMb: 429,
    codec: "hevc",
    resolution: "2160p",
  },
  {
    id: "2160p-h264",
    fileName: "jellyfish-120-mbps-4k-uhd-h264.mkv",
    sizeMb: 431,
    codec: "h264",
    resolution: "2160p",
  },
  {
    id: "1080p-hevc",
    fileName: "jellyfish-40-mbps-hd-hevc-10bit.mkv",
    sizeMb: 143,
    codec: "hevc",
    resolution: "1080p",
  },
  {
    id: "1080p-h264",
    fileName: "jellyfish-40-mbps-hd-h264.mkv",
    sizeMb: 142,
    codec: "h264",
    resolution: "1080p",
  },
];

export function assetManifest(mirror: string | null = null): TestAsset[] {
  const base = (mirror ?? DEFAULT_ASSET_MIRROR).replace(/\/+$/, "");
  return ASSET_FILES.map(({ fileName, ...asset }) => ({
    ...asset,
    url: `${base}/${fileName}`,
  }));
}

export function assetFileName(asset: TestAsset): string {
  const name = new URL(asset.url).pathname.split("/").pop();
  if (!name) {
    throw new DownloadError(asset.url, "URL does not name a file");
  }
  return name;
}

async function sizeInMb(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return Math.floor(stats.size / MIB);
  } catch {
    return null;
  }
}

async function* responseChunks(response: Response): AsyncGenerator<Uint8Array> {
  if (!response.body) {
    return;
  }
  const reader = response.body.getReader();
  while (true) {
    const { done, value } = await reader.read();
    if (done) {
      return;
    }
    yield value;
  }
}

async function download(asset: TestAsset, target: string, fetcher: Fetcher): Promise<void> {
  const partPath = `${target}.part`;
  try {
    let response: Response;
    try {
      response = await fetcher(asset.url);
    } catch (error) {
      throw new DownloadError(asset.url, errorMessage(error), { cause: error });
    }
    if (!response.ok) {
      throw new DownloadError(asset.url, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    try {
      await pipeline(responseChunks(response), createWriteStream(partPath));
    } catch (error) {
      throw new DownloadError(asset.url, errorMessage(error), { cause: error });
    }

    const actual = await sizeInMb(partPath);
    if (actual !== asset.sizeMb) {
      throw new DownloadError(
        asset.url,
        `downloaded size is ${actual ?? 0}MB, expected ${asset.sizeMb}MB`,
      );
    }
    await fs.rename(partPath, target);
  } catch (error) {
    await fs.rm(partPath, { force: true });
    throw error;
  }
}

/**
 * Make sure every asset in the manifest is present in `videosDir` with its expected
 * size, downloading the ones that are missing or truncated.
 */
export async function ensureAssets(
  videosDir: string,
  manifest: TestAsset[],
  deps: { fetcher: Fetcher; logger: Logger },
): Promise<LocalAsset[]> {
  const { fetcher, logger } = deps;

  try {
    await fs.mkdir(videosDir, { recursive: true });
    await fs.access(videosDir, fs.constants.W_OK);
  } catch (error) {
    throw new DownloadError(videosDir, `videos directory is not writable (${errorMessage(error)})`, {
      cause: error,
    });
  }

  const assets: LocalAsset[] = [];
  for (const asset of manifest) {
    const fileName = assetFileName(asset);
    const target = path.join(videosDir, fileName);
    const actual = await sizeInMb(target);

    if (actual === asset.sizeMb) {
      logger.debug(`Found valid test file "${target}" (${asset.sizeMb}MB)`, { module: "assets" });
    } else {
      if (actual === null) {
        logger.info(`File not found: "${target}"`, { module: "assets" });
      } else {
        logger.warn(`File "${target}" size is invalid: ${actual}MB not ${asset.sizeMb}MB`, {
          module: "assets",
        });
      }
      logger.info(`Downloading "${fileName}" (${asset.sizeMb}MB) to "${videosDir}"...`, {
        module: "assets",
        url: asset.url,
      });
      await download(asset, target, fetcher);
      logger.info(`Downloaded "${fileName}"`, { module: "assets" });
    }

    assets.push({ ...asset, fileName, path: target });
  }
  return assets;
}
