import { fetch } from "undici";
import { imageSize } from "image-size";
import type { ISizeCalculationResult } from "image-size/dist/types/interface.js";
import jpeg from "jpeg-js";
import { PNG } from "pngjs";
import { DEFAULT_IMAGE_FETCH_TIMEOUT_MS } from "../constants.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { RenderBlock } from "./markdown.js";

/** Resolves to the image bytes, or null for any failure. Never rejects. */
export type ImageFetcher = (url: string) => Promise<Buffer | null>;

export interface ImageFetcherOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export interface ImageAsset {
  data: Buffer;
  width: number;
  height: number;
}

export function createImageFetcher(opts: ImageFetcherOptions = {}): ImageFetcher {
  const doFetch = opts.fetchImpl ?? fetch;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_IMAGE_FETCH_TIMEOUT_MS;
  const log = opts.logger ?? silentLogger();

  return async (url: string) => {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      log.debug({ url }, "skipping image with invalid URL");
      return null;
    }
    if (target.protocol !== "http:" && target.protocol !== "https:") {
      log.debug({ url }, "skipping image with unsupported scheme");
      return null;
    }

    try {
      const res = await doFetch(target.href, { signal: AbortSignal.timeout(timeoutMs) });
      if (!res.ok) {
        log.debug({ url, status: res.status }, "image fetch failed");
        return null;
      }
      return Buffer.from(await res.arrayBuffer());
    } catch (err: unknown) {
      log.debug({ url, reason: errorMessage(err) }, "image fetch failed");
      return null;
    }
  };
}

// pdfkit inflates PNG pixel data in a callback no caller can catch, so an
// image reaches the painter only after a full decode here
function decodesCleanly(data: Buffer, type: "png" | "jpg"): boolean {
  try {
    if (type === "png") {
      PNG.sync.read(data);
    } else {
      jpeg.decode(data, { tolerantDecoding: false, maxMemoryUsageInMB: 256 });
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Read dimensions of a PNG or JPEG whose pixel data fully decodes. Anything
 * else, a broken header or corrupt pixel data gives null.
 */
export function decodeImage(data: Buffer): ImageAsset | null {
  let size: ISizeCalculationResult;
  try {
    size = imageSize(data);
  } catch {
    return null;
  }
  const { width, height, type } = size;
  if ((type !== "png" && type !== "jpg") || !width || !height) {
    return null;
  }
  return decodesCleanly(data, type) ? { data, width, height } : null;
}

/** Fetch and decode every distinct image URL in the document concurrently. */
export async function loadImages(
  blocks: RenderBlock[],
  fetchImage: ImageFetcher
): Promise<Map<string, ImageAsset>> {
  const urls = new Set<string>();
  for (const block of blocks) {
    if (block.kind === "image") urls.add(block.url);
  }

  const assets = new Map<string, ImageAsset>();
  await Promise.all(
    [...urls].map(async (url) => {
      const data = await fetchImage(url);
      const asset = data ? decodeImage(data) : null;
      if (asset) assets.set(url, asset);
    })
  );
  return assets;
}
