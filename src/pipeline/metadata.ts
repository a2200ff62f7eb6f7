import { fetch } from "undici";
import { z } from "zod";
import { MetadataUnavailableError, errorMessage } from "../errors.js";
import type { VideoInfo } from "../types.js";
import { watchUrl } from "./videoId.js";

const OEMBED_ENDPOINT = "https://www.youtube.com/oembed";

const OEmbedSchema = z.object({
  title: z.string().optional(),
});

export interface MetadataOptions {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export function oembedUrl(videoId: string): string {
  const params = new URLSearchParams({ url: watchUrl(videoId), format: "json" });
  return `${OEMBED_ENDPOINT}?${params.toString()}`;
}

/** Look up the video title through oEmbed, which needs no credentials. */
export async function fetchVideoInfo(videoId: string, opts: MetadataOptions): Promise<VideoInfo> {
  const doFetch = opts.fetchImpl ?? fetch;
  let body: unknown;
  try {
    const res = await doFetch(oembedUrl(videoId), {
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`oEmbed lookup failed: ${res.status}`);
    }
    body = await res.json();
  } catch (err: unknown) {
    throw new MetadataUnavailableError(errorMessage(err), { cause: err });
  }

  const parsed = OEmbedSchema.safeParse(body);
  if (!parsed.success) {
    throw new MetadataUnavailableError("unexpected oEmbed response");
  }
  return { id: videoId, title: parsed.data.title?.trim() || "Unknown Title" };
}
