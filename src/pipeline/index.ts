import type { ServiceConfig } from "../config.js";
import type { PipelineServices, ProgressListener, TranscriptResult } from "../types.js";
import { assembleResult } from "./assemble.js";
import { cleanTranscript, generateTakeaways } from "./clean.js";
import { generateText } from "./gemini.js";
import { fetchVideoInfo } from "./metadata.js";
import { extractTranscript } from "./transcript.js";
import { extractVideoId } from "./videoId.js";

export const STAGE_LABELS = {
  metadata: "Getting video info...",
  transcript: "Extracting transcript...",
  cleaning: "Cleaning transcript with Gemini...",
  takeaways: "Generating takeaways...",
  assembly: "Assembling document...",
} as const;

/** Run every stage in order, reporting the label of each before it starts. */
export async function processVideo(
  youtubeUrl: string,
  services: PipelineServices,
  onProgress: ProgressListener = () => {}
): Promise<TranscriptResult> {
  const videoId = extractVideoId(youtubeUrl);

  onProgress(STAGE_LABELS.metadata);
  const info = await services.fetchVideoInfo(videoId);

  onProgress(STAGE_LABELS.transcript);
  const rawTranscript = await services.extractTranscript(youtubeUrl);

  onProgress(STAGE_LABELS.cleaning);
  const transcript = await services.cleanTranscript(rawTranscript, info.title);

  onProgress(STAGE_LABELS.takeaways);
  const takeaways = await services.generateTakeaways(transcript, info.title);

  onProgress(STAGE_LABELS.assembly);
  return assembleResult({ info, url: youtubeUrl, transcript, takeaways });
}

export function createPipelineServices(cfg: ServiceConfig): PipelineServices {
  const generate = (prompt: string) =>
    generateText(prompt, {
      apiKey: cfg.googleApiKey,
      model: cfg.geminiModel,
      baseUrl: cfg.geminiBaseUrl,
      timeoutMs: cfg.geminiTimeoutMs,
    });

  return {
    fetchVideoInfo: (videoId) => fetchVideoInfo(videoId, { timeoutMs: cfg.metadataTimeoutMs }),
    extractTranscript: (youtubeUrl) =>
      extractTranscript(youtubeUrl, {
        ytdlpCmd: cfg.ytdlpCmd,
        language: cfg.subtitleLanguage,
        proxy: cfg.ytdlpProxy,
        timeoutMs: cfg.ytdlpTimeoutMs,
      }),
    cleanTranscript: (raw, title) => cleanTranscript(generate, raw, title),
    generateTakeaways: (transcript, title) => generateTakeaways(generate, transcript, title),
  };
}
