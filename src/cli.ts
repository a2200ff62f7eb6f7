import fs from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import { z } from "zod";
import type { ServiceConfig } from "./config.js";
import { ALLOWED_FONTS, DEFAULT_FONT, DEFAULT_ZOOM } from "./constants.js";
import { ConfigurationError } from "./errors.js";
import type { Logger } from "./logger.js";
import { assembleResult } from "./pipeline/assemble.js";
import { createPipelineServices, processVideo, STAGE_LABELS } from "./pipeline/index.js";
import { extractVideoId } from "./pipeline/videoId.js";
import { createImageFetcher, renderDocument, type ImageFetcher } from "./render/index.js";
import type { PipelineServices, TranscriptResult } from "./types.js";

const CliOptionsSchema = z.object({
  output: z.string().optional(),
  apiKey: z.string().optional(),
  rawOnly: z.boolean().default(false),
  pdf: z.boolean().default(false),
  font: z.string().default(DEFAULT_FONT),
  zoom: z.string().default(String(DEFAULT_ZOOM)),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface ConvertDeps {
  services: PipelineServices;
  apiKey?: string;
  outputDir: string;
  fetchImage: ImageFetcher;
  logger: Logger;
}

export interface ConvertOutput {
  result: TranscriptResult;
  markdownPath: string;
  pdfPath?: string;
}

async function buildResult(url: string, rawOnly: boolean, deps: ConvertDeps): Promise<TranscriptResult> {
  const log = deps.logger;
  if (!rawOnly) {
    return processVideo(url, deps.services, (label) => log.info(label));
  }

  const videoId = extractVideoId(url);
  log.info(STAGE_LABELS.metadata);
  const info = await deps.services.fetchVideoInfo(videoId);
  log.info(STAGE_LABELS.transcript);
  const transcript = await deps.services.extractTranscript(url);
  log.info({ characters: transcript.length }, "transcript extracted");
  return assembleResult({ info, url, transcript, takeaways: "" });
}

/** Run the pipeline once and write the document (and optionally a PDF) to disk. */
export async function convert(url: string, options: CliOptions, deps: ConvertDeps): Promise<ConvertOutput> {
  extractVideoId(url);
  if (!options.rawOnly && !deps.apiKey) {
    throw new ConfigurationError("Google AI API key required. Set GOOGLE_API_KEY or use --api-key");
  }

  const result = await buildResult(url, options.rawOnly, deps);
  const markdownPath = path.resolve(options.output ?? path.join(deps.outputDir, result.filename));
  await fs.mkdir(path.dirname(markdownPath), { recursive: true });
  await fs.writeFile(markdownPath, result.markdown, "utf-8");
  deps.logger.info({ path: markdownPath }, "saved markdown");

  if (!options.pdf) {
    return { result, markdownPath };
  }

  const pdfPath = markdownPath.replace(/\.md$/, "") + ".pdf";
  const pdf = await renderDocument(
    result.markdown,
    { font: options.font, zoom: options.zoom },
    {
      fetchImage: deps.fetchImage,
      title: result.title,
      logger: deps.logger,
    }
  );
  await fs.writeFile(pdfPath, pdf);
  deps.logger.info({ path: pdfPath }, "saved pdf");
  return { result, markdownPath, pdfPath };
}

export function createProgram(
  cfg: ServiceConfig,
  logger: Logger,
  makeServices: (cfg: ServiceConfig) => PipelineServices = createPipelineServices
): Command {
  const program = new Command();

  program
    .name("transcript-cleaner")
    .description("Extract and clean podcast transcripts from YouTube")
    .version("0.1.0")
    .argument("<url>", "YouTube video URL")
    .option("-o, --output <path>", "output file path (default: generated from the video title)")
    .option("--api-key <key>", "Google AI API key (or set GOOGLE_API_KEY)")
    .option("--raw-only", "only extract the raw transcript, don't clean it with Gemini")
    .option("--pdf", "also render a PDF next to the markdown file")
    .option("--font <name>", `PDF font family (${ALLOWED_FONTS.join(", ")})`, DEFAULT_FONT)
    .option("--zoom <percent>", "PDF text size as a percentage (50-200)", String(DEFAULT_ZOOM))
    .action(async (url: string, raw: unknown) => {
      const options = CliOptionsSchema.parse(raw);
      const apiKey = options.apiKey ?? cfg.googleApiKey;
      const services = makeServices({ ...cfg, googleApiKey: apiKey });
      const out = await convert(url, options, {
        services,
        apiKey,
        outputDir: cfg.outputDir,
        fetchImage: createImageFetcher({ timeoutMs: cfg.imageFetchTimeoutMs, logger }),
        logger,
      });
      logger.info({ title: out.result.title }, `Saved to: ${out.markdownPath}`);
    });

  return program;
}
