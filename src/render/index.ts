import { silentLogger, type Logger } from "../logger.js";
import type { LayoutRequest } from "../types.js";
import { createImageFetcher, loadImages, type ImageFetcher } from "./imageFetcher.js";
import { layoutDocument } from "./layout.js";
import { parseMarkdown } from "./markdown.js";
import { PdfKitPainter } from "./painter.js";
import { resolveTypography } from "./typography.js";

export interface RenderOptions {
  fetchImage?: ImageFetcher;
  /** Document title stored in the PDF metadata. */
  title?: string;
  logger?: Logger;
}

/** Render the assembled markdown document to PDF bytes. */
export async function renderDocument(
  markdown: string,
  request: LayoutRequest = {},
  options: RenderOptions = {}
): Promise<Buffer> {
  const log = options.logger ?? silentLogger();
  const typography = resolveTypography(request);
  const blocks = parseMarkdown(markdown);
  const images = await loadImages(blocks, options.fetchImage ?? createImageFetcher({ logger: log }));

  const painter = new PdfKitPainter(typography, { title: options.title });
  const { pages, skippedImages } = layoutDocument(blocks, typography, painter, images);
  log.debug({ blocks: blocks.length, pages, skippedImages, font: typography.font, zoom: typography.zoom }, "document laid out");

  return painter.finish();
}

export { resolveTypography } from "./typography.js";
export { createImageFetcher, type ImageFetcher } from "./imageFetcher.js";
