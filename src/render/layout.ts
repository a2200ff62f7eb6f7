import type { ImageAsset } from "./imageFetcher.js";
import type { HeadingLevel, RenderBlock, TextRun } from "./markdown.js";
import type { PagePainter, TextStyle } from "./painter.js";
import type { Typography } from "./typography.js";

const BULLET_MARKER = "•";

export interface Segment {
  text: string;
  bold: boolean;
}

export interface LayoutResult {
  pages: number;
  skippedImages: number;
}

interface Word {
  text: string;
  bold: boolean;
  spaceBefore: boolean;
}

type Measure = (text: string, bold: boolean) => number;

function toWords(runs: TextRun[]): Word[] {
  const words: Word[] = [];
  let pendingSpace = false;
  for (const run of runs) {
    for (const part of run.text.split(/(\s+)/)) {
      if (!part) continue;
      if (/^\s+$/.test(part)) {
        pendingSpace = true;
        continue;
      }
      words.push({ text: part, bold: run.bold, spaceBefore: pendingSpace });
      pendingSpace = false;
    }
  }
  return words;
}

/**
 * Greedy word wrap. Words wider than a whole line are split between
 * characters. Adjacent words of the same weight share a segment.
 */
export function wrapRuns(runs: TextRun[], maxWidth: number, measure: Measure): Segment[][] {
  const lines: Segment[][] = [];
  let line: Segment[] = [];
  let width = 0;

  const append = (text: string, bold: boolean) => {
    const last = line[line.length - 1];
    if (last && last.bold === bold) {
      last.text += text;
    } else {
      line.push({ text, bold });
    }
    width += measure(text, bold);
  };
  const breakLine = () => {
    lines.push(line);
    line = [];
    width = 0;
  };

  for (const word of toWords(runs)) {
    const wordWidth = measure(word.text, word.bold);
    const space = line.length > 0 && word.spaceBefore ? " " : "";
    const spaceWidth = space ? measure(space, word.bold) : 0;

    if (line.length > 0 && width + spaceWidth + wordWidth > maxWidth) {
      breakLine();
    } else if (space) {
      append(space, word.bold);
    }

    if (wordWidth <= maxWidth) {
      append(word.text, word.bold);
      continue;
    }

    let chunk = "";
    for (const ch of word.text) {
      if (chunk && measure(chunk + ch, word.bold) > maxWidth) {
        append(chunk, word.bold);
        breakLine();
        chunk = "";
      }
      chunk += ch;
    }
    if (chunk) append(chunk, word.bold);
  }

  if (line.length > 0) lines.push(line);
  return lines;
}

/**
 * Walks the blocks top to bottom with a vertical cursor, starting a new page
 * whenever the next line would cross the printable bottom. Images missing
 * from `images` are skipped without moving the cursor.
 */
export function layoutDocument(
  blocks: RenderBlock[],
  typo: Typography,
  painter: PagePainter,
  images: ReadonlyMap<string, ImageAsset>
): LayoutResult {
  const { page } = typo;
  let y = page.top;
  let pages = 1;
  let skippedImages = 0;

  const atTop = () => y <= page.top;
  const gap = (height: number) => {
    if (!atTop()) y += height;
  };
  const ensure = (height: number) => {
    if (y + height > page.bottom && !atTop()) {
      painter.addPage();
      pages++;
      y = page.top;
    }
  };

  const drawLines = (runs: TextRun[], size: number, lineHeight: number, indent: number, marker?: string): number => {
    const style = (bold: boolean): TextStyle => ({ bold, size });
    const measure: Measure = (text, bold) => painter.widthOfText(text, style(bold));
    const lines = wrapRuns(runs, page.printableWidth - indent, measure);

    lines.forEach((segments, index) => {
      ensure(lineHeight);
      if (marker && index === 0) {
        painter.drawText(marker, page.left + indent / 3, y, style(false));
      }
      let x = page.left + indent;
      for (const segment of segments) {
        painter.drawText(segment.text, x, y, style(segment.bold));
        x += measure(segment.text, segment.bold);
      }
      y += lineHeight;
    });
    return lines.length;
  };

  const heading = (level: HeadingLevel, text: string) => {
    gap(typo.bodyLineHeight / 2);
    const drawn = drawLines([{ text, bold: true }], typo.headingSizes[level], typo.headingLineHeights[level], 0);
    // Section headings are underlined
    if (level === 2 && drawn > 0) {
      painter.drawLine(page.left, page.left + page.printableWidth, y);
    }
    y += typo.bodyLineHeight / 4;
  };

  const rule = () => {
    ensure(typo.bodyLineHeight);
    y += typo.bodyLineHeight / 2;
    painter.drawLine(page.left, page.left + page.printableWidth, y);
    y += typo.bodyLineHeight / 2;
  };

  const image = (asset: ImageAsset): boolean => {
    const width = Math.min(typo.maxImageWidth, asset.width);
    let height = (asset.height * width) / asset.width;
    let drawWidth = width;
    const maxHeight = page.bottom - page.top;
    if (height > maxHeight) {
      drawWidth = (width * maxHeight) / height;
      height = maxHeight;
    }
    ensure(height);
    const x = page.left + (page.printableWidth - drawWidth) / 2;
    try {
      painter.drawImage(asset.data, x, y, drawWidth, height);
    } catch {
      return false;
    }
    y += height + typo.bodyLineHeight;
    return true;
  };

  for (const block of blocks) {
    if (block.kind === "image") {
      const asset = images.get(block.url);
      if (!asset) {
        skippedImages++;
        continue;
      }
      if (block.afterBlank) gap(typo.bodyLineHeight / 2);
      if (!image(asset)) skippedImages++;
      continue;
    }

    if (block.afterBlank) gap(typo.bodyLineHeight / 2);

    switch (block.kind) {
      case "heading":
        heading(block.level, block.text);
        break;
      case "paragraph":
        drawLines(block.runs, typo.bodySize, typo.bodyLineHeight, 0);
        break;
      case "bullet":
        drawLines(block.runs, typo.bodySize, typo.bodyLineHeight, typo.bulletIndent, BULLET_MARKER);
        break;
      case "rule":
        rule();
        break;
    }
  }

  return { pages, skippedImages };
}
