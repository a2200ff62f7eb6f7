import { toWinAnsi } from "./encoding.js";

export interface TextRun {
  text: string;
  bold: boolean;
}

export type HeadingLevel = 1 | 2 | 3;

interface BlockBase {
  /** A blank line came right before this block. */
  afterBlank: boolean;
}

export type RenderBlock =
  | (BlockBase & { kind: "heading"; level: HeadingLevel; text: string })
  | (BlockBase & { kind: "paragraph"; runs: TextRun[] })
  | (BlockBase & { kind: "bullet"; runs: TextRun[] })
  | (BlockBase & { kind: "rule" })
  | (BlockBase & { kind: "image"; url: string; alt: string });

type LineClass =
  | { kind: "heading"; level: HeadingLevel; text: string }
  | { kind: "paragraph"; text: string }
  | { kind: "bullet"; text: string }
  | { kind: "rule" }
  | { kind: "image"; url: string; alt: string }
  | { kind: "blank" };

const IMAGE_LINE = /^!\[([^\]]*)\]\(\s*<?([^\s)>]+)>?(?:\s+"[^"]*")?\s*\)$/;
const HEADING_LINE = /^(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;
const RULE_LINE = /^(?:(?:-\s*){3,}|(?:\*\s*){3,}|(?:_\s*){3,})$/;
const BULLET_LINE = /^[-*+]\s+(.*)$/;

const LINK = /!?\[([^\]]*)\]\([^)]*\)/g;
const BOLD = /\*\*(.+?)\*\*|__(.+?)__/g;

// Deeper headings render as level 3
function headingLevel(hashes: number): HeadingLevel {
  if (hashes === 1) return 1;
  if (hashes === 2) return 2;
  return 3;
}

/** Classify one source line; checks run in a fixed precedence order. */
export function classifyLine(line: string): LineClass {
  const trimmed = line.trim();

  const image = IMAGE_LINE.exec(trimmed);
  if (image?.[2]) {
    return { kind: "image", url: image[2], alt: image[1] ?? "" };
  }

  const heading = HEADING_LINE.exec(trimmed);
  if (heading?.[1]) {
    return { kind: "heading", level: headingLevel(heading[1].length), text: heading[2] ?? "" };
  }

  if (RULE_LINE.test(trimmed)) {
    return { kind: "rule" };
  }

  const bullet = BULLET_LINE.exec(trimmed);
  if (bullet) {
    return { kind: "bullet", text: bullet[1] ?? "" };
  }

  if (!trimmed) {
    return { kind: "blank" };
  }

  return { kind: "paragraph", text: trimmed };
}

/** Links keep their display text only. */
export function stripLinks(text: string): string {
  return text.replace(LINK, "$1");
}

/** Split inline text into plain and bold runs, after rewriting links. */
export function parseInline(text: string): TextRun[] {
  const source = stripLinks(text);
  const runs: TextRun[] = [];
  let last = 0;

  for (const match of source.matchAll(BOLD)) {
    const start = match.index ?? 0;
    if (start > last) {
      runs.push({ text: toWinAnsi(source.slice(last, start)), bold: false });
    }
    runs.push({ text: toWinAnsi(match[1] ?? match[2] ?? ""), bold: true });
    last = start + match[0].length;
  }
  if (last < source.length) {
    runs.push({ text: toWinAnsi(source.slice(last)), bold: false });
  }
  return runs.filter((run) => run.text.length > 0);
}

function headingText(text: string): string {
  return toWinAnsi(stripLinks(text).replace(BOLD, (_m, a?: string, b?: string) => a ?? b ?? "").trim());
}

/** Parse the document into blocks in source order. Blank lines only mark the next block. */
export function parseMarkdown(markdown: string): RenderBlock[] {
  const blocks: RenderBlock[] = [];
  let afterBlank = false;

  for (const line of markdown.split(/\r\n|\r|\n/)) {
    const cls = classifyLine(line);
    switch (cls.kind) {
      case "blank":
        afterBlank = true;
        continue;
      case "image":
        blocks.push({ kind: "image", url: cls.url, alt: toWinAnsi(cls.alt), afterBlank });
        break;
      case "heading":
        blocks.push({ kind: "heading", level: cls.level, text: headingText(cls.text), afterBlank });
        break;
      case "rule":
        blocks.push({ kind: "rule", afterBlank });
        break;
      case "bullet":
        blocks.push({ kind: "bullet", runs: parseInline(cls.text), afterBlank });
        break;
      case "paragraph":
        blocks.push({ kind: "paragraph", runs: parseInline(cls.text), afterBlank });
        break;
    }
    afterBlank = false;
  }

  return blocks;
}
