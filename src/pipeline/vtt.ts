const TIMESTAMP = /^\d{2}:\d{2}/;
const CUE_IDENTIFIER = /^[\d\-:.\s>]+$/;

/**
 * Flatten a WebVTT caption file into running text. Auto-generated captions
 * repeat each line across overlapping cues, so a line is kept only the first
 * time it appears.
 */
export function parseVtt(content: string): string {
  const seen = new Set<string>();
  const lines: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line) continue;
    if (line.startsWith("WEBVTT")) continue;
    if (line.startsWith("Kind:") || line.startsWith("Language:")) continue;
    if (TIMESTAMP.test(line)) continue;
    if (CUE_IDENTIFIER.test(line)) continue;

    line = line.replace(/<[^>]+>/g, "").replace(/&nbsp;/g, " ").trim();
    if (!line || seen.has(line)) continue;

    seen.add(line);
    lines.push(line);
  }

  return lines.join(" ");
}
