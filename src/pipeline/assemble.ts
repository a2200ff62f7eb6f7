import { DEFAULT_FILENAME_STEM, MAX_FILENAME_STEM_LENGTH } from "../constants.js";
import type { TranscriptResult, VideoInfo } from "../types.js";
import { thumbnailUrl } from "./videoId.js";

const PATH_HOSTILE = /[<>:"/\\|?*\u0000-\u001f\u007f]/g;

/** Turn a video title into a file name stem safe on every common filesystem. */
export function sanitizeFilename(title: string): string {
  const safe = title
    .replace(PATH_HOSTILE, "")
    .trim()
    .replace(/\s+/g, "_")
    .slice(0, MAX_FILENAME_STEM_LENGTH);
  return safe || DEFAULT_FILENAME_STEM;
}

export interface AssembleInput {
  info: VideoInfo;
  url: string;
  transcript: string;
  // Empty when the transcript was not cleaned
  takeaways: string;
}

export function buildMarkdown({ info, url, transcript, takeaways }: AssembleInput): string {
  const sections = [`![Thumbnail](${thumbnailUrl(info.id)})`, `# ${info.title}`, `Source: ${url}`];
  if (takeaways) {
    sections.push("## Top Takeaways", takeaways);
  }
  sections.push("---", "## Full Transcript", transcript);
  return sections.join("\n\n");
}

export function assembleResult(input: AssembleInput): TranscriptResult {
  const suffix = input.takeaways ? "" : "_raw";
  return Object.freeze({
    title: input.info.title,
    url: input.url,
    takeaways: input.takeaways,
    transcript: input.transcript,
    markdown: buildMarkdown(input),
    filename: `${sanitizeFilename(input.info.title)}${suffix}.md`,
  });
}
