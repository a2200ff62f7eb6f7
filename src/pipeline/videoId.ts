import { InvalidReferenceError } from "../errors.js";

// 11 id characters, not running on into a longer token
const ID = "([a-zA-Z0-9_-]{11})(?![a-zA-Z0-9_-])";

// Tried in order; the first capture wins
const PATTERNS: RegExp[] = [
  new RegExp(`(?:v=|/v/|youtu\\.be/)${ID}`),
  new RegExp(`(?:embed/)${ID}`),
  new RegExp(`(?:shorts/)${ID}`),
  /^([a-zA-Z0-9_-]{11})$/,
];

/**
 * Extract the video id from a watch URL, short link, embed URL, shorts URL
 * or a bare id.
 */
export function extractVideoId(reference: string): string {
  const input = reference.trim();
  for (const pattern of PATTERNS) {
    const match = pattern.exec(input);
    if (match?.[1]) {
      return match[1];
    }
  }
  throw new InvalidReferenceError(reference);
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function thumbnailUrl(videoId: string): string {
  return `https://img.youtube.com/vi/${videoId}/maxresdefault.jpg`;
}
