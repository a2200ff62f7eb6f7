import { CleaningFailedError, GenerationFailedError, errorMessage } from "../errors.js";
import { TAKEAWAY_COUNT } from "../constants.js";

export type TextGenerator = (prompt: string) => Promise<string>;

export function cleaningPrompt(transcript: string, title: string): string {
  return `Clean up this podcast transcript for "${title}".

Combine paragraphs from the same speaker, fix capitalization and punctuation, remove filler words like unnecessary "like"s "you know"s and "um"s, and remove repeated words. If there are names, use context clues to figure out who it is. Make sure all sentences are grammatical, but do not add new phrases/clauses/ideas of your own.

Split the transcript into natural paragraphs, where each paragraph is maximum 200 words. For podcasts with multiple speakers, there should always be a line break between each speaker's section and the next (even if this results in short paragraphs).

After cleaning the transcript, add chapters to split up sections/themes. Insert each chapter title into the transcript as a subheader (use ### markdown formatting, never deeper). The title should be a single short sentence expressing the key takeaway of that chapter. Every chapter must contain at least two paragraphs.

Otherwise, modify the original substance the minimum amount. Make sure the transcript is complete and not missing chunks. Be very meticulous.

Return ONLY the cleaned transcript. Do not include any intro text like "Here's the cleaned transcript..." - just start directly with the first chapter heading and content.

TRANSCRIPT:
${transcript}`;
}

export function takeawaysPrompt(transcript: string, title: string): string {
  return `Read this transcript for "${title}" and extract the top ${TAKEAWAY_COUNT} takeaways.

Each takeaway should be:
- One sentence, maximum 20 words
- Crisp and clear with minimum jargon
- A key insight, announcement, or important point from the video

Return ONLY a bullet list with exactly ${TAKEAWAY_COUNT} items. Do not include any intro text like "Here are the takeaways" - just the bullet points.

TRANSCRIPT:
${transcript}`;
}

const FENCED = /^```[a-z]*\n([\s\S]*?)\n```$/i;

/** Unwrap a code fence around the whole reply and cap chapter headings at level 3. */
export function normalizeCleanedTranscript(text: string): string {
  let out = text.trim();
  const fenced = FENCED.exec(out);
  if (fenced?.[1] !== undefined) {
    out = fenced[1].trim();
  }
  return out.replace(/^#{4,}(?=\s)/gm, "###");
}

const LIST_ITEM = /^\s*(?:[-*+•]|\d+[.)])\s+(.+)$/;

/** Keep the first five list items of a reply as `- ` bullets. */
export function normalizeTakeaways(text: string): string {
  const items: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = LIST_ITEM.exec(line);
    const item = match?.[1]?.trim();
    if (item) items.push(item);
  }
  if (items.length < TAKEAWAY_COUNT) {
    throw new GenerationFailedError(`expected ${TAKEAWAY_COUNT} takeaways, got ${items.length}`);
  }
  return items
    .slice(0, TAKEAWAY_COUNT)
    .map((item) => `- ${item}`)
    .join("\n");
}

export async function cleanTranscript(generate: TextGenerator, rawTranscript: string, title: string): Promise<string> {
  let reply: string;
  try {
    reply = await generate(cleaningPrompt(rawTranscript, title));
  } catch (err: unknown) {
    throw new CleaningFailedError(errorMessage(err), { cause: err });
  }
  const cleaned = normalizeCleanedTranscript(reply);
  if (!cleaned) {
    throw new CleaningFailedError("empty response");
  }
  return cleaned;
}

export async function generateTakeaways(generate: TextGenerator, transcript: string, title: string): Promise<string> {
  let reply: string;
  try {
    reply = await generate(takeawaysPrompt(transcript, title));
  } catch (err: unknown) {
    throw new GenerationFailedError(errorMessage(err), { cause: err });
  }
  return normalizeTakeaways(reply);
}
