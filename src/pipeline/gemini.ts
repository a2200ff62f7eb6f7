import { fetch } from "undici";
import { z } from "zod";

export interface GeminiOptions {
  apiKey?: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

const GenerateContentResponse = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

export function extractCandidateText(body: unknown): string {
  const parsed = GenerateContentResponse.safeParse(body);
  if (!parsed.success) {
    throw new Error("Unexpected Gemini response shape");
  }
  const blockReason = parsed.data.promptFeedback?.blockReason;
  if (blockReason) {
    throw new Error(`Gemini blocked the prompt: ${blockReason}`);
  }
  const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
  return parts.map((p) => p.text ?? "").join("");
}

/**
 * Single-shot text generation. No retries: a failed call fails the job and
 * the caller resubmits.
 */
export async function generateText(prompt: string, opts: GeminiOptions): Promise<string> {
  if (!opts.apiKey) {
    throw new Error("GOOGLE_API_KEY not configured");
  }
  const doFetch = opts.fetchImpl ?? fetch;
  const url = `${opts.baseUrl}/models/${encodeURIComponent(opts.model)}:generateContent`;

  const res = await doFetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "x-goog-api-key": opts.apiKey,
    },
    body: JSON.stringify({ contents: [{ role: "user", parts: [{ text: prompt }] }] }),
    signal: AbortSignal.timeout(opts.timeoutMs),
  });

  if (!res.ok) {
    const errorText = await res.text();
    throw new Error(`Gemini request failed: ${res.status} ${errorText}`);
  }

  return extractCandidateText(await res.json());
}
