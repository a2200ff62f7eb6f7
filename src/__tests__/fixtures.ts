import type { PipelineServices, TranscriptResult } from "../types.js";

export const VIDEO_ID = "AAAAAAAAAAA";
export const VIDEO_URL = `https://youtu.be/${VIDEO_ID}`;

export function sampleResult(overrides: Partial<TranscriptResult> = {}): TranscriptResult {
  return {
    title: "Test Episode",
    url: VIDEO_URL,
    takeaways: "- A.\n- B.\n- C.\n- D.\n- E.",
    transcript: "### Chapter\n\nBody text.",
    markdown: "# Test Episode\n\nBody text.",
    filename: "Test_Episode.md",
    ...overrides,
  };
}

export function fakeServices(overrides: Partial<PipelineServices> = {}): PipelineServices {
  return {
    fetchVideoInfo: async (videoId) => ({ id: videoId, title: "Test Episode" }),
    extractTranscript: async () => "raw words",
    cleanTranscript: async (raw) => `### Chapter\n\n${raw}`,
    generateTakeaways: async () => "- A.\n- B.\n- C.\n- D.\n- E.",
    ...overrides,
  };
}

export interface Gate {
  promise: Promise<void>;
  open(): void;
}

/** A promise the test resolves by hand. */
export function gate(): Gate {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}
