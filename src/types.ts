export interface VideoInfo {
  id: string;
  title: string;
}

/** A finished transcript document; also the shape persisted in the cache file. */
export interface TranscriptResult {
  title: string;
  url: string;
  takeaways: string;
  transcript: string;
  markdown: string;
  filename: string;
}

export type JobStatus = "processing" | "completed" | "error";

export interface JobRecord {
  id: string;
  videoId: string;
  status: JobStatus;
  progress: string; // label of the stage last entered
  result: TranscriptResult | null;
  error: string | null;
  createdAt: number;
  updatedAt: number;
}

export type ProgressListener = (label: string) => void;

/** External collaborators the pipeline calls, in stage order. */
export interface PipelineServices {
  fetchVideoInfo(videoId: string): Promise<VideoInfo>;
  extractTranscript(youtubeUrl: string): Promise<string>;
  cleanTranscript(rawTranscript: string, title: string): Promise<string>;
  generateTakeaways(transcript: string, title: string): Promise<string>;
}

/** Rendering options as a caller supplies them (query string, CLI flags). */
export interface LayoutRequest {
  font?: string;
  zoom?: string | number;
}
