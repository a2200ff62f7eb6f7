import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TranscriptUnavailableError, errorMessage } from "../errors.js";
import { runCommand, type CommandRunner } from "../utils/process.js";
import { parseVtt } from "./vtt.js";

export interface TranscriptOptions {
  ytdlpCmd: string;
  language: string;
  proxy?: string;
  timeoutMs: number;
  run?: CommandRunner;
}

export function buildYtdlpArgs(youtubeUrl: string, outDir: string, opts: TranscriptOptions): string[] {
  const args = [
    "--write-sub",
    "--write-auto-sub",
    "--sub-lang",
    opts.language,
    "--skip-download",
    "--sub-format",
    "vtt",
    "-o",
    path.join(outDir, "%(id)s.%(ext)s"),
  ];
  if (opts.proxy) {
    args.push("--proxy", opts.proxy);
  }
  args.push(youtubeUrl);
  return args;
}

/** Download the caption track with yt-dlp and return it as plain text. */
export async function extractTranscript(youtubeUrl: string, opts: TranscriptOptions): Promise<string> {
  const run = opts.run ?? runCommand;
  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "captions-"));
  try {
    try {
      await run(opts.ytdlpCmd, buildYtdlpArgs(youtubeUrl, workDir, opts), { timeoutMs: opts.timeoutMs });
    } catch (err: unknown) {
      throw new TranscriptUnavailableError(`Failed to extract transcript: ${errorMessage(err)}`, { cause: err });
    }

    const vttFiles = (await fs.readdir(workDir)).filter((f) => f.endsWith(".vtt")).sort();
    const first = vttFiles[0];
    if (!first) {
      throw new TranscriptUnavailableError("No transcript found for this video");
    }

    const text = parseVtt(await fs.readFile(path.join(workDir, first), "utf-8"));
    if (!text) {
      throw new TranscriptUnavailableError("Transcript for this video is empty");
    }
    return text;
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
}
