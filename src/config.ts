import "dotenv/config";
import os from "node:os";
import path from "node:path";

export interface ServiceConfig {
  port: number;
  host: string;
  cacheFile: string;
  outputDir: string;
  // Gemini (cleaning + takeaways)
  googleApiKey?: string;
  geminiModel: string;
  geminiBaseUrl: string;
  geminiTimeoutMs: number;
  // Caption extraction
  ytdlpCmd: string;
  ytdlpProxy?: string; // routes yt-dlp traffic, e.g. socks5://host:port
  ytdlpTimeoutMs: number;
  subtitleLanguage: string;
  metadataTimeoutMs: number;
  // Rendering
  imageFetchTimeoutMs: number;
  // Logging
  logLevel: string;
  logPretty: boolean;
}

const rootDir = path.resolve(process.cwd());

function intFromEnv(name: string, fallback: number, min = 0): number {
  const parsed = parseInt(process.env[name] || "", 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, parsed);
}

function optionalEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function loadConfig(): ServiceConfig {
  return {
    port: intFromEnv("PORT", 8080, 1),
    host: process.env.HOST || "0.0.0.0",
    cacheFile: path.resolve(
      process.env.CACHE_FILE || path.join(rootDir, "transcript_cache.json")
    ),
    outputDir:
      process.env.OUTPUT_DIR ||
      path.join(os.homedir(), "transcript-cleaner", "transcripts"),
    googleApiKey: optionalEnv("GOOGLE_API_KEY"),
    geminiModel: process.env.GEMINI_MODEL || "gemini-2.5-flash",
    geminiBaseUrl:
      process.env.GEMINI_BASE_URL ||
      "https://generativelanguage.googleapis.com/v1beta",
    // Cleaning a long podcast can take minutes
    geminiTimeoutMs: intFromEnv("GEMINI_TIMEOUT_MS", 600000, 1000),
    ytdlpCmd: process.env.YTDLP_CMD || "yt-dlp",
    ytdlpProxy: optionalEnv("YTDLP_PROXY"),
    ytdlpTimeoutMs: intFromEnv("YTDLP_TIMEOUT_MS", 300000, 1000),
    subtitleLanguage: process.env.SUB_LANG || "en",
    metadataTimeoutMs: intFromEnv("METADATA_TIMEOUT_MS", 15000, 100),
    imageFetchTimeoutMs: intFromEnv("IMAGE_FETCH_TIMEOUT_MS", 5000, 100),
    logLevel: process.env.LOG_LEVEL || "info",
    logPretty: process.env.LOG_PRETTY === "true",
  };
}
