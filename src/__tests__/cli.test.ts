import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { convert, createProgram, type CliOptions, type ConvertDeps } from "../cli.js";
import { loadConfig } from "../config.js";
import { ConfigurationError, InvalidReferenceError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { VIDEO_URL, fakeServices } from "./fixtures.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "cli-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const defaults: CliOptions = { rawOnly: false, pdf: false, font: "Times New Roman", zoom: "100" };

function deps(overrides: Partial<ConvertDeps> = {}): ConvertDeps {
  return {
    services: fakeServices(),
    apiKey: "test-secret",
    outputDir: dir,
    fetchImage: async () => null,
    logger: silentLogger(),
    ...overrides,
  };
}

describe("convert", () => {
  it("writes the cleaned document under the output directory", async () => {
    const out = await convert(VIDEO_URL, defaults, deps());

    expect(out.markdownPath).toBe(path.join(dir, "Test_Episode.md"));
    expect(out.pdfPath).toBeUndefined();
    expect(await fs.readFile(out.markdownPath, "utf-8")).toBe(out.result.markdown);
    expect(out.result.markdown).toContain("## Top Takeaways");
  });

  it("skips the model stages for a raw transcript", async () => {
    const cleanTranscript = vi.fn(async (raw: string) => raw);
    const generateTakeaways = vi.fn(async () => "");
    const out = await convert(
      VIDEO_URL,
      { ...defaults, rawOnly: true },
      deps({ apiKey: undefined, services: fakeServices({ cleanTranscript, generateTakeaways }) })
    );

    expect(out.markdownPath).toBe(path.join(dir, "Test_Episode_raw.md"));
    expect(out.result.takeaways).toBe("");
    expect(out.result.transcript).toBe("raw words");
    expect(out.result.markdown).not.toContain("## Top Takeaways");
    expect(cleanTranscript).not.toHaveBeenCalled();
    expect(generateTakeaways).not.toHaveBeenCalled();
  });

  it("requires an API key unless only the raw transcript is wanted", async () => {
    const attempt = convert(VIDEO_URL, defaults, deps({ apiKey: undefined }));
    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
    await expect(attempt).rejects.toThrow("Google AI API key required. Set GOOGLE_API_KEY or use --api-key");
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("checks the URL before anything else", async () => {
    await expect(convert("https://vimeo.com/1", defaults, deps({ apiKey: undefined }))).rejects.toBeInstanceOf(
      InvalidReferenceError
    );
  });

  it("writes a PDF beside an explicit output path", async () => {
    const output = path.join(dir, "nested", "episode.md");
    const out = await convert(VIDEO_URL, { ...defaults, output, pdf: true, font: "Courier New", zoom: "80" }, deps());

    expect(out.markdownPath).toBe(output);
    expect(out.pdfPath).toBe(path.join(dir, "nested", "episode.pdf"));
    const pdf = await fs.readFile(path.join(dir, "nested", "episode.pdf"));
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(pdf.toString("latin1")).toContain("/Courier");
  });
});

describe("createProgram", () => {
  function program() {
    return createProgram({ ...loadConfig(), outputDir: dir }, silentLogger(), () => fakeServices());
  }

  it("fails on a reference without a video id", async () => {
    await expect(program().parseAsync(["node", "transcript-cleaner", "https://vimeo.com/1", "--raw-only"])).rejects.toThrow(
      "Could not extract video ID from URL: https://vimeo.com/1"
    );
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("writes a raw transcript through the configured services", async () => {
    await program().parseAsync(["node", "transcript-cleaner", VIDEO_URL, "--raw-only"]);

    const written = await fs.readFile(path.join(dir, "Test_Episode_raw.md"), "utf-8");
    expect(written.endsWith("## Full Transcript\n\nraw words")).toBe(true);
  });
});
