import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JobOrchestrator, type OrchestratorOptions } from "../async/orchestrator.js";
import { silentLogger } from "../logger.js";
import type { ImageFetcher } from "../render/index.js";
import { buildServer } from "../server.js";
import { ResultCache } from "../store/resultCache.js";
import { VIDEO_ID, VIDEO_URL, fakeServices, gate } from "./fixtures.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "server-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const noImages: ImageFetcher = async () => null;

function setup(overrides: Partial<OrchestratorOptions> = {}) {
  let n = 0;
  const orchestrator = new JobOrchestrator({
    cache: new ResultCache(path.join(dir, "cache.json")),
    services: fakeServices(),
    apiKey: "test-secret",
    newJobId: () => `job-${++n}`,
    ...overrides,
  });
  const app = buildServer({ orchestrator, logger: silentLogger(), fetchImage: noImages });
  return { app, orchestrator };
}

async function completedJob() {
  const ctx = setup();
  const res = await ctx.app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_URL } });
  await ctx.orchestrator.drain();
  return { ...ctx, jobId: res.json<{ job_id: string }>().job_id };
}

describe("POST /transcribe", () => {
  it("returns a job id and processes the video in the background", async () => {
    const { app, orchestrator } = setup();

    const res = await app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_URL } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ job_id: "job-1" });

    await orchestrator.drain();
    const status = await app.inject({ method: "GET", url: "/status/job-1" });
    expect(status.json()).toMatchObject({ status: "completed", progress: "Done" });
  });

  it.each([{}, { url: "" }, { url: "   " }])("rejects a missing URL in %j", async (payload) => {
    const { app } = setup();
    const res = await app.inject({ method: "POST", url: "/transcribe", payload });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "URL is required" });
  });

  it("rejects a URL without a video id", async () => {
    const { app } = setup();
    const res = await app.inject({ method: "POST", url: "/transcribe", payload: { url: "https://vimeo.com/1" } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Could not extract video ID from URL: https://vimeo.com/1" });
  });

  it("rejects a malformed JSON body", async () => {
    const { app } = setup();
    const res = await app.inject({
      method: "POST",
      url: "/transcribe",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });
    expect(res.statusCode).toBe(400);
  });

  it("reports a missing API key as a server error", async () => {
    const { app } = setup({ apiKey: undefined });
    const res = await app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_URL } });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "GOOGLE_API_KEY not configured" });
  });

  it("answers 409 for a duplicate when configured to reject", async () => {
    const hold = gate();
    const { app, orchestrator } = setup({
      onDuplicate: "reject",
      services: fakeServices({
        fetchVideoInfo: async (videoId) => {
          await hold.promise;
          return { id: videoId, title: "Test Episode" };
        },
      }),
    });

    await app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_URL } });
    const res = await app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_ID } });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: `Video ${VIDEO_ID} is already being processed` });

    hold.open();
    await orchestrator.drain();
  });
});

describe("GET /status/:jobId", () => {
  it("shows progress of a running job", async () => {
    const hold = gate();
    const { app, orchestrator } = setup({
      services: fakeServices({
        fetchVideoInfo: async (videoId) => {
          await hold.promise;
          return { id: videoId, title: "Test Episode" };
        },
      }),
    });
    await app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_URL } });

    const res = await app.inject({ method: "GET", url: "/status/job-1" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "processing", progress: "Getting video info..." });

    hold.open();
    await orchestrator.drain();
  });

  it("includes the document of a completed job", async () => {
    const { app, jobId, orchestrator } = await completedJob();
    const res = await app.inject({ method: "GET", url: `/status/${jobId}` });
    const result = orchestrator.result(jobId);
    expect(res.json()).toEqual({
      status: "completed",
      progress: "Done",
      result: { title: "Test Episode", markdown: result.markdown, filename: "Test_Episode.md" },
    });
  });

  it("includes the error of a failed job", async () => {
    const { app, orchestrator } = setup({
      services: fakeServices({
        extractTranscript: async () => {
          throw new Error("No transcript found for this video");
        },
      }),
    });
    await app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_URL } });
    await orchestrator.drain();

    const res = await app.inject({ method: "GET", url: "/status/job-1" });
    expect(res.json()).toEqual({
      status: "error",
      progress: "Extracting transcript...",
      error: "No transcript found for this video",
    });
  });

  it("answers 404 for an unknown job", async () => {
    const { app } = setup();
    const res = await app.inject({ method: "GET", url: "/status/nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Job not found" });
  });
});

describe("GET /download/:jobId", () => {
  it("serves the markdown as an attachment", async () => {
    const { app, jobId, orchestrator } = await completedJob();
    const res = await app.inject({ method: "GET", url: `/download/${jobId}` });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/markdown; charset=utf-8");
    expect(res.headers["content-disposition"]).toBe(
      `attachment; filename="Test_Episode.md"; filename*=UTF-8''Test_Episode.md`
    );
    expect(res.body).toBe(orchestrator.result(jobId).markdown);
  });

  it("refuses a job that has not finished", async () => {
    const hold = gate();
    const { app, orchestrator } = setup({
      services: fakeServices({
        cleanTranscript: async (raw) => {
          await hold.promise;
          return raw;
        },
      }),
    });
    await app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_URL } });

    const res = await app.inject({ method: "GET", url: "/download/job-1" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Job not completed" });

    hold.open();
    await orchestrator.drain();
  });

  it("answers 404 for an unknown job", async () => {
    const { app } = setup();
    const res = await app.inject({ method: "GET", url: "/download/nope" });
    expect(res.statusCode).toBe(404);
  });
});

describe("GET /download/:jobId/pdf", () => {
  it("renders the document as a PDF attachment", async () => {
    const { app, jobId } = await completedJob();
    const res = await app.inject({ method: "GET", url: `/download/${jobId}/pdf?font=Arial&zoom=150` });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("application/pdf");
    expect(res.headers["content-disposition"]).toBe(
      `attachment; filename="Test_Episode.pdf"; filename*=UTF-8''Test_Episode.pdf`
    );
    expect(res.rawPayload.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(res.rawPayload.toString("latin1")).toContain("/Helvetica");
  });

  it("falls back to defaults for bad layout parameters", async () => {
    const { app, jobId } = await completedJob();
    const res = await app.inject({ method: "GET", url: `/download/${jobId}/pdf?font=Papyrus&zoom=huge` });
    expect(res.statusCode).toBe(200);
    expect(res.rawPayload.toString("latin1")).toContain("/Times-Roman");
  });

  it("answers 404 for an unknown job", async () => {
    const { app } = setup();
    const res = await app.inject({ method: "GET", url: "/download/nope/pdf" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Job not found" });
  });
});

describe("GET /healthz", () => {
  it("reports liveness", async () => {
    const { app } = setup();
    const res = await app.inject({ method: "GET", url: "/healthz" });
    expect(res.json()).toEqual({ ok: true });
  });
});

describe("close", () => {
  it("waits for running jobs", async () => {
    const hold = gate();
    const { app, orchestrator } = setup({
      services: fakeServices({
        generateTakeaways: async () => {
          await hold.promise;
          return "- A.\n- B.\n- C.\n- D.\n- E.";
        },
      }),
    });
    await app.inject({ method: "POST", url: "/transcribe", payload: { url: VIDEO_URL } });
    expect(orchestrator.runningCount).toBe(1);

    const closing = app.close();
    hold.open();
    await closing;

    expect(orchestrator.runningCount).toBe(0);
    expect(orchestrator.status("job-1").status).toBe("completed");
  });
});
