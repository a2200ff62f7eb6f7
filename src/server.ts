import Fastify, { type FastifyError } from "fastify";
import { z } from "zod";
import type { JobOrchestrator } from "./async/orchestrator.js";
import { AppError } from "./errors.js";
import type { Logger } from "./logger.js";
import { renderDocument, type ImageFetcher } from "./render/index.js";
import type { JobRecord } from "./types.js";
import { attachmentHeader } from "./utils/contentDisposition.js";

export interface ServerDeps {
  orchestrator: JobOrchestrator;
  logger: Logger;
  fetchImage: ImageFetcher;
}

const SubmitSchema = z.object({
  url: z.string({ required_error: "URL is required" }).trim().min(1, "URL is required"),
});

const PdfQuerySchema = z.object({
  font: z.string().optional(),
  zoom: z.string().optional(),
});

type JobParams = { Params: { jobId: string } };

export function statusBody(job: Readonly<JobRecord>) {
  const body: {
    status: JobRecord["status"];
    progress: string;
    result?: { title: string; markdown: string; filename: string };
    error?: string;
  } = { status: job.status, progress: job.progress };

  if (job.status === "completed" && job.result) {
    body.result = { title: job.result.title, markdown: job.result.markdown, filename: job.result.filename };
  } else if (job.status === "error") {
    body.error = job.error ?? "Unknown error";
  }
  return body;
}

export function buildServer(deps: ServerDeps) {
  const { orchestrator, logger } = deps;
  const app = Fastify({ loggerInstance: logger });

  // Let running jobs reach a terminal state before the process goes away
  app.addHook("onClose", async () => {
    await orchestrator.drain();
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof AppError) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    // Client errors raised by Fastify itself, e.g. a malformed JSON body
    if (error.validation || (error.statusCode !== undefined && error.statusCode < 500)) {
      return reply.code(error.statusCode ?? 400).send({ error: error.message });
    }
    request.log.error({ err: error }, "request failed");
    return reply.code(500).send({ error: "Internal server error" });
  });

  app.post("/transcribe", async (req, reply) => {
    const parsed = SubmitSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues[0]?.message ?? "URL is required" });
    }
    const jobId = orchestrator.submit(parsed.data.url);
    return reply.code(200).send({ job_id: jobId });
  });

  app.get<JobParams>("/status/:jobId", async (req) => statusBody(orchestrator.status(req.params.jobId)));

  app.get<JobParams>("/download/:jobId", async (req, reply) => {
    const result = orchestrator.result(req.params.jobId);
    return reply
      .header("Content-Type", "text/markdown; charset=utf-8")
      .header("Content-Disposition", attachmentHeader(result.filename, "transcript.md"))
      .send(result.markdown);
  });

  app.get<JobParams>("/download/:jobId/pdf", async (req, reply) => {
    const result = orchestrator.result(req.params.jobId);
    const query = PdfQuerySchema.safeParse(req.query ?? {});
    const layout = query.success ? query.data : {};

    const pdf = await renderDocument(result.markdown, layout, {
      fetchImage: deps.fetchImage,
      title: result.title,
      logger,
    });
    const filename = result.filename.replace(/\.md$/, ".pdf");
    return reply
      .header("Content-Type", "application/pdf")
      .header("Content-Disposition", attachmentHeader(filename, "transcript.pdf"))
      .send(pdf);
  });

  app.get("/healthz", async () => ({ ok: true }));

  return app;
}
