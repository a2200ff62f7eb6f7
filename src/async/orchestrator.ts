import crypto from "node:crypto";
import {
  AlreadyInProgressError,
  ConfigurationError,
  JobNotCompletedError,
  NotFoundError,
  errorMessage,
} from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { processVideo } from "../pipeline/index.js";
import { extractVideoId } from "../pipeline/videoId.js";
import { JobStore, completedJob } from "../store/jobStore.js";
import type { ResultCache } from "../store/resultCache.js";
import type { JobRecord, PipelineServices, TranscriptResult } from "../types.js";

export const PROGRESS = {
  starting: "Starting...",
  cached: "Loaded from cache",
  saving: "Saving result...",
  done: "Done",
} as const;

export interface OrchestratorOptions {
  cache: ResultCache;
  services: PipelineServices;
  /** Key for the cleaning service; a cache miss without one is rejected up front. */
  apiKey?: string;
  /** What a second submission for a video already in flight gets. Default: the running job. */
  onDuplicate?: "attach" | "reject";
  jobs?: JobStore;
  logger?: Logger;
  newJobId?: () => string;
}

/**
 * Owns the job table and one supervised task per running job. Submissions
 * for a video that is already being processed never start a second task.
 */
export class JobOrchestrator {
  private readonly cache: ResultCache;
  private readonly services: PipelineServices;
  private readonly apiKey?: string;
  private readonly onDuplicate: "attach" | "reject";
  private readonly jobs: JobStore;
  private readonly log: Logger;
  private readonly newJobId: () => string;
  // videoId -> jobId of the task processing it
  private readonly inFlight = new Map<string, string>();
  private readonly tasks = new Map<string, Promise<void>>();

  constructor(opts: OrchestratorOptions) {
    this.cache = opts.cache;
    this.services = opts.services;
    this.apiKey = opts.apiKey;
    this.onDuplicate = opts.onDuplicate ?? "attach";
    this.jobs = opts.jobs ?? new JobStore();
    this.log = (opts.logger ?? silentLogger()).child({ component: "orchestrator" });
    this.newJobId = opts.newJobId ?? (() => crypto.randomUUID());
  }

  /** Returns the id of a job to poll. Never waits for the pipeline. */
  submit(reference: string): string {
    const url = reference.trim();
    const videoId = extractVideoId(url);

    const cached = this.cache.get(videoId);
    if (cached) {
      const jobId = this.newJobId();
      this.jobs.insert(completedJob(jobId, videoId, cached, PROGRESS.cached));
      this.log.info({ jobId, videoId }, "served from cache");
      return jobId;
    }

    if (!this.apiKey) {
      throw new ConfigurationError("GOOGLE_API_KEY not configured");
    }

    const running = this.inFlight.get(videoId);
    if (running) {
      if (this.onDuplicate === "reject") {
        throw new AlreadyInProgressError(videoId, running);
      }
      this.log.info({ jobId: running, videoId }, "attached to running job");
      return running;
    }

    const jobId = this.newJobId();
    this.jobs.insert({ id: jobId, videoId, status: "processing", progress: PROGRESS.starting, result: null, error: null });
    this.inFlight.set(videoId, jobId);
    this.tasks.set(jobId, this.run(jobId, videoId, url));
    this.log.info({ jobId, videoId }, "job started");
    return jobId;
  }

  status(jobId: string): Readonly<JobRecord> {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError();
    return job;
  }

  result(jobId: string): TranscriptResult {
    const job = this.status(jobId);
    if (job.status !== "completed" || !job.result) throw new JobNotCompletedError();
    return job.result;
  }

  get runningCount(): number {
    return this.tasks.size;
  }

  /** Wait for every task running now to settle. */
  async drain(): Promise<void> {
    await Promise.all(this.tasks.values());
  }

  // Settles normally in every case; failures end up on the job record
  private async run(jobId: string, videoId: string, url: string): Promise<void> {
    try {
      const result = await processVideo(url, this.services, (label) => {
        this.jobs.update(jobId, { progress: label });
      });
      this.jobs.update(jobId, { progress: PROGRESS.saving });
      await this.cache.put(videoId, result);
      this.jobs.update(jobId, { status: "completed", progress: PROGRESS.done, result });
      this.log.info({ jobId, videoId }, "job completed");
    } catch (err: unknown) {
      this.jobs.update(jobId, { status: "error", error: errorMessage(err) });
      this.log.error({ err, jobId, videoId }, "job failed");
    } finally {
      this.inFlight.delete(videoId);
      this.tasks.delete(jobId);
    }
  }
}
