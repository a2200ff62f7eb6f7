import type { JobRecord, TranscriptResult } from "../types.js";

export type JobPatch = Partial<Pick<JobRecord, "status" | "progress" | "result" | "error">>;

/**
 * In-memory job table. Records are frozen and replaced whole on every
 * update, so a reader holding a snapshot never sees a half-written job.
 */
export class JobStore {
  private readonly jobs = new Map<string, Readonly<JobRecord>>();

  constructor(private readonly now: () => number = Date.now) {}

  insert(job: Omit<JobRecord, "createdAt" | "updatedAt">): Readonly<JobRecord> {
    const ts = this.now();
    const record = Object.freeze({ ...job, createdAt: ts, updatedAt: ts });
    this.jobs.set(job.id, record);
    return record;
  }

  update(id: string, patch: JobPatch): Readonly<JobRecord> {
    const job = this.jobs.get(id);
    if (!job) throw new Error(`Job not found: ${id}`);
    const next = Object.freeze({ ...job, ...patch, updatedAt: this.now() });
    this.jobs.set(id, next);
    return next;
  }

  get(id: string): Readonly<JobRecord> | null {
    return this.jobs.get(id) ?? null;
  }

  get size(): number {
    return this.jobs.size;
  }
}

export function completedJob(id: string, videoId: string, result: TranscriptResult, progress: string) {
  return { id, videoId, status: "completed" as const, progress, result, error: null };
}
