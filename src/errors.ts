export type ErrorCode =
  | "INVALID_REFERENCE"
  | "CONFIGURATION"
  | "NOT_FOUND"
  | "ALREADY_IN_PROGRESS"
  | "JOB_NOT_COMPLETED"
  | "METADATA_UNAVAILABLE"
  | "TRANSCRIPT_UNAVAILABLE"
  | "CLEANING_FAILED"
  | "GENERATION_FAILED";

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;

  constructor(code: ErrorCode, statusCode: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidReferenceError extends AppError {
  constructor(reference: string) {
    super("INVALID_REFERENCE", 400, `Could not extract video ID from URL: ${reference}`);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super("CONFIGURATION", 500, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Job not found") {
    super("NOT_FOUND", 404, message);
  }
}

export class AlreadyInProgressError extends AppError {
  readonly jobId: string;

  constructor(videoId: string, jobId: string) {
    super("ALREADY_IN_PROGRESS", 409, `Video ${videoId} is already being processed`);
    this.jobId = jobId;
  }
}

export class JobNotCompletedError extends AppError {
  constructor() {
    super("JOB_NOT_COMPLETED", 400, "Job not completed");
  }
}

export class MetadataUnavailableError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super("METADATA_UNAVAILABLE", 502, `Failed to get video info: ${message}`, options);
  }
}

export class TranscriptUnavailableError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super("TRANSCRIPT_UNAVAILABLE", 502, message, options);
  }
}

export class CleaningFailedError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super("CLEANING_FAILED", 502, `Failed to clean transcript: ${message}`, options);
  }
}

export class GenerationFailedError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super("GENERATION_FAILED", 502, `Failed to generate takeaways: ${message}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
