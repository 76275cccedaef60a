import type { ErrorKind, JobFailure, JobStatus } from "./types";

export class PipelineError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }

  toFailure(): JobFailure {
    return { kind: this.kind, message: this.message };
  }
}

export type ValidationIssue = { path: string; message: string };

export class ValidationError extends PipelineError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super("validation", message);
    this.issues = issues;
  }
}

export class SourceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("source", message, options);
  }
}

export class AnalysisError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("analysis", message, options);
  }
}

export class RenderError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("render", message, options);
  }
}

export class TranscriptionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transcription", message, options);
  }
}

export class TimeoutError extends PipelineError {
  constructor(message: string) {
    super("timeout", message);
  }
}

/** Not a failure: the job stops at a stage boundary and ends as `cancelled`. */
export class CancelledError extends PipelineError {
  constructor(stage: JobStatus) {
    super("cancelled", `Cancelled before ${stage}.`);
  }
}

export class InvalidStateError extends PipelineError {
  constructor(message: string) {
    super("invalid_state", message);
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class NotificationError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("notification", message, options);
    this.status = status;
  }
}

export function classifyError(error: unknown): JobFailure {
  if (error instanceof PipelineError) {
    return error.toFailure();
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return { kind: "internal", message };
}

export async function withTimeout<T>(task: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms.`)), timeoutMs);
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
