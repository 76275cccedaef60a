import { InvalidStateError } from "../domain/errors";
import type { JobStatus, TerminalStatus } from "../domain/types";

export const STATUS_ORDER: readonly JobStatus[] = [
  "queued",
  "downloading",
  "analyzing",
  "processing",
  "uploading",
  "finishing",
  "completed",
  "error",
  "cancelled"
];

export const STAGE_MESSAGES: Record<JobStatus, string> = {
  queued: "Waiting for a worker.",
  downloading: "Downloading source video.",
  analyzing: "Analyzing video for highlights.",
  processing: "Rendering clips.",
  uploading: "Uploading clips.",
  finishing: "Cleaning up.",
  completed: "Completed.",
  error: "Failed.",
  cancelled: "Cancelled."
};

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return status === "completed" || status === "error" || status === "cancelled";
}

/** Forward moves only; every outcome passes through `finishing`. */
export function canTransition(from: JobStatus, to: JobStatus) {
  if (isTerminal(from)) {
    return false;
  }
  if (isTerminal(to)) {
    return from === "finishing";
  }
  return STATUS_ORDER.indexOf(to) > STATUS_ORDER.indexOf(from);
}

export function assertTransition(from: JobStatus, to: JobStatus) {
  if (!canTransition(from, to)) {
    throw new InvalidStateError(`Cannot move job from ${from} to ${to}.`);
  }
}
