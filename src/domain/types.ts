export type JobStatus =
  | "queued"
  | "downloading"
  | "analyzing"
  | "processing"
  | "uploading"
  | "finishing"
  | "completed"
  | "error"
  | "cancelled";

export type TerminalStatus = "completed" | "error" | "cancelled";

export type Layout = "blur_zoom" | "vertical" | "horizontal" | "blur";
export type CaptionStyle = "classic" | "bold" | "box";
export type Platform = "universal" | "youtube_shorts" | "tiktok_instagram";
export type RequestMode = "ai" | "manual_cut" | "manual_edit";

export type ErrorKind =
  | "validation"
  | "source"
  | "analysis"
  | "render"
  | "transcription"
  | "timeout"
  | "cancelled"
  | "invalid_state"
  | "not_found"
  | "notification"
  | "internal";

/** A timestamp as the client sent it: seconds, or "m:ss" / "h:mm:ss". */
export type TimestampInput = number | string;

export interface Segment {
  start: number;
  end: number;
  title?: string | null;
  description?: string | null;
}

export interface RenderOptions {
  layout: Layout;
  maxClips: number;
  zoomLevel: number;
  fadeDuration: number;
  width: number;
  height: number;
  mirror: boolean;
  speed: number;
  pitchShift: number;
  backgroundNoise: number;
  colorFilter: boolean;
  ghostEffect: boolean;
  dynamicZoom: boolean;
  faceTracking: boolean;
  captions: boolean;
  captionStyle: CaptionStyle;
}

interface RequestBase {
  sourceId: string;
  webhookUrl: string;
  folderId?: string | null;
  options: RenderOptions;
}

export interface AiRequest extends RequestBase {
  mode: "ai";
  instruction?: string | null;
}

export interface ManualCutRequest extends RequestBase {
  mode: "manual_cut";
  clips: { start: TimestampInput; end: TimestampInput; title?: string | null }[];
}

export interface ManualEditRequest extends RequestBase {
  mode: "manual_edit";
  title?: string | null;
  segments: { start: TimestampInput; end: TimestampInput }[];
}

export type JobRequest = AiRequest | ManualCutRequest | ManualEditRequest;

export type Transition = { kind: "crossfade"; duration: number } | { kind: "cut" };

export interface RenderTarget {
  index: number;
  title: string;
  platform: Platform;
  segments: Segment[];
  /** One entry per boundary between consecutive segments. */
  transitions: Transition[];
  /** Output start of each segment, before speed change. */
  segmentOffsets: number[];
  plannedDuration: number;
  trimmed: boolean;
  options: RenderOptions;
}

export interface RenderPlan {
  mode: RequestMode;
  sourceDuration: number | null;
  clipCount: number;
  targets: RenderTarget[];
}

/** A clip proposed by the analysis provider, in source time. */
export interface CandidateClip {
  title?: string | null;
  segments: Segment[];
}

export interface MediaInfo {
  durationSec: number;
  width: number;
  height: number;
  fps: number;
  hasAudio: boolean;
}

export interface TranscriptWord {
  start: number;
  end: number;
  text: string;
}

export interface Transcript {
  language: string;
  words: TranscriptWord[];
}

export interface CaptionCue {
  start: number;
  end: number;
  text: string;
}

export interface CropKeyframe {
  time: number;
  x: number;
}

export interface GeneratedClip {
  index: number;
  title: string;
  platform: Platform;
  file_id: string;
  file_name: string;
  link: string | null;
  total_duration: number;
  segments: { start: number; end: number; description?: string }[];
  output_size_mb: number;
}

export interface JobResult {
  total_clips: number;
  generated_clips: GeneratedClip[];
}

export interface JobFailure {
  kind: ErrorKind;
  message: string;
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  stageMessage: string;
  cancelRequested: boolean;
  request: JobRequest;
  result?: JobResult | null;
  error?: JobFailure | null;
  webhookDelivered?: boolean | null;
  createdAt: Date;
  updatedAt: Date;
}

export type WebhookPayload =
  | { job_id: string; status: "completed"; original_source_id: string; result: JobResult }
  | { job_id: string; status: "error"; original_source_id: string; error: JobFailure }
  | { job_id: string; status: "cancelled"; original_source_id: string };

export interface JobStatusView {
  job_id: string;
  status: JobStatus;
  progress_message: string;
  elapsed_seconds: number;
  result?: JobResult;
  error?: JobFailure;
}
