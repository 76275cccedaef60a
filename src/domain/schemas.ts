import { z } from "zod";
import type { JobRequest, RenderOptions } from "./types";

export const DEFAULT_OPTIONS: RenderOptions = {
  layout: "blur_zoom",
  maxClips: 1,
  zoomLevel: 1400,
  fadeDuration: 1.0,
  width: 1080,
  height: 1920,
  mirror: false,
  speed: 1.0,
  pitchShift: 1.0,
  backgroundNoise: 0,
  colorFilter: false,
  ghostEffect: false,
  dynamicZoom: false,
  faceTracking: false,
  captions: false,
  captionStyle: "classic"
};

const optionsSchema = z
  .object({
    layout: z.enum(["blur_zoom", "vertical", "horizontal", "blur"]).default(DEFAULT_OPTIONS.layout),
    max_clips: z.number().int().min(1).max(10).default(DEFAULT_OPTIONS.maxClips),
    zoom_level: z.number().int().min(500).max(3000).default(DEFAULT_OPTIONS.zoomLevel),
    fade_duration: z.number().min(0).max(5).default(DEFAULT_OPTIONS.fadeDuration),
    width: z.number().int().min(360).max(3840).multipleOf(2, "width must be even").default(DEFAULT_OPTIONS.width),
    height: z.number().int().min(360).max(3840).multipleOf(2, "height must be even").default(DEFAULT_OPTIONS.height),
    mirror: z.boolean().default(false),
    speed: z.number().min(0.9).max(1.2).default(DEFAULT_OPTIONS.speed),
    pitch_shift: z.number().min(0.9).max(1.1).default(DEFAULT_OPTIONS.pitchShift),
    background_noise: z.number().min(0).max(1).default(DEFAULT_OPTIONS.backgroundNoise),
    color_filter: z.boolean().default(false),
    ghost_effect: z.boolean().default(false),
    dynamic_zoom: z.boolean().default(false),
    face_tracking: z.boolean().default(false),
    captions: z.boolean().default(false),
    caption_style: z.enum(["classic", "bold", "box"]).default(DEFAULT_OPTIONS.captionStyle)
  })
  .strict()
  .transform(
    (raw): RenderOptions => ({
      layout: raw.layout,
      maxClips: raw.max_clips,
      zoomLevel: raw.zoom_level,
      fadeDuration: raw.fade_duration,
      width: raw.width,
      height: raw.height,
      mirror: raw.mirror,
      speed: raw.speed,
      pitchShift: raw.pitch_shift,
      backgroundNoise: raw.background_noise,
      colorFilter: raw.color_filter,
      ghostEffect: raw.ghost_effect,
      dynamicZoom: raw.dynamic_zoom,
      faceTracking: raw.face_tracking,
      captions: raw.captions,
      captionStyle: raw.caption_style
    })
  );

const timestamp = z.union([z.number().nonnegative(), z.string().trim().min(1)]);

const base = {
  file_id: z.string().trim().min(1, "file_id cannot be empty"),
  webhook_url: z.string().url(),
  drive_folder_id: z.string().min(1).nullish(),
  options: optionsSchema.nullish()
};

const aiSchema = z.object({
  mode: z.literal("ai"),
  ...base,
  instruction: z.string().max(2000).nullish()
});

const manualCutSchema = z.object({
  mode: z.literal("manual_cut"),
  ...base,
  clips: z
    .array(z.object({ start: timestamp, end: timestamp, title: z.string().max(200).nullish() }))
    .min(1)
    .max(20)
});

const manualEditSchema = z.object({
  mode: z.literal("manual_edit"),
  ...base,
  title: z.string().max(200).nullish(),
  segments: z
    .array(z.object({ start: timestamp, end: timestamp }))
    .min(1)
    .max(20)
});

export const jobRequestSchema = z
  .discriminatedUnion("mode", [aiSchema, manualCutSchema, manualEditSchema])
  .transform((raw): JobRequest => {
    const common = {
      sourceId: raw.file_id,
      webhookUrl: raw.webhook_url,
      folderId: raw.drive_folder_id ?? null,
      options: raw.options ?? { ...DEFAULT_OPTIONS }
    };
    if (raw.mode === "ai") {
      return { mode: "ai", ...common, instruction: raw.instruction ?? null };
    }
    if (raw.mode === "manual_cut") {
      return {
        mode: "manual_cut",
        ...common,
        clips: raw.clips.map((clip) => ({ start: clip.start, end: clip.end, title: clip.title ?? null }))
      };
    }
    return { mode: "manual_edit", ...common, title: raw.title ?? null, segments: raw.segments };
  });

export type JobRequestPayload = z.input<typeof jobRequestSchema>;
