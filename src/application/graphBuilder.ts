import type { CaptionCue, CaptionStyle, CropKeyframe, MediaInfo, RenderOptions, RenderTarget, Segment } from "../domain/types";
import type { MediaInvocation } from "../interfaces/ports";
import { cropXExpression } from "./faceTracking";
import { FilterGraphDraft, formatNumber, serializeFilterGraph, type FilterGraph } from "./filterGraph";
import { fromMs, toMs } from "./timecode";

export interface CaptionStyleSpec {
  font: string;
  uppercase: boolean;
  borderWidth: number;
  box: boolean;
}

export const CAPTION_STYLES: Record<CaptionStyle, CaptionStyleSpec> = {
  classic: { font: "Sans", uppercase: false, borderWidth: 4, box: false },
  bold: { font: "Sans:style=Bold", uppercase: true, borderWidth: 6, box: false },
  box: { font: "Sans", uppercase: false, borderWidth: 0, box: true }
};

export interface EncodingSettings {
  fps: number;
  videoBitrate: string;
  audioBitrate: string;
}

const SAMPLE_RATE = 44100;
const NOISE_SOURCE_SEC = 600;

export interface GraphInput {
  target: RenderTarget;
  fps: number;
  hasAudio: boolean;
  cues?: CaptionCue[];
  /** Per segment; null keeps the centered crop. */
  cropTracks?: (CropKeyframe[] | null)[];
  fontFile?: string | null;
}

export function buildFilterGraph(input: GraphInput): FilterGraph {
  const { target, fps, hasAudio } = input;
  const options = target.options;
  const sources = hasAudio ? ["0:v", "0:a"] : ["0:v"];
  const draft = new FilterGraphDraft(sources);
  const count = target.segments.length;

  const videoInputs = count > 1 ? draft.add("split", ["0:v"], { outputs: count }, count) : ["0:v"];
  const audioInputs = hasAudio ? (count > 1 ? draft.add("asplit", ["0:a"], { outputs: count }, count) : ["0:a"]) : [];

  const pieces = target.segments.map((segment, index) => ({
    video: segmentVideo(draft, videoInputs[index], segment, options, fps, input.cropTracks?.[index] ?? null),
    audio: segmentAudio(draft, hasAudio ? audioInputs[index] : null, segment),
    durationMs: toMs(segment.end) - toMs(segment.start)
  }));

  let { video, audio } = combineSegments(draft, pieces, target);

  if (options.dynamicZoom && options.layout !== "horizontal") {
    video = draft.then(video, "zoompan", {
      z: "1.02+0.01*sin(2*PI*it/5)",
      x: "iw/2-(iw/zoom/2)",
      y: "ih/2-(ih/zoom/2)",
      d: 1,
      s: `${options.width}x${options.height}`,
      fps
    });
    video = draft.then(video, "format", { pix_fmts: "yuv420p" });
  }
  if (options.mirror) {
    video = draft.then(video, "hflip");
  }
  if (options.colorFilter) {
    video = draft.then(video, "eq", { brightness: 0.04, contrast: 1.06, saturation: 1.12 });
  }
  if (options.ghostEffect) {
    video = draft.then(video, "eq", { brightness: 0.06, enable: "lt(mod(t,11),0.067)" });
  }
  if (options.captions) {
    for (const cue of input.cues ?? []) {
      video = draft.then(video, "drawtext", captionParams(cue, options, input.fontFile ?? null));
    }
  }
  if (options.speed !== 1) {
    video = draft.then(video, "setpts", { expr: `PTS/${formatNumber(options.speed)}` });
    audio = draft.then(audio, "atempo", { tempo: options.speed });
  }
  if (options.pitchShift !== 1) {
    audio = draft.then(audio, "asetrate", { sample_rate: Math.round(SAMPLE_RATE * options.pitchShift) });
    audio = draft.then(audio, "atempo", { tempo: 1 / options.pitchShift });
    audio = draft.then(audio, "aresample", { sample_rate: SAMPLE_RATE });
  }
  if (options.backgroundNoise > 0) {
    let noise = draft.add("anoisesrc", [], {
      color: "pink",
      r: SAMPLE_RATE,
      a: options.backgroundNoise,
      d: NOISE_SOURCE_SEC
    })[0];
    noise = draft.then(noise, "aformat", audioFormat());
    // amix halves each input; volume=2 restores the program level
    audio = draft.add("amix", [audio, noise], { inputs: 2, duration: "first" })[0];
    audio = draft.then(audio, "volume", { volume: 2 });
  }

  return draft.finish({ video, audio });
}

export function buildMediaInvocation(input: {
  inputPath: string;
  outputPath: string;
  graph: FilterGraph;
  encoding: EncodingSettings;
}): MediaInvocation {
  const { graph, encoding } = input;
  return {
    outputPath: input.outputPath,
    args: [
      "-y",
      "-i",
      input.inputPath,
      "-filter_complex",
      serializeFilterGraph(graph),
      "-map",
      `[${graph.outputs.video}]`,
      "-map",
      `[${graph.outputs.audio}]`,
      "-c:v",
      "libx264",
      "-preset",
      "medium",
      "-crf",
      "23",
      "-b:v",
      encoding.videoBitrate,
      "-c:a",
      "aac",
      "-b:a",
      encoding.audioBitrate,
      "-r",
      String(encoding.fps),
      "-pix_fmt",
      "yuv420p",
      "-movflags",
      "+faststart",
      input.outputPath
    ]
  };
}

/**
 * Width of the frame the tracked crop slides over, or null when the layout
 * has no horizontal crop to steer.
 */
export function trackedCropGeometry(options: RenderOptions, media: Pick<MediaInfo, "width" | "height">) {
  if (options.layout === "vertical") {
    const scale = Math.max(options.width / media.width, options.height / media.height);
    return { scaledWidth: media.width * scale, cropWidth: options.width };
  }
  if (options.layout === "blur_zoom") {
    return { scaledWidth: foregroundWidth(options), cropWidth: options.width };
  }
  return null;
}

function segmentVideo(
  draft: FilterGraphDraft,
  input: string,
  segment: Segment,
  options: RenderOptions,
  fps: number,
  track: CropKeyframe[] | null
) {
  let pad = draft.then(input, "trim", { start: segment.start, end: segment.end });
  pad = draft.then(pad, "setpts", { expr: "PTS-STARTPTS" });
  pad = draft.then(pad, "fps", { fps });
  pad = draft.then(pad, "format", { pix_fmts: "yuv420p" });
  pad = draft.then(pad, "setsar", { sar: 1 });

  const W = options.width;
  const H = options.height;
  const cropX = track?.length ? cropXExpression(track, W) : `(iw-${W})/2`;

  switch (options.layout) {
    case "vertical":
      pad = draft.then(pad, "scale", { w: W, h: H, force_original_aspect_ratio: "increase" });
      pad = draft.then(pad, "crop", { w: W, h: H, x: cropX, y: `(ih-${H})/2` });
      break;
    case "horizontal":
      pad = draft.then(pad, "scale", { w: W, h: -2 });
      break;
    case "blur":
    case "blur_zoom": {
      const [backgroundIn, foregroundIn] = draft.add("split", [pad], { outputs: 2 }, 2);
      const background = blurredBackground(draft, backgroundIn, W, H);
      let foreground: string;
      if (options.layout === "blur_zoom") {
        foreground = draft.then(foregroundIn, "scale", { w: foregroundWidth(options), h: -2 });
        foreground = draft.then(foreground, "crop", { w: W, h: "ih", x: cropX, y: 0 });
      } else {
        foreground = draft.then(foregroundIn, "scale", { w: W, h: -2 });
      }
      pad = draft.add("overlay", [background, foreground], { x: 0, y: "(H-h)/2" })[0];
      break;
    }
  }

  return draft.then(pad, "setsar", { sar: 1 });
}

function blurredBackground(draft: FilterGraphDraft, input: string, width: number, height: number) {
  const smallW = Math.floor(width / 4);
  const smallH = Math.floor(height / 4);
  let pad = draft.then(input, "scale", { w: smallW, h: smallH, force_original_aspect_ratio: "increase" });
  pad = draft.then(pad, "crop", { w: smallW, h: smallH });
  pad = draft.then(pad, "boxblur", { luma_radius: 20, luma_power: 2, chroma_radius: 20, chroma_power: 2 });
  return draft.then(pad, "scale", { w: width, h: height });
}

function segmentAudio(draft: FilterGraphDraft, input: string | null, segment: Segment) {
  let pad: string;
  if (input) {
    pad = draft.then(input, "atrim", { start: segment.start, end: segment.end });
    pad = draft.then(pad, "asetpts", { expr: "PTS-STARTPTS" });
  } else {
    pad = draft.add("anullsrc", [], {
      channel_layout: "stereo",
      sample_rate: SAMPLE_RATE,
      duration: fromMs(toMs(segment.end) - toMs(segment.start))
    })[0];
  }
  return draft.then(pad, "aformat", audioFormat());
}

function combineSegments(
  draft: FilterGraphDraft,
  pieces: { video: string; audio: string; durationMs: number }[],
  target: RenderTarget
) {
  let { video, audio } = pieces[0];
  let accumulatedMs = pieces[0].durationMs;

  for (let i = 1; i < pieces.length; i += 1) {
    const previous = pieces[i - 1];
    const next = pieces[i];
    const transition = target.transitions[i - 1];
    const fadeMs = transition?.kind === "crossfade" ? toMs(transition.duration) : 0;
    const offsetMs = accumulatedMs - fadeMs;

    const fits =
      fadeMs > 0 && fadeMs < previous.durationMs && fadeMs < next.durationMs && offsetMs >= 0 && offsetMs <= accumulatedMs;

    if (fits) {
      video = draft.add("xfade", [video, next.video], {
        transition: "fade",
        duration: fromMs(fadeMs),
        offset: fromMs(offsetMs)
      })[0];
      audio = draft.add("acrossfade", [audio, next.audio], { d: fromMs(fadeMs), c1: "tri", c2: "tri" })[0];
      accumulatedMs += next.durationMs - fadeMs;
    } else {
      [video, audio] = draft.add("concat", [video, audio, next.video, next.audio], { n: 2, v: 1, a: 1 }, 2);
      accumulatedMs += next.durationMs;
    }
  }

  return { video, audio, durationMs: accumulatedMs };
}

function captionParams(cue: CaptionCue, options: RenderOptions, fontFile: string | null) {
  const style = CAPTION_STYLES[options.captionStyle];
  const params: Record<string, string | number> = {
    text: style.uppercase ? cue.text.toUpperCase() : cue.text,
    expansion: "none"
  };
  if (fontFile) {
    params.fontfile = fontFile;
  } else {
    params.font = style.font;
  }
  params.fontsize = Math.round(options.height / 40);
  params.fontcolor = "white";
  if (style.borderWidth > 0) {
    params.borderw = style.borderWidth;
    params.bordercolor = "black";
  }
  if (style.box) {
    params.box = 1;
    params.boxcolor = "black@0.6";
    params.boxborderw = 18;
  }
  params.x = "(w-text_w)/2";
  params.y = `h-text_h-${Math.round(options.height / 6)}`;
  params.enable = `between(t,${formatNumber(cue.start)},${formatNumber(cue.end)})`;
  return params;
}

function foregroundWidth(options: RenderOptions) {
  return Math.max(options.zoomLevel, options.width);
}

function audioFormat() {
  return { sample_fmts: "fltp", sample_rates: SAMPLE_RATE, channel_layouts: "stereo" };
}
