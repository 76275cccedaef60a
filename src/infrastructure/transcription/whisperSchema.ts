import { z } from "zod";
import type { Transcript, TranscriptWord } from "../../domain/types";
import { wordsFromSegments } from "../../application/captionPlanner";

const wordSchema = z.object({ word: z.string(), start: z.number(), end: z.number() });

/** Output of whisper's JSON writer and of OpenAI-style `verbose_json`; both share this shape. */
export const whisperOutputSchema = z.object({
  language: z.string().optional(),
  words: z.array(wordSchema).optional(),
  segments: z
    .array(
      z.object({
        start: z.number(),
        end: z.number(),
        text: z.string(),
        words: z.array(wordSchema).optional()
      })
    )
    .default([])
});

export type WhisperOutput = z.infer<typeof whisperOutputSchema>;

export function toTranscript(output: WhisperOutput, fallbackLanguage: string): Transcript {
  const language = output.language ?? fallbackLanguage;
  const toWord = (word: z.infer<typeof wordSchema>): TranscriptWord => ({
    start: word.start,
    end: word.end,
    text: word.word.trim()
  });

  if (output.words?.length) {
    return { language, words: output.words.map(toWord).filter((word) => word.text) };
  }
  const nested = output.segments.flatMap((segment) => segment.words ?? []);
  if (nested.length) {
    return { language, words: nested.map(toWord).filter((word) => word.text) };
  }
  return { language, words: wordsFromSegments(output.segments) };
}
