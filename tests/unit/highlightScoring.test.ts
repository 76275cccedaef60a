import { describe, expect, it } from "vitest";
import {
  buildEnergyWindows,
  buildTranscriptWindows,
  energyFromSilences,
  nonMaxSuppression,
  pickHighlights,
  rankWindows,
  tokenize,
  trimSilence
} from "../../src/application/highlightScoring";

const window = (start: number, end: number, score = 0.5) => ({ start, end, score, reason: "" });

describe("highlight scoring", () => {
  it("turns silences into a per-second energy curve", () => {
    expect(energyFromSilences(5, [{ start: 1, end: 2.5 }]).map((sample) => sample.value)).toEqual([
      0.72, 0.12, 0.12, 0.72, 0.72, 0.72
    ]);
  });

  it("applies non max suppression", () => {
    const reduced = nonMaxSuppression([window(0, 10, 0.9), window(2, 9, 0.5), window(20, 30, 0.4)]);
    expect(reduced.map((item) => [item.start, item.end])).toEqual([
      [0, 10],
      [20, 30]
    ]);
  });

  it("trims quiet edges off a window", () => {
    const energy = energyFromSilences(30, [
      { start: 0, end: 3 },
      { start: 27, end: 30 }
    ]);
    expect(trimSilence(window(0, 30), energy)).toMatchObject({ start: 4, end: 26 });
  });

  it("finds windows in active stretches of audio", () => {
    const energy = energyFromSilences(30, [
      { start: 0, end: 3 },
      { start: 27, end: 30 }
    ]);
    expect(buildEnergyWindows(energy, 18, 32).map((item) => [item.start, item.end])).toEqual([[4, 27]]);

    const long = buildEnergyWindows(energyFromSilences(100, []), 18, 32);
    expect(long.map((item) => [item.start, item.end])).toEqual([
      [0, 32],
      [18, 50],
      [36, 68],
      [54, 86]
    ]);
  });

  it("grows transcript windows phrase by phrase", () => {
    const words = [
      { start: 0, end: 1, text: "one" },
      { start: 3, end: 4, text: "two" },
      { start: 6, end: 7, text: "three" }
    ];
    expect(buildTranscriptWindows(words, 5, 8).map((item) => [item.start, item.end])).toEqual([[0, 7]]);
  });

  it("explains why a window ranks high", () => {
    const energy = energyFromSilences(60, [{ start: 30, end: 60 }]);
    const ranked = rankWindows(
      [window(40, 60), window(0, 20)],
      [
        { start: 2, end: 2.5, text: "this" },
        { start: 2.5, end: 3, text: "secret" },
        { start: 3, end: 3.5, text: "trick" }
      ],
      energy
    );
    expect(ranked.map((item) => [item.start, item.reason])).toEqual([
      [0, "audio peak + keyword: secret"],
      [40, "balanced energy"]
    ]);
  });

  it("tokenizes text for keyword matching", () => {
    expect(tokenize("Wow, that's BIG!")).toEqual(["wow", "that", "s", "big!"]);
  });

  it("picks non-overlapping highlights from audio alone", () => {
    const picked = pickHighlights({
      words: [],
      energy: energyFromSilences(100, [{ start: 40, end: 45 }]),
      count: 3
    });
    expect(picked.map((item) => [item.start, item.end, item.reason])).toEqual([
      [0, 32, "audio peak"],
      [46, 78, "audio peak"]
    ]);
  });

  it("returns nothing without audio or words", () => {
    expect(pickHighlights({ words: [], energy: [], count: 2 })).toEqual([]);
  });
});
