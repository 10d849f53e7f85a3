import test from "node:test";
import assert from "node:assert/strict";
import { createStyler, formatLoadSummary, formatRecommendations } from "../src/presenter";

test("createStyler wraps text in ANSI codes only when colour is on", () => {
  assert.equal(createStyler(true)("hi", "bold", "green"), "\u001b[1m\u001b[32mhi\u001b[0m");
  assert.equal(createStyler(true)(42), "42");
  assert.equal(createStyler(false)("hi", "red"), "hi");
});

test("formatLoadSummary mentions skipped lines only when there are some", () => {
  const plain = createStyler(false);
  assert.deepEqual(formatLoadSummary(12, 0, plain), ["Loaded 12 songs (duplicates auto-removed)."]);
  assert.deepEqual(formatLoadSummary(12, 3, plain), [
    "Loaded 12 songs (duplicates auto-removed).",
    "Skipped 3 bad/invalid lines."
  ]);
});

test("formatRecommendations renders rank, reason and score", () => {
  const lines = formatRecommendations(
    [
      {
        score: -4,
        song: { title: "Undertow", artist: "Mara Vell", genre: "Downtempo", bpm: 85, energy: 1 },
        why: "BPM diff: 47; Energy: 1 (goal: same)"
      }
    ],
    createStyler(false)
  );
  assert.deepEqual(lines, [
    "\nRecommended Next Songs:",
    "1. Undertow by Mara Vell (85 BPM, E1)",
    "   why: BPM diff: 47; Energy: 1 (goal: same)",
    "   score: -4"
  ]);
});
