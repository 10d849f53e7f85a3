import test from "node:test";
import assert from "node:assert/strict";
import { SessionAbortedError } from "../src/errors";
import { createStyler } from "../src/presenter";
import { runSession, type Prompter, type SessionIO } from "../src/session";
import type { Song } from "../src/types";

class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }
}

const catalog: Song[] = [
  { title: "Neon Harbor", artist: "Tidal Static", genre: "House", bpm: 124, energy: 4 },
  { title: "Copper Skies", artist: "Tidal Static", genre: "House", bpm: 122, energy: 3 },
  { title: "Glass Pavement", artist: "The Late Signals", genre: "Techno", bpm: 130, energy: 5 },
  { title: "Warehouse Prayer", artist: "Tidal Static", genre: "House", bpm: 126, energy: 5 }
];

function makeIO(answers: string[]): { io: SessionIO; prompter: ScriptedPrompter; output: string[] } {
  const prompter = new ScriptedPrompter(answers);
  const output: string[] = [];
  return { io: { prompter, write: (line) => output.push(line), style: createStyler(false) }, prompter, output };
}

test("runSession filters by genre, retries bad choices and prints ranked results", async () => {
  const { io, prompter, output } = makeIO(["house", "9", "x", "1", "UP"]);

  const session = await runSession(catalog, io);

  assert.equal(session.current.title, "Neon Harbor");
  assert.equal(session.goal, "up");
  assert.deepEqual(
    session.pool.map((s) => s.title),
    ["Neon Harbor", "Copper Skies", "Warehouse Prayer"]
  );
  assert.deepEqual(prompter.questions, [
    "\nType a genre to filter (or press Enter for ALL): ",
    "\nChoose current song number: ",
    "\nChoose current song number: ",
    "\nChoose current song number: ",
    "Energy goal (up / down / same): "
  ]);
  assert.equal(output.filter((line) => line === "Invalid choice. Try again.").length, 2);
  assert.ok(output.includes("\nNow playing: Neon Harbor - Tidal Static (House, 124 BPM, E4)"));
  assert.deepEqual(output.slice(-7), [
    "\nRecommended Next Songs:",
    "1. Warehouse Prayer by Tidal Static (126 BPM, E5)",
    "   why: BPM diff: 2; Energy change: +1 (goal: up); Genre match: +10",
    "   score: 126",
    "2. Copper Skies by Tidal Static (122 BPM, E3)",
    "   why: BPM diff: 2; Energy change: -1 (goal: up); Genre match: +10",
    "   score: 101"
  ]);
});

test("runSession lists genres and numbered songs", async () => {
  const { io, output } = makeIO(["", "3", "same"]);

  await runSession(catalog, io);

  assert.deepEqual(output.slice(0, 7), [
    "Genres found:",
    "House, Techno",
    "Available Songs:",
    " 1. Neon Harbor - Tidal Static (House, 124 BPM, E4)",
    " 2. Copper Skies - Tidal Static (House, 122 BPM, E3)",
    " 3. Glass Pavement - The Late Signals (Techno, 130 BPM, E5)",
    " 4. Warehouse Prayer - Tidal Static (House, 126 BPM, E5)"
  ]);
});

test("runSession falls back to all songs and the same goal on unknown input", async () => {
  const { io, output } = makeIO(["jazz", "2", "sideways"]);

  const session = await runSession(catalog, io, { limit: 2 });

  assert.ok(output.includes("Genre not found. Showing ALL songs."));
  assert.ok(output.includes("Invalid option, using 'same'."));
  assert.equal(session.pool.length, 4);
  assert.equal(session.goal, "same");
  assert.deepEqual(
    session.results.map((r) => [r.song.title, r.score]),
    [
      ["Neon Harbor", 106],
      ["Warehouse Prayer", 102]
    ]
  );
});

test("runSession reports when nothing can be recommended", async () => {
  const { io, output } = makeIO(["", "1", "up"]);

  const session = await runSession([catalog[0]], io);

  assert.deepEqual(session.results, []);
  assert.equal(output[output.length - 1], "No recommendations.");
});

test("runSession aborts when input closes", async () => {
  const { io } = makeIO(["house"]);
  await assert.rejects(runSession(catalog, io), SessionAbortedError);
});

test("runSession rejects an empty catalog without prompting", async () => {
  const { io, prompter } = makeIO(["", "1", "up"]);
  await assert.rejects(runSession([], io), RangeError);
  assert.deepEqual(prompter.questions, []);
});
