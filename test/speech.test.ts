import test from "node:test";
import assert from "node:assert/strict";
import { access, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ClipPlayer } from "../src/player";
import { SpeechRenderer, splitMessage } from "../src/speech";
import type { SpeechEngine } from "../src/tts";
import type { SpeechClip } from "../src/types";
import { tempDir } from "./fakes";

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

class FileEngine implements SpeechEngine {
  requests: Array<{ text: string; lang: string }> = [];
  files: string[] = [];
  failOn = new Set<string>();

  constructor(private readonly dir: string) {}

  async synthesize(text: string, lang: string): Promise<SpeechClip> {
    this.requests.push({ text, lang });
    if (this.failOn.has(text)) {
      throw new Error("TTS failed: 503 busy");
    }
    const filePath = path.join(this.dir, `clip-${this.files.length}.mp3`);
    await writeFile(filePath, "fake-audio");
    this.files.push(filePath);
    return { filePath, lang, engine: "test" };
  }
}

class RecordingClipPlayer implements ClipPlayer {
  played: Array<{ filePath: string; gain: number }> = [];
  failFirst = false;

  async play(filePath: string, gain: number): Promise<void> {
    this.played.push({ filePath, gain });
    if (this.failFirst && this.played.length === 1) {
      throw new Error("ffplay failed (1): device busy");
    }
  }
}

test("splitMessage splits on pipes and blank lines in order", () => {
  assert.deepEqual(splitMessage("Hello|World\n\nFoo"), ["Hello", "World", "Foo"]);
});

test("splitMessage returns nothing for empty or whitespace input", () => {
  assert.deepEqual(splitMessage(""), []);
  assert.deepEqual(splitMessage("   \n  "), []);
  assert.deepEqual(splitMessage("||"), []);
});

test("splitMessage keeps a single message whole", () => {
  assert.deepEqual(splitMessage("  Gate 4 is open  "), ["Gate 4 is open"]);
});

test("speak plays every segment with the gain and deletes each clip", async () => {
  const engine = new FileEngine(await tempDir("speech"));
  const player = new RecordingClipPlayer();
  const speech = new SpeechRenderer(engine, player);

  const spoken = await speech.speak("One|Two", 4);

  assert.equal(spoken, 2);
  assert.deepEqual(
    engine.requests.map((r) => r.text),
    ["One", "Two"]
  );
  assert.deepEqual(
    player.played.map((p) => p.gain),
    [4, 4]
  );
  for (const file of engine.files) {
    assert.equal(await exists(file), false);
  }
});

test("speak tags Malayalam segments and uses the default language otherwise", async () => {
  const engine = new FileEngine(await tempDir("speech"));
  const speech = new SpeechRenderer(engine, new RecordingClipPlayer(), { defaultLanguage: "en" });

  await speech.speak("Hello|നമസ്കാരം", 1);

  assert.deepEqual(engine.requests, [
    { text: "Hello", lang: "en" },
    { text: "നമസ്കാരം", lang: "ml" }
  ]);
});

test("speak skips segments that are only invisible markers", async () => {
  const engine = new FileEngine(await tempDir("speech"));
  const speech = new SpeechRenderer(engine, new RecordingClipPlayer());

  const spoken = await speech.speak("A|\u200b\u200e|B", 1);

  assert.equal(spoken, 2);
  assert.deepEqual(
    engine.requests.map((r) => r.text),
    ["A", "B"]
  );
});

test("a playback failure skips that segment and still removes its clip", async () => {
  const engine = new FileEngine(await tempDir("speech"));
  const player = new RecordingClipPlayer();
  player.failFirst = true;
  const speech = new SpeechRenderer(engine, player);

  const spoken = await speech.speak("First|Second", 1);

  assert.equal(spoken, 1);
  assert.equal(player.played.length, 2);
  assert.equal(await exists(engine.files[0] ?? ""), false);
  assert.equal(await exists(engine.files[1] ?? ""), false);
});

test("a synthesis failure skips that segment and continues", async () => {
  const engine = new FileEngine(await tempDir("speech"));
  engine.failOn.add("Broken");
  const player = new RecordingClipPlayer();
  const speech = new SpeechRenderer(engine, player);

  const spoken = await speech.speak("Broken|Fine", 1);

  assert.equal(spoken, 1);
  assert.equal(player.played.length, 1);
});

test("speak returns zero when nothing is speakable", async () => {
  const engine = new FileEngine(await tempDir("speech"));
  const speech = new SpeechRenderer(engine, new RecordingClipPlayer());

  assert.equal(await speech.speak(" \u200b ", 1), 0);
  assert.equal(engine.requests.length, 0);
});
