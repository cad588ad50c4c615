import { copyFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { UnspeakableTextError } from "./errors";
import type { SpeechClip } from "./types";

// Zero-width and bidi control characters, removed before synthesis.
const INVISIBLE_MARKERS = /[\u200b-\u200f\u202a-\u202e]/g;
const MALAYALAM = /[\u0d00-\u0d7f]/;

export function cleanSpeechText(text: string): string {
  return String(text ?? "")
    .trim()
    .split(/\s+/)
    .join(" ")
    .replace(INVISIBLE_MARKERS, "")
    .trim();
}

export function hasSpeakableText(text: string): boolean {
  return cleanSpeechText(text) !== "";
}

export function detectLanguage(text: string, fallback = "en"): string {
  return MALAYALAM.test(text) ? "ml" : fallback;
}

export interface SpeechEngine {
  /** Writes the spoken text to a fresh audio file. The caller owns and deletes the file. */
  synthesize(text: string, lang: string): Promise<SpeechClip>;
}

export class TTSClient implements SpeechEngine {
  constructor(
    private readonly baseUrl: string,
    private readonly outDir: string = os.tmpdir()
  ) {}

  async synthesize(text: string, lang: string): Promise<SpeechClip> {
    const cleaned = cleanSpeechText(text);
    if (!cleaned) {
      throw new UnspeakableTextError("text is empty");
    }

    const outFile = path.join(this.outDir, `alert-${randomUUID()}.mp3`);
    const res = await fetch(`${this.baseUrl}/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text: cleaned, lang })
    });

    if (!res.ok) {
      throw new Error(`TTS failed: ${res.status} ${await res.text()}`);
    }

    const contentType = res.headers.get("content-type") || "";
    if (contentType.includes("audio/")) {
      const arr = await res.arrayBuffer();
      await writeFile(outFile, Buffer.from(arr));
      return {
        filePath: outFile,
        lang,
        engine: res.headers.get("x-tts-engine") || "http",
        voice: res.headers.get("x-tts-voice") || undefined
      };
    }

    const reply = ttsReplySchema.parse(await res.json());
    const source = audioSourceOf(reply);
    if (!source) {
      throw new Error(`TTS reply carries no audio: ${Object.keys(reply).join(", ") || "<empty>"}`);
    }
    await writeAudioSource(source, outFile);
    return {
      filePath: outFile,
      lang: firstText(reply.lang, reply.language) ?? lang,
      engine: firstText(reply.engine) ?? "http",
      voice: firstText(reply.voice) ?? undefined,
      rate: reply.rate === undefined ? undefined : String(reply.rate)
    };
  }
}

const optionalText = z.string().nullish();

/** JSON replies name the audio by URL, by a path the client can read, or inline as base64. */
export const ttsReplySchema = z
  .object({
    audio_url: optionalText,
    url: optionalText,
    audio_path: optionalText,
    file_path: optionalText,
    audio_base64: optionalText,
    base64: optionalText,
    lang: optionalText,
    language: optionalText,
    engine: optionalText,
    voice: optionalText,
    rate: z.union([z.string(), z.number()]).optional()
  })
  .passthrough();

export type TtsReply = z.infer<typeof ttsReplySchema>;

export type AudioSource = { kind: "url" | "path" | "base64"; value: string };

function firstText(...values: Array<string | null | undefined>): string | null {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return null;
}

export function audioSourceOf(reply: TtsReply): AudioSource | null {
  const url = firstText(reply.audio_url, reply.url);
  if (url) return { kind: "url", value: url };
  const filePath = firstText(reply.audio_path, reply.file_path);
  if (filePath) return { kind: "path", value: filePath };
  const inline = firstText(reply.audio_base64, reply.base64);
  if (inline) {
    // data:audio/mpeg;base64,<payload>
    const value = inline.startsWith("data:") ? inline.slice(inline.indexOf(",") + 1) : inline;
    return value ? { kind: "base64", value } : null;
  }
  return null;
}

export async function writeAudioSource(source: AudioSource, outFile: string): Promise<void> {
  switch (source.kind) {
    case "url": {
      const res = await fetch(source.value);
      if (!res.ok) {
        throw new Error(`TTS audio download failed: ${res.status} ${source.value}`);
      }
      await writeFile(outFile, Buffer.from(await res.arrayBuffer()));
      return;
    }
    case "path":
      await copyFile(source.value, outFile);
      return;
    case "base64":
      await writeFile(outFile, Buffer.from(source.value, "base64"));
      return;
  }
}
