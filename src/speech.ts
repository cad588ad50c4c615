import { rm } from "node:fs/promises";
import { log, logError } from "./log";
import type { ClipPlayer } from "./player";
import { cleanSpeechText, detectLanguage, type SpeechEngine } from "./tts";
import type { SpeechClip } from "./types";

/** Splits an alert on `|` or newlines into trimmed, non-empty segments, in order. */
export function splitMessage(message: string): string[] {
  const raw = String(message ?? "");
  const parts = raw
    .split(/\|+|\n+/)
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length) {
    return parts;
  }
  const single = raw.trim();
  return single ? [single] : [];
}

export interface Speaker {
  /** Speaks each segment of `message`; resolves with how many segments were actually played. */
  speak(message: string, gain: number): Promise<number>;
}

export type SpeechRendererOptions = {
  defaultLanguage?: string;
  debug?: boolean;
};

export class SpeechRenderer implements Speaker {
  private readonly defaultLanguage: string;
  private readonly debug: boolean;

  constructor(
    private readonly engine: SpeechEngine,
    private readonly player: ClipPlayer,
    opts: SpeechRendererOptions = {}
  ) {
    this.defaultLanguage = opts.defaultLanguage ?? "en";
    this.debug = opts.debug ?? false;
  }

  async speak(message: string, gain: number): Promise<number> {
    if (this.debug) {
      log("speech.debug.raw", { length: String(message ?? "").length, text: message });
    }

    let spoken = 0;
    for (const part of splitMessage(message)) {
      const text = cleanSpeechText(part);
      if (!text) {
        continue;
      }
      const lang = detectLanguage(text, this.defaultLanguage);
      if (this.debug) {
        log("speech.debug.part", { length: text.length, lang });
      }

      let clip: SpeechClip;
      try {
        clip = await this.engine.synthesize(text, lang);
      } catch (error) {
        logError("speech.synth.failed", error, { lang });
        continue;
      }

      log("speech.speaking", { lang: clip.lang, engine: clip.engine, voice: clip.voice, rate: clip.rate });
      try {
        await this.player.play(clip.filePath, gain);
        spoken += 1;
      } catch (error) {
        logError("speech.play.failed", error, { filePath: clip.filePath });
      } finally {
        await removeClip(clip.filePath);
      }
    }
    return spoken;
  }
}

async function removeClip(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (error) {
    logError("speech.cleanup.failed", error, { filePath });
  }
}
