import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { log, logError, logWarn } from "./log";
import type { ClientState } from "./types";

const watermark = z.coerce.number().int().nonnegative().catch(0);

const stateFileSchema = z.object({
  last_music_id: watermark,
  last_music_link: z.string().catch(""),
  last_ai_alert_id: watermark,
  last_user_alert_id: watermark
});

export function emptyState(): ClientState {
  return {
    lastMusicId: 0,
    lastMusicLink: "",
    lastAiAlertId: 0,
    lastUserAlertId: 0
  };
}

export function parseStateFile(raw: string): ClientState {
  const parsed = stateFileSchema.parse(JSON.parse(raw) ?? {});
  return {
    lastMusicId: parsed.last_music_id,
    lastMusicLink: parsed.last_music_link,
    lastAiAlertId: parsed.last_ai_alert_id,
    lastUserAlertId: parsed.last_user_alert_id
  };
}

export function serializeState(state: ClientState): string {
  return JSON.stringify(
    {
      last_music_id: state.lastMusicId,
      last_music_link: state.lastMusicLink,
      last_ai_alert_id: state.lastAiAlertId,
      last_user_alert_id: state.lastUserAlertId
    },
    null,
    2
  );
}

/**
 * Durable watermark record. Only the controller path writes it, and every
 * write replaces the whole file.
 */
export class StateStore {
  private current: ClientState = emptyState();

  constructor(private readonly filePath: string) {}

  get state(): Readonly<ClientState> {
    return this.current;
  }

  async load(): Promise<ClientState> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch {
      this.current = emptyState();
      log("state.fresh", { path: this.filePath });
      return { ...this.current };
    }
    try {
      this.current = parseStateFile(raw);
    } catch (error) {
      logError("state.corrupt", error, { path: this.filePath });
      this.current = emptyState();
    }
    return { ...this.current };
  }

  async update(patch: Partial<ClientState>): Promise<void> {
    this.current = { ...this.current, ...patch };
    await this.save();
  }

  async save(): Promise<void> {
    await mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await writeFile(this.filePath, serializeState(this.current), "utf8");
  }

  /** Resets the music watermark when it points past the table, e.g. after the table was emptied. */
  async reconcileMusicWatermark(maxMusicId: number | null): Promise<boolean> {
    if (maxMusicId === null) {
      logWarn("state.music_watermark.unverified", { lastMusicId: this.current.lastMusicId });
      return false;
    }
    if (this.current.lastMusicId <= maxMusicId) {
      return false;
    }
    logWarn("state.music_watermark.reset", { lastMusicId: this.current.lastMusicId, maxMusicId });
    await this.update({ lastMusicId: 0, lastMusicLink: "" });
    return true;
  }
}
