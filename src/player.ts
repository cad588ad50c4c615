import type { ChildProcess } from "node:child_process";
import { z } from "zod";
import { systemClock, type Clock } from "./clock";
import { PlayerMissingError, isMissingBinary } from "./errors";
import { log, logError } from "./log";
import { normalizeLink } from "./music";
import { execCmd, findBinary, isRunning, killProcessTree, spawnDetached } from "./proc";

export interface MusicPlayer {
  /**
   * Stops whatever is playing, then starts `link` at `volume` (0-100), `offsetSec` seconds in.
   * Returns once the player is spawned.
   */
  start(link: string, volume: number, offsetSec?: number): Promise<void>;
  /** Best-effort volume change; the backing player can only restart the stream at the new volume. */
  restartWithVolume(volume: number): Promise<void>;
  /** Kills the player's whole process group. */
  stop(): void;
  isPlaying(): boolean;
  /** Media length in whole seconds, or null for live or unknown media. */
  probeDurationSec(link: string): Promise<number | null>;
}

export interface ClipPlayer {
  /** Plays a local audio file to completion with a linear gain applied. */
  play(filePath: string, gain: number): Promise<void>;
}

export function clampVolume(volume: number): number {
  if (!Number.isFinite(volume)) return 100;
  return Math.min(100, Math.max(0, Math.round(volume)));
}

const mediaInfoSchema = z
  .object({
    is_live: z.boolean().nullish(),
    duration: z.number().nullish()
  })
  .passthrough();

/** Reads the length out of a `yt-dlp -J` document. */
export function parseDurationInfo(stdout: string): number | null {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    return null;
  }
  const info = mediaInfoSchema.safeParse(raw);
  if (!info.success || info.data.is_live === true || info.data.duration == null) {
    return null;
  }
  const seconds = Math.trunc(info.data.duration);
  return seconds > 0 ? seconds : null;
}

/** Resolved stream URLs keyed by source link; resolving is slow on small devices. */
export class StreamUrlCache {
  private readonly entries = new Map<string, { url: string; at: number }>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  async resolve(link: string, resolver: (link: string) => Promise<string>): Promise<string> {
    const key = normalizeLink(link);
    if (!key) {
      throw new Error("url is empty");
    }
    const now = this.clock.now();
    this.evictExpired(now);
    const hit = this.entries.get(key);
    if (hit) {
      return hit.url;
    }
    const url = await resolver(key);
    this.entries.set(key, { url, at: now });
    return url;
  }

  get size(): number {
    return this.entries.size;
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now - entry.at > this.ttlMs) {
        this.entries.delete(key);
      }
    }
  }
}

let downloaderArgs: Promise<string[]> | null = null;

async function resolveDownloader(): Promise<string[]> {
  try {
    await execCmd("yt-dlp", ["--version"], { timeoutMs: 15_000 });
    return ["yt-dlp"];
  } catch {
    // Fall through to python module check.
  }

  try {
    await execCmd("python3", ["-m", "yt_dlp", "--version"], { timeoutMs: 15_000 });
    return ["python3", "-m", "yt_dlp"];
  } catch {
    throw new Error(
      "yt-dlp is not installed. Install it with `python3 -m pip install -U yt-dlp` or your package manager."
    );
  }
}

async function ytDlp(args: string[], timeoutMs?: number): Promise<string> {
  if (!downloaderArgs) {
    downloaderArgs = resolveDownloader().catch((error: unknown) => {
      downloaderArgs = null;
      throw error;
    });
  }
  const [bin, ...baseArgs] = await downloaderArgs;
  const { stdout } = await execCmd(bin, [...baseArgs, ...args], { timeoutMs });
  return stdout;
}

async function resolveAudioUrl(link: string): Promise<string> {
  const stdout = await ytDlp(["-g", "-f", "bestaudio", "--no-playlist", link]);
  const lines = stdout.trim().split(/\r?\n/).filter((line) => line.trim());
  const last = lines[lines.length - 1];
  if (!last) {
    throw new Error("yt-dlp returned no stream URL");
  }
  return last.trim();
}

/** Streams music links through yt-dlp into ffplay (or mpg123 when ffplay is absent). */
export class StreamPlayer implements MusicPlayer {
  private child: ChildProcess | null = null;
  private currentStreamUrl: string | null = null;
  private currentVolume = 100;
  private playerBin: Promise<string | null> | null = null;
  private readonly cache: StreamUrlCache;

  constructor(
    resolveCacheTtlSec = 600,
    private readonly probeTimeoutMs = 45_000
  ) {
    this.cache = new StreamUrlCache(resolveCacheTtlSec * 1000);
  }

  isPlaying(): boolean {
    return isRunning(this.child);
  }

  async start(link: string, volume: number, offsetSec = 0): Promise<void> {
    this.stop();
    const streamUrl = await this.cache.resolve(link, resolveAudioUrl);
    await this.spawnPlayer(streamUrl, clampVolume(volume), offsetSec);
    log("player.started", { link: normalizeLink(link), volume: this.currentVolume, offsetSec });
  }

  async restartWithVolume(volume: number): Promise<void> {
    const streamUrl = this.currentStreamUrl;
    const next = clampVolume(volume);
    if (!streamUrl || next === this.currentVolume) {
      return;
    }
    this.stop();
    await this.spawnPlayer(streamUrl, next);
    log("player.volume", { volume: next });
  }

  stop(): void {
    if (this.child) {
      killProcessTree(this.child);
    }
    this.child = null;
    this.currentStreamUrl = null;
  }

  async probeDurationSec(link: string): Promise<number | null> {
    const url = normalizeLink(link);
    if (!url) return null;
    try {
      return parseDurationInfo(await ytDlp(["-J", "--no-playlist", url], this.probeTimeoutMs));
    } catch (error) {
      logError("player.probe.failed", error, { link: url });
      return null;
    }
  }

  private async spawnPlayer(streamUrl: string, volume: number, offsetSec = 0): Promise<void> {
    if (!this.playerBin) {
      this.playerBin = findBinary([
        { bin: "ffplay", versionArgs: ["-version"] },
        { bin: "mpg123", versionArgs: ["--version"] }
      ]);
    }
    const bin = await this.playerBin;
    if (!bin) {
      this.playerBin = null;
      throw new PlayerMissingError();
    }

    if (offsetSec > 0 && bin !== "ffplay") {
      log("player.offset.ignored", { bin, offsetSec });
    }
    const child = spawnDetached(bin, streamPlayerArgs(bin, streamUrl, volume, offsetSec));
    child.on("error", (error) => logError("player.process.error", error, { bin }));
    this.child = child;
    this.currentStreamUrl = streamUrl;
    this.currentVolume = volume;
  }
}

/** mpg123 seeks in frames whose length depends on the stream, so it always starts at the top. */
export function streamPlayerArgs(bin: string, streamUrl: string, volume: number, offsetSec = 0): string[] {
  if (bin !== "ffplay") {
    return ["-q", "-f", String(Math.round((32768 * volume) / 100)), streamUrl];
  }
  const args = ["-nodisp", "-autoexit", "-loglevel", "error", "-volume", String(volume)];
  if (offsetSec > 0) {
    args.push("-ss", String(offsetSec));
  }
  args.push(streamUrl);
  return args;
}

function ffplayArgs(filePath: string, gain: number): string[] {
  const args = ["-nodisp", "-autoexit", "-loglevel", "error", "-volume", "100"];
  if (gain && gain !== 1) {
    args.push("-af", `volume=${gain}`);
  }
  args.push(filePath);
  return args;
}

/** Blocking clip playback for speech: ffplay, falling back to mpg123 when ffplay is not installed. */
export class FfplayClipPlayer implements ClipPlayer {
  async play(filePath: string, gain: number): Promise<void> {
    try {
      await execCmd("ffplay", ffplayArgs(filePath, gain));
      return;
    } catch (error) {
      if (!isMissingBinary(error)) {
        throw error;
      }
    }
    try {
      await execCmd("mpg123", ["-q", "-f", String(Math.round(32768 * (gain > 0 ? gain : 1))), filePath]);
    } catch (error) {
      if (isMissingBinary(error)) {
        throw new PlayerMissingError();
      }
      throw error;
    }
  }
}
