import type { AlertArbitrator } from "./arbitrator";
import { systemClock, type Clock } from "./clock";
import type { RadioDb } from "./db";
import type { AudioGate } from "./gate";
import type { LatestValueCell } from "./latest-cell";
import { errorMessage, log, logError } from "./log";
import { isPlayable, normalizeLink, sameMusic } from "./music";
import type { MusicPlayer } from "./player";
import type { RuntimeState } from "./runtime-state";
import type { StateStore } from "./state-store";
import type { Alert, ControllerState, MusicItem, PlayOutcome } from "./types";

export type ControllerOptions = {
  pollIntervalSec: number;
  defaultDurationSec: number;
  /** Row that always holds the current track; 0 selects sequential mode. */
  fixedMusicId: number;
  alertCheckIntervalSec: number;
  enableDurationDetect: boolean;
  musicVolumeNormal: number;
  musicVolumeDucked: number;
  tickMs?: number;
};

export type ControllerDeps = {
  db: Pick<RadioDb, "getMusicById" | "getNextMusicAfter" | "getLatestMusic">;
  player: MusicPlayer;
  store: StateStore;
  gate: AudioGate;
  arbitrator: AlertArbitrator;
  desiredMusic: LatestValueCell<MusicItem>;
  /** Wakes a gated wait early when the status changes. */
  statusChanges?: LatestValueCell<string>;
  runtime: RuntimeState;
  clock?: Clock;
};

const MIN_ALERT_CHECK_MS = 200;

/**
 * The playback timeline. One track at a time; each tick weighs, in order,
 * the enable gate, a changed desired track, the natural end of the track and
 * pending alerts.
 */
export class PlaybackController {
  private readonly abort = new AbortController();
  private readonly clock: Clock;
  private readonly tickMs: number;
  private readonly alertCheckMs: number;
  private stateValue: ControllerState = "IDLE";

  constructor(
    private readonly opts: ControllerOptions,
    private readonly deps: ControllerDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.tickMs = Math.min(500, opts.tickMs ?? 250);
    this.alertCheckMs = Math.max(MIN_ALERT_CHECK_MS, Math.round(opts.alertCheckIntervalSec * 1000));
  }

  get state(): ControllerState {
    return this.stateValue;
  }

  get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  private get sequential(): boolean {
    return this.opts.fixedMusicId <= 0;
  }

  async run(): Promise<void> {
    log("client.connected", { mode: this.sequential ? "sequential" : "fixed-row", musicId: this.opts.fixedMusicId });
    while (!this.stopped) {
      await this.runOnce();
    }
  }

  /** Requests the loop to end; playback is stopped right away. */
  stop(): void {
    if (this.stopped) return;
    this.abort.abort();
    this.stopPlayer();
    this.setState("STOPPED");
  }

  async runOnce(): Promise<void> {
    if (!(await this.audioAllowed())) {
      await this.enterGated();
      await this.waitWhileGated();
      return;
    }

    await this.handleIdleAlerts();

    const music = await this.selectMusic();
    if (isPlayable(music) && !this.stopped) {
      try {
        await this.playTrack(music);
      } catch (error) {
        logError("playback.error", error, { id: music.id });
        this.deps.runtime.playbackError(errorMessage(error));
        this.stopPlayer();
        this.setState("IDLE");
      }
    }

    await this.pause(this.opts.pollIntervalSec * 1000);
  }

  async playTrack(music: MusicItem): Promise<PlayOutcome> {
    if (!(await this.audioAllowed())) {
      await this.enterGated();
      return "gated";
    }

    let current = music;
    let planned = await this.resolveDuration(current);
    await this.startTrack(current, planned);
    let startedAt = this.clock.now();
    let lastAlertCheck = Number.NEGATIVE_INFINITY;

    while (!this.stopped) {
      if (!(await this.audioAllowed())) {
        // The watermark stays put so the track replays once audio is back.
        await this.enterGated();
        this.deps.runtime.trackEnded("gated");
        return "gated";
      }

      const desired = this.deps.desiredMusic.consumeChange();
      if (desired && !sameMusic(desired, current) && normalizeLink(desired.link)) {
        log("music.switch", { from: current.id, to: desired.id });
        this.stopPlayer();
        current = desired;
        planned = await this.resolveDuration(current);
        await this.startTrack(current, planned);
        startedAt = this.clock.now();
      }

      if (planned !== null && this.clock.now() - startedAt >= planned * 1000) {
        this.stopPlayer();
        await this.markFinished(current);
        return "finished";
      }

      const now = this.clock.now();
      if (now - lastAlertCheck >= this.alertCheckMs) {
        lastAlertCheck = now;
        if (await this.interruptForAlerts(current)) {
          startedAt = this.clock.now();
          continue;
        }
      }

      await this.pause(this.tickMs);
    }

    this.stopPlayer();
    this.deps.runtime.trackEnded("stopped");
    return "stopped";
  }

  /** Row duration first; then, in sequential mode only, a probe and the configured default. */
  async resolveDuration(music: MusicItem): Promise<number | null> {
    if (music.durationSec !== null) {
      return music.durationSec;
    }
    if (!this.sequential) {
      return null;
    }
    if (this.opts.enableDurationDetect) {
      const probed = await this.deps.player.probeDurationSec(music.link);
      if (probed !== null) {
        return probed;
      }
    }
    return this.opts.defaultDurationSec;
  }

  async selectMusic(): Promise<MusicItem | null> {
    let music: MusicItem | null = null;
    if (!this.sequential) {
      music = this.deps.desiredMusic.get();
      if (!music) {
        try {
          music = await this.deps.db.getMusicById(this.opts.fixedMusicId);
        } catch (error) {
          logError("music.fetch_failed", error, { musicId: this.opts.fixedMusicId });
        }
      }
    }
    return music ?? (await this.nextSequentialTrack());
  }

  /** Next row after the watermark, or the newest row when it was re-linked in place. */
  async nextSequentialTrack(): Promise<MusicItem | null> {
    const { lastMusicId, lastMusicLink } = this.deps.store.state;
    try {
      const next = await this.deps.db.getNextMusicAfter(lastMusicId);
      if (next) {
        return next;
      }
      const latest = await this.deps.db.getLatestMusic();
      if (latest && latest.id === lastMusicId && latest.link !== lastMusicLink) {
        return latest;
      }
    } catch (error) {
      logError("music.fetch_failed", error, { lastMusicId });
    }
    return null;
  }

  private async handleIdleAlerts(): Promise<void> {
    const user = await this.deps.arbitrator.pendingUserAlert();
    if (user) {
      this.logAlert(user);
      await this.deliverInterrupted(user);
    }
    if (this.stopped) return;
    const ai = await this.deps.arbitrator.pendingAiAlert();
    if (ai) {
      this.logAlert(ai);
      await this.deliverInterrupted(ai);
    }
  }

  /** Returns true when playback was restarted from the top. */
  private async interruptForAlerts(current: MusicItem): Promise<boolean> {
    const { arbitrator } = this.deps;
    const user = await arbitrator.pendingUserAlert();
    if (user) {
      this.logAlert(user);
      if (!arbitrator.speechEnabled) {
        await arbitrator.deliver(user);
        return false;
      }
      this.stopPlayer();
      await this.deliverInterrupted(user);
      if (this.stopped || !(await this.audioAllowed())) return true;
      await this.startTrack(current, null, false);
      return true;
    }

    const ai = await arbitrator.pendingAiAlert();
    if (ai) {
      this.logAlert(ai);
      if (!arbitrator.speechEnabled) {
        await arbitrator.deliver(ai);
        return false;
      }
      await this.setMusicVolume(current, this.opts.musicVolumeDucked);
      try {
        await this.deliverInterrupted(ai);
      } finally {
        if (!this.stopped) {
          await this.setMusicVolume(current, this.opts.musicVolumeNormal);
        }
      }
    }
    return false;
  }

  private async deliverInterrupted(alert: Alert): Promise<void> {
    const resumeTo = this.stateValue === "PLAYING" ? "PLAYING" : "IDLE";
    this.setState("INTERRUPTED");
    try {
      await this.deps.arbitrator.deliver(alert);
    } finally {
      if (!this.stopped) this.setState(resumeTo);
    }
  }

  private async setMusicVolume(music: MusicItem, volume: number): Promise<void> {
    try {
      await this.deps.player.restartWithVolume(volume);
    } catch (error) {
      logError("player.volume.failed", error, { volume });
      await this.deps.player.start(music.link, volume);
    }
    this.deps.runtime.volumeChanged(volume);
  }

  private async startTrack(music: MusicItem, planned: number | null, announce = true): Promise<void> {
    if (announce) {
      log("track.started", {
        id: music.id,
        name: music.name,
        link: music.link,
        durationSec: planned ?? "continuous"
      });
    }
    await this.deps.player.start(music.link, this.opts.musicVolumeNormal);
    if (announce) {
      this.deps.runtime.trackStarted(music, planned, this.opts.musicVolumeNormal);
    }
    this.setState("PLAYING");
  }

  private async markFinished(music: MusicItem): Promise<void> {
    try {
      await this.deps.store.update({ lastMusicId: music.id, lastMusicLink: music.link });
    } catch (error) {
      logError("state.save.failed", error, { musicId: music.id });
    }
    log("track.finished", { id: music.id });
    this.deps.runtime.setWatermarks(this.deps.store.state);
    this.deps.runtime.trackEnded("finished");
    this.setState("IDLE");
  }

  private async enterGated(): Promise<void> {
    await this.deps.gate.reportStatusMode();
    this.stopPlayer();
    this.setState("STOPPED");
  }

  private async waitWhileGated(): Promise<void> {
    const deadline = this.clock.now() + this.opts.pollIntervalSec * 1000;
    while (!this.stopped && this.clock.now() < deadline) {
      const changed = this.deps.statusChanges?.consumeChange() ?? null;
      if (changed !== null) {
        return;
      }
      await this.pause(Math.min(this.tickMs, deadline - this.clock.now()));
    }
  }

  private async audioAllowed(): Promise<boolean> {
    return this.deps.gate.isAudioAllowed();
  }

  private logAlert(alert: Alert): void {
    if (alert.kind === "ai") {
      log("alert.ai.received", { id: alert.id, severity: alert.severity });
    } else {
      log("alert.user.received", { id: alert.id });
    }
  }

  private stopPlayer(): void {
    try {
      this.deps.player.stop();
    } catch (error) {
      logError("player.stop.failed", error);
    }
  }

  private setState(state: ControllerState): void {
    this.stateValue = state;
    this.deps.runtime.setState(state);
  }

  private pause(ms: number): Promise<void> {
    return this.clock.sleep(ms, this.abort.signal);
  }
}
