import type { RadioDb } from "./db";
import { isContentFailure } from "./errors";
import type { AudioGate } from "./gate";
import { log, logError, logWarn } from "./log";
import type { RuntimeState } from "./runtime-state";
import type { Speaker } from "./speech";
import type { StateStore } from "./state-store";
import { hasSpeakableText } from "./tts";
import type { Alert, AlertKind, DeliveryOutcome } from "./types";

export type AlertArbitratorOptions = {
  enableTts: boolean;
  userGain: number;
  aiGain: number;
};

type AlertDb = Pick<RadioDb, "getNextAiAlertAfter" | "getNextUserAlertAfter" | "ackAlert">;

/**
 * Fetches pending alerts, speaks them and acknowledges them afterwards.
 *
 * Every delivered alert is acknowledged exactly once, after the speech
 * attempt, whatever the attempt's result: one bad message must not stall
 * the loop. The only exception is audio being switched off remotely while
 * the alert was pending; that alert stays queued.
 */
export class AlertArbitrator {
  constructor(
    private readonly db: AlertDb,
    private readonly store: StateStore,
    private readonly speaker: Speaker,
    private readonly gate: AudioGate,
    private readonly opts: AlertArbitratorOptions,
    private readonly runtime?: RuntimeState
  ) {}

  get speechEnabled(): boolean {
    return this.opts.enableTts;
  }

  async nextUserAlertAfter(lastId: number): Promise<Alert | null> {
    try {
      return await this.db.getNextUserAlertAfter(lastId);
    } catch (error) {
      logError("alert.user.fetch_failed", error, { lastId });
      return null;
    }
  }

  async nextAiAlertAfter(lastId: number): Promise<Alert | null> {
    try {
      return await this.db.getNextAiAlertAfter(lastId);
    } catch (error) {
      logError("alert.ai.fetch_failed", error, { lastId });
      return null;
    }
  }

  pendingUserAlert(): Promise<Alert | null> {
    return this.nextUserAlertAfter(this.store.state.lastUserAlertId);
  }

  pendingAiAlert(): Promise<Alert | null> {
    return this.nextAiAlertAfter(this.store.state.lastAiAlertId);
  }

  /**
   * Removes the alert row and advances the local watermark. The watermark
   * moves even when the row could not be removed, so the alert is not
   * spoken twice.
   */
  async acknowledge(kind: AlertKind, id: number): Promise<boolean> {
    let removed = false;
    try {
      removed = await this.db.ackAlert(kind, id);
    } catch (error) {
      logError("alert.ack.failed", error, { kind, id });
    }
    if (!removed) {
      logWarn("alert.ack.not_removed", { kind, id });
    }

    const state = this.store.state;
    try {
      if (kind === "ai") {
        await this.store.update({ lastAiAlertId: Math.max(state.lastAiAlertId, id) });
      } else {
        await this.store.update({ lastUserAlertId: Math.max(state.lastUserAlertId, id) });
      }
    } catch (error) {
      logError("state.save.failed", error, { kind, id });
    }
    this.runtime?.setWatermarks(this.store.state);
    return removed;
  }

  async deliver(alert: Alert): Promise<DeliveryOutcome> {
    const outcome = await this.speakAlert(alert);
    if (outcome !== "deferred") {
      await this.acknowledge(alert.kind, alert.id);
    }
    this.runtime?.alertHandled(alert, outcome);
    return outcome;
  }

  private async speakAlert(alert: Alert): Promise<DeliveryOutcome> {
    if (!this.opts.enableTts) {
      log("alert.skipped", { kind: alert.kind, id: alert.id, reason: "tts_disabled" });
      return "skipped";
    }
    if (!(await this.gate.isAudioAllowed())) {
      await this.gate.reportStatusMode();
      log("alert.deferred", { kind: alert.kind, id: alert.id });
      return "deferred";
    }

    const gain = alert.kind === "ai" ? this.opts.aiGain : this.opts.userGain;
    try {
      const spoken = await this.speaker.speak(alert.message, gain);
      if (spoken > 0) {
        log("alert.spoken", { kind: alert.kind, id: alert.id, segments: spoken });
        return "spoken";
      }
      logWarn("alert.unspeakable", { kind: alert.kind, id: alert.id, visibleText: hasSpeakableText(alert.message) });
      return "content_failure";
    } catch (error) {
      const outcome = isContentFailure(error) || !hasSpeakableText(alert.message) ? "content_failure" : "speech_failure";
      logError("alert.speak.failed", error, { kind: alert.kind, id: alert.id, outcome });
      return outcome;
    }
  }
}
