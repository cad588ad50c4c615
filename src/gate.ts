import { systemClock, type Clock } from "./clock";
import { normalizeStatus, type RadioDb } from "./db";
import type { LatestValueCell } from "./latest-cell";
import { log, logError } from "./log";

const ENABLED_STATUSES = new Set(["net", "both"]);

export function isEnabledStatus(status: string | null | undefined): boolean {
  return ENABLED_STATUSES.has(normalizeStatus(status));
}

export interface AudioGate {
  isAudioAllowed(): Promise<boolean>;
  /** Logs the current status, at most once per change or reminder interval. */
  reportStatusMode(): Promise<void>;
}

export type ServerStatusGateOptions = {
  cacheTtlMs?: number;
  reminderMs?: number;
};

/**
 * Reads the remote enable flag. A value published by the status watcher wins;
 * without one the database is read directly, cached for a short TTL.
 */
export class ServerStatusGate implements AudioGate {
  private cachedValue: string | null = null;
  private cachedAt = Number.NEGATIVE_INFINITY;
  private lastReported: string | null = null;
  private lastReportedAt = Number.NEGATIVE_INFINITY;
  private readonly cacheTtlMs: number;
  private readonly reminderMs: number;

  constructor(
    private readonly db: Pick<RadioDb, "getServerStatus">,
    private readonly watched: LatestValueCell<string>,
    opts: ServerStatusGateOptions = {},
    private readonly clock: Clock = systemClock
  ) {
    this.cacheTtlMs = opts.cacheTtlMs ?? 1000;
    this.reminderMs = opts.reminderMs ?? 15_000;
  }

  async currentStatus(): Promise<string> {
    const observed = this.watched.get();
    if (observed !== null) {
      return observed;
    }

    const now = this.clock.now();
    if (this.cachedValue !== null && now - this.cachedAt < this.cacheTtlMs) {
      return this.cachedValue;
    }

    let status = "";
    try {
      status = normalizeStatus(await this.db.getServerStatus());
    } catch (error) {
      logError("status.read.failed", error);
    }
    this.cachedValue = status;
    this.cachedAt = now;
    return status;
  }

  async isAudioAllowed(): Promise<boolean> {
    return isEnabledStatus(await this.currentStatus());
  }

  async reportStatusMode(): Promise<void> {
    const status = await this.currentStatus();
    const now = this.clock.now();
    if (status === this.lastReported && now - this.lastReportedAt <= this.reminderMs) {
      return;
    }
    this.lastReported = status;
    this.lastReportedAt = now;
    log("radio.mode", { status: status || "<unknown>", audioAllowed: isEnabledStatus(status) });
  }
}
