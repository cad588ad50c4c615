import { systemClock, type Clock } from "./clock";
import { normalizeStatus, type RadioDb } from "./db";
import { isEnabledStatus } from "./gate";
import type { LatestValueCell } from "./latest-cell";
import { log, logError } from "./log";
import { normalizeLink } from "./music";
import type { MusicItem } from "./types";

const MIN_INTERVAL_MS = 200;

/**
 * Background poll loop. `pollOnce` must not throw; a rejection that slips
 * through is logged and ends the loop.
 */
export abstract class PollingWatcher {
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  protected readonly intervalMs: number;

  constructor(
    protected readonly name: string,
    intervalSec: number,
    protected readonly clock: Clock = systemClock
  ) {
    this.intervalMs = Math.max(MIN_INTERVAL_MS, Math.round(intervalSec * 1000));
  }

  abstract pollOnce(): Promise<void>;

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.run(abort.signal).catch((error) => logError(`${this.name}.crash`, error));
    log(`${this.name}.started`, { intervalMs: this.intervalMs });
  }

  /** Stops the loop and waits up to `timeoutMs` for it to wind down. Resolves false on timeout. */
  async stop(timeoutMs = 2000): Promise<boolean> {
    const loop = this.loop;
    if (!loop) return true;
    this.abort?.abort();
    const deadline = new AbortController();
    const joined = await Promise.race([
      loop.then(() => true),
      this.clock.sleep(timeoutMs, deadline.signal).then(() => false)
    ]);
    deadline.abort();
    this.loop = null;
    this.abort = null;
    log(`${this.name}.stopped`, { joined });
    return joined;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.pollOnce();
      await this.clock.sleep(this.intervalMs, signal);
    }
  }
}

/** Follows the fixed music row and publishes each new link to the desired-music cell. */
export class MusicWatcher extends PollingWatcher {
  private lastLink: string | null = null;
  private failing = false;

  constructor(
    private readonly db: Pick<RadioDb, "getMusicById">,
    private readonly musicId: number,
    private readonly desired: LatestValueCell<MusicItem>,
    intervalSec: number,
    clock?: Clock
  ) {
    super("music.watch", intervalSec, clock);
  }

  async pollOnce(): Promise<void> {
    let row: MusicItem | null;
    try {
      row = await this.db.getMusicById(this.musicId);
    } catch (error) {
      if (!this.failing) {
        logError("music.watch.unreachable", error, { musicId: this.musicId });
      }
      this.failing = true;
      return;
    }
    this.failing = false;

    const link = normalizeLink(row?.link);
    if (!row || !link) {
      return;
    }
    if (this.lastLink === null || link !== this.lastLink) {
      this.lastLink = link;
      this.desired.set(row);
    }
  }
}

export type StatusWatcherOptions = {
  intervalSec: number;
  heartbeatSec?: number;
  /** Called with the first observed status and every change after it. */
  onStatus?: (status: string) => void;
  /** Called when the status turns to a disabled value. Errors are logged, never rethrown. */
  onDisabled?: () => void;
};

/** Follows the remote enable flag and publishes it to the status cell. */
export class StatusWatcher extends PollingWatcher {
  private last: string | null = null;
  private lastLoggedAt = 0;
  private readonly heartbeatMs: number;
  private readonly onStatus?: (status: string) => void;
  private readonly onDisabled?: () => void;

  constructor(
    private readonly db: Pick<RadioDb, "getServerStatus">,
    private readonly status: LatestValueCell<string>,
    opts: StatusWatcherOptions,
    clock?: Clock
  ) {
    super("status.watch", opts.intervalSec, clock);
    this.heartbeatMs = (opts.heartbeatSec ?? 30) * 1000;
    this.onStatus = opts.onStatus;
    this.onDisabled = opts.onDisabled;
  }

  async pollOnce(): Promise<void> {
    let current = "";
    try {
      current = normalizeStatus(await this.db.getServerStatus());
    } catch (error) {
      logError("status.watch.read_failed", error);
    }

    const now = this.clock.now();
    if (this.last === null) {
      this.last = current;
      this.status.seed(current);
      this.lastLoggedAt = now;
      log("status.observed", { status: current });
      this.onStatus?.(current);
    } else if (current !== this.last) {
      const previous = this.last;
      this.last = current;
      this.status.set(current);
      this.lastLoggedAt = now;
      log("status.changed", { from: previous, to: current });
      this.onStatus?.(current);
      if (!isEnabledStatus(current)) {
        this.cascadeDisabled();
      }
    }

    if (now - this.lastLoggedAt > this.heartbeatMs) {
      this.lastLoggedAt = now;
      log("status.heartbeat", { status: this.last });
    }
  }

  private cascadeDisabled(): void {
    try {
      this.onDisabled?.();
    } catch (error) {
      logError("status.watch.disable_failed", error);
    }
  }
}
