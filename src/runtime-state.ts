import type {
  Alert,
  ClientEvent,
  ClientSnapshot,
  ClientState,
  ClientStats,
  ControllerState,
  DeliveryOutcome,
  MusicItem,
  PlayOutcome,
  SystemErrorItem
} from "./types";

const MAX_RECENT_EVENTS = 200;
const MAX_RECENT_ERRORS = 50;

type Listener = (event: ClientEvent) => void;

function trimNewest<T>(items: T[], max: number): T[] {
  return items.slice(0, max);
}

function emptyStats(): ClientStats {
  return {
    tracksStarted: 0,
    tracksFinished: 0,
    alertsSpoken: 0,
    alertFailures: 0,
    playbackErrors: 0,
    gatedStops: 0
  };
}

function cloneSnapshot(snapshot: ClientSnapshot): ClientSnapshot {
  return JSON.parse(JSON.stringify(snapshot)) as ClientSnapshot;
}

/** In-memory view of the client for the status server. Nothing here feeds back into playback. */
export class RuntimeState {
  private listeners = new Set<Listener>();

  private snapshotState: ClientSnapshot = {
    state: "IDLE",
    serverStatus: null,
    audioAllowed: false,
    nowPlaying: null,
    watermarks: {
      lastMusicId: 0,
      lastMusicLink: "",
      lastAiAlertId: 0,
      lastUserAlertId: 0
    },
    lastAlert: null,
    stats: emptyStats(),
    recentEvents: [],
    recentErrors: []
  };

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): ClientSnapshot {
    return cloneSnapshot(this.snapshotState);
  }

  setState(state: ControllerState): void {
    if (this.snapshotState.state === state) {
      return;
    }
    const from = this.snapshotState.state;
    this.snapshotState.state = state;
    this.emit("state.changed", { from, to: state });
  }

  setServerStatus(status: string, audioAllowed: boolean): void {
    if (this.snapshotState.serverStatus === status && this.snapshotState.audioAllowed === audioAllowed) {
      return;
    }
    this.snapshotState.serverStatus = status;
    this.snapshotState.audioAllowed = audioAllowed;
    this.emit("status.updated", { status, audioAllowed });
  }

  setWatermarks(watermarks: ClientState): void {
    this.snapshotState.watermarks = { ...watermarks };
    this.emit("watermarks.updated", { ...watermarks });
  }

  trackStarted(music: MusicItem, plannedSec: number | null, volume: number): void {
    this.snapshotState.nowPlaying = {
      id: music.id,
      name: music.name,
      link: music.link,
      startedAt: new Date().toISOString(),
      plannedSec,
      volume
    };
    this.snapshotState.stats.tracksStarted += 1;
    this.emit("track.started", { id: music.id, name: music.name, plannedSec });
  }

  volumeChanged(volume: number): void {
    const now = this.snapshotState.nowPlaying;
    if (!now || now.volume === volume) {
      return;
    }
    now.volume = volume;
    this.emit("track.volume", { id: now.id, volume });
  }

  trackEnded(outcome: PlayOutcome): void {
    const now = this.snapshotState.nowPlaying;
    this.snapshotState.nowPlaying = null;
    if (outcome === "finished") {
      this.snapshotState.stats.tracksFinished += 1;
    } else if (outcome === "gated") {
      this.snapshotState.stats.gatedStops += 1;
    }
    this.emit("track.ended", { id: now?.id ?? null, outcome });
  }

  alertHandled(alert: Alert, outcome: DeliveryOutcome): void {
    this.snapshotState.lastAlert = {
      kind: alert.kind,
      id: alert.id,
      severity: alert.severity,
      outcome,
      ts: new Date().toISOString()
    };
    if (outcome === "spoken") {
      this.snapshotState.stats.alertsSpoken += 1;
    } else if (outcome === "content_failure" || outcome === "speech_failure") {
      this.snapshotState.stats.alertFailures += 1;
      this.recordError(`alert.${alert.kind}`, `alert ${alert.id}: ${outcome}`);
    }
    this.emit("alert.handled", { kind: alert.kind, id: alert.id, outcome });
  }

  playbackError(message: string): void {
    this.snapshotState.stats.playbackErrors += 1;
    this.recordError("playback", message);
    this.emit("playback.error", { message });
  }

  private recordError(source: string, message: string): void {
    const error: SystemErrorItem = {
      ts: new Date().toISOString(),
      source,
      message
    };
    this.snapshotState.recentErrors = trimNewest([error, ...this.snapshotState.recentErrors], MAX_RECENT_ERRORS);
  }

  private emit(event: string, payload: Record<string, unknown>): void {
    const compact: ClientEvent = {
      ts: new Date().toISOString(),
      event,
      payload
    };

    this.snapshotState.recentEvents = trimNewest([compact, ...this.snapshotState.recentEvents], MAX_RECENT_EVENTS);

    if (this.listeners.size === 0) {
      return;
    }
    const out: ClientEvent = {
      ...compact,
      snapshot: this.snapshot()
    };
    for (const listener of this.listeners) {
      listener(out);
    }
  }
}
