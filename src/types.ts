export type MusicItem = {
  id: number;
  name: string;
  link: string;
  /** null when the row carries no length (continuous or unknown). */
  durationSec: number | null;
};

export type AlertKind = "ai" | "user";

export type Alert = {
  kind: AlertKind;
  id: number;
  message: string;
  /** Informational tag on AI alerts; empty for user alerts. */
  severity: string;
};

export type ClientState = {
  lastMusicId: number;
  lastMusicLink: string;
  lastAiAlertId: number;
  lastUserAlertId: number;
};

export type ControllerState = "IDLE" | "PLAYING" | "INTERRUPTED" | "STOPPED";

export type PlayOutcome = "finished" | "gated" | "stopped";

export type DeliveryOutcome = "spoken" | "content_failure" | "speech_failure" | "skipped" | "deferred";

export type SpeechClip = {
  filePath: string;
  lang: string;
  engine: string;
  voice?: string;
  rate?: string;
};

export type NowPlaying = {
  id: number;
  name: string;
  link: string;
  startedAt: string;
  plannedSec: number | null;
  volume: number;
};

export type HandledAlert = {
  kind: AlertKind;
  id: number;
  severity: string;
  outcome: DeliveryOutcome;
  ts: string;
};

export type SystemErrorItem = {
  ts: string;
  source: string;
  message: string;
};

export type ClientStats = {
  tracksStarted: number;
  tracksFinished: number;
  alertsSpoken: number;
  alertFailures: number;
  playbackErrors: number;
  gatedStops: number;
};

export type ClientSnapshot = {
  state: ControllerState;
  serverStatus: string | null;
  audioAllowed: boolean;
  nowPlaying: NowPlaying | null;
  watermarks: ClientState;
  lastAlert: HandledAlert | null;
  stats: ClientStats;
  recentEvents: ClientEvent[];
  recentErrors: SystemErrorItem[];
};

export type ClientEvent = {
  ts: string;
  event: string;
  payload: Record<string, unknown>;
  snapshot?: ClientSnapshot;
};
