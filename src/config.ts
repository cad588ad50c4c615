import os from "node:os";
import path from "node:path";
import { config as loadDotenv } from "dotenv";

export function loadEnvFiles(): void {
  loadDotenv({ path: process.env.DOTENV_PATH || path.resolve(process.cwd(), ".env") });
  loadDotenv();
}

export type ClientConfig = {
  mysql: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    connectTimeoutSec: number;
    poolSize: number;
  };
  statePath: string;
  workDir: string;
  pollIntervalSec: number;
  defaultDurationSec: number;
  musicId: number;
  musicWatchIntervalSec: number;
  statusWatchIntervalSec: number;
  statusHeartbeatSec: number;
  alertCheckIntervalSec: number;
  enableTts: boolean;
  enableDurationDetect: boolean;
  debugTts: boolean;
  ttsBaseUrl: string;
  ttsDefaultLang: string;
  resolveCacheTtlSec: number;
  userAlertMaxAgeMin: number;
  musicVolumeNormal: number;
  musicVolumeDucked: number;
  ttsGainUser: number;
  ttsGainAi: number;
  statusPort: number;
};

type Env = Record<string, string | undefined>;

function num(env: Env, name: string, fallback: number): number {
  const v = Number(env[name] || fallback);
  return Number.isFinite(v) ? v : fallback;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const v = (env[name] || "").trim().toLowerCase();
  if (!v) return fallback;
  return ["1", "true", "yes", "on"].includes(v);
}

export function loadConfig(env: Env = process.env): ClientConfig {
  return {
    mysql: {
      host: env.MYSQL_HOST || "127.0.0.1",
      port: num(env, "MYSQL_PORT", 3306),
      user: env.MYSQL_USER || "",
      password: env.MYSQL_PASSWORD || "",
      database: env.MYSQL_DATABASE || "",
      connectTimeoutSec: num(env, "MYSQL_TIMEOUT_SEC", 10),
      poolSize: num(env, "MYSQL_POOL_SIZE", 3)
    },
    statePath: env.STATE_PATH || path.resolve(process.cwd(), "client_state.json"),
    workDir: env.WORK_DIR || os.tmpdir(),
    pollIntervalSec: num(env, "POLL_INTERVAL_SEC", 3),
    defaultDurationSec: num(env, "DEFAULT_DURATION_SEC", 180),
    musicId: Math.trunc(num(env, "MUSIC_ID", 1)),
    musicWatchIntervalSec: num(env, "MUSIC_WATCH_INTERVAL_SEC", 1.5),
    statusWatchIntervalSec: num(env, "STATUS_WATCH_INTERVAL_SEC", 2),
    statusHeartbeatSec: num(env, "STATUS_HEARTBEAT_SEC", 30),
    alertCheckIntervalSec: num(env, "ALERT_CHECK_INTERVAL_SEC", 1.5),
    enableTts: flag(env, "ENABLE_TTS", true),
    enableDurationDetect: flag(env, "ENABLE_DURATION_DETECT", true),
    debugTts: flag(env, "DEBUG_TTS", false),
    ttsBaseUrl: env.TTS_BASE_URL || "http://localhost:8000",
    ttsDefaultLang: env.TTS_DEFAULT_LANG || "en",
    resolveCacheTtlSec: num(env, "RESOLVE_CACHE_TTL_SEC", 600),
    userAlertMaxAgeMin: num(env, "USER_ALERT_MAX_AGE_MIN", 60),
    musicVolumeNormal: num(env, "MUSIC_VOLUME_NORMAL", 100),
    musicVolumeDucked: num(env, "MUSIC_VOLUME_DUCKED", 10),
    ttsGainUser: num(env, "TTS_GAIN_USER", 1),
    ttsGainAi: num(env, "TTS_GAIN_AI", 4),
    statusPort: num(env, "STATUS_PORT", 0)
  };
}
