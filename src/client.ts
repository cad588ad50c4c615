import type { Server } from "node:http";
import { mkdir } from "node:fs/promises";
import { AlertArbitrator } from "./arbitrator";
import type { ClientConfig } from "./config";
import { PlaybackController } from "./controller";
import { MySqlRadioDb, createMySqlExecutor, type RadioDb } from "./db";
import { ServerStatusGate, isEnabledStatus } from "./gate";
import { LatestValueCell } from "./latest-cell";
import { log, logError } from "./log";
import { FfplayClipPlayer, StreamPlayer, type MusicPlayer } from "./player";
import { RuntimeState } from "./runtime-state";
import { closeStatusServer, startStatusServer } from "./server";
import { SpeechRenderer } from "./speech";
import { StateStore } from "./state-store";
import { TTSClient } from "./tts";
import type { MusicItem } from "./types";
import { MusicWatcher, StatusWatcher } from "./watchers";

const WATCHER_JOIN_TIMEOUT_MS = 2000;

/** Wires the database, players, speech and watchers around one playback controller. */
export class RadioClient {
  readonly runtime = new RuntimeState();
  private readonly db: RadioDb;
  private readonly player: MusicPlayer;
  private readonly store: StateStore;
  private readonly controller: PlaybackController;
  private readonly musicWatcher: MusicWatcher | null;
  private readonly statusWatcher: StatusWatcher;
  private server: Server | null = null;
  private shuttingDown: Promise<void> | null = null;

  constructor(private readonly config: ClientConfig) {
    this.db = new MySqlRadioDb(createMySqlExecutor(config.mysql), config.userAlertMaxAgeMin);
    this.player = new StreamPlayer(config.resolveCacheTtlSec);
    this.store = new StateStore(config.statePath);

    const desiredMusic = new LatestValueCell<MusicItem>();
    const status = new LatestValueCell<string>();
    const gate = new ServerStatusGate(this.db, status);
    const speech = new SpeechRenderer(new TTSClient(config.ttsBaseUrl, config.workDir), new FfplayClipPlayer(), {
      defaultLanguage: config.ttsDefaultLang,
      debug: config.debugTts
    });
    const arbitrator = new AlertArbitrator(
      this.db,
      this.store,
      speech,
      gate,
      { enableTts: config.enableTts, userGain: config.ttsGainUser, aiGain: config.ttsGainAi },
      this.runtime
    );

    this.musicWatcher =
      config.musicId > 0 ? new MusicWatcher(this.db, config.musicId, desiredMusic, config.musicWatchIntervalSec) : null;
    this.statusWatcher = new StatusWatcher(this.db, status, {
      intervalSec: config.statusWatchIntervalSec,
      heartbeatSec: config.statusHeartbeatSec,
      onStatus: (value) => this.runtime.setServerStatus(value, isEnabledStatus(value)),
      onDisabled: () => this.player.stop()
    });

    this.controller = new PlaybackController(
      {
        pollIntervalSec: config.pollIntervalSec,
        defaultDurationSec: config.defaultDurationSec,
        fixedMusicId: config.musicId,
        alertCheckIntervalSec: config.alertCheckIntervalSec,
        enableDurationDetect: config.enableDurationDetect,
        musicVolumeNormal: config.musicVolumeNormal,
        musicVolumeDucked: config.musicVolumeDucked
      },
      {
        db: this.db,
        player: this.player,
        store: this.store,
        gate,
        arbitrator,
        desiredMusic,
        statusChanges: status,
        runtime: this.runtime
      }
    );
  }

  /** Loads and reconciles local state, then starts the watchers and the optional status server. */
  async start(): Promise<void> {
    await mkdir(this.config.workDir, { recursive: true });
    await this.store.load();
    try {
      await this.store.reconcileMusicWatermark(await this.db.getMaxMusicId());
    } catch (error) {
      logError("state.validate.failed", error);
    }
    this.runtime.setWatermarks(this.store.state);

    this.musicWatcher?.start();
    this.statusWatcher.start();

    if (this.config.statusPort > 0) {
      try {
        this.server = await startStatusServer(this.runtime, this.config.statusPort);
      } catch (error) {
        logError("server.start.failed", error, { port: this.config.statusPort });
      }
    }
  }

  run(): Promise<void> {
    return this.controller.run();
  }

  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.doShutdown();
    }
    return this.shuttingDown;
  }

  private async doShutdown(): Promise<void> {
    log("client.stopping");
    this.controller.stop();
    this.player.stop();
    await Promise.all([
      this.musicWatcher?.stop(WATCHER_JOIN_TIMEOUT_MS),
      this.statusWatcher.stop(WATCHER_JOIN_TIMEOUT_MS)
    ]);
    if (this.server) {
      await closeStatusServer(this.server);
      this.server = null;
    }
    try {
      await this.db.close();
    } catch (error) {
      logError("db.close.failed", error);
    }
    log("client.stopped");
  }
}
