import mysql, { type Pool, type ResultSetHeader, type RowDataPacket } from "mysql2/promise";
import { logError } from "./log";
import type { Alert, AlertKind, MusicItem } from "./types";

export type SqlParam = string | number;
export type SqlRow = Record<string, unknown>;

/** The two query shapes the radio tables need. Connections are borrowed per call. */
export interface SqlExecutor {
  select(sql: string, params?: SqlParam[]): Promise<SqlRow[]>;
  /** Runs a write and returns the number of affected rows. */
  mutate(sql: string, params?: SqlParam[]): Promise<number>;
  close(): Promise<void>;
}

export type MySqlConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeoutSec: number;
  poolSize: number;
};

export function createMySqlExecutor(config: MySqlConfig): SqlExecutor {
  const pool: Pool = mysql.createPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectTimeout: config.connectTimeoutSec * 1000,
    connectionLimit: Math.max(1, config.poolSize),
    waitForConnections: true,
    charset: "utf8mb4"
  });
  return {
    async select(sql, params = []) {
      const [rows] = await pool.query<RowDataPacket[]>(sql, params);
      return rows;
    },
    async mutate(sql, params = []) {
      const [result] = await pool.execute<ResultSetHeader>(sql, params);
      return result.affectedRows;
    },
    async close() {
      await pool.end();
    }
  };
}

export interface RadioDb {
  getMusicById(id: number): Promise<MusicItem | null>;
  /** Next row strictly after `lastId`; never returns an id at or below it. */
  getNextMusicAfter(lastId: number): Promise<MusicItem | null>;
  getLatestMusic(): Promise<MusicItem | null>;
  /** Highest music id (0 for an empty table), or null when the table cannot be read. */
  getMaxMusicId(): Promise<number | null>;
  getNextAiAlertAfter(lastId: number): Promise<Alert | null>;
  getNextUserAlertAfter(lastId: number): Promise<Alert | null>;
  /** Deletes the alert row, or blanks its message when it cannot be deleted. True when a row changed. */
  ackAlert(kind: AlertKind, id: number): Promise<boolean>;
  /** Normalised status string, or null when it cannot be read. */
  getServerStatus(): Promise<string | null>;
  close(): Promise<void>;
}

const SCHEMA_ERROR_CODES = new Set(["ER_NO_SUCH_TABLE", "ER_BAD_FIELD_ERROR"]);

function sqlErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isSchemaError(error: unknown): boolean {
  const code = sqlErrorCode(error);
  return code !== undefined && SCHEMA_ERROR_CODES.has(code);
}

function toInt(value: unknown): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

function toText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  return Buffer.isBuffer(value) ? value.toString("utf8") : String(value);
}

function toMusic(row: SqlRow): MusicItem {
  const rawDuration = row.duration_seconds;
  const duration =
    rawDuration === null || rawDuration === undefined || String(rawDuration).trim() === "" ? null : toInt(rawDuration);
  return {
    id: toInt(row.id),
    name: toText(row.name),
    link: toText(row.link),
    durationSec: duration
  };
}

function toAlert(kind: AlertKind, row: SqlRow): Alert {
  return {
    kind,
    id: toInt(row.id),
    message: toText(row.message),
    severity: kind === "ai" ? toText(row.severity) : ""
  };
}

const ALERT_TABLES: Record<AlertKind, string> = {
  ai: "ai_alert",
  user: "user_alert"
};

const MUSIC_COLUMNS = "SELECT id, name, link, duration_seconds FROM music";

/**
 * Radio tables on MySQL. Missing tables or columns read as "no data";
 * connectivity errors are left to the caller.
 */
export class MySqlRadioDb implements RadioDb {
  constructor(
    private readonly sql: SqlExecutor,
    private readonly userAlertMaxAgeMin = 60
  ) {}

  async getMusicById(id: number): Promise<MusicItem | null> {
    const row = await this.first(`${MUSIC_COLUMNS} WHERE id = ? LIMIT 1`, [id]);
    return row ? toMusic(row) : null;
  }

  async getNextMusicAfter(lastId: number): Promise<MusicItem | null> {
    const row = await this.first(`${MUSIC_COLUMNS} WHERE id > ? ORDER BY id ASC LIMIT 1`, [lastId]);
    if (!row) {
      return null;
    }
    const music = toMusic(row);
    return music.id > lastId ? music : null;
  }

  async getLatestMusic(): Promise<MusicItem | null> {
    const row = await this.first(`${MUSIC_COLUMNS} ORDER BY id DESC LIMIT 1`);
    return row ? toMusic(row) : null;
  }

  async getMaxMusicId(): Promise<number | null> {
    const row = await this.first("SELECT COALESCE(MAX(id), 0) AS max_id FROM music");
    return row ? toInt(row.max_id) : null;
  }

  async getNextAiAlertAfter(lastId: number): Promise<Alert | null> {
    const row = await this.first(
      "SELECT id, message, severity FROM ai_alert " +
        "WHERE id > ? AND message IS NOT NULL AND TRIM(message) != '' ORDER BY id ASC LIMIT 1",
      [lastId]
    );
    return row ? this.afterWatermark(toAlert("ai", row), lastId) : null;
  }

  async getNextUserAlertAfter(lastId: number): Promise<Alert | null> {
    const base = "SELECT id, message FROM user_alert WHERE id > ? AND message IS NOT NULL AND TRIM(message) != ''";
    let rows: SqlRow[];
    try {
      rows = await this.sql.select(
        `${base} AND (last_updated IS NULL OR last_updated >= (UTC_TIMESTAMP() - INTERVAL ? MINUTE)) ORDER BY id ASC LIMIT 1`,
        [lastId, this.userAlertMaxAgeMin]
      );
    } catch (error) {
      if (!isSchemaError(error)) {
        throw error;
      }
      // Schemas without last_updated have no freshness window.
      const fallback = await this.first(`${base} ORDER BY id ASC LIMIT 1`, [lastId]);
      rows = fallback ? [fallback] : [];
    }
    const row = rows[0];
    return row ? this.afterWatermark(toAlert("user", row), lastId) : null;
  }

  async ackAlert(kind: AlertKind, id: number): Promise<boolean> {
    const table = ALERT_TABLES[kind];
    try {
      if ((await this.sql.mutate(`DELETE FROM ${table} WHERE id = ?`, [id])) > 0) {
        return true;
      }
    } catch (error) {
      logError("db.alert.delete_failed", error, { kind, id });
    }
    return (await this.sql.mutate(`UPDATE ${table} SET message = '' WHERE id = ?`, [id])) > 0;
  }

  async getServerStatus(): Promise<string | null> {
    try {
      let row: SqlRow | null;
      try {
        row = await this.selectFirst("SELECT status FROM status_server ORDER BY id DESC LIMIT 1");
      } catch (error) {
        if (!isSchemaError(error)) {
          throw error;
        }
        row = await this.selectFirst("SELECT status FROM status_server LIMIT 1");
      }
      if (!row || row.status === null || row.status === undefined) {
        return null;
      }
      return normalizeStatus(toText(row.status));
    } catch (error) {
      if (!isSchemaError(error)) {
        logError("db.status.failed", error);
      }
      return null;
    }
  }

  close(): Promise<void> {
    return this.sql.close();
  }

  private afterWatermark(alert: Alert, lastId: number): Alert | null {
    return alert.id > lastId ? alert : null;
  }

  /** First row, or null when the table or a column is missing. */
  private async first(sql: string, params: SqlParam[] = []): Promise<SqlRow | null> {
    try {
      return await this.selectFirst(sql, params);
    } catch (error) {
      if (isSchemaError(error)) {
        return null;
      }
      throw error;
    }
  }

  private async selectFirst(sql: string, params: SqlParam[] = []): Promise<SqlRow | null> {
    const rows = await this.sql.select(sql, params);
    return rows[0] ?? null;
  }
}

export function normalizeStatus(status: string | null | undefined): string {
  return String(status ?? "").trim().toLowerCase();
}
