import crypto from "node:crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import * as sqlJs from "sql.js";
import { endOfDay, isValid, parseISO } from "date-fns";
import { ExecutionError, ValidationError } from "../errors.js";
import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import type { Fernet } from "./fernet.js";
import type { ScreenshotHistory, ScreenshotQuery, ScreenshotStats, ScreenshotSummary, WindowInfo } from "./types.js";

type SqlJsStatic = Awaited<ReturnType<typeof sqlJs.default>>;
type SqlDatabase = InstanceType<SqlJsStatic["Database"]>;
type SqlParam = string | number | Uint8Array | null;
type Row = Record<string, unknown>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS screenshots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL,
    application TEXT NOT NULL,
    window_title TEXT,
    encrypted_data BLOB NOT NULL,
    file_hash TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_timestamp ON screenshots(timestamp);
  CREATE INDEX IF NOT EXISTS idx_application ON screenshots(application);
`;

export const DEFAULT_SCREENSHOT_LIMIT = 10;
export const IN_MEMORY = ":memory:";

export interface ScreenshotStoreOptions {
  /** Database file, or `:memory:` for a store that is never written to disk. */
  dbPath: string;
  cipher: Fernet;
  now?: () => Date;
  logger?: PrefixedLogger;
}

let engine: Promise<SqlJsStatic> | null = null;

// The wasm engine is loaded once per process and shared by every store.
function loadEngine(): Promise<SqlJsStatic> {
  if (!engine) {
    engine = sqlJs.default();
  }
  return engine;
}

/**
 * Encrypted screenshot archive in SQLite (sql.js). The database lives in memory
 * and is flushed to `dbPath` after every write. Timestamps are stored as UTC ISO strings.
 */
export class ScreenshotStore implements ScreenshotHistory {
  private readonly db: SqlDatabase;
  private readonly dbPath: string;
  private readonly cipher: Fernet;
  private readonly now: () => Date;
  private readonly log: PrefixedLogger;

  private constructor(db: SqlDatabase, options: ScreenshotStoreOptions) {
    this.db = db;
    this.dbPath = options.dbPath;
    this.cipher = options.cipher;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? loggerFor("screenshots");
  }

  static async open(options: ScreenshotStoreOptions): Promise<ScreenshotStore> {
    const SQL = await loadEngine();
    let db: SqlDatabase;
    if (options.dbPath === IN_MEMORY) {
      db = new SQL.Database();
    } else {
      mkdirSync(path.dirname(options.dbPath), { recursive: true });
      db = new SQL.Database(existsSync(options.dbPath) ? readFileSync(options.dbPath) : null);
    }
    db.exec(SCHEMA);
    return new ScreenshotStore(db, options);
  }

  /** False for empty images and for repeats of the application's most recent frame. */
  saveScreenshot(image: Buffer, windowInfo: WindowInfo): boolean {
    if (image.length === 0) {
      return false;
    }

    const fileHash = crypto.createHash("sha256").update(image).digest("hex");
    const latest = this.get(
      "SELECT file_hash FROM screenshots WHERE application = ? ORDER BY timestamp DESC, id DESC LIMIT 1",
      [windowInfo.application],
    );
    if (latest && text(latest, "file_hash") === fileHash) {
      this.log.debug(`skip duplicate application=${windowInfo.application}`);
      return false;
    }

    const timestamp = this.now().toISOString();
    const token = this.cipher.encrypt(image, this.now());
    this.run(
      "INSERT INTO screenshots (timestamp, application, window_title, encrypted_data, file_hash) VALUES (?, ?, ?, ?, ?)",
      [timestamp, windowInfo.application, windowInfo.window_title, Buffer.from(token, "ascii"), fileHash],
    );

    this.log.info(`saved application=${windowInfo.application} bytes=${image.length} timestamp=${timestamp}`);
    return true;
  }

  getScreenshots(query: ScreenshotQuery = {}): ScreenshotSummary[] {
    const clauses: string[] = [];
    const params: SqlParam[] = [];

    if (query.application) {
      clauses.push("application = ?");
      params.push(query.application);
    }
    if (query.startDate) {
      clauses.push("timestamp >= ?");
      params.push(normaliseBound(query.startDate, "start", "$.startDate"));
    }
    if (query.endDate) {
      clauses.push("timestamp <= ?");
      params.push(normaliseBound(query.endDate, "end", "$.endDate"));
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    params.push(query.limit ?? DEFAULT_SCREENSHOT_LIMIT);

    return this.all(
      `SELECT id, timestamp, application, window_title, file_hash FROM screenshots ${where} ORDER BY timestamp DESC, id DESC LIMIT ?`,
      params,
    ).map((row) => ({
      id: integer(row, "id"),
      timestamp: text(row, "timestamp"),
      application: text(row, "application"),
      window_title: optionalText(row, "window_title"),
      file_hash: text(row, "file_hash"),
    }));
  }

  /** Decrypted PNG bytes; a row that no longer decrypts is a server-side fault. */
  getScreenshotData(id: number): Buffer | null {
    const row = this.get("SELECT encrypted_data FROM screenshots WHERE id = ?", [id]);
    const token = row?.encrypted_data;
    if (!(token instanceof Uint8Array)) {
      return null;
    }
    try {
      return this.cipher.decrypt(Buffer.from(token));
    } catch (error) {
      this.log.error(`decrypt id=${id} error=${formatErrorMessage(error)}`);
      throw new ExecutionError(`Screenshot ${id} could not be decrypted`, { cause: error });
    }
  }

  getStats(): ScreenshotStats {
    const total = this.get("SELECT COUNT(*) AS total FROM screenshots");
    const applications = this.all(
      "SELECT application, COUNT(*) AS count FROM screenshots GROUP BY application ORDER BY count DESC, application ASC",
    );
    const range = this.get("SELECT MIN(timestamp) AS first, MAX(timestamp) AS last FROM screenshots");

    return {
      total_screenshots: total ? integer(total, "total") : 0,
      applications: applications.map((row): [string, number] => [text(row, "application"), integer(row, "count")]),
      date_range: [range ? optionalText(range, "first") : null, range ? optionalText(range, "last") : null],
    };
  }

  deleteScreenshot(id: number): boolean {
    const deleted = this.run("DELETE FROM screenshots WHERE id = ?", [id]) > 0;
    if (deleted) {
      this.log.info(`deleted id=${id}`);
    }
    return deleted;
  }

  close(): void {
    this.db.close();
  }

  private all(sql: string, params: SqlParam[] = []): Row[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: Row[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  private get(sql: string, params: SqlParam[] = []): Row | undefined {
    return this.all(sql, params)[0];
  }

  /** Executes a write, flushes the database file and returns the changed row count. */
  private run(sql: string, params: SqlParam[]): number {
    this.db.run(sql, params);
    const changes = this.db.getRowsModified();
    if (changes > 0 && this.dbPath !== IN_MEMORY) {
      writeFileSync(this.dbPath, this.db.export());
    }
    return changes;
  }
}

function text(row: Row, column: string): string {
  const value = row[column];
  return typeof value === "string" ? value : "";
}

function optionalText(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === "string" ? value : null;
}

function integer(row: Row, column: string): number {
  const value = row[column];
  return typeof value === "number" ? value : 0;
}

/** Converts a filter bound to the stored UTC format. A bare end date covers the whole day. */
function normaliseBound(value: string, side: "start" | "end", at: string): string {
  const parsed = parseISO(value.trim());
  if (!isValid(parsed)) {
    throw new ValidationError(`Invalid date: ${value}`, { path: at });
  }
  const dateOnly = /^\d{4}-\d{2}-\d{2}$/.test(value.trim());
  return (side === "end" && dateOnly ? endOfDay(parsed) : parsed).toISOString();
}
