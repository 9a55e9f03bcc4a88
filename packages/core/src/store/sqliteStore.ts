import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import type { AgentRun, LogEntry, LogQueryOptions, RunStatistics, SqliteConfig, ToolCall } from "@runlog/contracts";
import { DEFAULT_CONFIG } from "../defaults.js";
import { NotFoundError, StoreConnectionError, asErrorMessage } from "../errors.js";
import { messageMatches } from "../logFilter.js";
import { asRecord, sqlQuote, toFiniteNumber } from "../utils.js";
import { decodeAgentRun, decodeLogEntry, decodeToolCall } from "./rows.js";
import type { RecordStore } from "./types.js";

const execFileAsync = promisify(execFile);
const SCHEMA_URL = new URL("./schema.sql", import.meta.url);

export interface SqliteRecordStoreOptions {
  databasePath: string;
  sqlite?: SqliteConfig;
}

/**
 * Reads runs, tool calls and logs through the `sqlite3` shell in JSON mode.
 * Queries run with `-readonly`; only `initialize()` opens the file for writing.
 */
export class SqliteRecordStore implements RecordStore {
  readonly databasePath: string;
  private readonly sqlite: SqliteConfig;

  constructor(options: SqliteRecordStoreOptions) {
    this.databasePath = options.databasePath;
    this.sqlite = options.sqlite ?? DEFAULT_CONFIG.sqlite;
  }

  async initialize(): Promise<void> {
    const schema = await readFile(SCHEMA_URL, "utf8");
    await mkdir(path.dirname(this.databasePath), { recursive: true });
    await this.exec(["-bail", this.databasePath, schema], "initialize database");
  }

  async listRuns(): Promise<AgentRun[]> {
    const rows = await this.query("select * from agent_runs order by run_number desc;");
    return rows.map(decodeAgentRun);
  }

  async getRun(runId: string): Promise<AgentRun> {
    const [row] = await this.query(`select * from agent_runs where id = ${sqlQuote(runId)} limit 1;`);
    if (!row) {
      throw new NotFoundError(`run not found: ${runId}`);
    }
    return decodeAgentRun(row);
  }

  async getLatestRun(): Promise<AgentRun | null> {
    const [row] = await this.query("select * from agent_runs order by run_number desc limit 1;");
    return row ? decodeAgentRun(row) : null;
  }

  async loadToolCalls(runId: string): Promise<ToolCall[]> {
    const rows = await this.query(
      `select * from tool_calls where run_id = ${sqlQuote(runId)} order by sequence_number;`,
    );
    return rows.map(decodeToolCall);
  }

  async loadLogs(runId: string, options: LogQueryOptions = {}): Promise<LogEntry[]> {
    const clauses = [`run_id = ${sqlQuote(runId)}`];
    if (options.types && options.types.length > 0) {
      clauses.push(`log_type in (${options.types.map(sqlQuote).join(", ")})`);
    }
    // rowid keeps insertion order among equal timestamps
    const rows = await this.query(`select * from logs where ${clauses.join(" and ")} order by timestamp, rowid;`);
    // LIKE folds ASCII only, so the text search runs here
    const query = options.query ?? "";
    return rows.map(decodeLogEntry).filter((entry) => messageMatches(entry.message, query));
  }

  async getRunStatistics(runId: string): Promise<RunStatistics> {
    const [row] = await this.query(
      [
        "select count(*) as total,",
        "sum(case when status = 'success' then 1 else 0 end) as succeeded,",
        "sum(case when status = 'running' then 1 else 0 end) as running,",
        "sum(case when status = 'failed' then 1 else 0 end) as failed",
        `from tool_calls where run_id = ${sqlQuote(runId)};`,
      ].join(" "),
    );
    const record = asRecord(row);
    return {
      total: toFiniteNumber(record.total) ?? 0,
      succeeded: toFiniteNumber(record.succeeded) ?? 0,
      running: toFiniteNumber(record.running) ?? 0,
      failed: toFiniteNumber(record.failed) ?? 0,
    };
  }

  private async query(sql: string): Promise<Record<string, unknown>[]> {
    if (!existsSync(this.databasePath)) {
      throw new StoreConnectionError(`database file not found: ${this.databasePath}`);
    }
    const output = await this.exec(["-readonly", "-json", this.databasePath, sql], "query database");
    const trimmed = output.trim();
    if (!trimmed) return [];
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new StoreConnectionError(`unreadable sqlite3 output: ${asErrorMessage(error)}`, { cause: error });
    }
    if (!Array.isArray(parsed)) return [];
    return parsed.map((row) => asRecord(row));
  }

  private async exec(args: string[], action: string): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.sqlite.binary, args, {
        encoding: "utf8",
        timeout: this.sqlite.timeoutMs,
        maxBuffer: this.sqlite.maxBufferBytes,
      });
      return stdout;
    } catch (error) {
      const stderr = asRecord(error).stderr;
      const detail = typeof stderr === "string" && stderr.trim() ? stderr.trim() : asErrorMessage(error);
      throw new StoreConnectionError(`failed to ${action} (${this.databasePath}): ${detail}`, { cause: error });
    }
  }
}
