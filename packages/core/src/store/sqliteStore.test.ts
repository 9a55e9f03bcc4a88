import { execFileSync } from "node:child_process";
import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { NotFoundError, StoreConnectionError } from "../errors.js";
import { sqlQuote } from "../utils.js";
import { SqliteRecordStore } from "./sqliteStore.js";

function hasSqliteCli(): boolean {
  try {
    execFileSync("sqlite3", ["--version"], {
      encoding: "utf8",
      stdio: ["ignore", "pipe", "ignore"],
      timeout: 2_000,
      maxBuffer: 128 * 1024,
    });
    return true;
  } catch {
    return false;
  }
}

function runSql(dbPath: string, statements: string[]): void {
  execFileSync("sqlite3", [dbPath, statements.join("\n")], {
    encoding: "utf8",
    stdio: ["ignore", "pipe", "ignore"],
    timeout: 5_000,
    maxBuffer: 2 * 1024 * 1024,
  });
}

function toolCallInsert(
  id: string,
  sequence: number,
  status: string,
  duration: number | null,
  response: string | null,
): string {
  return [
    "insert into tool_calls (id, run_id, sequence_number, tool_name, status, timestamp, duration, request, response, size, summary, result_summary) values (",
    [
      sqlQuote(id),
      "'run-a'",
      String(sequence),
      "'web_search'",
      sqlQuote(status),
      sqlQuote(`2024-12-26T12:34:0${sequence}`),
      duration === null ? "null" : String(duration),
      sqlQuote('{"query":"tides"}'),
      response === null ? "null" : sqlQuote(response),
      "2400",
      sqlQuote(`call ${sequence}`),
      "null",
    ].join(", "),
    ");",
  ].join("");
}

async function createFixture(): Promise<SqliteRecordStore> {
  const root = await mkdtemp(path.join(os.tmpdir(), "runlog-sqlite-"));
  const store = new SqliteRecordStore({ databasePath: path.join(root, "nested", "runlog.db") });
  await store.initialize();
  runSql(store.databasePath, [
    "insert into agent_runs (id, run_number, start_time, end_time, status) values ('run-a', 46, '2024-12-26T11:00:00', '2024-12-26T11:05:00', 'failed');",
    "insert into agent_runs (id, run_number, start_time, end_time, status) values ('run-b', 47, '2024-12-26T12:00:00', null, 'running');",
    toolCallInsert("tc-3", 3, "running", null, null),
    toolCallInsert("tc-1", 1, "success", 0.234, '{"total_results":24}'),
    toolCallInsert("tc-2", 2, "failed", 1.5, "gateway timeout"),
    toolCallInsert("tc-4", 4, "success", 0.1, "{}"),
    "insert into logs (id, run_id, timestamp, log_type, message, metadata) values ('l3', 'run-a', '2024-12-26T11:00:03', 'ERROR', 'Search failed: 100% of retries used', null);",
    "insert into logs (id, run_id, timestamp, log_type, message, metadata) values ('l1', 'run-a', '2024-12-26T11:00:01', 'INFO', 'Agent started', '{\"pid\":1}');",
    "insert into logs (id, run_id, timestamp, log_type, message, metadata) values ('l2', 'run-a', '2024-12-26T11:00:01', 'TOOL', 'search_web called', null);",
    "insert into logs (id, run_id, timestamp, log_type, message, metadata) values ('l4', 'run-a', '2024-12-26T11:00:04', 'DEBUG', 'search cache size 1000', null);",
    "insert into logs (id, run_id, timestamp, log_type, message, metadata) values ('l5', 'run-b', '2024-12-26T12:00:01', 'ERROR', 'ÜBERPRÜFUNG fehlgeschlagen', null);",
  ]);
  return store;
}

describe("SqliteRecordStore", () => {
  it("resolves runs by id and by highest run number", async () => {
    if (!hasSqliteCli()) return;
    const store = await createFixture();

    expect((await store.listRuns()).map((run) => run.id)).toEqual(["run-b", "run-a"]);
    const latest = await store.getLatestRun();
    expect(latest).toMatchObject({ id: "run-b", runNumber: 47, endTimeMs: null, status: "running" });
    expect((await store.getRun("run-a")).endTimeMs).toBe(Date.parse("2024-12-26T11:05:00"));
    await expect(store.getRun("run-z")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("loads tool calls in sequence order as status variants", async () => {
    if (!hasSqliteCli()) return;
    const store = await createFixture();

    const calls = await store.loadToolCalls("run-a");
    expect(calls.map((call) => `${call.sequenceNumber}:${call.status}`)).toEqual([
      "1:success",
      "2:failed",
      "3:running",
      "4:success",
    ]);
    expect(calls[0]).toMatchObject({ durationSeconds: 0.234, response: '{"total_results":24}', size: 2400 });
    expect(await store.loadToolCalls("run-b")).toEqual([]);
    expect(await store.getRunStatistics("run-a")).toEqual({ total: 4, succeeded: 2, running: 1, failed: 1 });
    expect(await store.getRunStatistics("run-b")).toEqual({ total: 0, succeeded: 0, running: 0, failed: 0 });
  });

  it("orders logs by timestamp, then insertion, and pre-filters in SQL", async () => {
    if (!hasSqliteCli()) return;
    const store = await createFixture();

    expect((await store.loadLogs("run-a")).map((entry) => entry.id)).toEqual(["l1", "l2", "l3", "l4"]);
    expect((await store.loadLogs("run-a", { query: "SEARCH" })).map((entry) => entry.id)).toEqual(["l2", "l3", "l4"]);
    expect((await store.loadLogs("run-a", { query: "search", types: ["ERROR", "DEBUG"] })).map((entry) => entry.id)).toEqual([
      "l3",
      "l4",
    ]);
    expect((await store.loadLogs("run-a", { query: "100%" })).map((entry) => entry.id)).toEqual(["l3"]);
    expect((await store.loadLogs("run-a", { query: "_web" })).map((entry) => entry.id)).toEqual(["l2"]);
    expect((await store.loadLogs("run-a"))[0]?.metadata).toBe('{"pid":1}');
  });

  it("matches non-ASCII message text regardless of case, like the filter engine", async () => {
    if (!hasSqliteCli()) return;
    const store = await createFixture();

    expect((await store.loadLogs("run-b", { query: "überprüfung" })).map((entry) => entry.id)).toEqual(["l5"]);
    expect(await store.loadLogs("run-b", { query: "überprüfung", types: ["INFO"] })).toEqual([]);
  });

  it("keeps initialize idempotent", async () => {
    if (!hasSqliteCli()) return;
    const store = await createFixture();
    await store.initialize();
    expect(await store.listRuns()).toHaveLength(2);
  });

  it("raises a connection error for a missing database file", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "runlog-missing-"));
    const store = new SqliteRecordStore({ databasePath: path.join(root, "absent.db") });
    await expect(store.loadToolCalls("run-a")).rejects.toBeInstanceOf(StoreConnectionError);
    await expect(store.getLatestRun()).rejects.toThrow(`database file not found: ${path.join(root, "absent.db")}`);
  });
});
