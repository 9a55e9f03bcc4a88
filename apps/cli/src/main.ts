#!/usr/bin/env node
import { Command } from "commander";
import type { AgentRun, AppConfig, LogEntry } from "@runlog/contracts";
import {
  DEFAULT_CONFIG_PATH,
  formatRunDuration,
  InvalidArgumentError,
  loadConfig,
  logRow,
  mergeConfig,
  openStore,
  progressBar,
  resolveRun,
  runHeader,
  RunSession,
  saveConfig,
  splitLogTypeList,
  toolCallListLines,
  type OpenStoreOptions,
  type PartialAppConfigInput,
} from "@runlog/core";
import { detailLines, runBrowse } from "./browse.js";

interface GlobalOptions {
  config: string;
  db?: string;
}

function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ")
      .trimEnd();
    console.log(line);
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function printNamedTable(section: string, rows: string[][]): void {
  if (rows.length === 0) return;
  console.log(`\n${section}:`);
  printTable(rows);
}

function fmtTime(ms: number | null): string {
  if (ms === null) return "-";
  return new Date(ms).toISOString();
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  if (input.includes(",")) return input.split(",").map((part) => part.trim());
  return input;
}

function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  if (parts.length === 0) return;

  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i += 1) {
    const key = parts[i];
    if (!key) continue;
    const next = cursor[key];
    if (!next || typeof next !== "object" || Array.isArray(next)) {
      cursor[key] = {};
    }
    cursor = cursor[key] as Record<string, unknown>;
  }
  const lastKey = parts[parts.length - 1];
  if (!lastKey) return;
  cursor[lastKey] = value;
}

function runRow(run: AgentRun): string[] {
  return [
    String(run.runNumber),
    run.id,
    run.status,
    fmtTime(run.startTimeMs),
    fmtTime(run.endTimeMs),
    formatRunDuration(run),
  ];
}

function logLine(entry: LogEntry, config: AppConfig): string[] {
  const row = logRow(entry, config.logs.messagePreviewChars);
  return [row.time, row.type, row.message];
}

const program = new Command();
program.name("runlog").description("Inspect an AI agent's recorded tool calls and logs");
program.option("--config <path>", "Config path", DEFAULT_CONFIG_PATH);
program.option("--db <path>", "Database path (overrides store.databasePath)", process.env.RUNLOG_DB);
program.addHelpText(
  "after",
  `
Examples:
  $ runlog runs list
  $ runlog run latest
  $ runlog tool-calls latest --select 3
  $ runlog logs latest --type error,tool --search timeout
  $ runlog browse latest
`,
);

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function storeOptions(opts: GlobalOptions): OpenStoreOptions {
  return opts.db ? { databasePath: opts.db } : {};
}

async function openContext(): Promise<{ config: AppConfig; store: ReturnType<typeof openStore> }> {
  const opts = globalOptions();
  const config = await loadConfig(opts.config);
  return { config, store: openStore(config, storeOptions(opts)) };
}

async function openSession(runRef: string): Promise<{ config: AppConfig; session: RunSession }> {
  const { config, store } = await openContext();
  const session = await RunSession.open(store, runRef, { activeTypes: config.logs.defaultTypes });
  return { config, session };
}

program
  .command("init")
  .description("Create the database schema if it is missing")
  .action(async () => {
    const { store } = await openContext();
    await store.initialize();
    console.log(`initialized ${store.databasePath}`);
  });

const runs = program.command("runs").description("Run-level operations");

runs
  .command("list")
  .option("--json", "JSON output")
  .action(async (opts: { json?: boolean }) => {
    const { store } = await openContext();
    const list = await store.listRuns();
    if (opts.json) {
      console.log(JSON.stringify(list, null, 2));
      return;
    }
    if (list.length === 0) {
      console.log("no agent runs found");
      return;
    }
    printTable([["run", "id", "status", "started", "ended", "duration"], ...list.map(runRow)]);
  });

program
  .command("run <id_or_latest>")
  .description("Show a run's header, tool call statistics, and progress")
  .option("--json", "JSON output")
  .action(async (runRef: string, opts: { json?: boolean }) => {
    const { store } = await openContext();
    const run = await resolveRun(store, runRef);
    const statistics = await store.getRunStatistics(run.id);
    if (opts.json) {
      console.log(JSON.stringify({ run, statistics }, null, 2));
      return;
    }
    console.log(runHeader(run));
    printNamedTable("tool_calls", [
      ["total", "succeeded", "running", "failed"],
      [String(statistics.total), String(statistics.succeeded), String(statistics.running), String(statistics.failed)],
    ]);
    console.log(`\n${progressBar(statistics.total, statistics.succeeded)}`);
  });

program
  .command("tool-calls <id_or_latest>")
  .description("List a run's tool calls and show the selected one in detail")
  .option("--select <n>", "Timeline position to select (1-based)", "1")
  .option("--json", "JSON output")
  .action(async (runRef: string, opts: { select: string; json?: boolean }) => {
    const position = Number(opts.select);
    if (!opts.select.trim() || !Number.isInteger(position)) {
      throw new InvalidArgumentError(`--select expects a whole number, got: ${opts.select}`);
    }
    const { config, session } = await openSession(runRef);
    session.selection.select(position - 1);

    if (opts.json) {
      console.log(
        JSON.stringify(
          {
            run: session.run,
            selectedIndex: session.currentSelection(),
            toolCalls: session.toolCalls,
            detail: session.currentDetail(),
          },
          null,
          2,
        ),
      );
      return;
    }

    console.log(runHeader(session.run));
    console.log(`\nTool Call Timeline (${session.toolCalls.length} calls)`);
    session.toolCalls.forEach((call, index) => {
      for (const line of toolCallListLines(call, index === session.currentSelection(), {
        summaryChars: config.toolCalls.summaryPreviewChars,
        resultChars: config.toolCalls.resultPreviewChars,
      })) {
        console.log(line);
      }
    });

    const detail = session.currentDetail();
    if (detail) {
      console.log("");
      for (const line of detailLines(detail)) console.log(line);
    }
  });

program
  .command("logs <id_or_latest>")
  .description("Show a run's log entries, filtered by type and message text")
  .option("--type <types>", "Comma-separated log types (INFO, TOOL, ERROR, DEBUG)")
  .option("--search <query>", "Case-insensitive message search")
  .option("--json", "JSON output")
  .action(async (runRef: string, opts: { type?: string; search?: string; json?: boolean }) => {
    const { config, session } = await openSession(runRef);
    if (opts.type !== undefined) {
      session.logFilter.setActiveTypes(splitLogTypeList(opts.type));
    }
    if (opts.search !== undefined) {
      session.logFilter.setQuery(opts.search);
    }
    const visible = session.visibleEntries();

    if (opts.json) {
      console.log(JSON.stringify(visible, null, 2));
      return;
    }

    printTable([["time", "type", "message"], ...visible.map((entry) => logLine(entry, config))]);
    console.log(
      `\n${visible.length} of ${session.logs.length} entries (types: ${session.activeTypes().join(",") || "none"}; search: ${
        session.currentQuery() || "-"
      })`,
    );
  });

program
  .command("browse <id_or_latest>")
  .description("Browse tool calls and logs interactively")
  .action(async (runRef: string) => {
    const { config, session } = await openSession(runRef);
    await runBrowse(session, config);
  });

const configCmd = program.command("config").description("Configuration");

configCmd.command("get").action(async () => {
  const config = await loadConfig(globalOptions().config);
  console.log(JSON.stringify(config, null, 2));
});

configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
  const configPath = globalOptions().config;
  const config = await loadConfig(configPath);
  const mutable = structuredClone(config) as unknown as Record<string, unknown>;
  setPath(mutable, key, parseValue(value));
  const merged = mergeConfig(mutable as PartialAppConfigInput);
  await saveConfig(merged, configPath);
  console.log(`updated ${key}`);
});

void program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
