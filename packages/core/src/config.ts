import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import TOML, { type JsonMap } from "@iarna/toml";
import type { AppConfig, LogsConfig, LogType, SqliteConfig, StoreConfig, ToolCallsConfig } from "@runlog/contracts";
import { DEFAULT_CONFIG, DEFAULT_HOME_DIR } from "./defaults.js";
import { isLogType, sortLogTypes, splitLogTypeList } from "./logTypes.js";
import { expandHome, toFiniteNumber } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(DEFAULT_HOME_DIR, "config.toml");

export interface PartialAppConfigInput {
  store?: Partial<StoreConfig>;
  sqlite?: Partial<SqliteConfig>;
  logs?: Partial<Omit<LogsConfig, "defaultTypes">> & { defaultTypes?: unknown };
  toolCalls?: Partial<ToolCallsConfig>;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function mergeStore(input?: Partial<StoreConfig>): StoreConfig {
  return {
    databasePath: nonEmptyStringOrDefault(input?.databasePath, DEFAULT_CONFIG.store.databasePath),
  };
}

function mergeSqlite(input?: Partial<SqliteConfig>): SqliteConfig {
  const defaults = DEFAULT_CONFIG.sqlite;
  return {
    binary: nonEmptyStringOrDefault(input?.binary, defaults.binary),
    timeoutMs: positiveIntOrDefault(input?.timeoutMs, defaults.timeoutMs),
    maxBufferBytes: positiveIntOrDefault(input?.maxBufferBytes, defaults.maxBufferBytes),
  };
}

function logTypeTokens(value: unknown): string[] | null {
  if (typeof value === "string") return splitLogTypeList(value);
  if (Array.isArray(value)) return value.map((entry) => String(entry ?? "").trim().toUpperCase());
  return null;
}

/** An explicit empty list means "none"; a list with no known type falls back to the defaults. */
function mergeDefaultTypes(value: unknown): LogType[] {
  const tokens = logTypeTokens(value);
  if (tokens === null) return [...DEFAULT_CONFIG.logs.defaultTypes];
  if (tokens.length === 0) return [];
  const types = tokens.filter(isLogType);
  if (types.length === 0) return [...DEFAULT_CONFIG.logs.defaultTypes];
  return sortLogTypes(types);
}

function mergeLogs(input?: PartialAppConfigInput["logs"]): LogsConfig {
  const defaults = DEFAULT_CONFIG.logs;
  return {
    defaultTypes: mergeDefaultTypes(input?.defaultTypes),
    messagePreviewChars: positiveIntOrDefault(input?.messagePreviewChars, defaults.messagePreviewChars),
  };
}

function mergeToolCalls(input?: Partial<ToolCallsConfig>): ToolCallsConfig {
  const defaults = DEFAULT_CONFIG.toolCalls;
  return {
    summaryPreviewChars: positiveIntOrDefault(input?.summaryPreviewChars, defaults.summaryPreviewChars),
    resultPreviewChars: positiveIntOrDefault(input?.resultPreviewChars, defaults.resultPreviewChars),
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    store: mergeStore(input?.store),
    sqlite: mergeSqlite(input?.sqlite),
    logs: mergeLogs(input?.logs),
    toolCalls: mergeToolCalls(input?.toolCalls),
  };
}

export function resolveDatabasePath(config: AppConfig, override?: string): string {
  const candidate = override?.trim() ? override.trim() : config.store.databasePath;
  return path.resolve(expandHome(candidate));
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return mergeConfig();
  }
  const parsed = TOML.parse(raw) as PartialAppConfigInput;
  return mergeConfig(parsed);
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}
