import type { LogType, RunStatus, ToolCallStatus } from "@runlog/contracts";
import { InvalidArgumentError } from "./errors.js";

export const LOG_TYPES: readonly LogType[] = ["INFO", "TOOL", "ERROR", "DEBUG"];
export const TOOL_CALL_STATUSES: readonly ToolCallStatus[] = ["queued", "running", "success", "failed"];
export const RUN_STATUSES: readonly RunStatus[] = ["running", "completed", "failed"];

export function isLogType(value: unknown): value is LogType {
  return value === "INFO" || value === "TOOL" || value === "ERROR" || value === "DEBUG";
}

export function isToolCallStatus(value: unknown): value is ToolCallStatus {
  return TOOL_CALL_STATUSES.some((status) => status === value);
}

export function isRunStatus(value: unknown): value is RunStatus {
  return RUN_STATUSES.some((status) => status === value);
}

export function parseLogType(value: unknown): LogType {
  if (isLogType(value)) return value;
  throw new InvalidArgumentError(`unknown log type: ${String(value)} (expected one of ${LOG_TYPES.join(", ")})`);
}

export function parseLogTypes(values: Iterable<unknown>): Set<LogType> {
  const parsed = new Set<LogType>();
  for (const value of values) {
    parsed.add(parseLogType(value));
  }
  return parsed;
}

/** Splits "info,error" style input into upper-cased tokens; validation is left to the caller. */
export function splitLogTypeList(input: string): string[] {
  return input
    .split(",")
    .map((token) => token.trim().toUpperCase())
    .filter((token) => token.length > 0);
}

export function sortLogTypes(types: Iterable<LogType>): LogType[] {
  const present = new Set(types);
  return LOG_TYPES.filter((type) => present.has(type));
}
