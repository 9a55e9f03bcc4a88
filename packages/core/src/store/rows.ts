import type { AgentRun, LogEntry, RunStatistics, ToolCall, ToolCallBase } from "@runlog/contracts";
import { InvalidArgumentError } from "../errors.js";
import { isRunStatus, isToolCallStatus, parseLogType } from "../logTypes.js";
import { asNullableString, asString, parseEpochMs, toFiniteNumber } from "../utils.js";

function requireString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value !== "string") {
    throw new InvalidArgumentError(`row is missing text column "${key}"`);
  }
  return value;
}

function requireTimestamp(row: Record<string, unknown>, key: string): number {
  const parsed = parseEpochMs(row[key]);
  if (parsed === null) {
    throw new InvalidArgumentError(`row has an unreadable timestamp in "${key}": ${asString(row[key])}`);
  }
  return parsed;
}

function optionalTimestamp(row: Record<string, unknown>, key: string): number | null {
  if (row[key] === null || row[key] === undefined || row[key] === "") return null;
  return requireTimestamp(row, key);
}

function nonNegativeOrNull(value: unknown): number | null {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return null;
  return numeric;
}

export function decodeAgentRun(row: Record<string, unknown>): AgentRun {
  const status = row.status;
  if (!isRunStatus(status)) {
    throw new InvalidArgumentError(`unknown run status: ${asString(status)}`);
  }
  const startTimeMs = requireTimestamp(row, "start_time");
  const endTimeMs = optionalTimestamp(row, "end_time");
  if (endTimeMs !== null && endTimeMs < startTimeMs) {
    throw new InvalidArgumentError(`run ${asString(row.id)} ends before it starts`);
  }
  return {
    id: requireString(row, "id"),
    runNumber: Math.round(toFiniteNumber(row.run_number) ?? 0),
    startTimeMs,
    endTimeMs,
    status,
  };
}

export function decodeToolCall(row: Record<string, unknown>): ToolCall {
  const status = row.status;
  if (!isToolCallStatus(status)) {
    throw new InvalidArgumentError(`unknown tool call status: ${asString(status)}`);
  }
  const size = nonNegativeOrNull(row.size);
  const base: ToolCallBase = {
    id: requireString(row, "id"),
    runId: requireString(row, "run_id"),
    sequenceNumber: Math.round(toFiniteNumber(row.sequence_number) ?? 0),
    toolName: requireString(row, "tool_name"),
    timestampMs: requireTimestamp(row, "timestamp"),
    request: requireString(row, "request"),
    size: size === null ? null : Math.round(size),
    summary: asString(row.summary),
  };
  const durationSeconds = nonNegativeOrNull(row.duration);
  const response = asNullableString(row.response);
  const resultSummary = asNullableString(row.result_summary);

  switch (status) {
    case "queued":
      return { ...base, status };
    case "running":
      return { ...base, status };
    case "success":
      return { ...base, status, durationSeconds, response, resultSummary };
    case "failed":
      return { ...base, status, durationSeconds, response, errorSummary: resultSummary };
  }
}

export function decodeLogEntry(row: Record<string, unknown>): LogEntry {
  return {
    id: requireString(row, "id"),
    runId: requireString(row, "run_id"),
    timestampMs: requireTimestamp(row, "timestamp"),
    logType: parseLogType(row.log_type),
    message: asString(row.message),
    metadata: asNullableString(row.metadata),
  };
}

export function countToolCalls(toolCalls: readonly ToolCall[]): RunStatistics {
  const stats: RunStatistics = { total: toolCalls.length, succeeded: 0, running: 0, failed: 0 };
  for (const call of toolCalls) {
    if (call.status === "success") stats.succeeded += 1;
    else if (call.status === "running") stats.running += 1;
    else if (call.status === "failed") stats.failed += 1;
  }
  return stats;
}
