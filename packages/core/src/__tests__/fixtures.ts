import type { AgentRun, LogEntry, LogType, ToolCall, ToolCallBase } from "@runlog/contracts";

export const RUN_ID = "run-0001";

export function localMs(isoWithoutZone: string): number {
  return Date.parse(isoWithoutZone);
}

export function makeRun(overrides: Partial<AgentRun> = {}): AgentRun {
  return {
    id: RUN_ID,
    runNumber: 47,
    startTimeMs: localMs("2024-12-26T12:00:00"),
    endTimeMs: localMs("2024-12-26T12:02:34"),
    status: "completed",
    ...overrides,
  };
}

function base(sequenceNumber: number, overrides: Partial<ToolCallBase>): ToolCallBase {
  return {
    id: `tc-${sequenceNumber}`,
    runId: RUN_ID,
    sequenceNumber,
    toolName: "web_search",
    timestampMs: localMs(`2024-12-26T12:34:0${sequenceNumber % 10}`),
    request: '{"query":"tide tables"}',
    size: null,
    summary: `call ${sequenceNumber}`,
    ...overrides,
  };
}

export function succeeded(
  sequenceNumber: number,
  overrides: Partial<ToolCallBase> & { durationSeconds?: number | null; response?: string | null; resultSummary?: string | null } = {},
): ToolCall {
  const { durationSeconds = 0.25, response = '{"ok":true}', resultSummary = "→ done", ...rest } = overrides;
  return { ...base(sequenceNumber, rest), status: "success", durationSeconds, response, resultSummary };
}

export function failed(
  sequenceNumber: number,
  overrides: Partial<ToolCallBase> & { durationSeconds?: number | null; response?: string | null; errorSummary?: string | null } = {},
): ToolCall {
  const { durationSeconds = 1.5, response = null, errorSummary = "→ timeout", ...rest } = overrides;
  return { ...base(sequenceNumber, rest), status: "failed", durationSeconds, response, errorSummary };
}

export function running(sequenceNumber: number, overrides: Partial<ToolCallBase> = {}): ToolCall {
  return { ...base(sequenceNumber, overrides), status: "running" };
}

export function queued(sequenceNumber: number, overrides: Partial<ToolCallBase> = {}): ToolCall {
  return { ...base(sequenceNumber, overrides), status: "queued" };
}

export function makeLog(index: number, logType: LogType, message: string, overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    id: `log-${index}`,
    runId: RUN_ID,
    timestampMs: localMs("2024-12-26T12:00:00") + index * 1000,
    logType,
    message,
    metadata: null,
    ...overrides,
  };
}
