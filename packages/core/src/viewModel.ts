import type { AgentRun, LogEntry, LogType, ToolCall } from "@runlog/contracts";
import { durationText } from "./detail.js";

export const SELECTED_MARKER = " ◄──";

export interface LogRow {
  time: string;
  type: LogType;
  message: string;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatClock(ms: number): string {
  const date = new Date(ms);
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** Keeps the first line only; longer lines end in "...". */
export function truncateText(text: string, maxLength: number): string {
  const firstLine = text.split("\n", 1)[0] ?? "";
  if (firstLine.length <= maxLength) return firstLine;
  return `${firstLine.slice(0, Math.max(0, maxLength - 3))}...`;
}

export function runDurationMs(run: AgentRun): number | null {
  if (run.endTimeMs === null) return null;
  return run.endTimeMs - run.startTimeMs;
}

export function formatRunDuration(run: AgentRun): string {
  const durationMs = runDurationMs(run);
  if (durationMs === null) return "00:00";
  const totalSeconds = Math.floor(durationMs / 1000);
  return `${pad2(Math.floor(totalSeconds / 60))}:${pad2(totalSeconds % 60)}`;
}

export function runHeader(run: AgentRun): string {
  return `Run #${run.runNumber} │ Duration: ${formatRunDuration(run)} │ Status: ${run.status}`;
}

export function progressPercent(total: number, completed: number): number {
  if (total <= 0) return 0;
  return Math.floor((completed / total) * 100);
}

export function progressBar(total: number, completed: number, width = 20): string {
  const filled = total > 0 ? Math.floor((completed / total) * width) : 0;
  const bar = filled < width ? `${"=".repeat(filled)}>` : "=".repeat(width);
  return `[${bar.padEnd(width)}] ${completed}/${total} ${progressPercent(total, completed)}%`;
}

function outcomeSummary(call: ToolCall): string | null {
  if (call.status === "success") return call.resultSummary;
  if (call.status === "failed") return call.errorSummary;
  return null;
}

export interface ToolCallLineOptions {
  summaryChars?: number;
  resultChars?: number;
}

export function toolCallListLines(call: ToolCall, selected: boolean, options: ToolCallLineOptions = {}): string[] {
  const lines = [
    `${call.sequenceNumber}. ${call.toolName}${selected ? SELECTED_MARKER : ""}`,
    `   ${formatClock(call.timestampMs)} │ ${durationText(call)}`,
    `   ${truncateText(call.summary, options.summaryChars ?? 50)}`,
  ];
  const outcome = outcomeSummary(call);
  if (outcome) {
    lines.push(`   ${truncateText(outcome, options.resultChars ?? 30)}`);
  }
  return lines;
}

export function logRow(entry: LogEntry, maxMessageChars = 80): LogRow {
  return {
    time: formatClock(entry.timestampMs),
    type: entry.logType,
    message: truncateText(entry.message, maxMessageChars),
  };
}
