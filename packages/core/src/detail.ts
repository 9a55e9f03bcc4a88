import { parse, stringify } from "lossless-json";
import type { ContentBlock, DetailBadge, ToolCall, ToolCallDetail } from "@runlog/contracts";

export const NO_RESPONSE_PLACEHOLDER = "No response yet";

export function capitalize(value: string): string {
  return value ? `${value.charAt(0).toUpperCase()}${value.slice(1)}` : value;
}

export function formatDurationSeconds(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  return `${(bytes / 1024).toFixed(1)}KB`;
}

export function durationText(call: ToolCall): string {
  switch (call.status) {
    case "queued":
      return "Queued";
    case "running":
      return "Running...";
    case "success":
    case "failed":
      return call.durationSeconds === null ? "n/a" : formatDurationSeconds(call.durationSeconds);
  }
}

/**
 * JSON payloads are re-indented; anything else passes through untouched.
 * Numbers keep their stored digits, so `1.0` and integers past 2^53 print as written.
 */
export function formatPayload(payload: string): ContentBlock {
  let text: string | undefined;
  try {
    text = stringify(parse(payload), null, 2);
  } catch {
    return { format: "text", text: payload };
  }
  return text === undefined ? { format: "text", text: payload } : { format: "json", text };
}

function responseBlock(call: ToolCall): ContentBlock {
  if (call.status === "queued" || call.status === "running" || !call.response) {
    return { format: "placeholder", text: NO_RESPONSE_PLACEHOLDER };
  }
  return formatPayload(call.response);
}

export function projectToolCallDetail(call: ToolCall): ToolCallDetail {
  const status: DetailBadge = { kind: call.status, text: capitalize(call.status) };
  const duration: DetailBadge = { kind: "duration", text: durationText(call) };
  const size: DetailBadge | null = call.size === null ? null : { kind: "size", text: formatSize(call.size) };
  return {
    header: `Selected Tool: #${call.sequenceNumber} ${call.toolName}`,
    status,
    duration,
    size,
    request: formatPayload(call.request),
    response: responseBlock(call),
  };
}
