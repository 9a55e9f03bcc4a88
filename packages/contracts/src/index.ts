export type ToolCallStatus = "queued" | "running" | "success" | "failed";
export type LogType = "INFO" | "TOOL" | "ERROR" | "DEBUG";
export type RunStatus = "running" | "completed" | "failed";

export interface ToolCallBase {
  id: string;
  runId: string;
  sequenceNumber: number;
  toolName: string;
  timestampMs: number;
  request: string;
  size: number | null;
  summary: string;
}

export interface QueuedToolCall extends ToolCallBase {
  status: "queued";
}

export interface RunningToolCall extends ToolCallBase {
  status: "running";
}

export interface SucceededToolCall extends ToolCallBase {
  status: "success";
  durationSeconds: number | null;
  response: string | null;
  resultSummary: string | null;
}

export interface FailedToolCall extends ToolCallBase {
  status: "failed";
  durationSeconds: number | null;
  response: string | null;
  errorSummary: string | null;
}

export type CompletedToolCall = SucceededToolCall | FailedToolCall;
export type ToolCall = QueuedToolCall | RunningToolCall | CompletedToolCall;

export interface LogEntry {
  id: string;
  runId: string;
  timestampMs: number;
  logType: LogType;
  message: string;
  metadata: string | null;
}

export interface AgentRun {
  id: string;
  runNumber: number;
  startTimeMs: number;
  endTimeMs: number | null;
  status: RunStatus;
}

export interface RunStatistics {
  total: number;
  succeeded: number;
  running: number;
  failed: number;
}

export interface LogQueryOptions {
  types?: LogType[];
  query?: string;
}

export type BadgeKind = ToolCallStatus | "duration" | "size";

export interface DetailBadge {
  kind: BadgeKind;
  text: string;
}

export type ContentBlock =
  | { format: "json"; text: string }
  | { format: "text"; text: string }
  | { format: "placeholder"; text: string };

export interface ToolCallDetail {
  header: string;
  status: DetailBadge;
  duration: DetailBadge;
  size: DetailBadge | null;
  request: ContentBlock;
  response: ContentBlock;
}

export interface SelectionChange<T> {
  index: number;
  item: T;
}

export interface StoreConfig {
  databasePath: string;
}

export interface SqliteConfig {
  binary: string;
  timeoutMs: number;
  maxBufferBytes: number;
}

export interface LogsConfig {
  defaultTypes: LogType[];
  messagePreviewChars: number;
}

export interface ToolCallsConfig {
  summaryPreviewChars: number;
  resultPreviewChars: number;
}

export interface AppConfig {
  store: StoreConfig;
  sqlite: SqliteConfig;
  logs: LogsConfig;
  toolCalls: ToolCallsConfig;
}
