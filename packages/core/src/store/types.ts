import type { AgentRun, LogEntry, LogQueryOptions, RunStatistics, ToolCall } from "@runlog/contracts";

/**
 * Read-only access to recorded runs. Implementations never mutate records.
 *
 * `getRun` rejects with `NotFoundError` for an unknown id; the bulk loaders
 * return empty sequences instead.
 */
export interface RecordStore {
  listRuns(): Promise<AgentRun[]>;
  getRun(runId: string): Promise<AgentRun>;
  getLatestRun(): Promise<AgentRun | null>;
  /** Ascending by sequence number. */
  loadToolCalls(runId: string): Promise<ToolCall[]>;
  /**
   * Ascending by timestamp. `types` and `query` pre-filter in the store; the
   * query lower-cases both sides the way `LogFilterEngine` does, beyond ASCII too.
   */
  loadLogs(runId: string, options?: LogQueryOptions): Promise<LogEntry[]>;
  getRunStatistics(runId: string): Promise<RunStatistics>;
}
