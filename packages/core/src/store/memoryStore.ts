import type { AgentRun, LogEntry, LogQueryOptions, RunStatistics, ToolCall } from "@runlog/contracts";
import { NotFoundError } from "../errors.js";
import { messageMatches } from "../logFilter.js";
import { countToolCalls } from "./rows.js";
import type { RecordStore } from "./types.js";

export interface MemoryRecordStoreInput {
  runs?: AgentRun[];
  toolCalls?: ToolCall[];
  logs?: LogEntry[];
}

/** In-process store over plain arrays, ordered the same way the SQLite store orders rows. */
export class MemoryRecordStore implements RecordStore {
  private readonly runs: AgentRun[];
  private readonly toolCalls: ToolCall[];
  private readonly logs: LogEntry[];

  constructor(input: MemoryRecordStoreInput = {}) {
    this.runs = [...(input.runs ?? [])];
    this.toolCalls = [...(input.toolCalls ?? [])];
    this.logs = [...(input.logs ?? [])];
  }

  async listRuns(): Promise<AgentRun[]> {
    return [...this.runs].sort((a, b) => b.runNumber - a.runNumber);
  }

  async getRun(runId: string): Promise<AgentRun> {
    const run = this.runs.find((candidate) => candidate.id === runId);
    if (!run) {
      throw new NotFoundError(`run not found: ${runId}`);
    }
    return run;
  }

  async getLatestRun(): Promise<AgentRun | null> {
    const [latest] = await this.listRuns();
    return latest ?? null;
  }

  async loadToolCalls(runId: string): Promise<ToolCall[]> {
    return this.toolCalls
      .filter((call) => call.runId === runId)
      .sort((a, b) => a.sequenceNumber - b.sequenceNumber);
  }

  async loadLogs(runId: string, options: LogQueryOptions = {}): Promise<LogEntry[]> {
    const types = options.types && options.types.length > 0 ? new Set(options.types) : null;
    const query = options.query ?? "";
    return this.logs
      .filter((entry) => entry.runId === runId)
      .filter((entry) => !types || types.has(entry.logType))
      .filter((entry) => messageMatches(entry.message, query))
      .sort((a, b) => a.timestampMs - b.timestampMs);
  }

  async getRunStatistics(runId: string): Promise<RunStatistics> {
    return countToolCalls(await this.loadToolCalls(runId));
  }
}
