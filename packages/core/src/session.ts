import type { AgentRun, LogEntry, LogType, RunStatistics, ToolCall, ToolCallDetail } from "@runlog/contracts";
import { projectToolCallDetail } from "./detail.js";
import { NotFoundError } from "./errors.js";
import { LogFilterEngine, type VisibilityListener } from "./logFilter.js";
import { SelectionController, type SelectionListener } from "./selection.js";
import type { RecordStore } from "./store/types.js";

export const LATEST_KEYWORD = "latest";

export interface RunSessionOptions {
  activeTypes?: Iterable<LogType>;
  query?: string;
}

export type DetailListener = (detail: ToolCallDetail) => void;

export function isLatestToken(input: string): boolean {
  return input.trim().toLowerCase() === LATEST_KEYWORD;
}

export async function resolveRun(store: RecordStore, runRef: string): Promise<AgentRun> {
  if (!isLatestToken(runRef)) {
    return store.getRun(runRef.trim());
  }
  const latest = await store.getLatestRun();
  if (!latest) {
    throw new NotFoundError('no agent runs found (cannot resolve "latest")');
  }
  return latest;
}

/**
 * Everything one run's display needs: the loaded records plus the selection
 * and filter state built over them. Records are fetched once, in full, before
 * either controller exists.
 */
export class RunSession {
  readonly selection: SelectionController<ToolCall>;
  readonly logFilter: LogFilterEngine;
  private detail: ToolCallDetail | null;

  private constructor(
    readonly run: AgentRun,
    readonly toolCalls: readonly ToolCall[],
    readonly logs: readonly LogEntry[],
    readonly statistics: RunStatistics,
    options: RunSessionOptions,
  ) {
    this.selection = new SelectionController(toolCalls);
    this.logFilter = new LogFilterEngine(logs, options);
    const first = this.selection.currentItem();
    this.detail = first ? projectToolCallDetail(first) : null;
    this.selection.onChange(({ item }) => {
      this.detail = projectToolCallDetail(item);
    });
  }

  static async open(store: RecordStore, runRef: string, options: RunSessionOptions = {}): Promise<RunSession> {
    const run = await resolveRun(store, runRef);
    const [toolCalls, logs, statistics] = await Promise.all([
      store.loadToolCalls(run.id),
      store.loadLogs(run.id),
      store.getRunStatistics(run.id),
    ]);
    return new RunSession(run, toolCalls, logs, statistics, options);
  }

  currentSelection(): number {
    return this.selection.current();
  }

  selectedToolCall(): ToolCall | null {
    return this.selection.currentItem();
  }

  currentDetail(): ToolCallDetail | null {
    return this.detail;
  }

  visibleEntries(): readonly LogEntry[] {
    return this.logFilter.visibleEntries();
  }

  activeTypes(): LogType[] {
    return this.logFilter.activeTypes();
  }

  currentQuery(): string {
    return this.logFilter.currentQuery();
  }

  onSelectionChange(listener: SelectionListener<ToolCall>): () => void {
    return this.selection.onChange(listener);
  }

  onVisibilityChange(listener: VisibilityListener): () => void {
    return this.logFilter.onVisibilityChange(listener);
  }

  onDetailChange(listener: DetailListener): () => void {
    return this.selection.onChange(() => {
      if (this.detail) listener(this.detail);
    });
  }
}
