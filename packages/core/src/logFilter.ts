import { EventEmitter } from "node:events";
import type { LogEntry, LogType } from "@runlog/contracts";
import { LOG_TYPES, parseLogType, parseLogTypes, sortLogTypes } from "./logTypes.js";

export type VisibilityListener = (visible: readonly LogEntry[]) => void;

export interface LogFilterOptions {
  activeTypes?: Iterable<LogType>;
  query?: string;
}

/** Case-insensitive substring test shared by every store and the filter engine. */
export function messageMatches(message: string, query: string): boolean {
  if (!query) return true;
  return message.toLowerCase().includes(query.toLowerCase());
}

export function matchesLogFilter(entry: LogEntry, activeTypes: ReadonlySet<LogType>, query: string): boolean {
  return activeTypes.has(entry.logType) && messageMatches(entry.message, query);
}

/** Stable: the result keeps the relative order of `entries`. */
export function filterLogEntries(
  entries: readonly LogEntry[],
  activeTypes: ReadonlySet<LogType>,
  query: string,
): LogEntry[] {
  return entries.filter((entry) => matchesLogFilter(entry, activeTypes, query));
}

function sameTypes(a: ReadonlySet<LogType>, b: ReadonlySet<LogType>): boolean {
  if (a.size !== b.size) return false;
  for (const type of a) {
    if (!b.has(type)) return false;
  }
  return true;
}

/**
 * Type filter and message search over an immutable log sequence.
 *
 * Both predicates apply together. An empty type set hides everything. Inputs
 * arriving as `unknown` are checked against the four log types; a bad value
 * throws `InvalidArgumentError` before any state changes.
 */
export class LogFilterEngine extends EventEmitter {
  private readonly entries: readonly LogEntry[];
  private types: Set<LogType>;
  private query: string;
  private visible: LogEntry[] | null = null;

  constructor(entries: readonly LogEntry[], options: LogFilterOptions = {}) {
    super();
    this.entries = entries;
    this.types = new Set(options.activeTypes ?? LOG_TYPES);
    this.query = options.query ?? "";
  }

  allEntries(): readonly LogEntry[] {
    return this.entries;
  }

  visibleEntries(): readonly LogEntry[] {
    if (this.visible === null) {
      this.visible = filterLogEntries(this.entries, this.types, this.query);
    }
    return this.visible;
  }

  activeTypes(): LogType[] {
    return sortLogTypes(this.types);
  }

  isTypeActive(type: LogType): boolean {
    return this.types.has(type);
  }

  currentQuery(): string {
    return this.query;
  }

  setActiveTypes(types: Iterable<unknown>): void {
    const next = parseLogTypes(types);
    if (sameTypes(next, this.types)) return;
    this.types = next;
    this.changed();
  }

  toggleType(type: unknown): void {
    const parsed = parseLogType(type);
    const next = new Set(this.types);
    if (next.has(parsed)) next.delete(parsed);
    else next.add(parsed);
    this.types = next;
    this.changed();
  }

  setAllTypes(active: boolean): void {
    this.setActiveTypes(active ? LOG_TYPES : []);
  }

  /** All four active turns everything off; anything less turns everything on. */
  toggleAll(): void {
    this.setAllTypes(this.types.size !== LOG_TYPES.length);
  }

  setQuery(query: string): void {
    if (query === this.query) return;
    this.query = query;
    this.changed();
  }

  onVisibilityChange(listener: VisibilityListener): () => void {
    this.on("visibility", listener);
    return () => {
      this.off("visibility", listener);
    };
  }

  private changed(): void {
    this.visible = null;
    if (this.listenerCount("visibility") === 0) return;
    this.emit("visibility", this.visibleEntries());
  }
}
