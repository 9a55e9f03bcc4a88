import { emitKeypressEvents } from "node:readline";
import type { AppConfig, ContentBlock, LogType, ToolCallDetail } from "@runlog/contracts";
import {
  LOG_TYPES,
  logRow,
  progressBar,
  runHeader,
  toolCallListLines,
  type RunSession,
} from "@runlog/core";

export type BrowsePane = "tool_calls" | "logs";

export interface BrowseState {
  pane: BrowsePane;
  searching: boolean;
  logOffset: number;
  quit: boolean;
}

export interface KeyInput {
  name?: string | undefined;
  sequence?: string | undefined;
  ctrl?: boolean | undefined;
}

export const INITIAL_BROWSE_STATE: BrowseState = {
  pane: "tool_calls",
  searching: false,
  logOffset: 0,
  quit: false,
};

const TYPE_KEYS: Record<string, LogType> = {
  "1": "INFO",
  "2": "TOOL",
  "3": "ERROR",
  "4": "DEBUG",
};

const LOG_PAGE_SIZE = 20;

function clampLogOffset(session: RunSession, offset: number): number {
  const maxOffset = Math.max(0, session.visibleEntries().length - 1);
  return Math.min(maxOffset, Math.max(0, offset));
}

function handleSearchKey(session: RunSession, state: BrowseState, key: KeyInput): BrowseState {
  if (key.name === "return" || key.name === "enter" || key.name === "escape") {
    return { ...state, searching: false };
  }
  const query = session.currentQuery();
  if (key.name === "backspace") {
    session.logFilter.setQuery(query.slice(0, -1));
    return { ...state, logOffset: 0 };
  }
  const text = key.sequence ?? "";
  if (!key.ctrl && text.length === 1 && text >= " ") {
    session.logFilter.setQuery(`${query}${text}`);
    return { ...state, logOffset: 0 };
  }
  return state;
}

function move(session: RunSession, state: BrowseState, delta: 1 | -1): BrowseState {
  if (state.pane === "tool_calls") {
    if (delta > 0) session.selection.selectNext();
    else session.selection.selectPrevious();
    return state;
  }
  return { ...state, logOffset: clampLogOffset(session, state.logOffset + delta) };
}

/**
 * Applies one keypress to the session and returns the next screen state.
 * Selection and filter changes go straight to the session's controllers.
 */
export function handleKey(session: RunSession, state: BrowseState, key: KeyInput): BrowseState {
  if (key.ctrl && key.name === "c") {
    return { ...state, quit: true };
  }
  if (state.searching) {
    return handleSearchKey(session, state, key);
  }

  const name = key.name ?? key.sequence ?? "";
  switch (name) {
    case "q":
      return { ...state, quit: true };
    case "tab":
      return { ...state, pane: state.pane === "tool_calls" ? "logs" : "tool_calls" };
    case "j":
    case "down":
      return move(session, state, 1);
    case "k":
    case "up":
      return move(session, state, -1);
    case "g":
    case "home":
      if (state.pane === "tool_calls") session.selection.selectFirst();
      return { ...state, logOffset: 0 };
    case "end":
      if (state.pane === "tool_calls") session.selection.selectLast();
      return { ...state, logOffset: clampLogOffset(session, Number.MAX_SAFE_INTEGER) };
    case "a":
      session.logFilter.toggleAll();
      return { ...state, logOffset: 0 };
    case "/":
      return { ...state, pane: "logs", searching: true, logOffset: 0 };
    default: {
      const type = TYPE_KEYS[name];
      if (!type) return state;
      session.logFilter.toggleType(type);
      return { ...state, logOffset: 0 };
    }
  }
}

function contentLines(title: string, block: ContentBlock): string[] {
  return [`${title}:`, ...block.text.split("\n").map((line) => `  ${line}`)];
}

export function detailLines(detail: ToolCallDetail): string[] {
  const badges = [detail.status.text, detail.duration.text, detail.size?.text].filter(
    (text): text is string => Boolean(text),
  );
  return [
    detail.header,
    badges.join(" │ "),
    "",
    ...contentLines("Request", detail.request),
    "",
    ...contentLines("Response", detail.response),
  ];
}

export function filterBarLine(session: RunSession): string {
  const active = new Set(session.activeTypes());
  const toggles = LOG_TYPES.map((type, index) => `${index + 1}:[${active.has(type) ? "x" : " "}] ${type}`);
  return `${toggles.join("  ")}  │ search: ${session.currentQuery() || "-"}`;
}

export function renderScreen(session: RunSession, state: BrowseState, config: AppConfig): string[] {
  const stats = session.statistics;
  const lines = [
    runHeader(session.run),
    `${progressBar(stats.total, stats.succeeded)}  running ${stats.running}  failed ${stats.failed}`,
    "",
  ];

  if (state.pane === "tool_calls") {
    lines.push(`Tool Call Timeline (${session.toolCalls.length} calls)`);
    session.toolCalls.forEach((call, index) => {
      lines.push(
        ...toolCallListLines(call, index === session.currentSelection(), {
          summaryChars: config.toolCalls.summaryPreviewChars,
          resultChars: config.toolCalls.resultPreviewChars,
        }),
      );
    });
    const detail = session.currentDetail();
    if (detail) {
      lines.push("", ...detailLines(detail));
    }
  } else {
    const visible = session.visibleEntries();
    lines.push(filterBarLine(session), `Logs (${visible.length} of ${session.logs.length})`);
    for (const entry of visible.slice(state.logOffset, state.logOffset + LOG_PAGE_SIZE)) {
      const row = logRow(entry, config.logs.messagePreviewChars);
      lines.push(`${row.time}  ${row.type.padEnd(5)}  ${row.message}`);
    }
  }

  lines.push("", state.searching ? "search> (enter to finish)" : "j/k move  tab switch  1-4 types  a all  / search  q quit");
  return lines;
}

export interface BrowseInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
}

export interface BrowseIo {
  input: BrowseInput;
  output: { write(chunk: string): unknown };
}

/**
 * Runs the keyboard loop until `q`, ctrl+c or the end of input. The terminal's
 * raw mode is restored on every exit path, including a failed redraw.
 */
export async function runBrowse(
  session: RunSession,
  config: AppConfig,
  io: BrowseIo = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const { input, output } = io;
  let state = INITIAL_BROWSE_STATE;

  const draw = (): void => {
    output.write(`\x1b[2J\x1b[H${renderScreen(session, state, config).join("\n")}\n`);
  };

  emitKeypressEvents(input);
  const wasRaw = input.isRaw ?? false;
  if (input.isTTY) input.setRawMode?.(true);
  input.resume();

  try {
    await new Promise<void>((resolve, reject) => {
      const detach = (): void => {
        input.off("keypress", onKeypress);
        input.off("end", onEnd);
      };
      const onEnd = (): void => {
        detach();
        resolve();
      };
      const onKeypress = (_text: string | undefined, key: KeyInput | undefined): void => {
        try {
          state = handleKey(session, state, key ?? {});
          if (state.quit) {
            onEnd();
            return;
          }
          draw();
        } catch (error) {
          detach();
          reject(error);
        }
      };
      input.on("keypress", onKeypress);
      input.once("end", onEnd);
      try {
        draw();
      } catch (error) {
        detach();
        reject(error);
      }
    });
  } finally {
    if (input.isTTY) input.setRawMode?.(wasRaw);
    input.pause();
  }
}
