import path from "node:path";
import os from "node:os";
import type { AppConfig } from "@runlog/contracts";

export const DEFAULT_HOME_DIR = path.join(os.homedir(), ".runlog");
export const DEFAULT_DATABASE_PATH = "~/.runlog/runlog.db";

export const DEFAULT_CONFIG: AppConfig = {
  store: {
    databasePath: DEFAULT_DATABASE_PATH,
  },
  sqlite: {
    binary: "sqlite3",
    timeoutMs: 5_000,
    maxBufferBytes: 16 * 1024 * 1024,
  },
  logs: {
    defaultTypes: ["INFO", "TOOL", "ERROR", "DEBUG"],
    messagePreviewChars: 80,
  },
  toolCalls: {
    summaryPreviewChars: 50,
    resultPreviewChars: 30,
  },
};
