import type { AppConfig } from "@runlog/contracts";
import { loadConfig, resolveDatabasePath } from "./config.js";
import { RunSession } from "./session.js";
import { SqliteRecordStore } from "./store/sqliteStore.js";

export interface OpenStoreOptions {
  databasePath?: string;
}

export function openStore(config: AppConfig, options: OpenStoreOptions = {}): SqliteRecordStore {
  return new SqliteRecordStore({
    databasePath: resolveDatabasePath(config, options.databasePath),
    sqlite: config.sqlite,
  });
}

export async function loadSession(
  configPath: string | undefined,
  runRef: string,
  options: OpenStoreOptions = {},
): Promise<RunSession> {
  const config = await loadConfig(configPath);
  const store = openStore(config, options);
  return RunSession.open(store, runRef, { activeTypes: config.logs.defaultTypes });
}
