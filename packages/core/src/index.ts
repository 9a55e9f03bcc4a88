export * from "./config.js";
export * from "./defaults.js";
export * from "./detail.js";
export * from "./errors.js";
export * from "./logFilter.js";
export * from "./logTypes.js";
export * from "./selection.js";
export * from "./session.js";
export * from "./snapshot.js";
export * from "./utils.js";
export * from "./viewModel.js";
export * from "./store/memoryStore.js";
export * from "./store/rows.js";
export * from "./store/sqliteStore.js";
export type * from "./store/types.js";
