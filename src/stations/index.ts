/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Station subsystem exports for StationBase.
 */
export * from "./consolidate.js";
export * from "./dedupe.js";
export * from "./ledger.js";
export * from "./manifest.js";
export * from "./pipeline.js";
export * from "./search.js";
export * from "./staging.js";
export * from "./store.js";
export * from "./runtime.js";
