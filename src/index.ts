export * from "./config/index.js";
export { dumpTarget, runDump } from "./dump/dumper.js";
export type { DumpOptions, DumpResult, DumpSettings } from "./dump/dumper.js";
export { ConfigurationError, OutputWriteError } from "./errors.js";
export * from "./exclusion/index.js";
export * from "./ingest/index.js";
export * from "./output/index.js";
export * from "./structure/index.js";
