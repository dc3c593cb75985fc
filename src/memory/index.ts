export { MemoryStore, openMemoryStore, type OpenMemoryStoreOptions } from "./store";
export { MemoryError, isMemoryError, type MemoryErrorCode } from "./errors";
export { extractLearnings } from "./passive";
export { classifyTool, suggestTopicKey } from "./topic";
export { DETAIL_LEVELS, formatObservation, parseDetailLevel } from "./detail-level";
export { formatStats, navigationHint } from "./stats";
export { EXPORT_VERSION, type ExportDocument } from "./transfer";
export type { CreateOutcome } from "./observations";
export type * from "./types";
