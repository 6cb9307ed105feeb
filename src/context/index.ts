export { feed } from "./aggregator.js";
export type {
  AdmittedFile,
  FeedOptions,
  FeedResult,
  SkipReason,
  SkipRecord,
} from "./aggregator.js";
export { isTextFile, isTextSample, SAMPLE_SIZE } from "./classifier.js";
export { Limiter } from "./limiter.js";
export type { AdmitDecision, LimitReason, Limits, RunningTotals } from "./limiter.js";
export { walkDirectory } from "./traversal.js";
export type { Entry, EntryKind, Walker, WalkOptions } from "./traversal.js";
export { TreeRenderer, NON_TEXT_ANNOTATION } from "./tree.js";
export type { FileOutcome } from "./tree.js";
