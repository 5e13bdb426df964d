/**
 * Batch rename engine: name generation, preview, conflict validation, apply.
 */

export type { ApplyOptions, ApplyOutcome, ApplyProgress, ApplyResult, ApplySummary } from "./apply.js";
export { applyPlan, assertRunnable, classifyError, findStagedItems, runApply, sortResults, summarizeResults } from "./apply.js";
export type { BatchOptions, FileEntry, IndexBy, ListOptions } from "./batch.js";
export { createBatch, IMAGE_EXTENSIONS, listFiles } from "./batch.js";
export type { ApplyErrorKind, RenameErrorKind, ValidationErrorKind } from "./errors.js";
export { InvalidSchemeError, PlanRejectedError, RenameError } from "./errors.js";
export { changeCase, formatNumber, generateName, splitExtension, titleCase } from "./name-generator.js";
export type { SchemePreset } from "./presets.js";
export { BUILT_IN_PRESETS, findPreset, parseSchemeInput, readSchemeFile } from "./presets.js";
export type { PreviewPair } from "./preview.js";
export { DEFAULT_PREVIEW_COUNT, samplePreview } from "./preview.js";
export type { CaseOption, NumberingOptions, NumberPosition, SchemeInput, SchemeParams } from "./scheme.js";
export { CASE_OPTIONS, createScheme, DEFAULT_NUMBERING, mergeSchemeInput, validateScheme } from "./scheme.js";
export type {
  CheckOptions,
  ConflictReport,
  DuplicateConflict,
  ExistingFileConflict,
  FilenamePlatform,
  InvalidNameConflict,
  RenamePlan,
  RenamePlanItem,
  ValidatedPlan,
} from "./validator.js";
export {
  buildPlan,
  checkConflicts,
  countConflicts,
  invalidNameReason,
  isReportEmpty,
  MAX_NAME_BYTES,
  validatePlan,
} from "./validator.js";
