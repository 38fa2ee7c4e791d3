export * from "./types";
export * from "./constants";
export { ReportPipelineError, isReportPipelineError } from "./errors";
export type { ReportPipelineErrorCode } from "./errors";
export { logger, setLogLevel, getLogLevel } from "./lib/logger";
export type { LogLevel } from "./lib/logger";
export { mapPipelineErrorToMessage } from "./lib/errorMessages";
export { loadPipelineConfig, readReferenceTablesFile } from "./config";
export type { PipelineConfig } from "./config";
export {
  DEFAULT_REFERENCE_TABLES,
  parseReferenceTables,
  findReferenceEntry,
  getCanonicalKeys,
  normalizeLookupKey
} from "./referenceCatalog";
export { normalizeReportText } from "./textNormalizer";
export { extractPatientInfo, extractVitalSigns, extractLabMentions, extractReportDate } from "./fieldExtraction";
export { resolveCanonicalTest } from "./labNormalization";
export { classifyLabValue, deriveHighlight, formatReferenceRange, resolveLabMention } from "./rangeClassification";
export {
  assemblePatientRecord,
  renderLabsAsText,
  renderLabHighlights,
  serializePatientRecord,
  createEditableCopy
} from "./recordAssembly";
export type { AssembleRecordInput } from "./recordAssembly";
export { buildSummaryPrompt, generateNarrativeSummary } from "./narrative";
export { analyzeReport, analyzeReports, analyzeReportFromSource } from "./reportPipeline";
export type { AnalyzeReportOptions } from "./reportPipeline";
