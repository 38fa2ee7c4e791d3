import { UNKNOWN_LANGUAGE } from "./constants";
import { ReportPipelineError } from "./errors";
import { extractLabMentions, extractPatientInfo, extractReportDate, extractVitalSigns } from "./fieldExtraction";
import { logger } from "./lib/logger";
import { resolveLabMention } from "./rangeClassification";
import { assemblePatientRecord } from "./recordAssembly";
import { DEFAULT_REFERENCE_TABLES } from "./referenceCatalog";
import { normalizeReportText } from "./textNormalizer";
import type { LanguageDetector, PatientRecord, RawDocument, ReferenceTables, ReportTextSource } from "./types";

export interface AnalyzeReportOptions {
  language?: string | null;
  languageDetector?: LanguageDetector;
  tables?: ReferenceTables;
}

const assertDocument: (document: unknown) => asserts document is RawDocument = (document) => {
  if (!document || typeof document !== "object") {
    throw new ReportPipelineError("INVALID_ARGUMENT", "A report document object is required.");
  }
  if (!("text" in document) || typeof document.text !== "string") {
    throw new ReportPipelineError("INVALID_ARGUMENT", "Report text must be a string.");
  }
  if (!("fileName" in document) || typeof document.fileName !== "string") {
    throw new ReportPipelineError("INVALID_ARGUMENT", "Report file name must be a string.");
  }
};

const detectLanguage = (text: string, options: AnalyzeReportOptions): string => {
  if (options.language) {
    return options.language;
  }
  if (!options.languageDetector || !text) {
    return UNKNOWN_LANGUAGE;
  }
  try {
    return options.languageDetector.detect(text) || UNKNOWN_LANGUAGE;
  } catch (error) {
    logger.warn("Language detection failed; tagging record as unknown.", error);
    return UNKNOWN_LANGUAGE;
  }
};

export const analyzeReport = (document: RawDocument, options: AnalyzeReportOptions = {}): PatientRecord => {
  assertDocument(document);
  const tables = options.tables ?? DEFAULT_REFERENCE_TABLES;

  const normalizedText = normalizeReportText(document.text, tables);
  const patient = extractPatientInfo(normalizedText);
  const vitalSigns = extractVitalSigns(normalizedText);
  const mentions = extractLabMentions(normalizedText, tables);
  const labs = mentions.map((mention) => resolveLabMention(mention, tables));

  logger.debug(
    `Analyzed ${document.fileName}: ${mentions.length} lab mentions, ${
      labs.filter((lab) => lab.status === "Unknown").length
    } unresolved, ${Object.keys(vitalSigns).length} vital signs.`
  );

  return assemblePatientRecord({
    fileName: document.fileName,
    normalizedText,
    patient,
    vitalSigns,
    labs,
    language: detectLanguage(normalizedText, options),
    reportDate: extractReportDate(normalizedText)
  });
};

export const analyzeReports = (
  documents: readonly RawDocument[],
  options: AnalyzeReportOptions = {}
): PatientRecord[] => documents.map((document) => analyzeReport(document, options));

export const analyzeReportFromSource = async (
  source: ReportTextSource,
  fileName: string,
  options: AnalyzeReportOptions = {}
): Promise<PatientRecord> => {
  const document = await source.readText(fileName);
  return analyzeReport(document, options);
};
