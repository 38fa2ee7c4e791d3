import { ReportPipelineError } from "../errors";

export const mapPipelineErrorToMessage = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return "The report could not be processed.";
  }
  if (!(error instanceof ReportPipelineError)) {
    return error.message || "The report could not be processed.";
  }

  if (error.code === "INVALID_ARGUMENT") {
    return `The report input is invalid: ${error.message}`;
  }
  if (error.code === "INVALID_REFERENCE_TABLES") {
    return "The reference tables are malformed. Check the configured JSON file.";
  }
  if (error.code === "REFERENCE_TABLES_UNREADABLE") {
    return "The reference tables file could not be read. Check the configured path.";
  }
  if (error.code === "NARRATIVE_EMPTY") {
    return "The summary service returned no text. The structured results are still available.";
  }
  return "The summary could not be generated. The structured results are still available.";
};
