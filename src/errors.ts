export type ReportPipelineErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_REFERENCE_TABLES"
  | "REFERENCE_TABLES_UNREADABLE"
  | "NARRATIVE_FAILED"
  | "NARRATIVE_EMPTY";

export class ReportPipelineError extends Error {
  code: ReportPipelineErrorCode;

  constructor(code: ReportPipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReportPipelineError";
    this.code = code;
  }
}

export const isReportPipelineError = (error: unknown): error is ReportPipelineError =>
  error instanceof ReportPipelineError;
