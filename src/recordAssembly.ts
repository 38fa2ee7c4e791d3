import { NO_LABS_DETECTED, UNKNOWN_LANGUAGE } from "./constants";
import type {
  EditablePatientRecord,
  LabHighlight,
  PatientInfo,
  PatientRecord,
  PatientRecordDocument,
  ResolvedLabResult,
  VitalSigns
} from "./types";
import { baseFileName, formatNumber } from "./utils";

export interface AssembleRecordInput {
  fileName: string;
  normalizedText: string;
  patient: PatientInfo;
  vitalSigns: VitalSigns;
  labs: readonly ResolvedLabResult[];
  language?: string | null;
  reportDate?: string | null;
}

type LabLine = Pick<ResolvedLabResult, "testName" | "value" | "unit" | "normalRange" | "status">;

const HIGHLIGHT_TAGS: Record<LabHighlight, string> = {
  warning: "[!]",
  normal: "[OK]",
  unknown: "[?]"
};

export const assemblePatientRecord = (input: AssembleRecordInput): PatientRecord => {
  const language = input.language || UNKNOWN_LANGUAGE;

  return Object.freeze({
    fileName: baseFileName(input.fileName),
    language,
    reportDate: input.reportDate ?? null,
    patient: Object.freeze({ ...input.patient }),
    vitalSigns: Object.freeze({ ...input.vitalSigns }),
    labs: Object.freeze(input.labs.map((lab) => Object.freeze({ ...lab }))),
    rawText: input.normalizedText
  });
};

const formatLabLine = (lab: LabLine): string =>
  `- ${lab.testName}: ${formatNumber(lab.value)} ${lab.unit} (Normal: ${lab.normalRange}, Status: ${lab.status})`;

export const renderLabsAsText = (labs: readonly LabLine[]): string => {
  if (labs.length === 0) {
    return NO_LABS_DETECTED;
  }
  return labs.map(formatLabLine).join("\n");
};

export const renderLabHighlights = (labs: ReadonlyArray<LabLine & { highlight: LabHighlight }>): string =>
  labs
    .map((lab) => `${HIGHLIGHT_TAGS[lab.highlight]} ${formatLabLine(lab).slice(2)}`)
    .join("\n");

export const serializePatientRecord = (record: PatientRecord | EditablePatientRecord): PatientRecordDocument => ({
  file_name: record.fileName,
  language: record.language,
  report_date: record.reportDate,
  patient: {
    name: record.patient.name,
    age: record.patient.age,
    gender: record.patient.gender
  },
  vital_signs: { ...record.vitalSigns },
  labs: record.labs.map((lab) => ({
    test_name: lab.testName,
    value: lab.value,
    unit: lab.unit,
    normal_range: lab.normalRange,
    status: lab.status,
    highlight: lab.highlight,
    confidence: lab.confidence
  })),
  raw_text: record.rawText
});

export const createEditableCopy = (record: PatientRecord): EditablePatientRecord => ({
  fileName: record.fileName,
  language: record.language,
  reportDate: record.reportDate,
  patient: { ...record.patient },
  vitalSigns: { ...record.vitalSigns },
  labs: record.labs.map((lab) => ({ ...lab })),
  rawText: record.rawText
});
