import { ReportPipelineError } from "./errors";
import { renderLabsAsText } from "./recordAssembly";
import type { EditablePatientRecord, NarrativeGenerator, PatientRecord, VitalSignKind } from "./types";

type SummarySource = PatientRecord | EditablePatientRecord;

const VITAL_SIGN_LABELS: Array<[VitalSignKind, string]> = [
  ["blood_pressure", "Blood Pressure"],
  ["heart_rate", "Heart Rate"],
  ["respiratory_rate", "Respiratory Rate"],
  ["temperature", "Temperature"],
  ["oxygen_saturation", "Oxygen Saturation"]
];

const SUMMARY_RULES = [
  "- Write ONE summary paragraph",
  "- Use simple, non-technical language",
  "- Do NOT diagnose diseases",
  "- Do NOT suggest treatments",
  "- Be calm and reassuring",
  "- Do NOT discuss future tests or investigations",
  "- Only describe what is present in the report"
];

const describePatient = (record: SummarySource): string => {
  const lines: string[] = [];
  if (record.patient.age !== null) {
    lines.push(`Age: ${record.patient.age}`);
  }
  if (record.patient.gender) {
    lines.push(`Gender: ${record.patient.gender}`);
  }
  return lines.length > 0 ? lines.join("\n") : "Not specified";
};

const describeVitals = (record: SummarySource): string => {
  const lines = VITAL_SIGN_LABELS.flatMap(([kind, label]) => {
    const reading = record.vitalSigns[kind];
    return reading ? [`${label}: ${reading}`] : [];
  });
  return lines.length > 0 ? lines.join("\n") : "Not available";
};

export const buildSummaryPrompt = (record: SummarySource): string =>
  [
    record.patient.name ? `Hello ${record.patient.name},` : "Hello,",
    "",
    "You are a medical assistant summarizing a health report.",
    "",
    "Rules:",
    ...SUMMARY_RULES,
    "",
    "Patient Information:",
    describePatient(record),
    "",
    "Vital Signs:",
    describeVitals(record),
    "",
    "Lab Results:",
    renderLabsAsText(record.labs),
    "",
    "Provide a friendly patient summary."
  ].join("\n");

export const generateNarrativeSummary = async (
  record: SummarySource,
  generator: NarrativeGenerator
): Promise<string> => {
  const prompt = buildSummaryPrompt(record);
  let reply: string;
  try {
    reply = await generator.generate({ prompt, labsText: renderLabsAsText(record.labs) });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReportPipelineError("NARRATIVE_FAILED", `Narrative generation failed: ${detail}`, { cause: error });
  }

  const summary = typeof reply === "string" ? reply.trim() : "";
  if (!summary) {
    throw new ReportPipelineError("NARRATIVE_EMPTY", "Narrative generator returned an empty summary.");
  }
  return summary;
};
