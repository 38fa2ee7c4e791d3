export type Gender = "Male" | "Female";
export type LabStatus = "Low" | "Normal" | "High" | "Unknown";
export type LabHighlight = "warning" | "normal" | "unknown";
export type ResolutionMethod = "alias" | "unmatched";
export type VitalSignKind =
  | "blood_pressure"
  | "heart_rate"
  | "respiratory_rate"
  | "temperature"
  | "oxygen_saturation";

export interface RawDocument {
  fileName: string;
  text: string;
}

export interface PatientInfo {
  name: string | null;
  age: number | null;
  gender: Gender | null;
}

export type VitalSigns = Partial<Record<VitalSignKind, string>>;

export interface RawLabMention {
  label: string;
  value: number;
  unitHint: string | null;
}

export interface ReferenceInterval {
  low: number;
  high: number;
  unit: string;
}

export interface ReferenceEntry {
  key: string;
  displayName: string;
  aliases: readonly string[];
  interval: ReferenceInterval | null;
}

export interface UnitArtifactRule {
  pattern: RegExp;
  replacement: string;
}

export interface ReferenceTables {
  tests: readonly ReferenceEntry[];
  labTokens: readonly string[];
  units: readonly string[];
  unitArtifacts: readonly UnitArtifactRule[];
}

export interface CanonicalResolution {
  canonicalKey: string | null;
  confidence: number;
  method: ResolutionMethod;
  matchedAlias?: string;
}

export interface LabClassification {
  status: LabStatus;
  highlight: LabHighlight;
  normalRange: string;
  unit: string;
}

export interface ResolvedLabResult extends LabClassification {
  testName: string;
  canonicalKey: string | null;
  value: number;
  confidence: number;
}

export interface PatientRecord {
  readonly fileName: string;
  readonly language: string;
  readonly reportDate: string | null;
  readonly patient: Readonly<PatientInfo>;
  readonly vitalSigns: Readonly<VitalSigns>;
  readonly labs: ReadonlyArray<Readonly<ResolvedLabResult>>;
  readonly rawText: string;
}

export interface EditablePatientRecord {
  fileName: string;
  language: string;
  reportDate: string | null;
  patient: PatientInfo;
  vitalSigns: VitalSigns;
  labs: ResolvedLabResult[];
  rawText: string;
}

export interface PatientRecordDocument {
  file_name: string;
  language: string;
  report_date: string | null;
  patient: {
    name: string | null;
    age: number | null;
    gender: Gender | null;
  };
  vital_signs: VitalSigns;
  labs: Array<{
    test_name: string;
    value: number;
    unit: string;
    normal_range: string;
    status: LabStatus;
    highlight: LabHighlight;
    confidence: number;
  }>;
  raw_text: string;
}

export interface ReportTextSource {
  readText(fileName: string): Promise<RawDocument>;
}

export interface LanguageDetector {
  detect(text: string): string | null;
}

export interface NarrativeRequest {
  prompt: string;
  labsText: string;
}

export interface NarrativeGenerator {
  generate(request: NarrativeRequest): Promise<string>;
}
