import { RANGE_NOT_AVAILABLE, UNKNOWN_UNIT } from "./constants";
import { resolveCanonicalTest } from "./labNormalization";
import { DEFAULT_REFERENCE_TABLES, findReferenceEntry } from "./referenceCatalog";
import type {
  LabClassification,
  LabHighlight,
  LabStatus,
  RawLabMention,
  ReferenceInterval,
  ReferenceTables,
  ResolvedLabResult
} from "./types";
import { cleanLabel, formatNumber, roundConfidence } from "./utils";

export const deriveHighlight = (status: LabStatus): LabHighlight => {
  if (status === "Low" || status === "High") {
    return "warning";
  }
  if (status === "Normal") {
    return "normal";
  }
  return "unknown";
};

export const formatReferenceRange = (interval: Pick<ReferenceInterval, "low" | "high">): string =>
  `${formatNumber(interval.low)}–${formatNumber(interval.high)}`;

const deriveStatus = (value: number, interval: ReferenceInterval): LabStatus => {
  if (value < interval.low) {
    return "Low";
  }
  if (value > interval.high) {
    return "High";
  }
  return "Normal";
};

export const classifyLabValue = (
  canonicalKey: string | null,
  value: number,
  unitHint: string | null = null,
  tables: ReferenceTables = DEFAULT_REFERENCE_TABLES
): LabClassification => {
  const unit = unitHint?.trim() || UNKNOWN_UNIT;
  const interval = findReferenceEntry(canonicalKey, tables)?.interval ?? null;

  if (!interval || !Number.isFinite(value)) {
    return { status: "Unknown", highlight: deriveHighlight("Unknown"), normalRange: RANGE_NOT_AVAILABLE, unit };
  }

  const status = deriveStatus(value, interval);
  return {
    status,
    highlight: deriveHighlight(status),
    normalRange: formatReferenceRange(interval),
    unit
  };
};

export const resolveLabMention = (
  mention: RawLabMention,
  tables: ReferenceTables = DEFAULT_REFERENCE_TABLES
): ResolvedLabResult => {
  const resolution = resolveCanonicalTest(mention, tables);
  const entry = findReferenceEntry(resolution.canonicalKey, tables);
  const classification = classifyLabValue(resolution.canonicalKey, mention.value, mention.unitHint, tables);

  return {
    testName: entry?.displayName ?? (cleanLabel(mention.label) || "Unnamed test"),
    canonicalKey: resolution.canonicalKey,
    value: mention.value,
    confidence: roundConfidence(resolution.confidence),
    ...classification
  };
};
