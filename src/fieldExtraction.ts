import { format, isValid, parse } from "date-fns";
import { MAX_PLAUSIBLE_AGE } from "./constants";
import { DEFAULT_REFERENCE_TABLES } from "./referenceCatalog";
import type { PatientInfo, RawLabMention, ReferenceTables, VitalSignKind, VitalSigns } from "./types";
import { cleanLabel, escapeRegExp, parseNumericToken, toTitleCase } from "./utils";

interface VitalSignRule {
  kind: VitalSignKind;
  pattern: RegExp;
  render: (match: RegExpMatchArray) => string;
}

const NAME_PATTERN =
  /\bpatient[^\S\n]*name[^\S\n]*[:\-]?[^\S\n]*([A-Za-z][A-Za-z .\-]*?)[^\S\n]*(?=\b(?:age|gender|sex)\b|\n|$)/i;
const AGE_PATTERN = /\bage[^\S\n]*[:\-]?[^\S\n]*(\d+)/i;
const GENDER_PATTERN = /\b(?:gender|sex)[^\S\n]*[:\-]?[^\S\n]*(male|female)\b/i;

const VITAL_SIGN_RULES: VitalSignRule[] = [
  {
    kind: "blood_pressure",
    pattern: /\b(?:blood\s*pressure|bp)\s*[:\-]?\s*(\d{2,3})\s*\/\s*(\d{2,3})\s*mm\s*hg\b/i,
    render: (match) => `${match[1]}/${match[2]} mmHg`
  },
  {
    kind: "heart_rate",
    pattern: /\b(?:heart\s*rate|pulse(?:\s*rate)?)\s*[:\-]?\s*(\d{2,3})\s*(?:bpm|beats\s*\/\s*min)\b/i,
    render: (match) => `${match[1]} bpm`
  },
  {
    kind: "respiratory_rate",
    pattern: /\b(?:respiratory\s*rate|resp\s*rate)\s*[:\-]?\s*(\d{1,2})\s*(?:breaths\s*\/\s*min|\/\s*min)\b/i,
    render: (match) => `${match[1]} breaths/min`
  },
  {
    kind: "temperature",
    pattern: /\b(?:temperature|temp)\s*[:\-]?\s*(\d{2,3}(?:\.\d{1,2})?)\s*(f|c)\b/i,
    render: (match) => `${match[1]} °${match[2].toUpperCase()}`
  },
  {
    kind: "oxygen_saturation",
    pattern: /\b(?:spo2|oxygen\s*saturation)\s*[:\-]?\s*(\d{2,3})\s*%/i,
    render: (match) => `${match[1]}%`
  }
];

const DATE_VALUE_SOURCE =
  "(\\d{4}-\\d{1,2}-\\d{1,2}|\\d{1,2}[/.\\-]\\d{1,2}[/.\\-]\\d{2,4}|\\d{1,2}\\s+[A-Za-z]{3,9}\\s+\\d{4}|[A-Za-z]{3,9}\\s+\\d{1,2},?\\s+\\d{4})";

const DATE_LABEL_PATTERNS: RegExp[] = [
  new RegExp(
    `\\b(?:collected(?:\\s*on)?|collection\\s*date|sample\\s*(?:collection\\s*)?date|date\\s*collected)\\s*[:\\-]?\\s*${DATE_VALUE_SOURCE}`,
    "i"
  ),
  new RegExp(`\\b(?:report(?:ed)?\\s*date|date\\s*reported|reported\\s*on)\\s*[:\\-]?\\s*${DATE_VALUE_SOURCE}`, "i"),
  new RegExp(`\\bdate(?!\\s*of\\s*birth)\\s*[:\\-]?\\s*${DATE_VALUE_SOURCE}`, "i")
];

// "dd" and "MM" accept one or two digits, so "3-4-24" and "03/04/2024" share a format.
const DATE_FORMATS = [
  "yyyy-MM-dd",
  "dd/MM/yyyy",
  "dd-MM-yyyy",
  "dd.MM.yyyy",
  "dd/MM/yy",
  "dd-MM-yy",
  "dd.MM.yy",
  "dd MMM yyyy",
  "dd MMMM yyyy",
  "MMM dd yyyy",
  "MMMM dd yyyy"
];

const DATE_REFERENCE = new Date(2000, 0, 1);

const labTokenPatternCache = new WeakMap<ReferenceTables, RegExp | null>();

const labTokenPattern = (tables: ReferenceTables): RegExp | null => {
  const cached = labTokenPatternCache.get(tables);
  if (cached !== undefined) {
    return cached;
  }
  const alternatives = [...tables.labTokens]
    .sort((left, right) => right.length - left.length)
    .map((token) => escapeRegExp(token).replace(/ /g, "\\s+"));
  const pattern = alternatives.length > 0 ? new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "gi") : null;
  labTokenPatternCache.set(tables, pattern);
  return pattern;
};

export const extractPatientInfo = (text: string): PatientInfo => {
  const info: PatientInfo = { name: null, age: null, gender: null };

  const name = text.match(NAME_PATTERN)?.[1]?.trim();
  if (name) {
    info.name = name;
  }

  const age = text.match(AGE_PATTERN)?.[1];
  if (age) {
    const parsed = Number.parseInt(age, 10);
    info.age = Number.isSafeInteger(parsed) && parsed <= MAX_PLAUSIBLE_AGE ? parsed : null;
  }

  const gender = text.match(GENDER_PATTERN)?.[1];
  if (gender) {
    info.gender = toTitleCase(gender) === "Male" ? "Male" : "Female";
  }

  return info;
};

export const extractVitalSigns = (text: string): VitalSigns => {
  const vitals: VitalSigns = {};
  for (const rule of VITAL_SIGN_RULES) {
    const match = text.match(rule.pattern);
    if (match) {
      vitals[rule.kind] = rule.render(match);
    }
  }
  return vitals;
};

const detectUnit = (window: string, units: readonly string[]): string | null => {
  const haystack = window.toLowerCase();
  return units.find((unit) => haystack.includes(unit.toLowerCase())) ?? null;
};

const parseScanWindow = (window: string, valueFrom: number, units: readonly string[]): RawLabMention | null => {
  const afterToken = window.slice(valueFrom);
  for (const candidate of afterToken.matchAll(/\S+/g)) {
    const value = parseNumericToken(candidate[0]);
    if (value === null) {
      continue;
    }
    const valueStart = valueFrom + (candidate.index ?? 0);
    return {
      label: cleanLabel(window.slice(0, valueStart)),
      value,
      unitHint: detectUnit(window, units)
    };
  }
  return null;
};

// Plain words ahead of the first token belong to its name ("Mean Corpuscular Hemoglobin").
const LABEL_LEAD_IN_PATTERN = /^(?:[A-Za-z]+ )+$/;

const labelStart = (line: string, tokenStart: number, index: number): number =>
  index === 0 && LABEL_LEAD_IN_PATTERN.test(line.slice(0, tokenStart)) ? 0 : tokenStart;

export const extractLabMentions = (
  text: string,
  tables: ReferenceTables = DEFAULT_REFERENCE_TABLES
): RawLabMention[] => {
  const pattern = labTokenPattern(tables);
  if (!pattern) {
    return [];
  }

  const mentions: RawLabMention[] = [];
  for (const line of text.split("\n")) {
    const occurrences = Array.from(line.matchAll(pattern));
    // A window without a value runs on into the next one: "MCH (Mean Corpuscular Hemoglobin) 29 pg".
    let pending: { start: number; valueFrom: number } | null = null;
    for (const [index, occurrence] of occurrences.entries()) {
      const tokenStart = occurrence.index ?? 0;
      const end = occurrences[index + 1]?.index ?? line.length;
      const start: number = pending ? pending.start : labelStart(line, tokenStart, index);
      const valueFrom: number = pending ? pending.valueFrom : tokenStart + occurrence[0].length;
      const mention = parseScanWindow(line.slice(start, end), valueFrom - start, tables.units);
      if (mention) {
        mentions.push(mention);
        pending = null;
      } else {
        pending = { start, valueFrom };
      }
    }
  }
  return mentions;
};

const toIsoDate = (value: string): string | null => {
  const compact = value.replace(/,/g, " ").replace(/\s+/g, " ").trim();
  for (const pattern of DATE_FORMATS) {
    const parsed = parse(compact, pattern, DATE_REFERENCE);
    if (!isValid(parsed)) {
      continue;
    }
    const year = parsed.getFullYear();
    if (year < 1900 || year > 2100) {
      continue;
    }
    return format(parsed, "yyyy-MM-dd");
  }
  return null;
};

export const extractReportDate = (text: string): string | null => {
  for (const pattern of DATE_LABEL_PATTERNS) {
    const candidate = text.match(pattern)?.[1];
    const iso = candidate ? toIsoDate(candidate) : null;
    if (iso) {
      return iso;
    }
  }
  return null;
};

export const __fieldExtractionInternals = {
  labTokenPattern,
  parseScanWindow,
  labelStart,
  detectUnit,
  toIsoDate
};
