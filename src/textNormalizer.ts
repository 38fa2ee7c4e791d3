import { DEFAULT_REFERENCE_TABLES } from "./referenceCatalog";
import type { ReferenceTables } from "./types";
import { escapeRegExp } from "./utils";

const URL_PATTERN = /(?:https?:\/\/|www\.)\S+/gi;
const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi;
const UNSAFE_CHARACTER_PATTERN = /[^A-Za-z0-9\s.,:/()%\-]/g;
const SAFE_TOKEN_PATTERN = /^[A-Za-z0-9.,:/()%\-]*$/;

const protectedPatternCache = new WeakMap<ReferenceTables, RegExp | null>();

// Unit spellings such as "x10^3/µL" fall outside the safe character set; they
// are kept verbatim so that a second pass leaves them untouched.
const protectedTokenPattern = (tables: ReferenceTables): RegExp | null => {
  const cached = protectedPatternCache.get(tables);
  if (cached !== undefined) {
    return cached;
  }
  const tokens = Array.from(
    new Set([...tables.unitArtifacts.map((rule) => rule.replacement), ...tables.units])
  )
    .filter((token) => token && !SAFE_TOKEN_PATTERN.test(token))
    .sort((left, right) => right.length - left.length);
  const pattern = tokens.length > 0 ? new RegExp(`(${tokens.map(escapeRegExp).join("|")})`) : null;
  protectedPatternCache.set(tables, pattern);
  return pattern;
};

const scrubSegment = (segment: string): string =>
  segment.replace(URL_PATTERN, " ").replace(EMAIL_PATTERN, " ").replace(UNSAFE_CHARACTER_PATTERN, " ");

const collapseWhitespace = (value: string): string =>
  value
    .replace(/[^\S\n]+/g, " ")
    .replace(/ ?\n ?/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();

const repairUnitArtifacts = (value: string, tables: ReferenceTables): string =>
  tables.unitArtifacts.reduce((text, rule) => text.replace(rule.pattern, rule.replacement), value);

export const normalizeReportText = (raw: string, tables: ReferenceTables = DEFAULT_REFERENCE_TABLES): string => {
  if (typeof raw !== "string" || !raw) {
    return "";
  }

  const protectedPattern = protectedTokenPattern(tables);
  const unified = raw.replace(/\r\n?/g, "\n");
  const segments = protectedPattern ? unified.split(protectedPattern) : [unified];
  // split() with a capture group interleaves the protected tokens at odd indexes.
  const scrubbed = segments.map((segment, index) => (index % 2 === 1 ? segment : scrubSegment(segment))).join("");

  return repairUnitArtifacts(collapseWhitespace(scrubbed), tables);
};

export const __textNormalizerInternals = {
  protectedTokenPattern,
  scrubSegment,
  collapseWhitespace,
  repairUnitArtifacts
};
