const DECIMAL_TOKEN_PATTERN = /^\d+(?:[.,]\d+)?$/;
const GROUPED_THOUSANDS_PATTERN = /^\d{1,3}(?:,\d{3})+$/;
const TOKEN_EDGE_PUNCTUATION = /^[(:;,]+|[):;,]+$/g;

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const parseNumericToken = (token: string): number | null => {
  const cleaned = token.trim().replace(TOKEN_EDGE_PUNCTUATION, "");
  if (!cleaned) {
    return null;
  }

  // "250,000" is a grouped count, "13,8" a decimal comma.
  const normalized = GROUPED_THOUSANDS_PATTERN.test(cleaned)
    ? cleaned.replace(/,/g, "")
    : DECIMAL_TOKEN_PATTERN.test(cleaned)
      ? cleaned.replace(",", ".")
      : null;
  if (normalized === null) {
    return null;
  }

  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
};

export const formatNumber = (value: number): string => String(value);

export const roundConfidence = (value: number): number => Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;

const countOf = (value: string, character: string): number => value.split(character).length - 1;

export const cleanLabel = (value: string): string => {
  let label = value.replace(/\s+/g, " ").replace(/^[\s:;,()\-]+/, "");
  let previous = "";
  while (label !== previous) {
    previous = label;
    label = label.replace(/[\s:;,(\-]+$/, "");
    // A closing parenthesis stays when it closes one inside the label: "MCH (Mean Corpuscular Hemoglobin)".
    if (label.endsWith(")") && countOf(label, ")") > countOf(label, "(")) {
      label = label.slice(0, -1);
    }
  }
  return label;
};

export const toTitleCase = (value: string): string =>
  value
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((token) => token.charAt(0).toUpperCase() + token.slice(1).toLowerCase())
    .join(" ");

export const baseFileName = (fileName: string): string => {
  const trimmed = fileName.trim();
  const parts = trimmed.split(/[\\/]/).filter(Boolean);
  return parts[parts.length - 1] ?? "";
};
