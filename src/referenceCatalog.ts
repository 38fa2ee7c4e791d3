import defaultTablesJson from "./data/referenceTables.json";
import { ReportPipelineError } from "./errors";
import { logger } from "./lib/logger";
import type { ReferenceEntry, ReferenceInterval, ReferenceTables, UnitArtifactRule } from "./types";

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

export const normalizeLookupKey = (value: string): string =>
  value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();

const uniqueNonEmpty = (values: string[]): string[] => Array.from(new Set(values.filter(Boolean)));

const parseInterval = (key: string, input: unknown): ReferenceInterval | null => {
  if (input === null || input === undefined) {
    return null;
  }
  if (!isRecord(input)) {
    logger.warn(`Reference entry "${key}" has a malformed interval; treating it as unavailable.`);
    return null;
  }
  const { low, high, unit } = input;
  if (typeof low !== "number" || typeof high !== "number" || !Number.isFinite(low) || !Number.isFinite(high)) {
    logger.warn(`Reference entry "${key}" has non-numeric bounds; treating the interval as unavailable.`);
    return null;
  }
  if (low > high) {
    logger.warn(`Reference entry "${key}" has low ${low} above high ${high}; treating the interval as unavailable.`);
    return null;
  }
  const cleanUnit = typeof unit === "string" ? unit.trim() : "";
  return Object.freeze({ low, high, unit: cleanUnit });
};

const parseTestEntries = (input: unknown[]): ReferenceEntry[] => {
  const entries: ReferenceEntry[] = [];
  const seenKeys = new Set<string>();

  input.forEach((raw, index) => {
    if (!isRecord(raw) || typeof raw.key !== "string") {
      logger.warn(`Dropping reference entry #${index}: expected an object with a string "key".`);
      return;
    }
    const key = normalizeLookupKey(raw.key);
    if (!key) {
      logger.warn(`Dropping reference entry #${index}: empty key.`);
      return;
    }
    if (seenKeys.has(key)) {
      logger.warn(`Dropping duplicate reference entry "${key}".`);
      return;
    }
    seenKeys.add(key);

    const rawAliases = Array.isArray(raw.aliases) ? raw.aliases : [];
    const aliases = uniqueNonEmpty([
      key,
      ...rawAliases.filter((alias): alias is string => typeof alias === "string").map(normalizeLookupKey)
    ]);
    const displayName =
      typeof raw.displayName === "string" && raw.displayName.trim() ? raw.displayName.trim() : raw.key.trim();

    entries.push(
      Object.freeze({
        key,
        displayName,
        aliases: Object.freeze(aliases),
        interval: parseInterval(key, raw.interval)
      })
    );
  });

  return entries;
};

const parseLabTokens = (input: unknown[]): string[] =>
  uniqueNonEmpty(
    input.filter((token): token is string => typeof token === "string").map((token) => normalizeLookupKey(token))
  );

const parseUnits = (input: unknown[]): string[] =>
  uniqueNonEmpty(input.filter((unit): unit is string => typeof unit === "string").map((unit) => unit.trim())).sort(
    (left, right) => right.length - left.length
  );

const parseUnitArtifacts = (input: unknown[]): UnitArtifactRule[] => {
  const rules: UnitArtifactRule[] = [];
  input.forEach((raw, index) => {
    if (!isRecord(raw) || typeof raw.pattern !== "string" || typeof raw.replacement !== "string" || !raw.pattern) {
      logger.warn(`Dropping unit artifact #${index}: expected string "pattern" and "replacement".`);
      return;
    }
    try {
      rules.push(Object.freeze({ pattern: new RegExp(raw.pattern, "gi"), replacement: raw.replacement }));
    } catch (error) {
      logger.warn(`Dropping unit artifact #${index}: invalid pattern.`, error);
    }
  });
  return rules;
};

const readSection = <T>(
  root: JsonRecord,
  name: keyof ReferenceTables,
  parse: (input: unknown[]) => T[],
  fallback: readonly T[] | null
): readonly T[] => {
  const section = root[name];
  if (Array.isArray(section)) {
    return Object.freeze(parse(section));
  }
  if (section !== undefined) {
    logger.warn(`Reference tables section "${name}" is not an array; using defaults.`);
  }
  return fallback ?? Object.freeze([]);
};

export const parseReferenceTables = (input: unknown, fallback: ReferenceTables | null = null): ReferenceTables => {
  if (!isRecord(input)) {
    throw new ReportPipelineError("INVALID_REFERENCE_TABLES", "Reference tables must be a JSON object.");
  }

  const tests = readSection(input, "tests", parseTestEntries, fallback?.tests ?? null);
  if (tests.length === 0) {
    throw new ReportPipelineError("INVALID_REFERENCE_TABLES", "Reference tables contain no usable test entries.");
  }

  return Object.freeze({
    tests,
    labTokens: readSection(input, "labTokens", parseLabTokens, fallback?.labTokens ?? null),
    units: readSection(input, "units", parseUnits, fallback?.units ?? null),
    unitArtifacts: readSection(input, "unitArtifacts", parseUnitArtifacts, fallback?.unitArtifacts ?? null)
  });
};

export const DEFAULT_REFERENCE_TABLES: ReferenceTables = parseReferenceTables(defaultTablesJson);

export const findReferenceEntry = (
  key: string | null,
  tables: ReferenceTables = DEFAULT_REFERENCE_TABLES
): ReferenceEntry | null => {
  if (!key) {
    return null;
  }
  return tables.tests.find((entry) => entry.key === key) ?? null;
};

export const getCanonicalKeys = (tables: ReferenceTables = DEFAULT_REFERENCE_TABLES): string[] =>
  tables.tests.map((entry) => entry.key);
