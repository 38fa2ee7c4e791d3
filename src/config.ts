import { readFileSync } from "node:fs";
import path from "node:path";
import { LOG_LEVEL_ENV, REFERENCE_TABLES_ENV } from "./constants";
import { ReportPipelineError } from "./errors";
import { type LogLevel, logger, parseLogLevel, setLogLevel } from "./lib/logger";
import { DEFAULT_REFERENCE_TABLES, parseReferenceTables } from "./referenceCatalog";
import type { ReferenceTables } from "./types";

export interface PipelineConfig {
  tables: ReferenceTables;
  logLevel: LogLevel;
  tablesSource: string;
}

type Env = Record<string, string | undefined>;

export const readReferenceTablesFile = (filePath: string): ReferenceTables => {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = readFileSync(resolved, "utf8");
  } catch (error) {
    throw new ReportPipelineError("REFERENCE_TABLES_UNREADABLE", `Could not read reference tables at ${resolved}.`, {
      cause: error
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ReportPipelineError("INVALID_REFERENCE_TABLES", `Reference tables at ${resolved} are not valid JSON.`, {
      cause: error
    });
  }

  return parseReferenceTables(parsed, DEFAULT_REFERENCE_TABLES);
};

export const loadPipelineConfig = (env: Env = process.env): PipelineConfig => {
  const requestedLevel = env[LOG_LEVEL_ENV];
  const logLevel = parseLogLevel(requestedLevel) ?? "warn";
  if (requestedLevel && !parseLogLevel(requestedLevel)) {
    logger.warn(`Ignoring unknown ${LOG_LEVEL_ENV} value "${requestedLevel}".`);
  }
  setLogLevel(logLevel);

  const tablesPath = env[REFERENCE_TABLES_ENV]?.trim();
  if (!tablesPath) {
    return { tables: DEFAULT_REFERENCE_TABLES, logLevel, tablesSource: "default" };
  }

  const tables = readReferenceTablesFile(tablesPath);
  logger.info(`Loaded ${tables.tests.length} reference entries from ${tablesPath}.`);
  return { tables, logLevel, tablesSource: path.resolve(tablesPath) };
};
