export const UNKNOWN_UNIT = "Unknown";
export const UNKNOWN_LANGUAGE = "unknown";
export const RANGE_NOT_AVAILABLE = "Not available";
export const NO_LABS_DETECTED = "No lab values were detected.";

export const ALIAS_MATCH_CONFIDENCE = 0.95;
export const UNMATCHED_CONFIDENCE = 0.4;

export const MAX_PLAUSIBLE_AGE = 150;

export const REFERENCE_TABLES_ENV = "LAB_REFERENCE_TABLES";
export const LOG_LEVEL_ENV = "LAB_PIPELINE_LOG_LEVEL";
