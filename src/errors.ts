import type { ValidationIssue } from "./types/index.js";

// ============================================================================
// Error Classes
// ============================================================================

export class ConfigError extends Error {
  code = "CONFIG_INVALID" as const;
  problems: string[];

  constructor(source: string, problems: string[]) {
    super(`Invalid config (${source}):\n- ${problems.join("\n- ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export class SpreadsheetError extends Error {
  code = "SPREADSHEET_INVALID" as const;

  constructor(message: string) {
    super(message);
    this.name = "SpreadsheetError";
  }
}

/**
 * Raised once per run with every input problem of the batch.
 */
export class BatchValidationError extends Error {
  code = "BATCH_INVALID" as const;
  issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Clinic batch rejected (${String(issues.length)} problem(s)):\n- ${issues
        .map(describeIssue)
        .join("\n- ")}`
    );
    this.name = "BatchValidationError";
    this.issues = issues;
  }
}

export class IdMapFormatError extends Error {
  code = "ID_MAP_FORMAT" as const;

  constructor(message: string) {
    super(message);
    this.name = "IdMapFormatError";
  }
}

export class IdMapIntegrityError extends Error {
  code = "ID_MAP_INTEGRITY" as const;

  constructor(message: string) {
    super(message);
    this.name = "IdMapIntegrityError";
  }
}

export class IdMapConflictError extends Error {
  code = "ID_MAP_CONFLICT" as const;

  constructor(expected: string, actual: string) {
    super(
      `Id map changed since it was loaded (expected revision ${expected.slice(0, 12)}, found ${actual.slice(0, 12)})`
    );
    this.name = "IdMapConflictError";
  }
}

export class SourceFetchError extends Error {
  code = "SOURCE_FETCH" as const;
  status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "SourceFetchError";
    this.status = status;
  }
}

// ============================================================================
// Formatting
// ============================================================================

export function describeIssue(issue: ValidationIssue): string {
  switch (issue.kind) {
    case "MISSING_COLUMN":
      return `Missing required column: ${issue.column}`;
    case "EMPTY_NAME":
      return `Row ${String(issue.rowNumber)}: clinic name is empty after normalization`;
    case "DUPLICATE_NAME":
      return `Duplicate clinic name "${issue.name}" in rows ${issue.rowNumbers.join(", ")}`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
