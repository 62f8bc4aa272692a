import type { Logger } from "./logger";
import {
  ASSESSMENT_DATE_COLUMN,
  DAYS_SINCE_REVIEW_COLUMN,
  DERIVED_COLUMNS,
  NEEDS_REVIEW_COLUMN,
  REMEDIATION_STATUS_COLUMN,
  RISK_CATEGORY_COLUMN,
  RISK_SCORE_COLUMN,
  SERVICE_COLUMN,
  VENDOR_NAME_COLUMN,
  type CellValue,
  type FlaggedRegister,
  type RegisterIssue,
  type RegisterTable,
  type RiskCategory,
  type VendorRecord
} from "./types";

export const MEDIUM_RISK_FLOOR = 50;

const DAY_MS = 24 * 60 * 60 * 1000;

export type FlagOptions = {
  daysThreshold: number;
  highThreshold: number;
  evaluationDate?: Date;
  logger?: Logger;
};

type Coerced<T> = { value: T | null; failed: boolean };

export function toCalendarDay(date: Date): Date {
  return new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
}

export function subtractDays(date: Date, days: number): Date {
  const next = new Date(date);
  next.setUTCDate(next.getUTCDate() - days);
  return next;
}

function isBlank(value: CellValue): boolean {
  return value === null || (typeof value === "string" && value.trim().length === 0);
}

export function coerceDate(value: CellValue): Coerced<Date> {
  if (isBlank(value)) {
    return { value: null, failed: false };
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? { value: null, failed: true }
      : { value: toCalendarDay(value), failed: false };
  }
  if (typeof value !== "string") {
    return { value: null, failed: true };
  }

  const text = value.trim();
  const isoMatch = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/.exec(text);
  if (isoMatch) {
    const [year, month, day] = [Number(isoMatch[1]), Number(isoMatch[2]), Number(isoMatch[3])];
    const parsed = new Date(Date.UTC(year, month - 1, day));
    const valid =
      parsed.getUTCFullYear() === year && parsed.getUTCMonth() === month - 1 && parsed.getUTCDate() === day;
    return valid ? { value: parsed, failed: false } : { value: null, failed: true };
  }

  const fallback = new Date(text);
  if (Number.isNaN(fallback.getTime())) {
    return { value: null, failed: true };
  }
  return { value: toCalendarDay(fallback), failed: false };
}

export function coerceNumber(value: CellValue): Coerced<number> {
  if (isBlank(value)) {
    return { value: null, failed: false };
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? { value, failed: false } : { value: null, failed: true };
  }
  if (typeof value === "string") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? { value: parsed, failed: false } : { value: null, failed: true };
  }
  return { value: null, failed: true };
}

function coerceText(value: CellValue): string | null {
  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

/**
 * Buckets a risk score. Lower edges are inclusive: a score equal to
 * `highThreshold` is High and a score equal to 50 is Medium.
 */
export function categorizeRiskScore(score: number | null, highThreshold: number): RiskCategory {
  if (score === null) {
    return "Unknown";
  }
  if (score >= highThreshold) {
    return "High";
  }
  if (score >= MEDIUM_RISK_FLOOR) {
    return "Medium";
  }
  return "Low";
}

export function computeNeedsReview(assessmentDate: Date | null, thresholdDate: Date): boolean {
  return assessmentDate === null || assessmentDate.getTime() < thresholdDate.getTime();
}

export function computeDaysSinceReview(assessmentDate: Date | null, evaluationDate: Date): number | null {
  if (assessmentDate === null) {
    return null;
  }
  return Math.floor((evaluationDate.getTime() - assessmentDate.getTime()) / DAY_MS);
}

function coercionIssue(column: string, rowNumber: number, raw: CellValue): RegisterIssue {
  return {
    code: "value_coercion",
    message: `Could not parse ${column} value "${String(raw)}" on row ${rowNumber}; treating as empty`,
    column,
    rowNumber
  };
}

export function flagRegister(table: RegisterTable, options: FlagOptions): FlaggedRegister {
  const evaluationDate = toCalendarDay(options.evaluationDate ?? new Date());
  const thresholdDate = subtractDays(evaluationDate, options.daysThreshold);
  const issues: RegisterIssue[] = [];

  const columns = [...table.columns];
  for (const column of DERIVED_COLUMNS) {
    if (!columns.includes(column)) {
      columns.push(column);
    }
  }

  const records = table.rows.map((row, index): VendorRecord => {
    // header occupies row 1
    const rowNumber = index + 2;
    const rawDate = row[ASSESSMENT_DATE_COLUMN] ?? null;
    const rawScore = row[RISK_SCORE_COLUMN] ?? null;
    const date = coerceDate(rawDate);
    const score = coerceNumber(rawScore);
    if (date.failed) {
      issues.push(coercionIssue(ASSESSMENT_DATE_COLUMN, rowNumber, rawDate));
    }
    if (score.failed) {
      issues.push(coercionIssue(RISK_SCORE_COLUMN, rowNumber, rawScore));
    }

    const daysSinceReview = computeDaysSinceReview(date.value, evaluationDate);
    const needsReview = computeNeedsReview(date.value, thresholdDate);
    const riskCategory = categorizeRiskScore(score.value, options.highThreshold);

    return {
      rowNumber,
      vendorName: coerceText(row[VENDOR_NAME_COLUMN] ?? null),
      service: coerceText(row[SERVICE_COLUMN] ?? null),
      riskScore: score.value,
      assessmentDate: date.value,
      remediationStatus: coerceText(row[REMEDIATION_STATUS_COLUMN] ?? null),
      daysSinceReview,
      needsReview,
      riskCategory,
      cells: {
        ...row,
        [RISK_SCORE_COLUMN]: score.value,
        [ASSESSMENT_DATE_COLUMN]: date.value,
        [DAYS_SINCE_REVIEW_COLUMN]: daysSinceReview,
        [NEEDS_REVIEW_COLUMN]: needsReview,
        [RISK_CATEGORY_COLUMN]: riskCategory
      }
    };
  });

  for (const issue of issues) {
    options.logger?.warn(issue.message, { code: issue.code, column: issue.column, rowNumber: issue.rowNumber });
  }

  return { columns, records, evaluationDate, issues };
}
