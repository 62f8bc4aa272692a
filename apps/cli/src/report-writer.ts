import path from "node:path";

import {
  ASSESSMENT_DATE_COLUMN,
  NEEDS_REVIEW_COLUMN,
  formatCsv,
  isHighRisk,
  type CellValue,
  type FlaggedRegister,
  type Logger,
  type VendorRecord
} from "@riskreg/register";
import ExcelJS from "exceljs";

import { ensureOutputDir, writeFileAtomic } from "./atomic-write";
import { DEFAULT_HIGHLIGHT_ARGB, highlightFlaggedRows, type HighlightResult } from "./spreadsheet-highlight";

export const HIGH_RISK_FILE = "high_risk.csv";
export const NEEDS_REVIEW_FILE = "needs_review.csv";
export const FLAGGED_WORKBOOK_FILE = "vendor_register_flagged.xlsx";
export const REGISTER_SHEET_NAME = "Vendor Register";

export type WriteReportsInput = {
  register: FlaggedRegister;
  outDir: string;
  highThreshold: number;
  fillArgb?: string;
  logger: Logger;
};

export type WriteReportsResult = {
  highRiskPath: string;
  needsReviewPath: string;
  workbookPath: string;
  highRiskCount: number;
  needsReviewCount: number;
  highlight: HighlightResult;
};

export function selectHighRisk(records: readonly VendorRecord[], highThreshold: number): VendorRecord[] {
  return records.filter((record) => isHighRisk(record.riskScore, highThreshold));
}

export function selectNeedsReview(records: readonly VendorRecord[]): VendorRecord[] {
  return records.filter((record) => record.needsReview);
}

function writeExtract(filePath: string, columns: string[], records: readonly VendorRecord[]): void {
  writeFileAtomic(filePath, formatCsv(columns, records.map((record) => record.cells)));
}

const NUMERIC_TEXT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

// Text sources carry every pass-through cell as a string; numeric ones become number cells.
export function toWorkbookValue(value: CellValue | undefined): ExcelJS.CellValue {
  if (value === undefined) {
    return null;
  }
  if (typeof value === "string" && NUMERIC_TEXT.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
}

export async function buildRegisterWorkbook(register: FlaggedRegister): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(REGISTER_SHEET_NAME);
  sheet.addRow(register.columns);
  for (const record of register.records) {
    sheet.addRow(register.columns.map((column) => toWorkbookValue(record.cells[column])));
  }

  const dateColumn = register.columns.indexOf(ASSESSMENT_DATE_COLUMN);
  if (dateColumn >= 0) {
    sheet.getColumn(dateColumn + 1).numFmt = "yyyy-mm-dd";
  }
  sheet.getRow(1).font = { bold: true };

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

export async function writeReports(input: WriteReportsInput): Promise<WriteReportsResult> {
  const { register, outDir, highThreshold, logger } = input;
  ensureOutputDir(outDir);

  const highRisk = selectHighRisk(register.records, highThreshold);
  const needsReview = selectNeedsReview(register.records);

  const highRiskPath = path.join(outDir, HIGH_RISK_FILE);
  writeExtract(highRiskPath, register.columns, highRisk);

  const needsReviewPath = path.join(outDir, NEEDS_REVIEW_FILE);
  writeExtract(needsReviewPath, register.columns, needsReview);

  const workbookPath = path.join(outDir, FLAGGED_WORKBOOK_FILE);
  writeFileAtomic(workbookPath, await buildRegisterWorkbook(register));
  logger.info(`Saved CSVs and Excel: ${highRiskPath}, ${needsReviewPath}, ${workbookPath}`);

  const highlight = await highlightFlaggedRows(workbookPath, {
    sheetName: REGISTER_SHEET_NAME,
    flagColumn: NEEDS_REVIEW_COLUMN,
    fillArgb: input.fillArgb ?? DEFAULT_HIGHLIGHT_ARGB,
    logger
  });

  return {
    highRiskPath,
    needsReviewPath,
    workbookPath,
    highRiskCount: highRisk.length,
    needsReviewCount: needsReview.length,
    highlight
  };
}
