import { parseFlagCell, type Logger, type RegisterIssue } from "@riskreg/register";
import ExcelJS from "exceljs";

import { writeFileAtomic } from "./atomic-write";

export const DEFAULT_HIGHLIGHT_ARGB = "FFFFF2CC";

export type HighlightOptions = {
  sheetName: string;
  flagColumn: string;
  fillArgb?: string;
  logger: Logger;
};

export type HighlightStatus = "applied" | "sheet_not_found" | "column_not_found";

export type HighlightResult = {
  status: HighlightStatus;
  highlightedRows: number[];
  issue?: RegisterIssue;
};

function findHeaderColumn(sheet: ExcelJS.Worksheet, header: string): number | null {
  let match: number | null = null;
  sheet.getRow(1).eachCell((cell, columnNumber) => {
    if (match === null && typeof cell.value === "string" && cell.value.trim() === header) {
      match = columnNumber;
    }
  });
  return match;
}

async function saveWorkbook(workbook: ExcelJS.Workbook, filePath: string): Promise<void> {
  writeFileAtomic(filePath, Buffer.from(await workbook.xlsx.writeBuffer()));
}

export async function highlightFlaggedRows(
  filePath: string,
  options: HighlightOptions
): Promise<HighlightResult> {
  const { logger } = options;
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  const sheet = workbook.getWorksheet(options.sheetName);
  if (!sheet) {
    const message = `${options.sheetName} sheet not found for highlighting`;
    logger.warn(message, { code: "highlight_sheet_not_found", filePath });
    return {
      status: "sheet_not_found",
      highlightedRows: [],
      issue: { code: "highlight_sheet_not_found", message }
    };
  }

  const flagColumn = findHeaderColumn(sheet, options.flagColumn);
  if (flagColumn === null) {
    const message = `'${options.flagColumn}' column not found in ${filePath}; skipping highlight`;
    logger.warn(message, { code: "highlight_column_not_found", filePath });
    await saveWorkbook(workbook, filePath);
    return {
      status: "column_not_found",
      highlightedRows: [],
      issue: { code: "highlight_column_not_found", message, column: options.flagColumn }
    };
  }

  const fill: ExcelJS.Fill = {
    type: "pattern",
    pattern: "solid",
    fgColor: { argb: options.fillArgb ?? DEFAULT_HIGHLIGHT_ARGB },
    bgColor: { argb: options.fillArgb ?? DEFAULT_HIGHLIGHT_ARGB }
  };
  const columnCount = sheet.columnCount;
  const highlightedRows: number[] = [];

  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
    const row = sheet.getRow(rowNumber);
    if (!parseFlagCell(row.getCell(flagColumn).value)) {
      continue;
    }
    for (let column = 1; column <= columnCount; column += 1) {
      row.getCell(column).fill = fill;
    }
    highlightedRows.push(rowNumber);
  }

  await saveWorkbook(workbook, filePath);
  logger.info(`Applied highlights to ${highlightedRows.length} flagged rows in ${filePath}`);
  return { status: "applied", highlightedRows };
}
