import fs from "node:fs";
import path from "node:path";

import * as XLSX from "xlsx";

import { resolveFirstExisting, type ExistsProbe } from "./candidate-resolver";
import { parseCsv } from "./csv";
import { InputNotFoundError } from "./errors";
import type { Logger } from "./logger";
import {
  REQUIRED_COLUMNS,
  type CellValue,
  type RegisterIssue,
  type RegisterRow,
  type RegisterTable
} from "./types";

const SPREADSHEET_EXTENSIONS = new Set([".xlsx", ".xlsm", ".xls"]);

export type LoadRegisterOptions = {
  logger: Logger;
  exists?: ExistsProbe;
};

export type LoadRegisterResult = {
  table: RegisterTable;
  sourcePath: string;
  issues: RegisterIssue[];
};

function normalizeHeaders(raw: unknown[]): string[] {
  return raw.map((value, index) => {
    const header = value === null || value === undefined ? "" : String(value).trim();
    return header.length > 0 ? header : `Column ${index + 1}`;
  });
}

function toCellValue(value: unknown): CellValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  return String(value);
}

function buildTable(matrix: unknown[][]): RegisterTable {
  if (matrix.length === 0) {
    return { columns: [], rows: [] };
  }

  const columns = normalizeHeaders(matrix[0]);
  const rows = matrix.slice(1).map((line) => {
    const row: RegisterRow = {};
    for (let index = 0; index < columns.length; index += 1) {
      row[columns[index]] = toCellValue(line[index]);
    }
    return row;
  });
  return { columns, rows };
}

function readCsvTable(filePath: string): RegisterTable {
  const records = parseCsv(fs.readFileSync(filePath, "utf8"));
  return buildTable(records.map((record) => record.map((cell) => (cell.length === 0 ? null : cell))));
}

const SERIAL_EPOCH_UTC = Date.UTC(1899, 11, 30);
const DATE1904_OFFSET_DAYS = 1462;

/**
 * Converts a spreadsheet date serial to a local Date with the same wall-clock
 * components. The 1900 system counts a nonexistent 1900-02-29 as serial 60.
 */
export function serialToDate(serial: number, date1904 = false): Date {
  const days = date1904 ? serial + DATE1904_OFFSET_DAYS : serial < 60 ? serial + 1 : serial;
  const wall = new Date(SERIAL_EPOCH_UTC + Math.round(days * 86_400) * 1000);
  return new Date(
    wall.getUTCFullYear(),
    wall.getUTCMonth(),
    wall.getUTCDate(),
    wall.getUTCHours(),
    wall.getUTCMinutes(),
    wall.getUTCSeconds()
  );
}

function readSheetCell(cell: XLSX.CellObject | undefined, date1904: boolean): CellValue {
  if (!cell || cell.t === "z" || cell.t === "e") {
    return null;
  }
  if (cell.t === "n" && typeof cell.v === "number" && typeof cell.z === "string" && XLSX.SSF.is_date(cell.z)) {
    return serialToDate(cell.v, date1904);
  }
  return toCellValue(cell.v);
}

function readSpreadsheetTable(filePath: string): RegisterTable {
  // Dates are read as serials: the library's Date conversion can land seconds before local midnight.
  const workbook = XLSX.read(fs.readFileSync(filePath), { type: "buffer", cellDates: false, cellNF: true });
  const firstSheetName = workbook.SheetNames[0];
  const sheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
  const ref = sheet?.["!ref"];
  if (!sheet || !ref) {
    return { columns: [], rows: [] };
  }

  const date1904 = workbook.Workbook?.WBProps?.date1904 === true;
  const range = XLSX.utils.decode_range(ref);
  const matrix: CellValue[][] = [];
  for (let r = range.s.r; r <= range.e.r; r += 1) {
    const line: CellValue[] = [];
    for (let c = range.s.c; c <= range.e.c; c += 1) {
      const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
      line.push(readSheetCell(cell, date1904));
    }
    if (line.some((value) => value !== null)) {
      matrix.push(line);
    }
  }
  return buildTable(matrix);
}

export function readRegisterTable(filePath: string): RegisterTable {
  const extension = path.extname(filePath).toLowerCase();
  if (SPREADSHEET_EXTENSIONS.has(extension)) {
    return readSpreadsheetTable(filePath);
  }
  return readCsvTable(filePath);
}

export function completeRequiredColumns(
  table: RegisterTable,
  logger: Logger
): { table: RegisterTable; issues: RegisterIssue[] } {
  const issues: RegisterIssue[] = [];
  const columns = [...table.columns];
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));

  for (const column of missing) {
    const message = `Column missing: ${column} - creating empty column`;
    logger.warn(message, { code: "schema_incomplete", column });
    issues.push({ code: "schema_incomplete", message, column });
    columns.push(column);
  }

  if (missing.length === 0) {
    return { table, issues };
  }

  const rows = table.rows.map((row) => {
    const completed: RegisterRow = { ...row };
    for (const column of missing) {
      completed[column] = null;
    }
    return completed;
  });
  return { table: { columns, rows }, issues };
}

export function loadRegister(
  candidates: readonly string[],
  options: LoadRegisterOptions
): LoadRegisterResult {
  const { logger } = options;
  let sourcePath: string;
  try {
    sourcePath = resolveFirstExisting(candidates, options.exists).path;
  } catch (error) {
    if (error instanceof InputNotFoundError) {
      logger.error(`No input found. Looked for: ${error.candidates.join(", ")}`);
    }
    throw error;
  }

  logger.info(`Loading ${sourcePath}`);
  const raw = readRegisterTable(sourcePath);
  const { table, issues } = completeRequiredColumns(raw, logger);
  logger.info(`Loaded ${table.rows.length} rows`, { columns: table.columns.length });
  return { table, sourcePath, issues };
}
