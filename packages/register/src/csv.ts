import type { CellValue } from "./types";

export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let current = "";
  let insideQuotes = false;
  let fieldStarted = false;

  const endRecord = (): void => {
    record.push(current);
    const isBlank = record.length === 1 && record[0].trim().length === 0 && !fieldStarted;
    if (!isBlank) {
      records.push(record);
    }
    record = [];
    current = "";
    fieldStarted = false;
  };

  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  for (let index = 0; index < source.length; index += 1) {
    const char = source[index];
    if (insideQuotes) {
      if (char === "\"") {
        if (source[index + 1] === "\"") {
          current += "\"";
          index += 1;
        } else {
          insideQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === "\"") {
      insideQuotes = true;
      fieldStarted = true;
      continue;
    }
    if (char === ",") {
      record.push(current);
      current = "";
      fieldStarted = true;
      continue;
    }
    if (char === "\r" && source[index + 1] === "\n") {
      continue;
    }
    if (char === "\n" || char === "\r") {
      endRecord();
      continue;
    }
    current += char;
  }

  if (current.length > 0 || record.length > 0 || fieldStarted) {
    endRecord();
  }
  return records;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatIsoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function formatCsvValue(value: CellValue): string {
  if (value === null) {
    return "";
  }
  if (value instanceof Date) {
    return formatIsoDate(value);
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, "\"\"")}"`;
  }
  return text;
}

export function formatCsv(columns: readonly string[], rows: ReadonlyArray<Record<string, CellValue>>): string {
  const lines = [
    columns.map(formatCsvValue).join(","),
    ...rows.map((row) => columns.map((column) => formatCsvValue(row[column] ?? null)).join(","))
  ];
  return `${lines.join("\n")}\n`;
}
