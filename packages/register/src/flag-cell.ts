export type FlagCell =
  | { kind: "boolean"; value: boolean }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "other" };

const TRUTHY_STRINGS = new Set(["true", "1", "yes"]);

function hasResult(value: object): value is { result: unknown } {
  return "result" in value;
}

export function classifyFlagCell(value: unknown): FlagCell {
  if (typeof value === "boolean") {
    return { kind: "boolean", value };
  }
  if (typeof value === "number") {
    return { kind: "number", value };
  }
  if (typeof value === "string") {
    return { kind: "string", value };
  }
  // formula cells carry their cached value in `result`
  if (typeof value === "object" && value !== null && !(value instanceof Date) && hasResult(value)) {
    return classifyFlagCell(value.result);
  }
  return { kind: "other" };
}

export function isFlagSet(cell: FlagCell): boolean {
  switch (cell.kind) {
    case "boolean":
      return cell.value;
    case "number":
      return cell.value === 1;
    case "string":
      return TRUTHY_STRINGS.has(cell.value.trim().toLowerCase());
    case "other":
      return false;
  }
}

export function parseFlagCell(value: unknown): boolean {
  return isFlagSet(classifyFlagCell(value));
}
