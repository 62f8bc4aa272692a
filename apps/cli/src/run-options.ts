import path from "node:path";

import { z } from "zod";

export const DEFAULT_INPUT_CANDIDATES = [
  path.join("data", "vendor_register_template.xlsx"),
  path.join("data", "vendor_register_template.csv")
];

export type RunOptions = {
  inputCandidates: string[];
  outDir: string;
  daysThreshold: number;
  highThreshold: number;
  fillArgb: string;
};

export type CliCommand = { kind: "help" } | { kind: "run"; options: RunOptions };

export class RunOptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`);
    this.name = "RunOptionsError";
    this.issues = issues;
  }
}

const integerText = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "must be an integer")
  .transform((value) => Number.parseInt(value, 10));

const rawOptionsSchema = z.object({
  input: z.string().trim().min(1).optional(),
  outdir: z.string().trim().min(1).default("outputs"),
  days: integerText.pipe(z.number().int().nonnegative()).default("365"),
  threshold: integerText.pipe(z.number().int().min(0).max(100)).default("80"),
  fill: z
    .string()
    .trim()
    .regex(/^(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, "must be a 6 or 8 digit hex colour")
    .transform((value) => (value.length === 6 ? `FF${value}` : value).toUpperCase())
    .default("FFF2CC")
});

type RawOptionName = keyof z.input<typeof rawOptionsSchema>;

const FLAG_NAMES = new Map<string, RawOptionName>([
  ["--input", "input"],
  ["-i", "input"],
  ["--outdir", "outdir"],
  ["-o", "outdir"],
  ["--days", "days"],
  ["-d", "days"],
  ["--threshold", "threshold"],
  ["-t", "threshold"],
  ["--fill", "fill"]
]);

export const USAGE = `Vendor register analysis + flagging

Usage:
  riskreg [--input <file>] [--outdir <dir>] [--days <n>] [--threshold <n>] [--fill <hex>]

Options:
  -i, --input      Input file (xlsx or csv); defaults to data/vendor_register_template.xlsx, then .csv
  -o, --outdir     Output directory (default: outputs)
  -d, --days       Days threshold for Needs Review (default: 365)
  -t, --threshold  High risk threshold (default: 80)
      --fill       Highlight colour for rows needing review (default: FFF2CC)
  -h, --help       Show this message
`;

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const raw: Partial<Record<RawOptionName, string>> = {};
  const problems: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    const equalsAt = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = equalsAt > 0 ? arg.slice(0, equalsAt) : arg;
    const name = FLAG_NAMES.get(flag);
    if (!name) {
      problems.push(`unknown option ${arg}`);
      continue;
    }

    if (equalsAt > 0) {
      raw[name] = arg.slice(equalsAt + 1);
      continue;
    }
    const value = argv[index + 1];
    if (value === undefined) {
      problems.push(`${flag} requires a value`);
      continue;
    }
    raw[name] = value;
    index += 1;
  }

  const parsed = rawOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    problems.push(
      ...parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"} ${issue.message}`)
    );
  }
  if (problems.length > 0 || !parsed.success) {
    throw new RunOptionsError(problems);
  }

  const options = parsed.data;
  return {
    kind: "run",
    options: {
      inputCandidates: options.input ? [options.input] : [...DEFAULT_INPUT_CANDIDATES],
      outDir: options.outdir,
      daysThreshold: options.days,
      highThreshold: options.threshold,
      fillArgb: options.fill
    }
  };
}
