export { resolveFirstExisting, type ExistsProbe, type ResolvedCandidate } from "./candidate-resolver";
export { formatCsv, formatCsvValue, formatIsoDate, parseCsv } from "./csv";
export { InputNotFoundError } from "./errors";
export {
  categorizeRiskScore,
  coerceDate,
  coerceNumber,
  computeDaysSinceReview,
  computeNeedsReview,
  flagRegister,
  subtractDays,
  toCalendarDay,
  MEDIUM_RISK_FLOOR,
  type FlagOptions
} from "./flag-engine";
export { classifyFlagCell, isFlagSet, parseFlagCell, type FlagCell } from "./flag-cell";
export {
  completeRequiredColumns,
  loadRegister,
  readRegisterTable,
  serialToDate,
  type LoadRegisterOptions,
  type LoadRegisterResult
} from "./loader";
export {
  createConsoleLogger,
  createMemoryLogger,
  type ConsoleLoggerOptions,
  type LogEntry,
  type Logger,
  type LogLevel,
  type MemoryLogger
} from "./logger";
export { isHighRisk, summarizeRegister, type RegisterSummary } from "./summary";
export * from "./types";
