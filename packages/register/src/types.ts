export type CellValue = string | number | boolean | Date | null;

export type RegisterRow = Record<string, CellValue>;

export type RegisterTable = {
  columns: string[];
  rows: RegisterRow[];
};

export const VENDOR_NAME_COLUMN = "Vendor Name";
export const SERVICE_COLUMN = "Service";
export const RISK_SCORE_COLUMN = "Risk Score";
export const ASSESSMENT_DATE_COLUMN = "Assessment Date";
export const REMEDIATION_STATUS_COLUMN = "Remediation Status";

export const DAYS_SINCE_REVIEW_COLUMN = "Days Since Review";
export const NEEDS_REVIEW_COLUMN = "Needs Review";
export const RISK_CATEGORY_COLUMN = "Risk Category";

export const REQUIRED_COLUMNS = [
  VENDOR_NAME_COLUMN,
  SERVICE_COLUMN,
  RISK_SCORE_COLUMN,
  ASSESSMENT_DATE_COLUMN,
  REMEDIATION_STATUS_COLUMN
] as const;

export const DERIVED_COLUMNS = [
  DAYS_SINCE_REVIEW_COLUMN,
  NEEDS_REVIEW_COLUMN,
  RISK_CATEGORY_COLUMN
] as const;

export type RiskCategory = "High" | "Medium" | "Low" | "Unknown";

export const RISK_CATEGORIES: readonly RiskCategory[] = ["High", "Medium", "Low", "Unknown"];

export type VendorRecord = {
  rowNumber: number;
  vendorName: string | null;
  service: string | null;
  riskScore: number | null;
  assessmentDate: Date | null;
  remediationStatus: string | null;
  daysSinceReview: number | null;
  needsReview: boolean;
  riskCategory: RiskCategory;
  cells: RegisterRow;
};

export type IssueCode =
  | "schema_incomplete"
  | "value_coercion"
  | "highlight_sheet_not_found"
  | "highlight_column_not_found";

export type RegisterIssue = {
  code: IssueCode;
  message: string;
  column?: string;
  rowNumber?: number;
};

export type FlaggedRegister = {
  columns: string[];
  records: VendorRecord[];
  evaluationDate: Date;
  issues: RegisterIssue[];
};
