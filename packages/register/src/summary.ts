import { RISK_CATEGORIES, type FlaggedRegister, type RiskCategory } from "./types";

export type RegisterSummary = {
  totalRows: number;
  highRiskCount: number;
  needsReviewCount: number;
  categoryCounts: Array<{ category: RiskCategory; count: number }>;
};

export function isHighRisk(score: number | null, highThreshold: number): boolean {
  return score !== null && score >= highThreshold;
}

export function summarizeRegister(register: FlaggedRegister, highThreshold: number): RegisterSummary {
  const counts = new Map<RiskCategory, number>();
  let highRiskCount = 0;
  let needsReviewCount = 0;

  for (const record of register.records) {
    counts.set(record.riskCategory, (counts.get(record.riskCategory) ?? 0) + 1);
    if (isHighRisk(record.riskScore, highThreshold)) {
      highRiskCount += 1;
    }
    if (record.needsReview) {
      needsReviewCount += 1;
    }
  }

  return {
    totalRows: register.records.length,
    highRiskCount,
    needsReviewCount,
    categoryCounts: RISK_CATEGORIES.map((category) => ({ category, count: counts.get(category) ?? 0 }))
  };
}
