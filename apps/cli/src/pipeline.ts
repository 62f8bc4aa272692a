import path from "node:path";

import {
  flagRegister,
  loadRegister,
  summarizeRegister,
  type ExistsProbe,
  type Logger,
  type RegisterIssue,
  type RegisterSummary
} from "@riskreg/register";

import { renderCharts, type ChartRasterizer, type RenderChartsResult } from "./chart-renderer";
import { writeReports, type WriteReportsResult } from "./report-writer";
import type { RunOptions } from "./run-options";

export type PipelineDeps = {
  logger: Logger;
  rasterizer?: ChartRasterizer;
  evaluationDate?: Date;
  exists?: ExistsProbe;
};

export type PipelineResult = {
  sourcePath: string;
  summary: RegisterSummary;
  reports: WriteReportsResult;
  charts: RenderChartsResult;
  issues: RegisterIssue[];
};

function logSummary(logger: Logger, summary: RegisterSummary, highThreshold: number): void {
  logger.info(`Rows total: ${summary.totalRows}`);
  logger.info(`High risk (>=${highThreshold}): ${summary.highRiskCount}`);
  logger.info(`Needs review: ${summary.needsReviewCount}`);
  logger.info(
    `Risk categories: ${summary.categoryCounts.map((entry) => `${entry.category}=${entry.count}`).join(", ")}`
  );
}

export async function runPipeline(options: RunOptions, deps: PipelineDeps): Promise<PipelineResult> {
  const { logger } = deps;
  logger.info("Start analysis");

  const loaded = loadRegister(options.inputCandidates, { logger, exists: deps.exists });
  const register = flagRegister(loaded.table, {
    daysThreshold: options.daysThreshold,
    highThreshold: options.highThreshold,
    evaluationDate: deps.evaluationDate,
    logger
  });

  const summary = summarizeRegister(register, options.highThreshold);
  logSummary(logger, summary, options.highThreshold);

  const reports = await writeReports({
    register,
    outDir: options.outDir,
    highThreshold: options.highThreshold,
    fillArgb: options.fillArgb,
    logger
  });
  const charts = await renderCharts({
    register,
    outDir: options.outDir,
    logger,
    rasterizer: deps.rasterizer
  });

  const issues = [...loaded.issues, ...register.issues];
  if (reports.highlight.issue) {
    issues.push(reports.highlight.issue);
  }

  logger.info(`Done. Outputs are in: ${path.resolve(options.outDir)}`);
  return { sourcePath: loaded.sourcePath, summary, reports, charts, issues };
}
