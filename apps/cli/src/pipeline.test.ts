import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { createMemoryLogger, flagRegister, InputNotFoundError, loadRegister, parseCsv } from "@riskreg/register";
import { afterEach, describe, expect, it } from "vitest";

import type { ChartRasterizer } from "./chart-renderer";
import { runPipeline } from "./pipeline";
import type { RunOptions } from "./run-options";

const tempRoots: string[] = [];

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "riskreg-pipeline-"));
  tempRoots.push(dir);
  return dir;
}

function createCsv(filePath: string, lines: string[]): void {
  fs.writeFileSync(filePath, `${lines.join("\n")}\n`, "utf8");
}

const fakeRasterizer: ChartRasterizer = {
  renderPng: async () => Buffer.from("png-binary")
};

function optionsFor(dir: string, inputPath: string): RunOptions {
  return {
    inputCandidates: [inputPath],
    outDir: path.join(dir, "outputs"),
    daysThreshold: 365,
    highThreshold: 80,
    fillArgb: "FFFFF2CC"
  };
}

describe("register pipeline", () => {
  afterEach(() => {
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("produces every artifact from a csv register", async () => {
    const dir = createTempDir();
    const inputPath = path.join(dir, "vendor_register_template.csv");
    createCsv(inputPath, [
      "Vendor Name,Service,Risk Score,Assessment Date,Remediation Status",
      "Acme Hosting,Hosting,92,2024-05-01,Open",
      "Bolt Payroll,Payroll,55,2022-01-01,Closed",
      "Cirrus CRM,CRM,unknown,2024-04-10,"
    ]);
    const logger = createMemoryLogger();

    const result = await runPipeline(optionsFor(dir, inputPath), {
      logger,
      rasterizer: fakeRasterizer,
      evaluationDate: new Date(2024, 5, 1)
    });

    const outDir = path.join(dir, "outputs");
    expect(fs.readdirSync(outDir).sort()).toEqual([
      "high_risk.csv",
      "needs_review.csv",
      "remediation_status_pie.png",
      "top5_high_risk.png",
      "vendor_register_flagged.xlsx"
    ]);
    expect(result.sourcePath).toBe(inputPath);
    expect(result.summary).toEqual({
      totalRows: 3,
      highRiskCount: 1,
      needsReviewCount: 1,
      categoryCounts: [
        { category: "High", count: 1 },
        { category: "Medium", count: 1 },
        { category: "Low", count: 0 },
        { category: "Unknown", count: 1 }
      ]
    });
    expect(result.issues.map((issue) => issue.code)).toEqual(["value_coercion"]);
    expect(result.reports.highlight.highlightedRows).toEqual([3]);
    expect(logger.messages("info")).toContain("High risk (>=80): 1");
    expect(logger.messages("info")).toContain("Risk categories: High=1, Medium=1, Low=0, Unknown=1");
  });

  it("flags its own spreadsheet output to the same values", async () => {
    const dir = createTempDir();
    const inputPath = path.join(dir, "register.csv");
    createCsv(inputPath, [
      "Vendor Name,Service,Risk Score,Assessment Date,Remediation Status",
      "Acme Hosting,Hosting,92,2024-05-01,Open",
      "Bolt Payroll,Payroll,55,2023-06-02,Closed",
      "Cirrus CRM,CRM,30,2023-06-01,Open"
    ]);
    const evaluationDate = new Date(2024, 5, 1);

    const result = await runPipeline(optionsFor(dir, inputPath), {
      logger: createMemoryLogger(),
      rasterizer: fakeRasterizer,
      evaluationDate
    });
    const reloaded = loadRegister([result.reports.workbookPath], { logger: createMemoryLogger() });
    const reflagged = flagRegister(reloaded.table, { daysThreshold: 365, highThreshold: 80, evaluationDate });

    expect(reloaded.table.columns).toEqual([
      "Vendor Name",
      "Service",
      "Risk Score",
      "Assessment Date",
      "Remediation Status",
      "Days Since Review",
      "Needs Review",
      "Risk Category"
    ]);
    expect(reflagged.issues).toEqual([]);
    expect(
      reflagged.records.map((record) => [
        record.assessmentDate?.toISOString(),
        record.daysSinceReview,
        record.needsReview,
        record.riskCategory
      ])
    ).toEqual([
      ["2024-05-01T00:00:00.000Z", 31, false, "High"],
      ["2023-06-02T00:00:00.000Z", 365, false, "Medium"],
      ["2023-06-01T00:00:00.000Z", 366, true, "Low"]
    ]);
  });

  it("completes a run when the assessment date column is absent", async () => {
    const dir = createTempDir();
    const inputPath = path.join(dir, "register.csv");
    createCsv(inputPath, [
      "Vendor Name,Service,Risk Score,Remediation Status",
      "Acme Hosting,Hosting,92,Open",
      "Bolt Payroll,Payroll,30,Closed"
    ]);

    const result = await runPipeline(optionsFor(dir, inputPath), {
      logger: createMemoryLogger(),
      rasterizer: fakeRasterizer,
      evaluationDate: new Date(2024, 5, 1)
    });

    expect(result.issues).toEqual([
      {
        code: "schema_incomplete",
        message: "Column missing: Assessment Date - creating empty column",
        column: "Assessment Date"
      }
    ]);
    expect(result.summary.needsReviewCount).toBe(2);
    expect(result.reports.highlight.highlightedRows).toEqual([2, 3]);

    const needsReview = parseCsv(fs.readFileSync(result.reports.needsReviewPath, "utf8"));
    expect(needsReview[0]).toEqual([
      "Vendor Name",
      "Service",
      "Risk Score",
      "Remediation Status",
      "Assessment Date",
      "Days Since Review",
      "Needs Review",
      "Risk Category"
    ]);
    expect(needsReview.slice(1).map((record) => record[6])).toEqual(["True", "True"]);
  });

  it("aborts before writing anything when the input is missing", async () => {
    const dir = createTempDir();

    await expect(
      runPipeline(optionsFor(dir, path.join(dir, "missing.xlsx")), {
        logger: createMemoryLogger(),
        rasterizer: fakeRasterizer
      })
    ).rejects.toBeInstanceOf(InputNotFoundError);
    expect(fs.existsSync(path.join(dir, "outputs"))).toBe(false);
  });
});
