import path from "node:path";

import type { FlaggedRegister, Logger, VendorRecord } from "@riskreg/register";
import * as echarts from "echarts";
import type { EChartsOption } from "echarts";

import { ensureOutputDir, writeFileAtomic } from "./atomic-write";

export const TOP_RISK_FILE = "top5_high_risk.png";
export const STATUS_PIE_FILE = "remediation_status_pie.png";
export const TOP_RISK_LIMIT = 5;
export const UNKNOWN_STATUS = "Unknown";
const UNNAMED_VENDOR = "(unnamed)";

export type ChartSize = {
  width: number;
  height: number;
};

export type ChartRasterizer = {
  renderPng: (svg: string, size: ChartSize) => Promise<Buffer>;
};

export type RenderChartsInput = {
  register: FlaggedRegister;
  outDir: string;
  logger: Logger;
  rasterizer?: ChartRasterizer;
};

export type RenderChartsResult = {
  topRiskPath: string | null;
  statusPiePath: string | null;
};

export type StatusCount = {
  status: string;
  count: number;
};

const BAR_SIZE: ChartSize = { width: 800, height: 400 };
const PIE_SIZE: ChartSize = { width: 600, height: 600 };

export const resvgRasterizer: ChartRasterizer = {
  async renderPng(svg, size) {
    const { Resvg } = await import("@resvg/resvg-js");
    const image = new Resvg(svg, {
      fitTo: { mode: "width", value: size.width },
      background: "white"
    });
    return image.render().asPng();
  }
};

/**
 * Highest scores first; records without a score sort after every scored one
 * and only fill the selection when fewer than `limit` scores exist.
 */
export function selectTopRisk(records: readonly VendorRecord[], limit = TOP_RISK_LIMIT): VendorRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((left, right) => {
      const a = left.record.riskScore;
      const b = right.record.riskScore;
      if (a === null || b === null) {
        if (a === b) {
          return left.index - right.index;
        }
        return a === null ? 1 : -1;
      }
      return b - a || left.index - right.index;
    })
    .slice(0, limit)
    .map((entry) => entry.record);
}

export function countRemediationStatuses(records: readonly VendorRecord[]): StatusCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const status = record.remediationStatus?.trim() || UNKNOWN_STATUS;
    counts.set(status, (counts.get(status) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so ties keep first-seen order
  return [...counts.entries()]
    .map(([status, count]) => ({ status, count }))
    .sort((left, right) => right.count - left.count);
}

export function buildTopRiskOption(records: readonly VendorRecord[]): EChartsOption {
  return {
    animation: false,
    backgroundColor: "#ffffff",
    title: { text: "Top 5 High Risk Vendors", left: "center" },
    grid: { left: 60, right: 30, top: 60, bottom: 80 },
    xAxis: {
      type: "category",
      data: records.map((record) => record.vendorName ?? UNNAMED_VENDOR),
      axisLabel: { interval: 0, rotate: 30 }
    },
    yAxis: { type: "value", name: "Risk Score" },
    series: [
      {
        type: "bar",
        data: records.map((record) => (record.riskScore === null ? "-" : record.riskScore))
      }
    ]
  };
}

export function buildStatusPieOption(counts: readonly StatusCount[]): EChartsOption {
  return {
    animation: false,
    backgroundColor: "#ffffff",
    title: { text: "Remediation Status Distribution", left: "center" },
    series: [
      {
        type: "pie",
        radius: "60%",
        percentPrecision: 0,
        label: { formatter: "{b}: {d}%" },
        data: counts.map((entry) => ({ name: entry.status, value: entry.count }))
      }
    ]
  };
}

export function renderChartSvg(option: EChartsOption, size: ChartSize): string {
  const chart = echarts.init(null, null, {
    renderer: "svg",
    ssr: true,
    width: size.width,
    height: size.height
  });
  try {
    chart.setOption(option);
    return chart.renderToSVGString();
  } finally {
    chart.dispose();
  }
}

async function writeChart(
  filePath: string,
  option: EChartsOption,
  size: ChartSize,
  rasterizer: ChartRasterizer
): Promise<void> {
  const png = await rasterizer.renderPng(renderChartSvg(option, size), size);
  writeFileAtomic(filePath, png);
}

export async function renderCharts(input: RenderChartsInput): Promise<RenderChartsResult> {
  const { register, outDir, logger } = input;
  const rasterizer = input.rasterizer ?? resvgRasterizer;
  ensureOutputDir(outDir);

  let topRiskPath: string | null = null;
  const topRisk = selectTopRisk(register.records);
  if (topRisk.length > 0) {
    topRiskPath = path.join(outDir, TOP_RISK_FILE);
    await writeChart(topRiskPath, buildTopRiskOption(topRisk), BAR_SIZE, rasterizer);
    logger.info(`Saved top5 chart: ${topRiskPath}`);
  } else {
    logger.info("No vendors to chart; skipping top5 chart");
  }

  let statusPiePath: string | null = null;
  const statusCounts = countRemediationStatuses(register.records);
  if (statusCounts.length > 0) {
    statusPiePath = path.join(outDir, STATUS_PIE_FILE);
    await writeChart(statusPiePath, buildStatusPieOption(statusCounts), PIE_SIZE, rasterizer);
    logger.info(`Saved remediation status pie: ${statusPiePath}`);
  } else {
    logger.info("No remediation statuses to chart; skipping pie chart");
  }

  return { topRiskPath, statusPiePath };
}
