import { describe, expect, it, vi } from "vitest";

import { createConsoleLogger, createMemoryLogger } from "./logger";

function createSink() {
  return { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("logger", () => {
  it("prefixes lines with the level and passes structured data through", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink });

    logger.info("Loading data/register.csv");
    logger.warn("Column missing: Service - creating empty column", { code: "schema_incomplete" });

    expect(sink.log).toHaveBeenCalledWith("[INFO] Loading data/register.csv");
    expect(sink.warn).toHaveBeenCalledWith("[WARN] Column missing: Service - creating empty column", {
      code: "schema_incomplete"
    });
  });

  it("drops entries below the configured level", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ level: "warn", sink });

    logger.debug("detail");
    logger.info("progress");
    logger.error("failed", new Error("boom"));

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledTimes(1);
    expect(sink.error.mock.calls[0][1]).toMatchObject({ message: "boom" });
  });

  it("records entries in memory for inspection", () => {
    const logger = createMemoryLogger();
    logger.info("first");
    logger.warn("second", { column: "Service" });

    expect(logger.entries).toEqual([
      { level: "info", message: "first" },
      { level: "warn", message: "second", data: { column: "Service" } }
    ]);
    expect(logger.messages("warn")).toEqual(["second"]);
  });
});
