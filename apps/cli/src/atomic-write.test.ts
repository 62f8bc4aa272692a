import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ensureOutputDir, writeFileAtomic } from "./atomic-write";

const tempRoots: string[] = [];

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "riskreg-write-"));
  tempRoots.push(dir);
  return dir;
}

describe("atomic file writes", () => {
  afterEach(() => {
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("creates nested output directories and tolerates existing ones", () => {
    const outDir = path.join(createTempDir(), "reports", "2024");
    ensureOutputDir(outDir);
    ensureOutputDir(outDir);

    expect(fs.statSync(outDir).isDirectory()).toBe(true);
  });

  it("replaces the target and leaves no temp files behind", () => {
    const dir = createTempDir();
    const target = path.join(dir, "high_risk.csv");
    writeFileAtomic(target, "first\n");
    writeFileAtomic(target, "second\n");

    expect(fs.readFileSync(target, "utf8")).toBe("second\n");
    expect(fs.readdirSync(dir)).toEqual(["high_risk.csv"]);
  });

  it("keeps the previous artifact when the write fails", () => {
    const dir = createTempDir();
    const target = path.join(dir, "needs_review.csv");
    writeFileAtomic(target, "valid\n");
    // a directory in place of the target makes the rename fail
    const blocked = path.join(dir, "blocked");
    fs.mkdirSync(path.join(blocked, "child"), { recursive: true });

    expect(() => writeFileAtomic(blocked, "data")).toThrow();
    expect(fs.readFileSync(target, "utf8")).toBe("valid\n");
    expect(fs.readdirSync(dir).sort()).toEqual(["blocked", "needs_review.csv"]);
  });
});
