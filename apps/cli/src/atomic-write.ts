import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function ensureOutputDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Writes through a sibling temp file and renames it over the target, so an
 * interrupted write never replaces a previous artifact with a partial one.
 */
export function writeFileAtomic(filePath: string, data: string | Uint8Array): void {
  const token = crypto.randomBytes(4).toString("hex");
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${token}.tmp`);
  try {
    fs.writeFileSync(tempPath, data);
    fs.renameSync(tempPath, filePath);
  } finally {
    fs.rmSync(tempPath, { force: true });
  }
}
