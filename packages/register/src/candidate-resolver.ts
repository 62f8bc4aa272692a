import fs from "node:fs";

import { InputNotFoundError } from "./errors";

export type ResolvedCandidate = {
  path: string;
  index: number;
};

export type ExistsProbe = (candidate: string) => boolean;

export function resolveFirstExisting(
  candidates: readonly string[],
  exists: ExistsProbe = fs.existsSync
): ResolvedCandidate {
  for (let index = 0; index < candidates.length; index += 1) {
    if (exists(candidates[index])) {
      return { path: candidates[index], index };
    }
  }
  throw new InputNotFoundError([...candidates]);
}
