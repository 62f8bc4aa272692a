export class InputNotFoundError extends Error {
  readonly candidates: string[];

  constructor(candidates: string[]) {
    super(`Input file not found. Looked for: ${candidates.join(", ")}`);
    this.name = "InputNotFoundError";
    this.candidates = candidates;
  }
}
