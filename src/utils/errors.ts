/**
 * Error types raised by the matching engine.
 *
 * Only NotFittedError is expected to cross a component boundary in normal
 * operation: the caller resolves it by training the model. Unknown clients
 * and empty histories are not errors and come back as empty results.
 */

export class NotFittedError extends Error {
  constructor(component: string) {
    super(`${component} must be fitted before use — call train() first`);
    this.name = "NotFittedError";
  }
}

export class EmptyCorpusError extends Error {
  constructor() {
    super("Cannot fit on an empty freelancer corpus");
    this.name = "EmptyCorpusError";
  }
}

export class MalformedBudgetError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Malformed budget: ${issues.join("; ")}`);
    this.name = "MalformedBudgetError";
    this.issues = issues;
  }
}

export class InvalidWeightError extends Error {
  constructor(weight: number) {
    super(`Collaborative weight must be between 0 and 1, got ${weight}`);
    this.name = "InvalidWeightError";
  }
}

export class CorpusLoadError extends Error {
  constructor(path: string, reason: string) {
    super(`Could not load corpus from ${path}: ${reason}`);
    this.name = "CorpusLoadError";
  }
}

export class InvalidJobError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid job: ${issues.join("; ")}`);
    this.name = "InvalidJobError";
    this.issues = issues;
  }
}
