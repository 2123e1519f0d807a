/**
 * Errors raised by the analysis engine
 */

/**
 * A programming defect: the engine reached a state that correct construction
 * of the fact model rules out. The whole run is aborted.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class AnalysisAbortedError extends Error {
  readonly completedPackages: number;

  constructor(completedPackages: number, reason?: unknown) {
    const detail = reason instanceof Error ? `: ${reason.message}` : '';
    super(`Analysis aborted after ${completedPackages} package(s)${detail}`);
    this.name = 'AnalysisAbortedError';
    this.completedPackages = completedPackages;
  }
}
