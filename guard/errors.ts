/**
 * Guard errors
 *
 * Only failures that abort a call are modeled as errors. Span-level and
 * language-level anomalies are reported as diagnostics instead.
 */

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A detector threw or rejected. The anonymize call produces no output.
 */
export class DetectorFailureError extends Error {
  readonly detector: string;

  constructor(detector: string, cause: unknown) {
    super(`Detector "${detector}" failed: ${describe(cause)}`, { cause });
    this.name = "DetectorFailureError";
    this.detector = detector;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
