import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * A single store line or source record that cannot be parsed.
 * Callers count and skip these; they never abort a run.
 */
export class MalformedRecordError extends AppError {
  public readonly lineNumber: number;

  constructor(message = "Malformed record", lineNumber: number, options?: ErrorExtras) {
    super({
      message,
      code: "MALFORMED_RECORD",
      details: options?.details,
      cause: options?.cause,
    });
    this.lineNumber = lineNumber;
  }
}

/** A file produced by an earlier stage is absent. */
export class UpstreamMissingError extends AppError {
  public readonly path: string;

  constructor(path: string, stage: string, options?: ErrorExtras) {
    super({
      message: `Input file not found: ${path}`,
      code: "UPSTREAM_MISSING",
      exitCode: 2,
      hint: `Run \`wikindex ${stage}\` first.`,
      details: options?.details,
      cause: options?.cause,
    });
    this.path = path;
  }
}

/** An optional library needed by the selected backend is not installed. */
export class DependencyUnavailableError extends AppError {
  public readonly packageName: string;

  constructor(packageName: string, purpose: string, options?: ErrorExtras) {
    super({
      message: `${packageName} is required for ${purpose} but could not be loaded`,
      code: "DEPENDENCY_UNAVAILABLE",
      exitCode: 3,
      hint: `Install it with: npm install ${packageName}`,
      details: options?.details,
      cause: options?.cause,
    });
    this.packageName = packageName;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({
      message,
      code: "VALIDATION_ERROR",
      exitCode: 4,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

/**
 * A call to the embedding backend or vector index failed.
 * Not retried inline: re-running the stage is the recovery path.
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      code: "EXTERNAL_SERVICE_ERROR",
      exitCode: 5,
      hint: "Re-run the command; completed batches are skipped on resume.",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

/** Extract a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
