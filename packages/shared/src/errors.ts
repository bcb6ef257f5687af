export type ReportingErrorCode = "CONFIGURATION" | "INPUT" | "IO";

export abstract class ReportingError extends Error {
  abstract readonly code: ReportingErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ReportingError {
  readonly code = "CONFIGURATION" as const;
}

export class InputError extends ReportingError {
  readonly code = "INPUT" as const;
}

export class IOError extends ReportingError {
  readonly code = "IO" as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Process exit status per error class; anything unclassified exits 1.
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError) return 2;
  if (error instanceof InputError) return 3;
  if (error instanceof IOError) return 4;
  return 1;
}
