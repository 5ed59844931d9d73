/**
 * Every failure the CLI reports carries the exit status the process should end with.
 */
export class ReportError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** A required external tool (kubectl) cannot be executed. */
export class MissingDependencyError extends ReportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 1, options);
  }
}

/** Unknown or malformed command-line arguments, or an invalid config file. */
export class UsageError extends ReportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 2, options);
  }
}

/** A resource listing failed. The exit code is kubectl's own status when it has one. */
export class UpstreamQueryError extends ReportError {
  readonly resource: string;

  constructor(resource: string, message: string, exitCode = 1, options?: ErrorOptions) {
    super(message, exitCode > 0 ? exitCode : 1, options);
    this.resource = resource;
  }
}

export class OutputWriteError extends ReportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 1, options);
  }
}

export const exitCodeFor = (error: unknown): number => (error instanceof ReportError ? error.exitCode : 1);

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
