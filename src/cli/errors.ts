export interface CliErrorOptions {
  isUserError?: boolean;
  cause?: unknown;
}

/**
 * Error surfaced by the CLI. User errors are printed without the `Error:`
 * prefix since they describe bad input rather than a failure of the tool.
 */
export class CliError extends Error {
  readonly isUserError: boolean;

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.isUserError = options.isUserError ?? false;
  }
}
