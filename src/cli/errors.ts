export interface CliErrorOptions {
  /** User errors print their message alone; others get an `Error:` prefix */
  isUserError?: boolean;
  cause?: unknown;
}

export class CliError extends Error {
  readonly isUserError: boolean;

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.isUserError = options.isUserError ?? true;
  }
}

/**
 * The command line did not have the expected shape. The bootstrap prints the
 * attached usage text and exits with status 1.
 */
export class UsageError extends CliError {
  constructor(readonly usage: string, message = "Invalid arguments") {
    super(message);
    this.name = "UsageError";
  }
}

export interface SilentErrorOptions extends CliErrorOptions {
  exitCode?: number;
}

/**
 * Raised once the outcome has already been reported. Only the exit code is
 * left to apply.
 */
export class SilentError extends CliError {
  readonly exitCode: number;

  constructor(message = "", options: SilentErrorOptions = {}) {
    super(message, { isUserError: false, ...options });
    this.name = "SilentError";
    this.exitCode = options.exitCode ?? 0;
  }
}
