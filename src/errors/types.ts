/**
 * Error type definitions for the kbrag CLI
 *
 * These error classes carry:
 * - a recovery hint shown to the user
 * - an exit code for scripts wrapping the CLI
 */

/**
 * Base class for all CLI errors.
 *
 * `hint` tells the user how to fix the problem, `code` becomes the
 * process exit code.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - A required locator (knowledge base id, region) is not configured
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: kbrag config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level issues.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
