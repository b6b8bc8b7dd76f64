/**
 * errors.ts — Fatal error taxonomy.
 *
 * Every fatal path throws a PluginError; the CLI turns it into the process
 * exit code.  Missing fields are not errors: extractors return null.
 */

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export class PluginError extends Error {
  readonly exitCode: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = EXIT_FAILURE;
  }
}

/** Credentials rejected, secret missing, or the session cannot be re-established. */
export class AuthenticationError extends PluginError {}

/** Router unreachable, timed out, or answered with an unexpected HTTP status. */
export class TransportError extends PluginError {}

/** Unknown or missing metric selector. */
export class UsageError extends PluginError {}
