/**
 * Error types raised inside a fetch and converted to record status by the adapters.
 */

/** An accession that does not have the shape its adapter expects. */
export class InvalidAccessionError extends Error {
  readonly accession: string;

  constructor(accession: string, archive: string) {
    super(`Invalid ${archive} accession: ${accession}`);
    this.name = "InvalidAccessionError";
    this.accession = accession;
  }
}

/** Invalid or missing configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Render any thrown value as a message. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
