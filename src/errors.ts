/**
 * pgwire-probe error types.
 *
 * Every failure a session can hit is funneled into one of the subclasses
 * below, one per origin. The `kind` discriminant lets the CLI render a
 * distinct message per origin while `cause` keeps the underlying error.
 */

export type ErrorKind =
  | "io"
  | "parse"
  | "tls-handshake"
  | "tls"
  | "protocol"
  | "config";

/** Base error for all pgwire-probe errors. */
export abstract class PgProbeError extends Error {
  override readonly name: string = "PgProbeError";
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Socket-level failure: connect, read, write, timeout, or the peer
 * closing the stream before a full message arrived.
 */
export class IoError extends PgProbeError {
  override readonly name = "IoError";
  readonly kind = "io";
}

/** A backend message whose bytes do not match its declared shape. */
export class ParseError extends PgProbeError {
  override readonly name = "ParseError";
  readonly kind = "parse";
}

export class TlsHandshakeError extends PgProbeError {
  override readonly name = "TlsHandshakeError";
  readonly kind = "tls-handshake";
}

/** Failure on the TLS session after the handshake completed. */
export class TlsError extends PgProbeError {
  override readonly name = "TlsError";
  readonly kind = "tls";
}

/** The server answered with something the handshake does not allow. */
export class ProtocolViolationError extends PgProbeError {
  override readonly name = "ProtocolViolationError";
  readonly kind = "protocol";
}

/**
 * Missing or invalid configuration, raised before any network activity.
 *
 * Carries one entry per offending setting in `issues`.
 */
export class ConfigError extends PgProbeError {
  override readonly name = "ConfigError";
  readonly kind = "config";
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: ErrorOptions) {
    super(`invalid configuration: ${issues.join("; ")}`, options);
    this.issues = issues;
  }
}

/** Render an error as the one-line description the CLI prints. */
export function describeError(err: unknown): string {
  if (err instanceof PgProbeError) {
    return `${err.kind}: ${err.message}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
