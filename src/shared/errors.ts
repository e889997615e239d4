/**
 * Portal Error Taxonomy
 *
 * Every failure the portal pipeline can hit is one of these classes, told
 * apart by `kind`. All of them are scoped to a single account except
 * `ConfigError`, which stops the run before any account is processed.
 */

export type PortalErrorKind =
  | 'network'
  | 'auth'
  | 'protocol'
  | 'extraction'
  | 'persistence'
  | 'config';

export type HandshakePath = 'direct' | 'two-hop';

export abstract class PortalError extends Error {
  abstract readonly kind: PortalErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport failure, timeout or unexpected HTTP status. */
export class NetworkError extends PortalError {
  readonly kind = 'network';
  readonly status?: number;

  constructor(message: string, input: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: input.cause });
    this.status = input.status;
  }
}

/** The portal did not accept the credentials. */
export class AuthError extends PortalError {
  readonly kind = 'auth';
  readonly status: number;
  /** First characters of the response body, for diagnostics */
  readonly excerpt: string;

  constructor(message: string, input: { status: number; excerpt: string }) {
    super(message);
    this.status = input.status;
    this.excerpt = input.excerpt;
  }
}

/**
 * Expected markup or token missing. Usually means the portal changed
 * shape rather than the password being wrong.
 */
export class ProtocolError extends PortalError {
  readonly kind = 'protocol';
  readonly stage: HandshakePath;
  readonly snippet: string;

  constructor(message: string, input: { stage: HandshakePath; snippet: string }) {
    super(message);
    this.stage = input.stage;
    this.snippet = input.snippet;
  }
}

/** The grades trigger link or its arguments could not be found. */
export class ExtractionError extends PortalError {
  readonly kind = 'extraction';
  readonly snippet?: string;

  constructor(message: string, input: { snippet?: string } = {}) {
    super(message);
    this.snippet = input.snippet;
  }
}

export class PersistenceError extends PortalError {
  readonly kind = 'persistence';
  readonly accountId: string;

  constructor(message: string, input: { accountId: string; cause?: unknown }) {
    super(message, { cause: input.cause });
    this.accountId = input.accountId;
  }
}

export class ConfigError extends PortalError {
  readonly kind = 'config';
  readonly missing: string[];

  constructor(message: string, input: { missing: string[] }) {
    super(message);
    this.missing = input.missing;
  }
}

export function isPortalError(error: unknown): error is PortalError {
  return error instanceof PortalError;
}

/**
 * Wrap anything thrown by the transport into a NetworkError, leaving
 * portal errors untouched.
 */
export function toPortalError(error: unknown): PortalError {
  if (isPortalError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, { cause: error });
}
