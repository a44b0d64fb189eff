/**
 * Error taxonomy shared by the scraper, the store and the reconciler.
 *
 * Every error carries a category:
 *   transient  - retried where it happens, escalates when retries run out
 *   structural - aborts the current entity or mutation, the run continues
 *   session    - pauses extraction and triggers re-acquisition
 *   fatal      - aborts the whole run
 */

export type ErrorCategory = 'transient' | 'structural' | 'session' | 'fatal';

export class PorterError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.category = category;
  }
}

// ============================================
// SESSION / AUTH
// ============================================

export class AuthenticationError extends PorterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'session', options);
  }
}

export class SessionExpiredError extends PorterError {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Session expired (${reason}) at ${url}`, 'session');
    this.url = url;
  }
}

// ============================================
// EXTRACTION
// ============================================

export class ExtractionTimeout extends PorterError {
  readonly spec: string;
  readonly waitedMs: number;

  constructor(spec: string, waitedMs: number, missing: string[] = []) {
    const detail = missing.length > 0 ? ` (missing: ${missing.join(', ')})` : '';
    super(`Timed out after ${waitedMs}ms waiting for "${spec}"${detail}`, 'transient');
    this.spec = spec;
    this.waitedMs = waitedMs;
  }
}

export class StaleElementError extends PorterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transient', options);
  }
}

export class ExtractionSchemaError extends PorterError {
  readonly spec: string;
  readonly fields: string[];

  constructor(spec: string, fields: string[]) {
    super(`Page structure for "${spec}" is missing required field(s): ${fields.join(', ')}`, 'structural');
    this.spec = spec;
    this.fields = fields;
  }
}

export class LocaleUnsupportedError extends PorterError {
  readonly locale: string;

  constructor(locale: string) {
    super(`Unsupported UI locale "${locale}": switch the account language to English`, 'fatal');
    this.locale = locale;
  }
}

// ============================================
// STORE / CONFIG
// ============================================

export class StoreCorruptionError extends PorterError {
  constructor(path: string, detail: string) {
    super(`Local store ${path} failed integrity check: ${detail}`, 'fatal');
  }
}

export class ConfigError extends PorterError {
  constructor(message: string) {
    super(message, 'fatal');
  }
}

// ============================================
// DESTINATION API
// ============================================

export type DestinationErrorKind =
  | 'rate_limited'
  | 'transient_network'
  | 'conflict'
  | 'validation'
  | 'not_found'
  | 'auth'
  | 'unknown';

const DESTINATION_CATEGORY: Record<DestinationErrorKind, ErrorCategory> = {
  rate_limited: 'transient',
  transient_network: 'transient',
  conflict: 'structural',
  validation: 'structural',
  not_found: 'structural',
  auth: 'fatal',
  unknown: 'structural',
};

export class DestinationApiError extends PorterError {
  readonly kind: DestinationErrorKind;
  readonly status: number | null;
  readonly operation: string;
  /** Seconds from a Retry-After header, when the server sent one */
  readonly retryAfter: number | null;

  constructor(
    operation: string,
    kind: DestinationErrorKind,
    message: string,
    status: number | null = null,
    retryAfter: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed (${kind}${status !== null ? ` ${status}` : ''}): ${message}`, DESTINATION_CATEGORY[kind], options);
    this.kind = kind;
    this.status = status;
    this.operation = operation;
    this.retryAfter = retryAfter;
  }
}

export function errorCategory(error: unknown): ErrorCategory | null {
  return error instanceof PorterError ? error.category : null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isTransient(error: unknown): boolean {
  return errorCategory(error) === 'transient';
}
