export type AcmeErrorKind = 'RATE_LIMITED' | 'CHALLENGE_FAILED' | 'NETWORK_ERROR' | 'ACCOUNT_INVALID';

/**
 * Failure reported by the ACME issuer.
 */
export class AcmeError extends Error {
  constructor(
    public readonly kind: AcmeErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AcmeError';
  }
}

/**
 * Certificate material that does not parse, does not cover its hostname, or
 * whose key does not match.
 */
export class CertificateValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CertificateValidationError';
  }
}

/**
 * The persisted ACME account key exists but cannot be used.
 */
export class AccountCredentialError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AccountCredentialError';
  }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ERR_NETWORK',
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return property;
}

/**
 * Maps an error thrown while talking to the ACME server onto a failure kind.
 *
 * ACME problem documents only reach us as messages, so the problem type and
 * the usual Let's Encrypt wording are both checked.
 */
export function classifyAcmeError(error: unknown): AcmeErrorKind {
  if (error instanceof AcmeError) {
    return error.kind;
  }

  const status = readProperty(readProperty(error, 'response'), 'status') ?? readProperty(error, 'status');
  if (status === 429) {
    return 'RATE_LIMITED';
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) {
    return 'NETWORK_ERROR';
  }

  const message = error instanceof Error ? error.message : String(error);
  if (/ratelimited|rate limit|too many (certificates|new orders|failed authorizations|requests)/i.test(message)) {
    return 'RATE_LIMITED';
  }
  if (/accountdoesnotexist|account (is )?deactivated|no account|malformed.*account|jws/i.test(message)) {
    return 'ACCOUNT_INVALID';
  }
  if (/socket hang up|network error|timeout of \d+ms exceeded|getaddrinfo/i.test(message)) {
    return 'NETWORK_ERROR';
  }

  return 'CHALLENGE_FAILED';
}
