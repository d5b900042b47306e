/**
 * Engine error types and network error classification
 */

/**
 * Base class for every error raised by the probe engine itself
 */
export class ProbeEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid configuration reaching the engine (preset, module, timeout...).
 * Always raised before any network activity.
 */
export class ConfigurationError extends ProbeEngineError {}

/**
 * Invalid or out-of-bounds port range
 */
export class PortRangeError extends ConfigurationError {}

/**
 * Target host could not be resolved
 */
export class HostResolutionError extends ProbeEngineError {
  readonly host: string;

  constructor(host: string, reason: string) {
    super(`Could not resolve hostname '${host}': ${reason}`);
    this.host = host;
  }
}

/**
 * Coarse category of a network failure
 */
export type ErrorCategory =
  | 'timeout'
  | 'refused'
  | 'unreachable'
  | 'dns'
  | 'tls'
  | 'reset'
  | 'unknown';

/**
 * Error code (or name) → category.
 *
 * | input                                              | category    |
 * |----------------------------------------------------|-------------|
 * | ETIMEDOUT, ESOCKETTIMEDOUT, UND_ERR_*_TIMEOUT, UND_ERR_ABORTED, AbortError, TimeoutError | timeout |
 * | ECONNREFUSED                                       | refused     |
 * | EHOSTUNREACH, ENETUNREACH, EHOSTDOWN, ENETDOWN, EADDRNOTAVAIL | unreachable |
 * | ENOTFOUND, EAI_AGAIN, EAI_FAIL, EAI_NONAME         | dns         |
 * | ERR_SSL_*, ERR_TLS_*, EPROTO, X.509 verify codes   | tls         |
 * | ECONNRESET, EPIPE, UND_ERR_SOCKET, UND_ERR_CLOSED  | reset       |
 * | anything else                                      | unknown     |
 */
const CATEGORY_BY_CODE = new Map<string, ErrorCategory>(
  Object.entries({
    ETIMEDOUT: 'timeout',
    ESOCKETTIMEDOUT: 'timeout',
    UND_ERR_CONNECT_TIMEOUT: 'timeout',
    UND_ERR_HEADERS_TIMEOUT: 'timeout',
    UND_ERR_BODY_TIMEOUT: 'timeout',
    UND_ERR_ABORTED: 'timeout',
    ABORT_ERR: 'timeout',
    AbortError: 'timeout',
    TimeoutError: 'timeout',
    ECONNREFUSED: 'refused',
    EHOSTUNREACH: 'unreachable',
    ENETUNREACH: 'unreachable',
    EHOSTDOWN: 'unreachable',
    ENETDOWN: 'unreachable',
    EADDRNOTAVAIL: 'unreachable',
    ENOTFOUND: 'dns',
    EAI_AGAIN: 'dns',
    EAI_FAIL: 'dns',
    EAI_NONAME: 'dns',
    EPROTO: 'tls',
    ECONNRESET: 'reset',
    EPIPE: 'reset',
    UND_ERR_SOCKET: 'reset',
    UND_ERR_CLOSED: 'reset',
  } satisfies Record<string, ErrorCategory>)
);

// Certificate verification failures Node reports on a rejected handshake
const TLS_VERIFY_CODES = new Set([
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_CRL',
  'UNABLE_TO_DECRYPT_CERT_SIGNATURE',
  'UNABLE_TO_DECRYPT_CRL_SIGNATURE',
  'UNABLE_TO_DECODE_ISSUER_PUBLIC_KEY',
  'CERT_SIGNATURE_FAILURE',
  'CRL_SIGNATURE_FAILURE',
  'CERT_NOT_YET_VALID',
  'CERT_HAS_EXPIRED',
  'CRL_NOT_YET_VALID',
  'CRL_HAS_EXPIRED',
  'ERROR_IN_CERT_NOT_BEFORE_FIELD',
  'ERROR_IN_CERT_NOT_AFTER_FIELD',
  'ERROR_IN_CRL_LAST_UPDATE_FIELD',
  'ERROR_IN_CRL_NEXT_UPDATE_FIELD',
  'OUT_OF_MEM',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'CERT_CHAIN_TOO_LONG',
  'CERT_REVOKED',
  'INVALID_CA',
  'PATH_LENGTH_EXCEEDED',
  'INVALID_PURPOSE',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'HOSTNAME_MISMATCH',
]);

/**
 * Read the `code` of an error-like value, falling back to its name
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if (err instanceof Error) return err.name;
  return undefined;
}

/**
 * System errors carry a string code. Anything else thrown mid-probe is a bug,
 * not a port outcome.
 */
export function isSystemError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Human-readable message of any thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function classifyError(err: unknown): ErrorCategory {
  const code = errorCode(err);
  if (!code) return 'unknown';

  const mapped = CATEGORY_BY_CODE.get(code);
  if (mapped) return mapped;

  if (code.startsWith('ERR_SSL_') || code.startsWith('ERR_TLS_') || TLS_VERIFY_CODES.has(code)) {
    return 'tls';
  }
  return 'unknown';
}

/**
 * Split a TLS probe failure into the handshake layer or the socket layer
 */
export function classifyTlsFailure(err: unknown): 'ssl' | 'socket' {
  return classifyError(err) === 'tls' ? 'ssl' : 'socket';
}

/**
 * Keep only the root message:
 * "connect ECONNREFUSED 1.2.3.4:80 (os error 111)" → "connect ECONNREFUSED 1.2.3.4:80"
 */
export function truncateErrorMessage(message: string): string {
  const cut = message.indexOf(' (');
  return cut === -1 ? message : message.slice(0, cut);
}
