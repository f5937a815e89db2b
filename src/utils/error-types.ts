import { AbortError, FetchError } from 'node-fetch';

export enum RequestErrorCategory {
  TIMEOUT = 'timeout',
  DNS = 'dns',
  CONNECTION = 'connection',
  SSL = 'ssl',
  INVALID_URL = 'invalid_url',
  NETWORK = 'network',
  UNKNOWN = 'unknown',
}

export interface RequestErrorDetails {
  category: RequestErrorCategory;
  code: string;
  message: string;
  url: string;
  timestamp: string;
  systemCode?: string;
}

export interface RequestErrorRule {
  pattern: RegExp;
  category: RequestErrorCategory;
  code: string;
}

/**
 * Matched in order against "<system code> <message>" of a failed request.
 */
export const REQUEST_ERROR_RULES: RequestErrorRule[] = [
  // Timeouts
  {
    pattern: /\bETIMEDOUT\b|\bESOCKETTIMEDOUT\b/,
    category: RequestErrorCategory.TIMEOUT,
    code: 'SOCKET_TIMEOUT',
  },

  // DNS
  {
    pattern: /\bENOTFOUND\b/,
    category: RequestErrorCategory.DNS,
    code: 'DNS_RESOLUTION_FAILED',
  },
  {
    pattern: /\bEAI_AGAIN\b/,
    category: RequestErrorCategory.DNS,
    code: 'DNS_TEMPORARY_FAILURE',
  },

  // Connection
  {
    pattern: /\bECONNREFUSED\b/,
    category: RequestErrorCategory.CONNECTION,
    code: 'CONNECTION_REFUSED',
  },
  {
    pattern: /\bECONNRESET\b|socket hang up/i,
    category: RequestErrorCategory.CONNECTION,
    code: 'CONNECTION_RESET',
  },
  {
    pattern: /\bEHOSTUNREACH\b|\bENETUNREACH\b/,
    category: RequestErrorCategory.CONNECTION,
    code: 'HOST_UNREACHABLE',
  },

  // TLS
  {
    pattern: /CERT_HAS_EXPIRED/,
    category: RequestErrorCategory.SSL,
    code: 'CERTIFICATE_EXPIRED',
  },
  {
    pattern: /ERR_TLS_CERT_ALTNAME_INVALID/,
    category: RequestErrorCategory.SSL,
    code: 'CERTIFICATE_NAME_MISMATCH',
  },
  {
    pattern: /SELF_SIGNED_CERT|UNABLE_TO_VERIFY_LEAF_SIGNATURE|UNABLE_TO_GET_ISSUER_CERT/,
    category: RequestErrorCategory.SSL,
    code: 'INVALID_CERTIFICATE_AUTHORITY',
  },
  {
    pattern: /\bEPROTO\b|SSL routines/i,
    category: RequestErrorCategory.SSL,
    code: 'SSL_PROTOCOL_ERROR',
  },

  // Malformed input
  {
    pattern: /ERR_INVALID_URL|Invalid URL/,
    category: RequestErrorCategory.INVALID_URL,
    code: 'INVALID_URL',
  },
  {
    pattern: /URL scheme "[^"]*" is not supported/,
    category: RequestErrorCategory.INVALID_URL,
    code: 'UNSUPPORTED_SCHEME',
  },
];

function systemCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Puts a failed request into a diagnostic category.
 * An aborted request is the request deadline firing.
 */
export function categorizeRequestError(
  error: unknown,
  url: string
): RequestErrorDetails {
  const message = error instanceof Error ? error.message : String(error);
  const systemCode = systemCodeOf(error);
  const timestamp = new Date().toISOString();

  if (error instanceof AbortError) {
    return {
      category: RequestErrorCategory.TIMEOUT,
      code: 'REQUEST_TIMEOUT',
      message,
      url,
      timestamp,
      systemCode,
    };
  }

  const haystack = `${systemCode ?? ''} ${message}`;
  const rule = REQUEST_ERROR_RULES.find((candidate) =>
    candidate.pattern.test(haystack)
  );
  if (rule) {
    return {
      category: rule.category,
      code: rule.code,
      message,
      url,
      timestamp,
      systemCode,
    };
  }

  const fallback =
    error instanceof FetchError
      ? { category: RequestErrorCategory.NETWORK, code: 'NETWORK_ERROR' }
      : { category: RequestErrorCategory.UNKNOWN, code: 'UNKNOWN_ERROR' };

  return { ...fallback, message, url, timestamp, systemCode };
}

export function formatRequestError(details: RequestErrorDetails): string {
  const system = details.systemCode ? ` (${details.systemCode})` : '';
  return `[${details.category.toUpperCase()}] ${details.code}${system}: ${details.message}`;
}
