export class ProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

/** Network, rate-limit or timeout failure; safe to retry on a later cycle. */
export class TransientProviderError extends ProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientProviderError';
  }
}

/** Credentials rejected by the provider. Never retried automatically. */
export class AuthError extends ProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/** The remote object is already gone. */
export class NotFoundError extends ProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotFoundError';
  }
}

export type InferenceFailureReason = 'timeout' | 'transport' | 'malformed';

export class InferenceError extends Error {
  readonly reason: InferenceFailureReason;

  constructor(reason: InferenceFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceError';
    this.reason = reason;
  }
}

export class MutationRequestError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'MutationRequestError';
    this.statusCode = statusCode;
  }
}

export const TIMEOUT_SENTINEL = 'OPERATION_TIMEOUT';

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const errorCodes = (error: unknown) => {
  if (typeof error !== 'object' || error === null) {
    return { code: undefined, errno: undefined };
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  const errno = 'errno' in error && typeof error.errno === 'string' ? error.errno : undefined;
  return { code, errno };
};

const RECOVERABLE_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EPIPE',
  'EAI_AGAIN',
]);

export const isRecoverableNetworkError = (error: unknown) => {
  const { code, errno } = errorCodes(error);
  if ((code && RECOVERABLE_NETWORK_CODES.has(code)) || (errno && RECOVERABLE_NETWORK_CODES.has(errno))) {
    return true;
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return true;
  }
  const message = String(error).toLowerCase();
  return (
    message.includes(TIMEOUT_SENTINEL.toLowerCase())
    || message.includes('timed out')
    || message.includes('timeout')
    || message.includes('temporar')
    || message.includes('connection')
    || message.includes('network')
    || message.includes('fetch failed')
  );
};

export const isRetryableStatus = (status: number) => status === 429 || status === 408 || (status >= 500 && status <= 599);

export const isTokenInvalidStatus = (status: number) => status === 401 || status === 403;

export const runWithTimeout = async <T>(
  label: string,
  timeoutMs: number,
  fn: () => Promise<T>,
  onTimeout?: () => Promise<void> | void,
): Promise<T> => {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return fn();
  }

  let timeoutHandle: NodeJS.Timeout | null = null;
  try {
    return await Promise.race<T>([
      fn(),
      new Promise<T>((_, reject) => {
        timeoutHandle = setTimeout(() => {
          void Promise.resolve(onTimeout?.()).catch(() => undefined);
          reject(new TransientProviderError(`${TIMEOUT_SENTINEL}: ${label} timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
};
