/**
 * Failure of an external provider call (translation or speech synthesis).
 * `kind` lets callers report timeouts separately from other failures.
 */
export type ProviderErrorKind = 'timeout' | 'http' | 'network' | 'config';

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, kind: ProviderErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
    this.kind = kind;
    this.status = status;
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/** Rejects with a timeout ProviderError when `promise` does not settle within `timeoutMs`. */
export async function withTimeout<T>(provider: string, promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new ProviderError(provider, 'timeout', `${provider} timeout exceeded (${timeoutMs}ms)`)),
          timeoutMs
        );
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
