import { AxiosError } from 'axios';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const readServerMessage = (data: unknown): string | undefined => {
  if (typeof data !== 'object' || data === null) return undefined;
  const message = 'error' in data ? data.error : 'detail' in data ? data.detail : undefined;
  return typeof message === 'string' ? message : undefined;
};

/**
 * Normalises whatever axios (or our own validation) threw into an ApiError,
 * preferring the server's `error`/`detail` message when one came back.
 */
export const toApiError = (error: unknown, fallback: string): ApiError => {
  if (error instanceof ApiError) return error;

  if (error instanceof AxiosError) {
    const message = readServerMessage(error.response?.data) ?? error.message;
    return new ApiError(message || fallback, error.response?.status);
  }

  if (error instanceof Error) return new ApiError(error.message || fallback);
  return new ApiError(fallback);
};
