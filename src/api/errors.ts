/**
 * Error type raised by the SCF API client for non-2xx responses
 */

/**
 * HTTP status the service answers for an absent resource
 */
export const NOT_FOUND_STATUS = 404;

/**
 * Error class for API errors with HTTP status
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    status: number,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = options?.code;
    this.details = options?.details;
  }

  /**
   * Check if the service reported that the resource does not exist
   */
  isNotFound(): boolean {
    return this.status === NOT_FOUND_STATUS;
  }
}
