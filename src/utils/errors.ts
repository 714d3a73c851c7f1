export const ErrorCode = {
  UNAUTHORIZED: 'UNAUTHORIZED',
  RESOLUTION_FAILED: 'RESOLUTION_FAILED',
  DELIVERY_FAILED: 'DELIVERY_FAILED',
  CONFIG_MISSING: 'CONFIG_MISSING',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

export class RelayError extends Error {
  public readonly code: ErrorCodeType;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCodeType, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RelayError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wrap any thrown value, keeping an existing RelayError as-is. */
export function toRelayError(code: ErrorCodeType, message: string, cause: unknown): RelayError {
  if (cause instanceof RelayError) return cause;
  return new RelayError(code, `${message}: ${errorMessage(cause)}`, undefined, { cause });
}
