/**
 * Error type for failures the setup operations report to their caller.
 * `status` is the HTTP status the transport layer should answer with.
 */
export class SetupError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(message: string, code: string, status: number, details?: unknown) {
    super(message);
    this.name = 'SetupError';
    this.code = code;
    this.status = status;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const ERROR_CODES = {
  INVALID_PAYLOAD: 'validation.invalid_payload',
  CONFIG_WRITE_FAILED: 'config.write_failed',
} as const;

/**
 * Best description of an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * True for filesystem errors meaning the path, or one of its parents, does not exist as expected
 */
export const isMissingPathError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
