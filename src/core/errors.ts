/**
 * Extract error message from unknown catch value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Node system errors carry a string `code` (ENOENT, EACCES, ...).
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Galaxy answered a request with a non-200 status. */
export class ApiError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = 'ApiError';
  }
}

/** A planemo run finished without reporting an invocation. */
export class InvocationNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvocationNotFoundError';
  }
}
