export class EfbError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EfbError';
  }
}

export class ConfigurationError extends EfbError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ExtraFunctionNotFoundError extends EfbError {
  constructor(public readonly functionId: string) {
    super(`Extra function not found: ${functionId}`);
    this.name = 'ExtraFunctionNotFoundError';
  }
}

export class ExtraFunctionError extends EfbError {
  constructor(public readonly functionId: string, reason: string) {
    super(`Extra function ${functionId} failed: ${reason}`);
    this.name = 'ExtraFunctionError';
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Returns the `code` of a Node.js system error (EACCES, ENOTDIR, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
