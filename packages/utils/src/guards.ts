/**
 * Type Guards
 */

export function isDefined<T>(value: T | undefined | null): value is T {
  return value !== undefined && value !== null;
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
