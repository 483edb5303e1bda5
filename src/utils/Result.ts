/**
 * Typed success/failure values for operations whose rejection is part of normal control flow
 */

export type Result<T, E = Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}
