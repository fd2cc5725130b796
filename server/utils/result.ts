/**
 * Outcome of a call into an external dependency. Callers decide the
 * fallback; nothing on the dependency path throws past this boundary.
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}
