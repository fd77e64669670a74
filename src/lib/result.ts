export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
