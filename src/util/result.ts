/**
 * Result type returned by every collaborator of the brief pipeline.
 * Providers MUST NOT throw across this boundary; callers pick the fallback.
 */
export type Result<TData> =
  | { ok: true; data: TData }
  | { ok: false; error: string };

export function ok<TData>(data: TData): Result<TData> {
  return { ok: true, data };
}

export function fail<TData = never>(error: string): Result<TData> {
  return { ok: false, error };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
