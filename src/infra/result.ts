export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === "string" ? error : JSON.stringify(error));
}

/**
 * Runs a collaborator call whose failure must not abort the caller.
 * The caller decides how to log the returned error.
 */
export async function attempt<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}
