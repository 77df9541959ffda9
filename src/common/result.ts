export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * A successful-but-partial outcome: the secondary store could not be reached,
 * the caller should carry on with identity data only.
 */
export interface Degraded {
  store: string;
  reason: string;
}

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const degraded = (store: string, reason: string): Result<never, Degraded> => ({
  ok: false,
  error: { store, reason },
});
