// ============================================
// Settled results for best-effort sub-fetches
// ============================================

/**
 * Outcome of an optional fetch. The failure reason is kept so the caller
 * can log it and carry on without the value.
 */
export type Settled<T> = { ok: true; value: T } | { ok: false; reason: string };

export async function settle<T>(work: Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await work };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}
