/** Convert an unknown caught value to a human-readable error message. */
export function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The rejection value for an aborted operation: the signal's reason, or a DOMException. */
export function abortReason(signal?: AbortSignal): unknown {
  return signal?.reason ?? new DOMException('Aborted', 'AbortError');
}
