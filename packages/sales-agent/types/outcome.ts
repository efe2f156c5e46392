// A value that was either fully computed or substituted after a failure.
// Call sites must inspect `kind` before treating the value as authoritative.

export type Outcome<T> =
  | { readonly kind: 'computed'; readonly value: T }
  | { readonly kind: 'fallback'; readonly value: T; readonly reason: string };

export function computed<T>(value: T): Outcome<T> {
  return { kind: 'computed', value };
}

export function fallback<T>(value: T, reason: string): Outcome<T> {
  return { kind: 'fallback', value, reason };
}

export function isFallback<T>(outcome: Outcome<T>): outcome is Extract<Outcome<T>, { kind: 'fallback' }> {
  return outcome.kind === 'fallback';
}
