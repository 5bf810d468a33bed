// Tagged results shared by the fetch, probe and trim stages.
// Each stage returns one of these instead of throwing, and callers branch on `ok`.

export interface Failure<E extends string> {
  ok: false;
  error: E;
  message: string;
}

export function failure<E extends string>(error: E, message: string): Failure<E> {
  return { ok: false, error, message };
}
