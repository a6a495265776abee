/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values and `NaN` for non-integers.
 */
export function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

const SESSION_ID_RE = /^[A-Za-z0-9_.:-]{1,64}$/;

export function isValidSessionId(value: string): boolean {
  return SESSION_ID_RE.test(value);
}
