/**
 * Shared reading of on/off environment flags such as DEBUG.
 */

/** Unset, empty, `0`, `false`, `no` and `off` are off; anything else is on. */
export function parseFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return parseFlag(env.DEBUG);
}
