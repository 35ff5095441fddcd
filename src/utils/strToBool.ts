const TRUE_VALUES = ['y', 'yes', 't', 'true', 'on', '1'];
const FALSE_VALUES = ['n', 'no', 'f', 'false', 'off', '0'];

/**
 * Convert a string representation of truth to a boolean.
 * Returns null for anything that is neither a true nor a false spelling
 * (including undefined), so callers can fall back to a default.
 */
export function strToBool(value: unknown): boolean | null {
  const normalized = String(value).trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  return null;
}
