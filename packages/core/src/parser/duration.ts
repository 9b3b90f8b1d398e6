const COMPONENT_RE = /^\d+(?:\.\d+)?$/;

/**
 * Convert `SS.ms`, `MM:SS.ms` or `HH:MM:SS.ms` to seconds.
 * Returns `undefined` for anything else (empty parts, signs, units, more than
 * two separators).
 */
export function parseDuration(token: string): number | undefined {
  const trimmed = token.trim();
  if (!trimmed) {
    return undefined;
  }
  const parts = trimmed.split(':');
  if (parts.length > 3 || !parts.every((part) => COMPONENT_RE.test(part))) {
    return undefined;
  }
  const values = parts.map(Number);
  const [hours, minutes, seconds] =
    values.length === 3
      ? values
      : values.length === 2
        ? [0, ...values]
        : [0, 0, ...values];
  if (hours === undefined || minutes === undefined || seconds === undefined) {
    return undefined;
  }
  return hours * 3600 + minutes * 60 + seconds;
}

