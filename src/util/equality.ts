function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Desired-vs-live comparison. Scalars and arrays must be equal; objects only
 * need every desired field to match, since the API adds fields of its own.
 * An undefined desired value matches anything.
 */
export function matchesDesired(desired: unknown, live: unknown): boolean {
  if (desired === undefined) return true;

  if (Array.isArray(desired)) {
    return (
      Array.isArray(live) &&
      live.length === desired.length &&
      desired.every((item, index) => matchesDesired(item, live[index]))
    );
  }

  if (isRecord(desired)) {
    if (!isRecord(live)) return false;
    return Object.entries(desired).every(([key, value]) => matchesDesired(value, live[key]));
  }

  return desired === live;
}
