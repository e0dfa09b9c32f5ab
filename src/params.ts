/**
 * Coerce a command-line value: booleans, numbers, null and JSON lists/objects are parsed,
 * anything else stays a string.
 */
export function coerceParam(raw: string): unknown {
  const value = raw.trim();
  if (value === 'true' || value === 'True') return true;
  if (value === 'false' || value === 'False') return false;
  if (value === 'null' || value === 'None') return null;
  if (value !== '' && /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/.test(value)) return Number(value);
  if (/^[[{]/.test(value)) {
    try {
      return JSON.parse(value);
    } catch {
      return raw;
    }
  }
  return raw;
}

/** Turn `key=value` pairs into workflow parameters. */
export function parseParams(pairs: readonly string[]): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) throw new Error(`Invalid parameter '${pair}': expected key=value`);
    params[pair.slice(0, eq).trim()] = coerceParam(pair.slice(eq + 1));
  }
  return params;
}
