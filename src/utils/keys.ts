/**
 * Corpus and job files may use snake_case keys (`hourly_rate`,
 * `skills_required`). Converts keys of plain objects to camelCase,
 * recursively; arrays are mapped, everything else is returned as-is.
 */
export function snakeToCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, ch: string) => ch.toUpperCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelizeKeys);
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[snakeToCamel(key)] = camelizeKeys(inner);
  }
  return out;
}
