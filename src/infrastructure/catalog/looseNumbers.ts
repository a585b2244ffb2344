/**
 * Catalog feeds are loose about numeric fields: numbers arrive as ints, floats or strings
 */

const INTEGER_STRING = /^[+-]?\d+$/;

/**
 * @returns The year, or 0 when absent or unparseable
 */
export function parseYear(raw: unknown): number {
  if (typeof raw === 'string') {
    return INTEGER_STRING.test(raw) ? Number(raw) : 0;
  }
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return Math.trunc(raw);
  }
  return 0;
}

/**
 * @returns The integer, or undefined for null, missing or garbage values
 */
export function parseOptionalInt(raw: unknown): number | undefined {
  if (typeof raw === 'string') {
    return INTEGER_STRING.test(raw) ? Number(raw) : undefined;
  }
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return Math.trunc(raw);
  }
  return undefined;
}
