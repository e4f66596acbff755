/**
 * Study Planner - Form Field Access
 *
 * Route handlers accept URL-encoded or multipart bodies; both arrive as
 * FormData. Query strings arrive as URLSearchParams. Helpers here read
 * either one as trimmed strings.
 */

export interface FieldSource {
  get(name: string): unknown;
}

/**
 * Trimmed string value, or null when the field is absent, blank, or a file
 */
export function readField(source: FieldSource, name: string): string | null {
  const value = source.get(name);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Untrimmed string value ('' when absent)
 */
export function readRawField(source: FieldSource, name: string): string {
  const value = source.get(name);
  return typeof value === 'string' ? value : '';
}
