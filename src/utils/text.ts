/**
 * Small string helpers
 */

/**
 * True for undefined, null, or a string of only whitespace
 */
export function isBlank(s: string | null | undefined): boolean {
  return s === undefined || s === null || s.trim().length === 0;
}

/**
 * Fill `{}` placeholders in order. Surplus placeholders are left as-is.
 */
export function fillPlaceholders(template: string, values: readonly string[]): string {
  let index = 0;
  return template.replace(/\{\}/g, (match) => (index < values.length ? values[index++] : match));
}
