/**
 * Runtime Utilities
 *
 * HTML escaping for interpolated values.
 */

/**
 * Characters escaped in `{{name}}` output and their named entities.
 * Double quotes use `&quot;`, never a numeric entity.
 */
const escapeMap: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

// Regex to detect characters that need escaping
const escapeRegex = /[&<>"]/g;
const testRegex = /[&<>"]/;

/**
 * Escapes HTML entities for safe output in HTML contexts.
 *
 * @example
 * ```typescript
 * escapeHtml('<b>"Tom" & Jerry</b>');
 * // '&lt;b&gt;&quot;Tom&quot; &amp; Jerry&lt;/b&gt;'
 * ```
 */
export function escapeHtml(text: string): string {
  // Fast path: if no special characters, return original string
  if (!testRegex.test(text)) {
    return text;
  }

  return text.replace(escapeRegex, (char) => escapeMap[char] ?? char);
}
