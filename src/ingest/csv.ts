/**
 * Minimal CSV line parsing for question/answer datasets.
 *
 * Handles comma separation and double-quoted fields that contain commas.
 * Quote characters toggle quoting and are dropped; there is no escaped-quote
 * ("") support and no multi-line field support.
 */

/**
 * Splits one CSV line into fields.
 *
 * @param line - A single line without its newline
 * @returns Field values in order
 *
 * @example
 * ```typescript
 * parseCsvLine('1,"Can I cancel, then rebook?",Yes');
 * // => ['1', 'Can I cancel, then rebook?', 'Yes']
 * ```
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}

/**
 * Splits file content into lines, accepting both LF and CRLF endings.
 */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}
