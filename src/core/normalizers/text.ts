/**
 * Returns true for values that carry no text: null, undefined and NaN.
 * Spreadsheet readers hand over NaN for empty numeric cells.
 */
function isAbsent(value: unknown): boolean {
  return value == null || (typeof value === 'number' && Number.isNaN(value))
}

/**
 * Canonicalizes free text for comparison.
 *
 * Lowercases, applies Unicode compatibility decomposition (NFKD), strips
 * non-spacing marks, removes everything that is neither a letter, a number nor
 * whitespace, then collapses and trims whitespace. Absent values yield `''`.
 *
 * @param value - The raw field value
 * @returns Normalized text, never null
 *
 * @example
 * ```typescript
 * normalizeText('  Über   Web-Testing!  ') // 'uber webtesting'
 * normalizeText('Doe, J.')                  // 'doe j'
 * normalizeText(null)                       // ''
 * normalizeText(2020)                       // '2020'
 * ```
 */
export function normalizeText(value: unknown): string {
  if (isAbsent(value)) return ''

  return (
    String(value)
      .toLowerCase()
      .normalize('NFKD')
      // compatibility forms such as U+210C decompose to capitals
      .toLowerCase()
      .replace(/\p{Mn}/gu, '')
      .replace(/[^\p{L}\p{N}\s]/gu, '')
      .replace(/\s+/g, ' ')
      .trim()
  )
}

/**
 * Normalizes an identifier such as a DOI: lowercase and trim only.
 * Internal punctuation and slashes are significant and kept.
 *
 * @example
 * ```typescript
 * normalizeIdentifier(' 10.1/ABC ') // '10.1/abc'
 * normalizeIdentifier(undefined)    // ''
 * ```
 */
export function normalizeIdentifier(value: unknown): string {
  if (isAbsent(value)) return ''
  return String(value).toLowerCase().trim()
}
