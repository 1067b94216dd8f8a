/**
 * Token filters and document score.
 * Tokens that are not natural-language words are never spell-checked.
 */

/** Patterns that indicate non-natural-language content */
const SKIP_PATTERNS = [
  /^https?:\/\//i,                // URLs
  /^www\./i,                      // Bare web addresses
  /^mailto:/i,                    // Email links
  /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, // Emails
  /^[A-Za-z]+[a-z][A-Z]/,         // camelCase / CamelCase (JavaScript, TensorFlow)
  /^[A-Z]{2,}s?$/,                // All caps abbreviations (API, CNN, GDPs)
  /^\d+[\d.,]*$/,                 // Numbers
  /^\d+[a-zA-Z]+$/,               // Numbers with units (80px, 24h, 5mg)
  /^[#@]/,                        // Hashtags, mentions
  /^[€$£¥]/,                      // Currency amounts
  /^\+?\d[\d\s.-]{8,}$/,          // Phone numbers
  /^[a-z-]+\.[a-z]{2,}$/i,        // Domain names
  /\d/,                           // Alphanumeric identifiers (COVID19, v2)
]

export function isNonNaturalToken(token: string): boolean {
  return SKIP_PATTERNS.some((pattern) => pattern.test(token))
}

/**
 * Calculate a writing score (0-100) based on word count and issue count.
 * 100 = no issues, decreases with each issue relative to word count.
 */
export function calculateScore(wordCount: number, issueCount: number): number {
  if (wordCount === 0) return 100
  if (issueCount === 0) return 100

  // ~1 issue per 100 words = score ~90
  // ~5 issues per 100 words = score ~50
  const issuesPerHundredWords = (issueCount / wordCount) * 100
  const score = Math.max(0, Math.round(100 - issuesPerHundredWords * 10))
  return Math.min(100, score)
}
