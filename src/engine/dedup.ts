/**
 * Deduplication state threaded through every detector call.
 *
 * `lineScope` is cleared at the start of each line; `documentScope` lives
 * for one analysis run and only grows. Registering a token inserts both
 * its exact and lower-case forms, so case variants count as duplicates
 * once either has been seen.
 */

export class DedupContext {
  private readonly lineScope = new Set<string>()
  private readonly documentScope = new Set<string>()

  /** Start a new line */
  beginLine(): void {
    this.lineScope.clear()
  }

  register(token: string): void {
    const lower = token.toLowerCase()
    this.lineScope.add(token)
    this.lineScope.add(lower)
    this.documentScope.add(token)
    this.documentScope.add(lower)
  }

  seenInLine(token: string): boolean {
    return this.lineScope.has(token) || this.lineScope.has(token.toLowerCase())
  }

  seenInDocument(token: string): boolean {
    return this.documentScope.has(token) || this.documentScope.has(token.toLowerCase())
  }

  /** Lookup honoring the configured scope */
  seen(token: string, scope: 'line' | 'document'): boolean {
    return scope === 'document' ? this.seenInDocument(token) : this.seenInLine(token)
  }
}
