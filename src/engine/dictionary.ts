/**
 * Known-word dictionary.
 *
 * The bundled list (data/words.txt) holds base forms; common inflections
 * and prefixes are derived at lookup time. Hunspell-style `.dic` files are
 * accepted too: a leading entry count is skipped and `/FLAGS` suffixes are
 * dropped.
 */

import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { RuleDataError } from '../errors.js'
import { DATA_DIR } from './data.js'

export const DEFAULT_WORD_LIST_PATH = join(DATA_DIR, 'words.txt')

const PREFIXES = ['un', 're', 'non', 'pre', 'co', 'sub', 'multi', 'inter', 'over', 'under', 'out', 'self']

const wordListCache = new Map<string, ReadonlySet<string>>()

export function parseWordList(content: string): Set<string> {
  const words = new Set<string>()
  const lines = content.split(/\r?\n/)

  lines.forEach((raw, index) => {
    const line = raw.trim()
    if (!line || line.startsWith('#')) return
    // .dic header: number of entries
    if (index === 0 && /^\d+$/.test(line)) return

    const slash = line.indexOf('/')
    const word = (slash === -1 ? line : line.slice(0, slash)).trim()
    if (word) words.add(word.toLowerCase())
  })

  return words
}

/**
 * Read a word list from disk (cached per path).
 */
export function loadWordList(path: string = DEFAULT_WORD_LIST_PATH): ReadonlySet<string> {
  const cached = wordListCache.get(path)
  if (cached) return cached

  let content: string
  try {
    content = readFileSync(path, 'utf-8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new RuleDataError(path, `cannot read word list (${reason})`, { cause: error })
  }

  const words = parseWordList(content)
  wordListCache.set(path, words)
  return words
}

/**
 * Optimal string alignment distance (Levenshtein plus adjacent swaps).
 */
export function editDistance(a: string, b: string): number {
  const rows = a.length + 1
  const cols = b.length + 1
  const d: number[][] = Array.from({ length: rows }, () => new Array<number>(cols).fill(0))

  for (let i = 0; i < rows; i++) d[i][0] = i
  for (let j = 0; j < cols; j++) d[0][j] = j

  for (let i = 1; i < rows; i++) {
    for (let j = 1; j < cols; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      d[i][j] = Math.min(d[i - 1][j] + 1, d[i][j - 1] + 1, d[i - 1][j - 1] + cost)
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        d[i][j] = Math.min(d[i][j], d[i - 2][j - 2] + 1)
      }
    }
  }

  return d[rows - 1][cols - 1]
}

export class Dictionary {
  private readonly custom: Set<string>
  private readonly suggestions = new Map<string, string | null>()

  constructor(
    private readonly words: ReadonlySet<string>,
    customWords: Iterable<string> = [],
  ) {
    this.custom = new Set([...customWords].map((w) => w.trim().toLowerCase()).filter(Boolean))
  }

  get size(): number {
    return this.words.size + this.custom.size
  }

  private contains(word: string): boolean {
    return this.words.has(word) || this.custom.has(word)
  }

  /** Try the common English suffixes against the base list */
  private knownInflection(word: string): boolean {
    if (this.contains(word)) return true

    const stem = (suffix: string) => word.slice(0, word.length - suffix.length)
    const undoubled = (base: string) =>
      base.length > 2 && base[base.length - 1] === base[base.length - 2] ? base.slice(0, -1) : null
    const tryBase = (base: string | null) => base !== null && base.length > 1 && this.contains(base)

    if (word.endsWith('ies') && word.length > 4 && tryBase(stem('ies') + 'y')) return true
    if (word.endsWith('ied') && word.length > 4 && tryBase(stem('ied') + 'y')) return true
    if (word.endsWith('es') && word.length > 3 && tryBase(stem('es'))) return true
    if (word.endsWith('s') && !word.endsWith('ss') && word.length > 3 && tryBase(stem('s'))) return true

    for (const suffix of ['ed', 'ing', 'er', 'est']) {
      if (!word.endsWith(suffix) || word.length <= suffix.length + 2) continue
      const base = stem(suffix)
      if (tryBase(base) || tryBase(base + 'e') || tryBase(undoubled(base))) return true
      if ((suffix === 'er' || suffix === 'est') && base.endsWith('i') && tryBase(base.slice(0, -1) + 'y')) {
        return true
      }
    }

    if (word.endsWith('ly') && word.length > 4) {
      if (tryBase(stem('ly'))) return true
      if (word.endsWith('ily') && tryBase(stem('ily') + 'y')) return true
      if (word.endsWith('ally') && tryBase(stem('ally'))) return true
    }

    return false
  }

  /**
   * True when the word, or a recognizable inflection of it, is known.
   */
  has(word: string): boolean {
    let lower = word.toLowerCase()
    if (this.contains(lower)) return true

    // Possessives: "author's", "authors'"
    if (lower.endsWith("'s")) lower = lower.slice(0, -2)
    else if (lower.endsWith("'")) lower = lower.slice(0, -1)

    if (this.knownInflection(lower)) return true

    for (const prefix of PREFIXES) {
      if (lower.startsWith(prefix) && lower.length - prefix.length > 2) {
        if (this.knownInflection(lower.slice(prefix.length))) return true
      }
    }
    return false
  }

  /**
   * Nearest known base word within `maxDistance` edits, or null.
   * Ties keep list order, so results are deterministic.
   */
  suggest(word: string, maxDistance = 2): string | null {
    const lower = word.toLowerCase()
    const cached = this.suggestions.get(lower)
    if (cached !== undefined) return cached

    let best: string | null = null
    let bestDistance = maxDistance + 1
    for (const candidate of [...this.words, ...this.custom]) {
      if (Math.abs(candidate.length - lower.length) >= bestDistance) continue
      const distance = editDistance(lower, candidate)
      if (distance < bestDistance) {
        best = candidate
        bestDistance = distance
      }
    }

    this.suggestions.set(lower, best)
    return best
  }
}

/**
 * Build a dictionary from the configured word list plus custom words.
 */
export function createDictionary(options: { path?: string; customWords?: Iterable<string> } = {}): Dictionary {
  return new Dictionary(loadWordList(options.path), options.customWords)
}
