/**
 * Detector contract and helpers shared by every detector.
 */

import type { DetectorId, Issue, IssueType, Script } from '../../types.js'
import type { ProoflineTranslations } from '../../i18n.js'
import type { DedupContext } from '../dedup.js'
import type { Dictionary } from '../dictionary.js'
import type { RuleSet } from '../rules.js'
import type { ResolvedAnalyzerConfig } from '../shared.js'
import type { Token } from '../tokenizer.js'
import { charCount, charOffsetOf } from '../text.js'

export interface AnalyzedLine {
  /** Line text after per-line truncation */
  text: string
  /** `text` split into code points */
  chars: string[]
  /** 1-based */
  lineNumber: number
  script: Script
  tokens: Token[]
}

/** Everything a detector may read; none of it is mutable */
export interface DetectorContext {
  dictionary: Dictionary
  rules: RuleSet
  t: ProoflineTranslations
  config: ResolvedAnalyzerConfig
}

/**
 * A detector sees one line at a time and gets exclusive use of the dedup
 * context for that line. It never keeps state between calls.
 */
export interface Detector {
  readonly id: DetectorId
  detect(line: AnalyzedLine, dedup: DedupContext): Issue[]
}

export type DetectorFactory = (context: DetectorContext) => Detector

export function issueAt(
  line: AnalyzedLine,
  start: number,
  end: number,
  issueType: IssueType,
  message: string,
  suggestion: string,
): Issue {
  return { lineNumber: line.lineNumber, start, end, issueType, message, suggestion }
}

export interface PhraseMatch {
  /** Matched text as it appears in the line */
  text: string
  start: number
  end: number
}

const patternCache = new Map<string, RegExp>()

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function phrasePattern(phrase: string, wholeWord: boolean): RegExp {
  const key = `${wholeWord ? 'w' : 's'}:${phrase}`
  const cached = patternCache.get(key)
  if (cached) return cached

  const body = phrase.split(/\s+/).map(escapeRegExp).join('\\s+')
  const source = wholeWord ? `(?<![\\p{L}\\p{N}'])${body}(?![\\p{L}\\p{N}])` : body
  const pattern = new RegExp(source, wholeWord ? 'giu' : 'gu')
  patternCache.set(key, pattern)
  return pattern
}

/**
 * Every occurrence of a phrase, in character offsets.
 * `wholeWord` matches Latin phrases case-insensitively on word boundaries;
 * otherwise the phrase is matched verbatim as a substring.
 */
export function findPhrase(text: string, phrase: string, wholeWord: boolean): PhraseMatch[] {
  return findPattern(text, phrasePattern(phrase, wholeWord))
}

/** Every match of a global, unicode-aware pattern, in character offsets */
export function findPattern(text: string, pattern: RegExp): PhraseMatch[] {
  const matches: PhraseMatch[] = []
  for (const match of text.matchAll(pattern)) {
    const start = charOffsetOf(text, match.index ?? 0)
    matches.push({ text: match[0], start, end: start + charCount(match[0]) })
  }
  return matches
}

/** Carry the capitalization of `source` over to `replacement` */
export function matchCase(replacement: string, source: string): string {
  if (source.length > 1 && source === source.toUpperCase() && source !== source.toLowerCase()) {
    return replacement.toUpperCase()
  }
  if (/^[A-Z]/.test(source)) return replacement.charAt(0).toUpperCase() + replacement.slice(1)
  return replacement
}
