/**
 * Grammar rules.
 *
 * Latin lines: a/an choice, double negatives, preposition collocations,
 * pronoun subject-verb agreement and present-tense verbs in sentences about
 * the past. Chinese lines: the 的/地/得 particles and paired conjunctions.
 * Every rule reports its first match per line.
 */

import type { Issue } from '../../types.js'
import type { PairedConjunction, RuleSet } from '../rules.js'
import { charOffsetOf, charSlice } from '../text.js'
import type { AnalyzedLine, Detector, DetectorContext, PhraseMatch } from './common.js'
import { escapeRegExp, findPattern, findPhrase, issueAt, matchCase } from './common.js'

const SENTENCE_PATTERN = /[^.!?;]+/gu

const ARTICLE_PATTERN = /(?<![\p{L}\p{N}'])(an?)\s+([A-Za-z][A-Za-z'-]*)/giu

/** Words that invert subject and verb in questions ("does it have") */
const AUXILIARIES = new Set(['do', 'does', 'did', 'can', 'could', 'will', 'would', 'shall', 'should', 'may', 'might', 'must', 'to'])

function escapeClass(chars: string): string {
  return chars.replace(/[\]\\^-]/g, '\\$&')
}

function takesAn(word: string, rules: RuleSet): boolean {
  const lower = word.toLowerCase()
  if (rules.articleExceptions.an.some((prefix) => lower.startsWith(prefix))) return true
  if (rules.articleExceptions.a.some((prefix) => lower.startsWith(prefix))) return false
  return /^[aeiou]/.test(lower)
}

function articles(line: AnalyzedLine, { rules, t }: DetectorContext): Issue[] {
  for (const match of line.text.matchAll(ARTICLE_PATTERN)) {
    const [, article, next] = match
    // Acronyms are read letter by letter
    if (next.length > 1 && next === next.toUpperCase()) continue

    const expected = takesAn(next, rules) ? 'an' : 'a'
    if (article.toLowerCase() === expected) continue

    const start = charOffsetOf(line.text, match.index ?? 0)
    return [
      issueAt(
        line,
        start,
        start + article.length,
        'grammar',
        expected === 'an' ? t.articleBeforeVowel : t.articleBeforeConsonant,
        t.replaceWith(matchCase(expected, article)),
      ),
    ]
  }
  return []
}

function phraseTable(line: AnalyzedLine, table: Map<string, string>, message: string, { t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  for (const [phrase, correction] of table) {
    const [first] = findPhrase(line.text, phrase, true)
    if (first) issues.push(issueAt(line, first.start, first.end, 'grammar', message, t.replaceWith(correction)))
  }
  return issues
}

function agreement(line: AnalyzedLine, { rules, t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  const pairs: Array<[string[], string[]]> = [
    [rules.agreement.singularSubjects, rules.agreement.pluralVerbs],
    [rules.agreement.pluralSubjects, rules.agreement.singularVerbs],
  ]
  const precededByAuxiliary = (start: number) => {
    const before = /([\p{L}']+)\s+$/u.exec(charSlice(line.text, 0, start))
    return before !== null && AUXILIARIES.has(before[1].toLowerCase())
  }

  for (const [subjects, verbs] of pairs) {
    for (const subject of subjects) {
      for (const verb of verbs) {
        const first = findPhrase(line.text, `${subject} ${verb}`, true).find((match) => !precededByAuxiliary(match.start))
        if (!first) continue
        const [said] = first.text.split(/\s+/)
        issues.push(issueAt(line, first.start, first.end, 'grammar', t.agreement(said, verb), t.agreementHint(said)))
      }
    }
  }
  return issues
}

function earliestPhrase(text: string, phrases: string[]): PhraseMatch | undefined {
  let best: PhraseMatch | undefined
  for (const phrase of phrases) {
    const [first] = findPhrase(text, phrase, true)
    if (first && (!best || first.start < best.start)) best = first
  }
  return best
}

/** First present-tense verb in a sentence that also carries a past time marker */
function tense(line: AnalyzedLine, { rules, t }: DetectorContext): Issue[] {
  for (const sentence of findPattern(line.text, SENTENCE_PATTERN)) {
    const marker = earliestPhrase(sentence.text, rules.tense.pastMarkers)
    if (!marker) continue
    const verb = earliestPhrase(sentence.text, rules.tense.presentVerbs)
    if (!verb) continue

    const start = sentence.start + verb.start
    return [issueAt(line, start, start + (verb.end - verb.start), 'tense', t.tenseMismatch(verb.text, marker.text), t.usePastTense)]
  }
  return []
}

interface ConjunctionPattern {
  rule: PairedConjunction
  pattern: RegExp
}

function conjunctionPatterns(rules: RuleSet): ConjunctionPattern[] {
  return rules.pairedConjunctions.map((rule) => ({
    rule,
    pattern: new RegExp(`${escapeRegExp(rule.first)}.+?${escapeRegExp(rule.second)}`, 'gu'),
  }))
}

function conjunctions(line: AnalyzedLine, patterns: ConjunctionPattern[], { t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  for (const { rule, pattern } of patterns) {
    const [first] = findPattern(line.text, pattern)
    if (!first) continue
    const message =
      rule.kind === 'mismatch' ? t.mismatchedConjunction(rule.first, rule.second) : t.redundantConjunction(rule.first, rule.second)
    issues.push(issueAt(line, first.start, first.end, 'word_order', message, t.replaceWith(rule.preferred)))
  }
  return issues
}

interface ParticlePatterns {
  di: RegExp
  de: RegExp
}

function particlePatterns(rules: RuleSet): ParticlePatterns {
  const adjectives = escapeClass(rules.particles.adjectives)
  const verbs = escapeClass(rules.particles.verbs)
  return {
    di: new RegExp(`[${adjectives}]的[${verbs}]`, 'gu'),
    de: new RegExp(`[${verbs}]地[${adjectives}]`, 'gu'),
  }
}

function particles(line: AnalyzedLine, patterns: ParticlePatterns, { t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  const checks: Array<[RegExp, string, string, string]> = [
    [patterns.di, '的', '地', t.particleDi],
    [patterns.de, '地', '得', t.particleDe],
  ]
  for (const [pattern, from, to, message] of checks) {
    const [first] = line.text.matchAll(pattern)
    if (!first) continue
    // The particle is the second character of the match
    const at = charOffsetOf(line.text, first.index ?? 0) + 1
    issues.push(issueAt(line, at, at + 1, 'grammar', message, t.replaceParticle(from, to)))
  }
  return issues
}

export function createGrammarDetector(context: DetectorContext): Detector {
  const { rules, t } = context
  const patterns = particlePatterns(rules)
  const pairs = conjunctionPatterns(rules)

  return {
    id: 'grammar',
    detect(line) {
      if (line.script === 'chinese') return [...particles(line, patterns, context), ...conjunctions(line, pairs, context)]
      return [
        ...articles(line, context),
        ...phraseTable(line, rules.doubleNegatives, t.doubleNegative, context),
        ...phraseTable(line, rules.prepositionErrors, t.prepositionMisuse, context),
        ...agreement(line, context),
        ...tense(line, context),
      ]
    },
  }
}
