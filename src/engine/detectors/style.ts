/**
 * Academic register: contractions, redundant phrases and the passive voice
 * in Latin text; informal wording, filler expressions and passive markers
 * in Chinese text.
 */

import type { Issue } from '../../types.js'
import type { DedupContext } from '../dedup.js'
import type { RuleSet } from '../rules.js'
import { splitWords } from '../tokenizer.js'
import type { AnalyzedLine, Detector, DetectorContext } from './common.js'
import { findPhrase, issueAt, matchCase } from './common.js'

function isParticiple(word: string, rules: RuleSet): boolean {
  const lower = word.toLowerCase()
  if (rules.passiveVoice.irregularParticiples.has(lower)) return true
  return /^[a-z]{2,}ed$/.test(lower) && !rules.passiveVoice.notParticiples.has(lower)
}

/** First "be" + participle pair on the line, with only whitespace between them */
function latinPassive(line: AnalyzedLine, { rules, t }: DetectorContext): Issue[] {
  const words = splitWords(line.text)
  for (let i = 0; i + 1 < words.length; i++) {
    const auxiliary = words[i]
    const participle = words[i + 1]
    if (!rules.passiveVoice.auxiliaries.includes(auxiliary.text.toLowerCase())) continue
    const between = line.chars.slice(auxiliary.end, participle.start).join('')
    if (!/^\s+$/u.test(between) || !isParticiple(participle.text, rules)) continue

    const phrase = line.chars.slice(auxiliary.start, participle.end).join('')
    return [issueAt(line, auxiliary.start, participle.end, 'passive_voice', t.passiveVoice(phrase), t.preferActiveVoice)]
  }
  return []
}

function chinesePassive(line: AnalyzedLine, { rules, t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  for (const marker of rules.passiveVoice.markers) {
    const [first] = findPhrase(line.text, marker, false)
    if (first) issues.push(issueAt(line, first.start, first.end, 'passive_voice', t.passiveVoice(marker), t.preferActiveVoice))
  }
  return issues
}

function latinStyle(line: AnalyzedLine, context: DetectorContext): Issue[] {
  const { rules, t } = context
  const issues: Issue[] = []
  const reported = new Set<string>()

  for (const token of line.tokens) {
    const key = token.text.toLowerCase()
    const expansion = rules.contractions.get(key)
    if (!expansion || reported.has(key)) continue
    reported.add(key)
    issues.push(
      issueAt(line, token.start, token.end, 'style', t.contraction(token.text), t.replaceWith(matchCase(expansion, token.text))),
    )
  }

  for (const [phrase, replacement] of rules.redundantPhrases) {
    const [first] = findPhrase(line.text, phrase, true)
    if (!first) continue
    issues.push(issueAt(line, first.start, first.end, 'style', t.redundantPhrase(first.text), t.replaceWith(replacement)))
  }

  return [...issues, ...latinPassive(line, context)]
}

function chineseStyle(line: AnalyzedLine, context: DetectorContext, dedup: DedupContext): Issue[] {
  const { rules, t } = context
  const issues: Issue[] = []

  for (const [word, formal] of rules.informalExpressions) {
    // Already reported on this line, e.g. as casual heading wording
    if (dedup.seenInLine(word)) continue
    const [first] = findPhrase(line.text, word, false)
    if (!first) continue
    issues.push(issueAt(line, first.start, first.end, 'style', t.informalExpression(word), t.replaceWith(formal)))
    dedup.register(word)
  }

  for (const [phrase, hint] of rules.fillerExpressions) {
    if (dedup.seenInLine(phrase)) continue
    const [first] = findPhrase(line.text, phrase, false)
    if (!first) continue
    issues.push(issueAt(line, first.start, first.end, 'style', t.fillerExpression(phrase), t.fillerHints[hint]))
    dedup.register(phrase)
  }

  return [...issues, ...chinesePassive(line, context)]
}

export function createStyleDetector(context: DetectorContext): Detector {
  return {
    id: 'style',
    detect(line, dedup) {
      return line.script === 'chinese' ? chineseStyle(line, context, dedup) : latinStyle(line, context)
    },
  }
}
