/**
 * Sentence-length and punctuation checks.
 *
 * Sentences are bounded by terminating punctuation; a '.' only ends a
 * sentence when it is not followed by a letter or digit, so "3.14" and
 * "e.g" stay inside one sentence. Chinese lines are also checked for
 * ASCII marks mixed in with full-width punctuation.
 */

import type { Issue } from '../../types.js'
import { isAlphanumeric, isCjkIdeograph } from '../shared.js'
import type { AnalyzedLine, Detector, DetectorContext } from './common.js'
import { issueAt } from './common.js'

const LATIN_TERMINATORS = new Set(['.', '!', '?', ';'])
const CHINESE_TERMINATORS = new Set([...LATIN_TERMINATORS, '。', '！', '？', '；'])
const REPEATABLE_PUNCTUATION = new Set([',', '.', '!', '?', ';', ':', '，', '。', '！', '？', '；', '：', '、'])

const FULL_WIDTH = new Map([
  ['!', '！'],
  ['?', '？'],
  [';', '；'],
  [':', '：'],
  ['(', '（'],
  [')', '）'],
])
const CHINESE_PUNCTUATION = /[，。！？；：、“”‘’（）【】「」『』〈〉《》]/u

const isSpace = (ch: string) => /^\s$/u.test(ch)

function endsSentence(chars: string[], i: number, terminators: Set<string>): boolean {
  const ch = chars[i]
  if (!terminators.has(ch)) return false
  if (ch !== '.') return true
  const next = chars[i + 1]
  return next === undefined || isSpace(next) || !isAlphanumeric(next)
}

function longSentences(line: AnalyzedLine, chars: string[], { config, t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  const limit = config.sentenceLimits[line.script]
  const terminators = line.script === 'chinese' ? CHINESE_TERMINATORS : LATIN_TERMINATORS

  const check = (from: number, to: number) => {
    let start = from
    let end = to
    while (start < end && isSpace(chars[start])) start++
    while (end > start && isSpace(chars[end - 1])) end--
    const length = end - start
    if (length > limit) issues.push(issueAt(line, start, end, 'sentence_length', t.longSentence(length), t.splitSentence))
  }

  let sentenceStart = 0
  for (let i = 0; i < chars.length; i++) {
    if (!endsSentence(chars, i, terminators)) continue
    check(sentenceStart, i + 1)
    sentenceStart = i + 1
  }
  if (sentenceStart < chars.length) check(sentenceStart, chars.length)

  return issues
}

function repeatedPunctuation(line: AnalyzedLine, chars: string[], { t }: DetectorContext): Issue[] {
  const issues: Issue[] = []

  let i = 0
  while (i < chars.length) {
    if (!REPEATABLE_PUNCTUATION.has(chars[i])) {
      i++
      continue
    }
    let j = i + 1
    while (j < chars.length && REPEATABLE_PUNCTUATION.has(chars[j])) j++

    const run = chars.slice(i, j).join('')
    // An ellipsis is intentional
    if (j - i >= 2 && run !== '...') {
      issues.push(issueAt(line, i, j, 'punctuation', t.repeatedPunctuation(run), t.singlePunctuation))
    }
    i = j
  }

  return issues
}

function asciiCommas(line: AnalyzedLine, chars: string[], { t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  for (let i = 1; i < chars.length; i++) {
    if (chars[i] !== ',' || !isCjkIdeograph(chars[i - 1])) continue
    const next = chars[i + 1]
    if (next !== undefined && (/^\p{N}$/u.test(next) || /^\p{P}$/u.test(next))) continue
    issues.push(issueAt(line, i, i + 1, 'punctuation', t.asciiComma, t.useChineseComma))
  }
  return issues
}

/** First ASCII mark on a line that already uses full-width punctuation */
function mixedPunctuation(line: AnalyzedLine, chars: string[], { t }: DetectorContext): Issue[] {
  if (!CHINESE_PUNCTUATION.test(line.text)) return []
  const isDigit = (ch: string | undefined) => ch !== undefined && /^\p{N}$/u.test(ch)

  for (let i = 0; i < chars.length; i++) {
    const fullWidth = FULL_WIDTH.get(chars[i])
    if (fullWidth === undefined) continue
    // Clock times and ratios
    if (chars[i] === ':' && isDigit(chars[i - 1]) && isDigit(chars[i + 1])) continue
    return [issueAt(line, i, i + 1, 'punctuation', t.mixedPunctuation(chars[i]), t.replaceWith(fullWidth))]
  }
  return []
}

function unpairedParentheses(line: AnalyzedLine, chars: string[], { t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  const open: number[] = []

  for (let i = 0; i < chars.length; i++) {
    if (chars[i] === '（') {
      open.push(i)
    } else if (chars[i] === '）' && open.pop() === undefined) {
      issues.push(issueAt(line, i, i + 1, 'punctuation', t.unopenedParenthesis, t.removeParenthesis))
    }
  }
  for (const i of open) {
    issues.push(issueAt(line, i, i + 1, 'punctuation', t.unclosedParenthesis, t.addClosingParenthesis))
  }

  return issues
}

export function createSentenceDetector(context: DetectorContext): Detector {
  return {
    id: 'sentence',
    detect(line) {
      const { chars } = line
      const issues = [
        ...longSentences(line, chars, context),
        ...repeatedPunctuation(line, chars, context),
        ...unpairedParentheses(line, chars, context),
      ]
      if (line.script === 'chinese') issues.push(...asciiCommas(line, chars, context), ...mixedPunctuation(line, chars, context))
      return issues
    },
  }
}
