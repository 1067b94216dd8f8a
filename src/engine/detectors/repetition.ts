/**
 * Repeated words ("the the") on Latin lines and repeated characters
 * ("的的") on Chinese lines. Each run is reported once, spanning the run.
 * Words only form a run when nothing but whitespace separates them, so
 * "the end. End users" and "yes, yes" are left alone.
 */

import type { Issue } from '../../types.js'
import { isCjkIdeograph } from '../shared.js'
import { splitWords, type Token } from '../tokenizer.js'
import type { AnalyzedLine, Detector, DetectorContext } from './common.js'
import { issueAt } from './common.js'

function adjacent(line: AnalyzedLine, previous: Token, next: Token): boolean {
  return /^\s+$/u.test(line.chars.slice(previous.end, next.start).join(''))
}

function repeatedWords(line: AnalyzedLine, { t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  const words = splitWords(line.text)

  let i = 0
  while (i < words.length) {
    const first = words[i]
    const key = first.text.toLowerCase()
    let j = i + 1
    while (j < words.length && words[j].text.toLowerCase() === key && adjacent(line, words[j - 1], words[j])) j++

    if (j - i >= 2 && /\p{L}/u.test(key)) {
      const last = words[j - 1]
      issues.push(
        issueAt(line, first.start, last.end, 'repeated_word', t.repeatedWord(first.text), t.removeRepeatedWord(first.text)),
      )
    }
    i = j
  }

  return issues
}

function repeatedChars(line: AnalyzedLine, { rules, t }: DetectorContext): Issue[] {
  const issues: Issue[] = []
  const { chars } = line

  let i = 0
  while (i < chars.length) {
    const ch = chars[i]
    let j = i + 1
    while (j < chars.length && chars[j] === ch) j++

    const run = chars.slice(i, j).join('')
    const length = j - i
    if (length >= 2 && isCjkIdeograph(ch) && !(length === 2 && rules.reduplications.has(run))) {
      issues.push(issueAt(line, i, j, 'repeated_char', t.repeatedChar(run), t.removeRepeatedChar(ch)))
    }
    i = j
  }

  return issues
}

export function createRepetitionDetector(context: DetectorContext): Detector {
  return {
    id: 'repetition',
    detect(line) {
      return line.script === 'chinese' ? repeatedChars(line, context) : repeatedWords(line, context)
    },
  }
}
