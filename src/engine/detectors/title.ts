/**
 * Heading rules: misspelled heading words (reported once per document),
 * casual phrasing, and trailing punctuation. Only lines recognized as
 * headings are checked.
 */

import type { Issue } from '../../types.js'
import { charCount } from '../text.js'
import type { Detector, DetectorContext } from './common.js'
import { findPhrase, issueAt, matchCase } from './common.js'

const MAX_HEADING_CHARS = 80
const MAX_HEADING_WORDS = 15
const TERMINAL_PUNCTUATION = /[.!?;:。！？；：,，]$/u
const FORBIDDEN_TRAILING = new Set(['.', ',', ';', ':', '!', '。', '，', '；', '：', '！'])

/**
 * Markdown, numbered and Chinese chapter headings, plus short Title Case
 * or ALL CAPS lines without terminal punctuation.
 */
export function isHeading(text: string): boolean {
  const trimmed = text.trim()
  if (!trimmed || charCount(trimmed) > MAX_HEADING_CHARS) return false

  if (/^#{1,6}\s+\S/.test(trimmed)) return true
  if (/^\d+(\.\d+)*\.?\s+\S/.test(trimmed)) return true
  if (/^第[一二三四五六七八九十百零\d]+[章节部分篇]/u.test(trimmed)) return true
  if (/^[一二三四五六七八九十]+、/u.test(trimmed)) return true

  if (TERMINAL_PUNCTUATION.test(trimmed)) return false
  const words = trimmed.split(/\s+/).filter((w) => /[A-Za-z]/.test(w))
  if (words.length < 2 || words.length > MAX_HEADING_WORDS) return false
  const significant = words.filter((w) => /^[A-Za-z]/.test(w) && w.length > 3)
  return significant.length > 0 && significant.every((w) => /^[A-Z]/.test(w))
}

export function createTitleDetector({ rules, t }: DetectorContext): Detector {
  return {
    id: 'title',
    detect(line, dedup) {
      if (!isHeading(line.text)) return []
      const issues: Issue[] = []

      // Headings repeat in running heads and tables of contents
      for (const token of line.tokens) {
        const correction = rules.titleTypos.get(token.text.toLowerCase())
        if (!correction || dedup.seenInDocument(token.text)) continue

        issues.push(
          issueAt(
            line,
            token.start,
            token.end,
            'spelling',
            t.misspelling(token.text),
            t.replaceWith(matchCase(correction, token.text)),
          ),
        )
        dedup.register(token.text)
      }

      const phrases = [
        ...rules.casualTitlePhrases.latin.map((phrase) => ({ phrase, wholeWord: true })),
        ...rules.casualTitlePhrases.chinese.map((phrase) => ({ phrase, wholeWord: false })),
      ]
      for (const { phrase, wholeWord } of phrases) {
        const [first] = findPhrase(line.text, phrase, wholeWord)
        if (!first) continue
        issues.push(issueAt(line, first.start, first.end, 'title', t.casualHeading(first.text), t.formalHeading))
        dedup.register(phrase)
      }

      const body = line.text.trimEnd()
      const last = Array.from(body).pop()
      if (last !== undefined && FORBIDDEN_TRAILING.has(last)) {
        const end = charCount(body)
        issues.push(issueAt(line, end - 1, end, 'title', t.headingPunctuation(last), t.removeHeadingPunctuation))
      }

      return issues
    },
  }
}
