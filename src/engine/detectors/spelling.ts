/**
 * Dictionary spelling detector.
 *
 * Reports tokens missing from the known-word dictionary, once per dedup
 * scope, at their first occurrence in the line in any capitalization.
 * Capitalized words are treated as proper nouns and hyphenated compounds
 * as technical terms; neither is checked on its own.
 */

import type { Issue } from '../../types.js'
import { isNonNaturalToken } from '../filters.js'
import type { Detector, DetectorContext } from './common.js'
import { issueAt, matchCase } from './common.js'

const PLAIN_WORD = /^[a-z][A-Za-z']*$/

export function createSpellingDetector({ dictionary, rules, t, config }: DetectorContext): Detector {
  return {
    id: 'spelling',
    detect(line, dedup) {
      const issues: Issue[] = []

      for (const token of line.tokens) {
        const word = token.text
        if (!PLAIN_WORD.test(word) || isNonNaturalToken(word)) continue
        if (dedup.seen(word, config.dedupScope)) continue
        if (dictionary.has(word)) continue

        const lower = word.toLowerCase()
        const anchor = line.tokens.find((candidate) => candidate.text.toLowerCase() === lower) ?? token
        const known = rules.typos.get(lower)
        const nearest = known ?? dictionary.suggest(word)
        issues.push(
          issueAt(
            line,
            anchor.start,
            anchor.end,
            'spelling',
            known ? t.misspelling(anchor.text) : t.unknownWord(anchor.text),
            nearest ? t.replaceWith(matchCase(nearest, anchor.text)) : t.checkSpelling,
          ),
        )
        dedup.register(word)
      }

      return issues
    },
  }
}
