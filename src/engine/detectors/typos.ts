/**
 * Common-typo detector: table lookup of known misspellings in any
 * capitalization, plus misused CJK idioms matched as substrings.
 */

import type { Issue } from '../../types.js'
import { containsCjk } from '../shared.js'
import type { Detector, DetectorContext } from './common.js'
import { findPhrase, issueAt, matchCase } from './common.js'

export function createTypoDetector({ rules, t, config }: DetectorContext): Detector {
  return {
    id: 'typos',
    detect(line, dedup) {
      const issues: Issue[] = []

      for (const token of line.tokens) {
        const correction = rules.typos.get(token.text.toLowerCase())
        if (!correction || dedup.seen(token.text, config.dedupScope)) continue

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

      if (containsCjk(line.text)) {
        for (const [idiom, correct] of rules.idioms) {
          if (dedup.seen(idiom, config.dedupScope)) continue
          const [first] = findPhrase(line.text, idiom, false)
          if (!first) continue

          issues.push(issueAt(line, first.start, first.end, 'idiom', t.idiomMisuse(idiom), t.replaceWith(correct)))
          dedup.register(idiom)
        }
      }

      return issues
    },
  }
}
