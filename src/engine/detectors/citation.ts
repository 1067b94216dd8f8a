/**
 * In-text citations: styles mixed on one line, and author-year citations
 * missing their comma or their year.
 */

import type { Issue } from '../../types.js'
import type { AnalyzedLine, Detector, DetectorContext, PhraseMatch } from './common.js'
import { findPattern, issueAt } from './common.js'

type CitationStyle = 'APA' | 'MLA' | 'Chicago' | 'IEEE'

const NAME = "\\p{Lu}[\\p{L}'-]+"

const STYLE_PATTERNS: ReadonlyArray<[CitationStyle, RegExp]> = [
  ['APA', new RegExp(`\\(${NAME}(?: et al\\.)?,\\s*\\d{4}[a-z]?\\)`, 'gu')],
  ['MLA', new RegExp(`\\(${NAME}\\s+\\d{1,3}(?:[-–]\\d{1,3})?\\)`, 'gu')],
  // Numbered note: "1. Smith, John. ..."
  ['Chicago', new RegExp(`^\\d+\\.\\s+${NAME},\\s+\\p{Lu}`, 'gu')],
  ['IEEE', /\[\d+(?:\s*[,–-]\s*\d+)*\]/gu],
]

const MISSING_COMMA = new RegExp(`\\(\\s*${NAME}(?: et al\\.)?\\s+\\d{4}[a-z]?\\s*\\)`, 'gu')
const MISSING_COMMA_PARTS = /^\(\s*(.+?)\s+(\d{4}[a-z]?)\s*\)$/u
const ET_AL_WITHOUT_YEAR = new RegExp(`\\(\\s*${NAME}\\s+et al\\.?\\s*\\)`, 'gu')
const NAME_ONLY = new RegExp(`\\(\\s*${NAME}\\s*\\)`, 'gu')

interface Citation {
  style: CitationStyle
  match: PhraseMatch
}

function findCitations(text: string): Citation[] {
  return STYLE_PATTERNS.flatMap(([style, pattern]) => findPattern(text, pattern).map((match) => ({ style, match }))).sort(
    (a, b) => a.match.start - b.match.start,
  )
}

function mixedStyles(line: AnalyzedLine, citations: Citation[], { t }: DetectorContext): Issue[] {
  const [first] = citations
  if (!first) return []
  const other = citations.find((citation) => citation.style !== first.style)
  if (!other) return []
  return [
    issueAt(
      line,
      other.match.start,
      other.match.end,
      'citation',
      t.mixedCitationStyles(first.style, other.style),
      t.consistentCitationStyle,
    ),
  ]
}

function malformed(line: AnalyzedLine, hasCitations: boolean, { t }: DetectorContext): Issue[] {
  const issues: Issue[] = []

  for (const match of findPattern(line.text, MISSING_COMMA)) {
    const parts = MISSING_COMMA_PARTS.exec(match.text)
    const suggestion = parts ? t.replaceWith(`(${parts[1]}, ${parts[2]})`) : t.addCitationYear
    issues.push(issueAt(line, match.start, match.end, 'citation', t.citationMissingComma, suggestion))
  }

  // A bare "(Name)" only reads as a citation next to other citations
  const withoutYear = [
    ...findPattern(line.text, ET_AL_WITHOUT_YEAR),
    ...(hasCitations || issues.length > 0 ? findPattern(line.text, NAME_ONLY) : []),
  ]
  for (const match of withoutYear) {
    issues.push(issueAt(line, match.start, match.end, 'citation', t.citationMissingYear, t.addCitationYear))
  }

  return issues
}

export function createCitationDetector(context: DetectorContext): Detector {
  return {
    id: 'citation',
    detect(line) {
      const citations = findCitations(line.text)
      return [...mixedStyles(line, citations, context), ...malformed(line, citations.length > 0, context)]
    },
  }
}
