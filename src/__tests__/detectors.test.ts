import { describe, it, expect } from 'vitest'
import { DedupContext } from '../engine/dedup.js'
import type { AnalyzedLine, Detector, DetectorContext } from '../engine/detectors/index.js'
import { createDetectors, isHeading } from '../engine/detectors/index.js'
import { createCitationDetector } from '../engine/detectors/citation.js'
import { createGrammarDetector } from '../engine/detectors/grammar.js'
import { createRepetitionDetector } from '../engine/detectors/repetition.js'
import { createSentenceDetector } from '../engine/detectors/sentence.js'
import { createSpellingDetector } from '../engine/detectors/spelling.js'
import { createStyleDetector } from '../engine/detectors/style.js'
import { createTitleDetector } from '../engine/detectors/title.js'
import { createTypoDetector } from '../engine/detectors/typos.js'
import { Dictionary, createDictionary } from '../engine/dictionary.js'
import { classifyScript } from '../engine/language.js'
import { loadRuleSet } from '../engine/rules.js'
import { resolveAnalyzerConfig } from '../engine/shared.js'
import { extractTokens } from '../engine/tokenizer.js'
import { getTranslations } from '../i18n.js'
import type { AnalyzerConfig } from '../types.js'

const rules = loadRuleSet()
const bundled = createDictionary()

function context(config: AnalyzerConfig = {}, dictionary: Dictionary = bundled): DetectorContext {
  return {
    dictionary,
    rules,
    t: getTranslations('en'),
    config: resolveAnalyzerConfig({ locale: 'en', ...config }),
  }
}

function line(text: string, lineNumber = 1): AnalyzedLine {
  const script = classifyScript(text)
  return { text, chars: Array.from(text), lineNumber, script, tokens: extractTokens(text, script) }
}

function run(detector: Detector, text: string, dedup = new DedupContext()) {
  return detector.detect(line(text), dedup)
}

// --- Spelling ---

describe('spelling detector', () => {
  it('should report a repeated misspelling once per line', () => {
    const issues = run(createSpellingDetector(context()), 'teh cat sat on teh mat')
    expect(issues).toEqual([
      {
        lineNumber: 1,
        start: 0,
        end: 3,
        issueType: 'spelling',
        message: "Possible misspelling: 'teh'",
        suggestion: "Replace with 'the'",
      },
    ])
  })

  it('should anchor the issue at the first occurrence in any capitalization', () => {
    expect(run(createSpellingDetector(context()), 'Teh cat saw teh dog')).toEqual([
      {
        lineNumber: 1,
        start: 0,
        end: 3,
        issueType: 'spelling',
        message: "Possible misspelling: 'Teh'",
        suggestion: "Replace with 'The'",
      },
    ])
  })

  it('should suggest the nearest known word', () => {
    const dictionary = new Dictionary(new Set(['the', 'cat', 'sat', 'mat']))
    const [issue] = run(createSpellingDetector(context({}, dictionary)), 'the cat sat on the matt')
    expect(issue.message).toBe("Not found in dictionary: 'matt'")
    expect(issue.suggestion).toBe("Replace with 'mat'")
    expect([issue.start, issue.end]).toEqual([19, 23])
  })

  it('should fall back to a generic hint', () => {
    const dictionary = new Dictionary(new Set(['the']))
    const [issue] = run(createSpellingDetector(context({}, dictionary)), 'the qqqqqq')
    expect(issue.suggestion).toBe('Check the spelling of this word')
  })

  it('should skip capitalized and hyphenated words', () => {
    expect(run(createSpellingDetector(context()), 'Recieve the state-of-teh-art')).toEqual([])
  })

  it('should honor the document dedup scope', () => {
    const perLine = createSpellingDetector(context())
    const perDocument = createSpellingDetector(context({ dedupScope: 'document' }))

    for (const [detector, expected] of [
      [perLine, 1],
      [perDocument, 0],
    ] as const) {
      const dedup = new DedupContext()
      detector.detect(line('teh cat', 1), dedup)
      dedup.beginLine()
      expect(detector.detect(line('teh mat', 2), dedup)).toHaveLength(expected)
    }
  })
})

// --- Typos ---

describe('typo detector', () => {
  it('should flag any capitalization and keep the case in the suggestion', () => {
    const issues = run(createTypoDetector(context()), 'Recieve the letter and recieve the card')
    expect(issues).toHaveLength(1)
    expect(issues[0]).toMatchObject({ start: 0, end: 7, suggestion: "Replace with 'Receive'" })
  })

  it('should not re-flag a token the spelling detector reported', () => {
    const dedup = new DedupContext()
    const text = 'teh cat'
    expect(createSpellingDetector(context()).detect(line(text), dedup)).toHaveLength(1)
    expect(createTypoDetector(context()).detect(line(text), dedup)).toEqual([])
  })

  it('should flag misused idioms as substrings', () => {
    expect(run(createTypoDetector(context()), '他的表演一鸣惊动了全场')).toEqual([
      {
        lineNumber: 1,
        start: 4,
        end: 8,
        issueType: 'idiom',
        message: "Misused idiom: '一鸣惊动'",
        suggestion: "Replace with '一鸣惊人'",
      },
    ])
  })
})

// --- Headings ---

describe('isHeading', () => {
  it('should recognize heading markers', () => {
    expect(isHeading('# Introduction')).toBe(true)
    expect(isHeading('1.2 Research Method')).toBe(true)
    expect(isHeading('第一章 绪论')).toBe(true)
    expect(isHeading('一、研究背景')).toBe(true)
  })

  it('should recognize short Title Case lines', () => {
    expect(isHeading('Financal Allocation Review')).toBe(true)
  })

  it('should reject ordinary sentences', () => {
    expect(isHeading('This is a normal sentence.')).toBe(false)
    expect(isHeading('the results of the study')).toBe(false)
  })
})

describe('title detector', () => {
  it('should correct heading typos', () => {
    expect(run(createTitleDetector(context()), '## Financal Report')).toEqual([
      {
        lineNumber: 1,
        start: 3,
        end: 11,
        issueType: 'spelling',
        message: "Possible misspelling: 'Financal'",
        suggestion: "Replace with 'Financial'",
      },
    ])
  })

  it('should report a heading typo once per document', () => {
    const detector = createTitleDetector(context())
    const dedup = new DedupContext()
    expect(detector.detect(line('## Financal Report', 1), dedup)).toHaveLength(1)
    dedup.beginLine()
    expect(detector.detect(line('## Financal Report', 2), dedup)).toEqual([])
  })

  it('should flag casual phrasing and trailing punctuation', () => {
    const issues = run(createTitleDetector(context()), '# A lot of Things.')
    expect(issues.map((i) => [i.start, i.end, i.message])).toEqual([
      [2, 10, "Casual phrasing in heading: 'A lot of'"],
      [11, 17, "Casual phrasing in heading: 'Things'"],
      [17, 18, "Heading ends with '.'"],
    ])
    expect(issues.every((i) => i.issueType === 'title')).toBe(true)
  })

  it('should flag casual Chinese phrasing', () => {
    const issues = run(createTitleDetector(context()), '第一章 很多东西')
    expect(issues.map((i) => [i.start, i.end])).toEqual([
      [4, 6],
      [6, 8],
    ])
  })

  it('should ignore lines that are not headings', () => {
    expect(run(createTitleDetector(context()), 'There are a lot of things here.')).toEqual([])
  })
})

// --- Repetition ---

describe('repetition detector', () => {
  const detector = createRepetitionDetector(context())

  it('should span a repeated word run', () => {
    expect(run(detector, 'the the cat')).toEqual([
      {
        lineNumber: 1,
        start: 0,
        end: 7,
        issueType: 'repeated_word',
        message: "Repeated word 'the'",
        suggestion: "Remove the repeated 'the'",
      },
    ])
    expect(run(detector, 'The the the end')[0]).toMatchObject({ start: 0, end: 11, message: "Repeated word 'The'" })
  })

  it('should not join words across punctuation', () => {
    expect(run(detector, 'This is the end. End users agree.')).toEqual([])
    expect(run(detector, 'Yes, yes we can')).toEqual([])
  })

  it('should not treat repeated numbers as words', () => {
    expect(run(detector, 'page 1 1 only')).toEqual([])
  })

  it('should flag repeated CJK characters', () => {
    expect(run(detector, '我们的的研究')).toEqual([
      {
        lineNumber: 1,
        start: 2,
        end: 4,
        issueType: 'repeated_char',
        message: "Repeated character: '的的'",
        suggestion: "Replace with '的'",
      },
    ])
  })

  it('should allow listed reduplications', () => {
    expect(run(detector, '我们天天学习')).toEqual([])
  })
})

// --- Sentences and punctuation ---

describe('sentence detector', () => {
  it('should flag sentences over the limit', () => {
    const detector = createSentenceDetector(context({ sentenceLimits: { latin: 20 } }))
    const issues = run(detector, 'This sentence is clearly longer than twenty characters. Short one.')
    expect(issues).toEqual([
      {
        lineNumber: 1,
        start: 0,
        end: 55,
        issueType: 'sentence_length',
        message: 'Sentence is too long (55 characters)',
        suggestion: 'Consider splitting it into shorter sentences',
      },
    ])
  })

  it('should not end a sentence at a decimal point', () => {
    const detector = createSentenceDetector(context({ sentenceLimits: { latin: 10 } }))
    expect(run(detector, 'Pi is 3.14 ok').map((i) => [i.start, i.end])).toEqual([[0, 13]])
  })

  it('should flag repeated punctuation but not an ellipsis', () => {
    const issues = run(createSentenceDetector(context()), 'Really?! Yes...')
    expect(issues).toEqual([
      {
        lineNumber: 1,
        start: 6,
        end: 8,
        issueType: 'punctuation',
        message: "Repeated punctuation: '?!'",
        suggestion: 'Use a single punctuation mark',
      },
    ])
  })

  it('should flag repeated full-width punctuation', () => {
    expect(run(createSentenceDetector(context()), '真的吗？？').map((i) => [i.start, i.end])).toEqual([[3, 5]])
  })

  it('should flag ASCII commas after CJK characters', () => {
    const issues = run(createSentenceDetector(context()), '我们认为,这个方法有效')
    expect(issues.map((i) => [i.start, i.end, i.message])).toEqual([[4, 5, 'ASCII comma in Chinese text']])
  })

  it('should leave number separators alone', () => {
    expect(run(createSentenceDetector(context()), '数量为1,000个样本')).toEqual([])
  })

  it('should flag ASCII marks mixed with full-width punctuation', () => {
    expect(run(createSentenceDetector(context()), '结果如下: 准确率很高。')).toEqual([
      {
        lineNumber: 1,
        start: 4,
        end: 5,
        issueType: 'punctuation',
        message: "ASCII punctuation ':' in Chinese text",
        suggestion: "Replace with '：'",
      },
    ])
    expect(run(createSentenceDetector(context()), '会议在10:30开始。')).toEqual([])
  })

  it('should flag unpaired full-width parentheses', () => {
    const detector = createSentenceDetector(context())
    expect(run(detector, '该方法（见附录效果良好')).toEqual([
      {
        lineNumber: 1,
        start: 3,
        end: 4,
        issueType: 'punctuation',
        message: 'Unclosed parenthesis',
        suggestion: "Add a closing '）'",
      },
    ])
    expect(run(detector, '见附录）。').map((i) => [i.start, i.end, i.message])).toEqual([[3, 4, 'Unmatched closing parenthesis']])
    expect(run(detector, '该方法（见附录）效果良好')).toEqual([])
  })
})

// --- Style ---

describe('style detector', () => {
  const detector = createStyleDetector(context())

  it('should flag contractions', () => {
    const issues = run(detector, "We don't know and it's fine")
    expect(issues.map((i) => [i.start, i.end, i.suggestion])).toEqual([
      [3, 8, "Replace with 'do not'"],
      [18, 22, "Replace with 'it is'"],
    ])
  })

  it('should flag redundant phrases', () => {
    expect(run(detector, 'In order to win')).toEqual([
      {
        lineNumber: 1,
        start: 0,
        end: 11,
        issueType: 'style',
        message: "Redundant phrase: 'In order to'",
        suggestion: "Replace with 'to'",
      },
    ])
  })

  it('should flag informal Chinese expressions', () => {
    const issues = run(detector, '这个东西很好')
    expect(issues.map((i) => [i.start, i.end, i.suggestion])).toEqual([
      [4, 6, "Replace with '良好'"],
      [2, 4, "Replace with '物品'"],
    ])
  })

  it('should flag the passive voice', () => {
    expect(run(detector, 'The report was written by the team')).toEqual([
      {
        lineNumber: 1,
        start: 11,
        end: 22,
        issueType: 'passive_voice',
        message: "Passive voice: 'was written'",
        suggestion: 'Consider rewriting in the active voice',
      },
    ])
    expect(run(detector, 'The data were collected twice')[0]).toMatchObject({ start: 9, end: 23 })
    expect(run(detector, 'It is indeed true')).toEqual([])
    expect(run(detector, '他被老师批评了').map((i) => [i.issueType, i.start, i.end])).toEqual([['passive_voice', 1, 2]])
  })

  it('should flag Chinese filler expressions', () => {
    const issues = run(detector, '事实上，这个方法基本上有效')
    expect(issues.map((i) => [i.start, i.end, i.message, i.suggestion])).toEqual([
      [0, 3, "Filler expression: '事实上'", 'State the fact directly'],
      [8, 11, "Filler expression: '基本上'", 'Can be omitted'],
    ])
  })

  it('should skip expressions already reported on the line', () => {
    const dedup = new DedupContext()
    dedup.register('东西')
    expect(run(detector, '这个东西很好', dedup).map((i) => i.start)).toEqual([4])
  })
})

// --- Grammar ---

describe('grammar detector', () => {
  const detector = createGrammarDetector(context())

  it("should require 'an' before a vowel sound", () => {
    expect(run(detector, 'I ate a apple')).toEqual([
      {
        lineNumber: 1,
        start: 6,
        end: 7,
        issueType: 'grammar',
        message: "Use 'an' before words starting with a vowel sound",
        suggestion: "Replace with 'an'",
      },
    ])
  })

  it('should apply article exceptions and keep capitalization', () => {
    const [issue] = run(detector, 'An university')
    expect(issue).toMatchObject({ start: 0, end: 2, suggestion: "Replace with 'A'" })
    expect(run(detector, 'It took an hour')).toEqual([])
  })

  it('should skip acronyms after an article', () => {
    expect(run(detector, 'She met a FBI agent')).toEqual([])
  })

  it('should flag double negatives and preposition misuse', () => {
    expect(run(detector, "I don't have no time")[0]).toMatchObject({
      start: 2,
      end: 15,
      message: 'Double negative detected',
      suggestion: "Replace with 'don't have any'",
    })
    expect(run(detector, 'This is different than that')[0]).toMatchObject({
      start: 8,
      end: 22,
      message: 'Incorrect preposition usage',
      suggestion: "Replace with 'different from'",
    })
  })

  it('should flag subject-verb disagreement', () => {
    expect(run(detector, 'He have a car')[0]).toMatchObject({
      start: 0,
      end: 7,
      message: "Subject-verb agreement error: 'He' with 'have'",
      suggestion: "Use a verb form that agrees with 'He'",
    })
    expect(run(detector, 'They is here')[0]).toMatchObject({ start: 0, end: 7 })
  })

  it('should not flag inverted questions', () => {
    expect(run(detector, 'Does he have a car')).toEqual([])
  })

  it('should flag paired conjunctions', () => {
    expect(run(detector, '虽然实验成功了，但是成本很高')).toEqual([
      {
        lineNumber: 1,
        start: 0,
        end: 10,
        issueType: 'word_order',
        message: "'虽然' and '但是' need not both be used",
        suggestion: "Replace with '虽然…，但…'",
      },
    ])
    expect(run(detector, '他不仅没有完成任务，也没有道歉')[0]).toMatchObject({
      start: 1,
      end: 13,
      message: "Mismatched conjunctions: '不仅没有' with '也没有'",
    })
  })

  it('should flag present-tense verbs in a sentence about the past', () => {
    expect(run(detector, 'Yesterday the server is down.')).toEqual([
      {
        lineNumber: 1,
        start: 21,
        end: 23,
        issueType: 'tense',
        message: "Tense mismatch: 'is' with 'Yesterday'",
        suggestion: 'Use the past tense for past events',
      },
    ])
    expect(run(detector, 'It was cold yesterday. Today it is warm.')).toEqual([])
  })

  it('should flag 的/地/得 confusion', () => {
    expect(run(detector, '他快的跑过来')).toEqual([
      {
        lineNumber: 1,
        start: 2,
        end: 3,
        issueType: 'grammar',
        message: "Use '地' rather than '的' between an adjective and a verb",
        suggestion: "Replace '的' with '地'",
      },
    ])
    expect(run(detector, '他跑地快')[0]).toMatchObject({ start: 2, end: 3, suggestion: "Replace '地' with '得'" })
  })
})

// --- Citations ---

describe('citation detector', () => {
  const detector = createCitationDetector(context())

  it('should flag citation styles mixed on one line', () => {
    expect(run(detector, 'As shown (Smith, 2020) and [3].')).toEqual([
      {
        lineNumber: 1,
        start: 27,
        end: 30,
        issueType: 'citation',
        message: 'APA and IEEE citations mixed on one line',
        suggestion: 'Use one citation style throughout',
      },
    ])
    expect(run(detector, 'Prior work (Smith, 2020) and (Lee, 2021a)')).toEqual([])
  })

  it('should flag a missing comma', () => {
    expect(run(detector, 'This was shown (Smith 2020).')).toEqual([
      {
        lineNumber: 1,
        start: 15,
        end: 27,
        issueType: 'citation',
        message: 'Missing comma between author and year',
        suggestion: "Replace with '(Smith, 2020)'",
      },
    ])
  })

  it('should flag a missing year', () => {
    expect(run(detector, '(Garcia et al.) reported it').map((i) => [i.start, i.end, i.message])).toEqual([
      [0, 15, 'Citation has no year'],
    ])
    expect(run(detector, '(Smith, 2020) and (Lee)').map((i) => [i.start, i.end])).toEqual([[18, 23]])
  })

  it('should leave a lone parenthesized name alone', () => {
    expect(run(detector, 'See the (Appendix) for details')).toEqual([])
  })
})

// --- Registry ---

describe('createDetectors', () => {
  it('should keep registry order regardless of configuration order', () => {
    const detectors = createDetectors(context({ detectors: ['grammar', 'spelling', 'title'] }))
    expect(detectors.map((d) => d.id)).toEqual(['spelling', 'title', 'grammar'])
  })
})
