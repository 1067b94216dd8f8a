/**
 * Analysis orchestrator.
 *
 * An AnalysisSession consumes lines one at a time, threading a single
 * DedupContext through the enabled detectors and accumulating issues and
 * stats. The synchronous pass, the chunked scheduler and the streaming
 * file path all drive the same session, so their results are identical.
 */

import { getTranslations } from '../i18n.js'
import type { AnalysisResult, AnalysisStats, AnalyzerConfig, Issue } from '../types.js'
import { DedupContext } from './dedup.js'
import type { Detector } from './detectors/index.js'
import { createDetectors } from './detectors/index.js'
import { createDictionary, type Dictionary } from './dictionary.js'
import { calculateScore } from './filters.js'
import { classifyScript } from './language.js'
import { loadRuleSet } from './rules.js'
import { resolveAnalyzerConfig, type ResolvedAnalyzerConfig } from './shared.js'
import { charCount, splitRawLines, stripCarriageReturn, truncateSafe } from './text.js'
import { extractTokens } from './tokenizer.js'

export interface SessionOptions {
  /**
   * Character budget for input fed line by line. Each `\n` costs one
   * character and a `\r` left on a raw line counts as well, so the budget
   * matches `maxTextLength` applied to the whole text. The line that
   * crosses the budget is cut and later lines are ignored.
   */
  textBudget?: number
}

export class AnalysisSession {
  private readonly dedup = new DedupContext()
  private readonly issues: Issue[] = []
  private truncated = false
  private capped = false
  private lines = 0
  private chars = 0
  private words = 0
  private chineseLines = 0
  private latinLines = 0
  private remaining: number | undefined

  constructor(
    private readonly detectors: readonly Detector[],
    private readonly config: ResolvedAnalyzerConfig,
    options: SessionOptions = {},
  ) {
    this.remaining = options.textBudget
  }

  get issuesFound(): number {
    return this.issues.length
  }

  /** True once a text budget has been used up */
  get budgetExhausted(): boolean {
    return this.remaining === 0
  }

  /** Record that the input was cut before it reached the session */
  markTruncated(): void {
    this.truncated = true
  }

  /**
   * Analyze the next line. `raw` may still carry the `\r` of a CRLF break;
   * it is counted but not analyzed.
   */
  addLine(raw: string): void {
    let text = raw
    const separator = this.lines > 0 ? 1 : 0

    if (this.remaining !== undefined) {
      const available = this.remaining - separator
      if (available <= 0) {
        // The line break itself may still fit
        if (available === 0) this.chars += separator
        this.truncated = true
        this.remaining = 0
        return
      }
      const length = charCount(text)
      if (length > available) {
        text = truncateSafe(text, available)
        this.truncated = true
        this.remaining = 0
      } else {
        this.remaining = available - length
      }
    }

    this.lines++
    this.chars += separator + charCount(text)
    text = stripCarriageReturn(text)

    if (charCount(text) > this.config.maxLineLength) {
      text = truncateSafe(text, this.config.maxLineLength)
      this.truncated = true
    }

    const script = classifyScript(text)
    const tokens = extractTokens(text, script)
    this.words += tokens.length
    if (script === 'chinese') this.chineseLines++
    else this.latinLines++

    // Past the cap only stats are kept
    if (this.capped) return

    this.dedup.beginLine()
    const line = { text, chars: Array.from(text), lineNumber: this.lines, script, tokens }
    for (const detector of this.detectors) {
      const found = detector.detect(line, this.dedup).sort((a, b) => a.start - b.start)
      for (const issue of found) {
        if (this.issues.length >= this.config.maxIssues) {
          this.capped = true
          this.truncated = true
          return
        }
        this.issues.push(issue)
      }
    }
  }

  /**
   * Close the session.
   * `totalChars` overrides the counted characters when the caller holds
   * the exact text (line breaks may be two characters).
   */
  finish(totalChars?: number): AnalysisResult {
    const stats: AnalysisStats = {
      total_chars: totalChars ?? this.chars,
      total_words: this.words,
      total_lines: this.lines,
      total_issues: this.issues.length,
      chinese_lines: this.chineseLines,
      latin_lines: this.latinLines,
      score: calculateScore(this.words, this.issues.length),
    }
    return { issues: [...this.issues], stats, truncated: this.truncated }
  }
}

export interface PreparedText {
  /** Raw lines, as `AnalysisSession.addLine` takes them */
  lines: string[]
  truncated: boolean
  /** Characters in the text after truncation */
  totalChars: number
}

/** Apply the whole-text limit and split into lines */
export function prepareText(text: string, maxTextLength: number): PreparedText {
  const truncated = charCount(text) > maxTextLength
  const kept = truncated ? truncateSafe(text, maxTextLength) : text
  return { lines: splitRawLines(kept), truncated, totalChars: charCount(kept) }
}

export interface Analyzer {
  readonly config: ResolvedAnalyzerConfig
  readonly dictionary: Dictionary
  analyze(text: string): AnalysisResult
  createSession(options?: SessionOptions): AnalysisSession
}

export interface AnalyzerOptions {
  /** Known words added on top of `config.customDictionary` */
  customWords?: Iterable<string>
}

export function createAnalyzer(config: AnalyzerConfig = {}, options: AnalyzerOptions = {}): Analyzer {
  const resolved = resolveAnalyzerConfig(config)
  const dictionary = createDictionary({
    path: resolved.wordListPath,
    customWords: [...resolved.customDictionary, ...(options.customWords ?? [])],
  })
  const detectors = createDetectors({
    dictionary,
    rules: loadRuleSet(resolved.rulesPath),
    t: getTranslations(resolved.locale),
    config: resolved,
  })

  const createSession = (sessionOptions?: SessionOptions) => new AnalysisSession(detectors, resolved, sessionOptions)

  return {
    config: resolved,
    dictionary,
    createSession,
    analyze(text) {
      const prepared = prepareText(text, resolved.maxTextLength)
      const session = createSession()
      if (prepared.truncated) session.markTruncated()
      for (const line of prepared.lines) session.addLine(line)
      return session.finish(prepared.totalChars)
    },
  }
}

/** One-off analysis with a fresh analyzer */
export function analyzeText(text: string, config?: AnalyzerConfig): AnalysisResult {
  return createAnalyzer(config).analyze(text)
}
