/**
 * proofline: Type definitions.
 */

/** Issue type tags emitted by the detectors */
export type IssueType =
  | 'spelling'
  | 'idiom'
  | 'title'
  | 'repeated_word'
  | 'repeated_char'
  | 'sentence_length'
  | 'punctuation'
  | 'style'
  | 'passive_voice'
  | 'grammar'
  | 'word_order'
  | 'tense'
  | 'citation'

export interface Issue {
  /** 1-based line number */
  lineNumber: number
  /** Code-point offset of the issue start within the line */
  start: number
  /** Code-point offset of the issue end within the line (exclusive) */
  end: number
  issueType: IssueType
  /** Human-readable message explaining the issue */
  message: string
  /** Human-readable correction hint */
  suggestion: string
}

/** Metric name → count (`total_chars`, `total_words`, `total_lines`, …) */
export type AnalysisStats = Record<string, number>

export interface AnalysisResult {
  issues: Issue[]
  stats: AnalysisStats
  /** True when the text, a line, or the issue list was capped */
  truncated: boolean
}

export interface AnalysisProgress {
  /** 0-100 */
  progress: number
  currentLine: number
  totalLines: number
  issuesFound: number
  message: string
}

/**
 * Event payload for `analysis_progress` and `analysis_complete`.
 * Exactly one of `progress`, `result`, `error` is set.
 */
export interface AsyncAnalysisResult {
  analysisId: string
  completed: boolean
  progress?: AnalysisProgress
  result?: AnalysisResult
  error?: string
}

export type Script = 'chinese' | 'latin'

export type MessageLocale = 'zh' | 'en'

export type DetectorId =
  | 'spelling'
  | 'typos'
  | 'title'
  | 'repetition'
  | 'sentence'
  | 'style'
  | 'grammar'
  | 'citation'

export interface AnalyzerConfig {
  /** Whole-text limit in characters (default: 200000) */
  maxTextLength?: number
  /** Per-line limit in characters (default: 10000) */
  maxLineLength?: number
  /** Document-wide issue cap (default: 1000) */
  maxIssues?: number
  /** Lines per scheduling chunk in async mode (default: 50) */
  chunkSize?: number
  /** Texts longer than this are analyzed in chunks by the HTTP endpoint (default: 20000) */
  syncThreshold?: number
  /** Language of issue messages (default: 'zh') */
  locale?: MessageLocale
  /** 'document' makes the spelling detectors also consult the document scope (default: 'line') */
  dedupScope?: 'line' | 'document'
  /** Enabled detectors; registry order is kept regardless of the order given here */
  detectors?: DetectorId[]
  /** Words to never flag */
  customDictionary?: string[]
  /** Sentence length thresholds in characters (default: zh 100, en 200) */
  sentenceLimits?: Partial<Record<Script, number>>
  /** Override the bundled word list */
  wordListPath?: string
  /** Override the bundled rule data */
  rulesPath?: string
}

export interface ProoflinePluginConfig extends AnalyzerConfig {
  /** Base path for API endpoints (default: '/proofline') */
  endpointBasePath?: string
  /** Directory the file endpoint may read from; the endpoint is disabled when unset */
  documentRoot?: string
  /** Add the custom dictionary collection (default: true) */
  addDictionaryCollection?: boolean
}
