// Server entry: plugin + engine + types
export { prooflinePlugin } from './plugin.js'
export { AnalysisService } from './service.js'
export type { AnalysisEventName, AnalysisListener, AnalyzeOptions } from './service.js'
export type {
  AnalysisProgress,
  AnalysisResult,
  AnalysisStats,
  AnalyzerConfig,
  AsyncAnalysisResult,
  DetectorId,
  Issue,
  IssueType,
  MessageLocale,
  ProoflinePluginConfig,
  Script,
} from './types.js'
export { analyzeText, createAnalyzer, prepareText, AnalysisSession } from './engine/analyzer.js'
export type { Analyzer, AnalyzerOptions, SessionOptions } from './engine/analyzer.js'
export { streamAnalysis, runChunked } from './engine/scheduler.js'
export type { AnalysisEvent, StreamOptions } from './engine/scheduler.js'
export { DedupContext } from './engine/dedup.js'
export { classifyScript } from './engine/language.js'
export { extractTokens } from './engine/tokenizer.js'
export type { Token } from './engine/tokenizer.js'
export { charCount, charSlice, findWholeWord, splitLines, truncateSafe } from './engine/text.js'
export { createDictionary, Dictionary } from './engine/dictionary.js'
export { loadRuleSet, parseRuleSet } from './engine/rules.js'
export type { RuleSet } from './engine/rules.js'
export { detectorRegistry, isHeading } from './engine/detectors/index.js'
export type { AnalyzedLine, Detector, DetectorContext, DetectorFactory } from './engine/detectors/index.js'
export { isNonNaturalToken, calculateScore } from './engine/filters.js'
export { resolveAnalyzerConfig, DETECTOR_ORDER } from './engine/shared.js'
export { PlainTextDecoder } from './document/decoder.js'
export type { DocumentDecoder } from './document/decoder.js'
export { DocumentDecodeError, RuleDataError } from './errors.js'
export { loadDictionaryWords, invalidateDictionaryCache } from './endpoints/dictionary.js'
export { AnalysisJobRegistry } from './endpoints/jobs.js'
export type { AnalysisJob, CancelOutcome } from './endpoints/jobs.js'
export { resolveDocumentPath } from './endpoints/analyze.js'
export { getTranslations } from './i18n.js'
export type { ProoflineTranslations } from './i18n.js'
