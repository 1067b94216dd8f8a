/**
 * Shared constants and config resolution.
 * Used by the analyzer, the scheduler and the HTTP endpoints so that
 * every entry point applies identical limits.
 */

import type { AnalyzerConfig, DetectorId, MessageLocale, Script } from '../types.js'

/** Registry order: earlier detectors' dedup entries suppress later ones */
export const DETECTOR_ORDER: readonly DetectorId[] = [
  'spelling',
  'typos',
  'title',
  'repetition',
  'sentence',
  'style',
  'grammar',
  'citation',
]

export const DEFAULT_MAX_TEXT_LENGTH = 200_000
export const DEFAULT_MAX_LINE_LENGTH = 10_000
export const DEFAULT_MAX_ISSUES = 1_000
export const DEFAULT_CHUNK_SIZE = 50
export const DEFAULT_SYNC_THRESHOLD = 20_000

export interface ResolvedAnalyzerConfig {
  maxTextLength: number
  maxLineLength: number
  maxIssues: number
  chunkSize: number
  syncThreshold: number
  locale: MessageLocale
  dedupScope: 'line' | 'document'
  detectors: DetectorId[]
  customDictionary: string[]
  sentenceLimits: Record<Script, number>
  wordListPath?: string
  rulesPath?: string
}

function positiveInt(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback
  return Math.max(0, Math.floor(value))
}

/**
 * Apply defaults to a partial analyzer config.
 * Detector selection always follows DETECTOR_ORDER.
 */
export function resolveAnalyzerConfig(config: AnalyzerConfig = {}): ResolvedAnalyzerConfig {
  const enabled = new Set(config.detectors ?? DETECTOR_ORDER)

  return {
    maxTextLength: positiveInt(config.maxTextLength, DEFAULT_MAX_TEXT_LENGTH),
    maxLineLength: positiveInt(config.maxLineLength, DEFAULT_MAX_LINE_LENGTH),
    maxIssues: positiveInt(config.maxIssues, DEFAULT_MAX_ISSUES),
    // A zero chunk size would never make progress
    chunkSize: Math.max(1, positiveInt(config.chunkSize, DEFAULT_CHUNK_SIZE)),
    syncThreshold: positiveInt(config.syncThreshold, DEFAULT_SYNC_THRESHOLD),
    locale: config.locale ?? 'zh',
    dedupScope: config.dedupScope ?? 'line',
    detectors: DETECTOR_ORDER.filter((id) => enabled.has(id)),
    customDictionary: config.customDictionary ?? [],
    sentenceLimits: {
      chinese: positiveInt(config.sentenceLimits?.chinese, 100),
      latin: positiveInt(config.sentenceLimits?.latin, 200),
    },
    wordListPath: config.wordListPath,
    rulesPath: config.rulesPath,
  }
}

/** CJK Unified Ideographs block */
export function isCjkIdeograph(ch: string): boolean {
  const cp = ch.codePointAt(0)
  return cp !== undefined && cp >= 0x4e00 && cp <= 0x9fff
}

export function containsCjk(text: string): boolean {
  return /[\u4e00-\u9fff]/.test(text)
}

export function isAsciiLetter(ch: string): boolean {
  return /^[A-Za-z]$/.test(ch)
}

export function isAlphanumeric(ch: string): boolean {
  return /^[\p{L}\p{N}]$/u.test(ch)
}
