/**
 * Chunked analysis for large inputs.
 *
 * Lines are fed to one session in chunks; after each chunk a progress event
 * is yielded and control returns to the event loop. Chunking only affects
 * scheduling: the final result equals `analyzer.analyze(text)`.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import { getTranslations } from '../i18n.js'
import type { AnalysisProgress, AnalysisResult } from '../types.js'
import { prepareText, type Analyzer } from './analyzer.js'

export type AnalysisEvent =
  | { type: 'progress'; progress: AnalysisProgress }
  | { type: 'result'; result: AnalysisResult }

export interface StreamOptions {
  /** Checked before every chunk and before the result */
  signal?: AbortSignal
  /** Lines per chunk (default: the analyzer's `chunkSize`) */
  chunkSize?: number
}

/**
 * Yields cumulative progress after every chunk, then exactly one result.
 * An aborted signal ends the stream without a result.
 */
export async function* streamAnalysis(
  analyzer: Analyzer,
  text: string,
  options: StreamOptions = {},
): AsyncGenerator<AnalysisEvent, void, undefined> {
  const { signal } = options
  const chunkSize = Math.max(1, Math.floor(options.chunkSize ?? analyzer.config.chunkSize))
  const t = getTranslations(analyzer.config.locale)

  const prepared = prepareText(text, analyzer.config.maxTextLength)
  const session = analyzer.createSession()
  if (prepared.truncated) session.markTruncated()

  const totalLines = prepared.lines.length
  for (let from = 0; from < totalLines; from += chunkSize) {
    if (signal?.aborted) return

    const to = Math.min(from + chunkSize, totalLines)
    for (const line of prepared.lines.slice(from, to)) session.addLine(line)

    yield {
      type: 'progress',
      progress: {
        progress: Math.floor((to / totalLines) * 100),
        currentLine: to,
        totalLines,
        issuesFound: session.issuesFound,
        message: t.progress(to, totalLines),
      },
    }
    await yieldToEventLoop()
  }

  if (signal?.aborted) return
  yield { type: 'result', result: session.finish(prepared.totalChars) }
}

/**
 * Drain `streamAnalysis`, forwarding progress.
 * Resolves to null when the run was aborted.
 */
export async function runChunked(
  analyzer: Analyzer,
  text: string,
  options: StreamOptions & { onProgress?: (progress: AnalysisProgress) => void } = {},
): Promise<AnalysisResult | null> {
  for await (const event of streamAnalysis(analyzer, text, options)) {
    if (event.type === 'result') return event.result
    options.onProgress?.(event.progress)
  }
  return null
}
