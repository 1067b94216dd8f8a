/**
 * AnalysisService: the engine's public entry point.
 *
 * Synchronous analysis, background runs reported through events, and
 * line-streamed analysis of files on disk. Each run owns its own session,
 * so concurrent runs never share dedup state.
 */

import { randomUUID } from 'node:crypto'
import { EventEmitter } from 'node:events'
import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import { PlainTextDecoder, type DocumentDecoder } from './document/decoder.js'
import { createAnalyzer, type Analyzer } from './engine/analyzer.js'
import { runChunked } from './engine/scheduler.js'
import type { AnalysisResult, AnalyzerConfig, AsyncAnalysisResult } from './types.js'

export type AnalysisEventName = 'analysis_progress' | 'analysis_complete'

export type AnalysisListener = (event: AsyncAnalysisResult) => void

export interface AnalyzeOptions {
  /** Known words for this run only */
  customWords?: Iterable<string>
}

export class AnalysisService {
  private readonly events = new EventEmitter()
  private readonly runs = new Map<string, AbortController>()
  private baseAnalyzer: Analyzer | null = null

  constructor(
    private readonly config: AnalyzerConfig = {},
    private readonly decoder: DocumentDecoder = new PlainTextDecoder(),
  ) {}

  private analyzerFor(options: AnalyzeOptions = {}): Analyzer {
    if (options.customWords) return createAnalyzer(this.config, { customWords: options.customWords })
    this.baseAnalyzer ??= createAnalyzer(this.config)
    return this.baseAnalyzer
  }

  /** Subscribe to run events. Returns the unsubscribe function. */
  on(event: AnalysisEventName, listener: AnalysisListener): () => void {
    this.events.on(event, listener)
    return () => {
      this.events.off(event, listener)
    }
  }

  private emit(event: AnalysisEventName, payload: AsyncAnalysisResult): void {
    this.events.emit(event, payload)
  }

  /** Runs currently in flight */
  get activeRuns(): number {
    return this.runs.size
  }

  analyzeText(text: string, options?: AnalyzeOptions): AnalysisResult {
    return this.analyzerFor(options).analyze(text)
  }

  /**
   * Start a background run and return its id. Progress arrives as
   * `analysis_progress` events; `analysis_complete` follows exactly once
   * unless the run is cancelled.
   */
  analyzeTextAsync(text: string, options?: AnalyzeOptions): string {
    const analysisId = randomUUID()
    const controller = new AbortController()
    this.runs.set(analysisId, controller)
    void this.run(analysisId, text, controller.signal, options)
    return analysisId
  }

  private async run(analysisId: string, text: string, signal: AbortSignal, options?: AnalyzeOptions): Promise<void> {
    try {
      // Nothing runs before the caller has the id
      await yieldToEventLoop()
      const analyzer = this.analyzerFor(options)
      const result = await runChunked(analyzer, text, {
        signal,
        onProgress: (progress) => this.emit('analysis_progress', { analysisId, completed: false, progress }),
      })
      if (result) this.emit('analysis_complete', { analysisId, completed: true, result })
    } catch (error) {
      console.error(`[proofline/service] Analysis ${analysisId} failed:`, error)
      this.emit('analysis_complete', {
        analysisId,
        completed: true,
        error: error instanceof Error ? error.message : String(error),
      })
    } finally {
      this.runs.delete(analysisId)
    }
  }

  /** Returns false when no run with this id is in flight */
  cancelAnalysis(analysisId: string): boolean {
    const controller = this.runs.get(analysisId)
    if (!controller) return false
    controller.abort()
    this.runs.delete(analysisId)
    return true
  }

  /**
   * Analyze a file through the decoder. Decoders that stream lines are
   * read incrementally against the text budget; others are decoded whole.
   * Both give the result `analyzeText` gives for the file's text, except
   * that a line break ending the file is not counted in `total_chars`.
   * Decoder errors propagate unchanged.
   */
  async analyzeLargeFile(path: string, options?: AnalyzeOptions): Promise<AnalysisResult> {
    const analyzer = this.analyzerFor(options)

    try {
      if (!this.decoder.streamLines) {
        return analyzer.analyze(await this.decoder.decode(path))
      }

      const session = analyzer.createSession({ textBudget: analyzer.config.maxTextLength })
      for await (const line of this.decoder.streamLines(path)) {
        if (session.budgetExhausted) {
          session.markTruncated()
          break
        }
        session.addLine(line)
      }
      return session.finish()
    } catch (error) {
      console.error(`[proofline/service] Cannot analyze ${path}:`, error)
      throw error
    }
  }
}
