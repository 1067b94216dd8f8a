/**
 * Background analysis endpoints.
 * POST /api/proofline/analyze/async : start a run, replacing the current one
 * GET  /api/proofline/analyze/status: current run progress or result
 * POST /api/proofline/analyze/cancel: cancel the current run
 *
 * One job at a time per process; the run itself continues server-side
 * even if the client goes away.
 */

import type { PayloadHandler } from 'payload'
import type { AnalyzeOptions, AnalysisService } from '../service.js'
import type { AnalysisProgress, AnalysisResult, ProoflinePluginConfig } from '../types.js'
import { customWordsFor } from './dictionary.js'
import { internalError, readJsonBody, unauthorized } from './request.js'

export interface AnalysisJob {
  analysisId: string
  status: 'running' | 'completed' | 'cancelled' | 'error'
  progress: AnalysisProgress | null
  result: AnalysisResult | null
  error: string | null
  startedAt: string
  completedAt: string | null
}

export type CancelOutcome = 'cancelled' | 'idle' | 'finished'

/** Tracks the single current job from the service's events */
export class AnalysisJobRegistry {
  private current: AnalysisJob | null = null

  constructor(private readonly service: AnalysisService) {
    service.on('analysis_progress', (event) => {
      const job = this.current
      if (!job || job.analysisId !== event.analysisId || job.status !== 'running' || !event.progress) return
      job.progress = event.progress
    })

    service.on('analysis_complete', (event) => {
      const job = this.current
      if (!job || job.analysisId !== event.analysisId || job.status !== 'running') return
      job.status = event.error === undefined ? 'completed' : 'error'
      job.result = event.result ?? null
      job.error = event.error ?? null
      job.completedAt = new Date().toISOString()
    })
  }

  start(text: string, options?: AnalyzeOptions): AnalysisJob {
    if (this.current?.status === 'running') {
      console.warn(`[proofline/jobs] Replacing running analysis ${this.current.analysisId}`)
      this.cancel()
    }

    const analysisId = this.service.analyzeTextAsync(text, options)
    this.current = {
      analysisId,
      status: 'running',
      progress: null,
      result: null,
      error: null,
      startedAt: new Date().toISOString(),
      completedAt: null,
    }
    return { ...this.current }
  }

  status(): AnalysisJob | null {
    return this.current ? { ...this.current } : null
  }

  cancel(): CancelOutcome {
    const job = this.current
    if (!job) return 'idle'
    if (job.status !== 'running') return 'finished'

    this.service.cancelAnalysis(job.analysisId)
    job.status = 'cancelled'
    job.completedAt = new Date().toISOString()
    return 'cancelled'
  }
}

/**
 * POST: start a background analysis.
 * Body: { text: string }
 */
export function createAnalyzeAsyncHandler(
  registry: AnalysisJobRegistry,
  pluginConfig: ProoflinePluginConfig,
): PayloadHandler {
  return async (req) => {
    if (!req.user) return unauthorized()

    try {
      const body = await readJsonBody(req)
      if (typeof body.text !== 'string') {
        return Response.json({ error: 'Provide { text }' }, { status: 400 })
      }

      const customWords = await customWordsFor(req.payload, pluginConfig)
      const job = registry.start(body.text, { customWords })
      return Response.json({ analysisId: job.analysisId, status: job.status })
    } catch (error) {
      return internalError('jobs', error)
    }
  }
}

/**
 * GET: current job snapshot.
 */
export function createAnalyzeStatusHandler(registry: AnalysisJobRegistry): PayloadHandler {
  return async (req) => {
    if (!req.user) return unauthorized()

    const job = registry.status()
    if (!job) return Response.json({ status: 'idle' })
    return Response.json(job)
  }
}

/**
 * POST: cancel the current job.
 */
export function createAnalyzeCancelHandler(registry: AnalysisJobRegistry): PayloadHandler {
  return async (req) => {
    if (!req.user) return unauthorized()

    const outcome = registry.cancel()
    if (outcome === 'idle') return Response.json({ error: 'No analysis to cancel' }, { status: 404 })
    if (outcome === 'finished') return Response.json({ error: 'Analysis already finished' }, { status: 409 })
    return Response.json({ status: 'cancelled' })
  }
}
