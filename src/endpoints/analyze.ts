/**
 * Analyze endpoints.
 * POST /api/proofline/analyze     : analyze a text; large texts run chunked
 * POST /api/proofline/analyze/file: analyze a file under `documentRoot`
 */

import { isAbsolute, relative, resolve, sep } from 'node:path'
import type { PayloadHandler } from 'payload'
import { createAnalyzer } from '../engine/analyzer.js'
import { runChunked } from '../engine/scheduler.js'
import { charCount } from '../engine/text.js'
import { DocumentDecodeError } from '../errors.js'
import type { AnalysisService } from '../service.js'
import type { ProoflinePluginConfig } from '../types.js'
import { customWordsFor } from './dictionary.js'
import { internalError, readJsonBody, unauthorized } from './request.js'

/**
 * Absolute path of `requested` inside `root`, or null when it would
 * escape the root (or names the root itself).
 */
export function resolveDocumentPath(root: string, requested: string): string | null {
  const base = resolve(root)
  const target = resolve(base, requested)
  const rel = relative(base, target)
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return null
  return target
}

/**
 * POST: analyze a text.
 * Body: { text: string }
 */
export function createAnalyzeHandler(pluginConfig: ProoflinePluginConfig): PayloadHandler {
  return async (req) => {
    if (!req.user) return unauthorized()

    try {
      const body = await readJsonBody(req)
      const { text } = body
      if (typeof text !== 'string') {
        return Response.json({ error: 'Provide { text }' }, { status: 400 })
      }

      const customWords = await customWordsFor(req.payload, pluginConfig)
      const analyzer = createAnalyzer(pluginConfig, { customWords })

      if (charCount(text) <= analyzer.config.syncThreshold) {
        return Response.json(analyzer.analyze(text))
      }

      // Keep the event loop responsive for other requests
      const result = await runChunked(analyzer, text)
      if (!result) return Response.json({ error: 'Analysis cancelled' }, { status: 409 })
      return Response.json(result)
    } catch (error) {
      return internalError('analyze', error)
    }
  }
}

/**
 * POST: analyze a document on disk.
 * Body: { path: string }, relative to `documentRoot`
 */
export function createAnalyzeFileHandler(pluginConfig: ProoflinePluginConfig, service: AnalysisService): PayloadHandler {
  return async (req) => {
    if (!req.user) return unauthorized()

    const root = pluginConfig.documentRoot
    if (!root) return Response.json({ error: 'File analysis is disabled' }, { status: 404 })

    try {
      const body = await readJsonBody(req)
      if (typeof body.path !== 'string' || !body.path) {
        return Response.json({ error: 'Provide { path }' }, { status: 400 })
      }

      const path = resolveDocumentPath(root, body.path)
      if (!path) {
        return Response.json({ error: 'Path is outside the document root' }, { status: 400 })
      }

      const customWords = await customWordsFor(req.payload, pluginConfig)
      const result = await service.analyzeLargeFile(path, { customWords })
      return Response.json(result)
    } catch (error) {
      if (error instanceof DocumentDecodeError) {
        return Response.json({ error: error.message }, { status: 422 })
      }
      return internalError('analyze', error)
    }
  }
}
