/**
 * Payload CMS plugin for the proofline writing checker.
 *
 * Registers:
 * - API endpoints for synchronous, background and file analysis
 * - Dictionary endpoints and the custom dictionary collection
 *
 * Usage:
 *   import { prooflinePlugin } from 'proofline'
 *
 *   export default buildConfig({
 *     plugins: [
 *       prooflinePlugin({ locale: 'en', documentRoot: './manuscripts' }),
 *     ],
 *   })
 */

import type { Config, Plugin } from 'payload'
import type { ProoflinePluginConfig } from './types.js'
import { createAnalysisDictionaryCollection } from './collections/AnalysisDictionary.js'
import { createAnalyzeFileHandler, createAnalyzeHandler } from './endpoints/analyze.js'
import {
  AnalysisJobRegistry,
  createAnalyzeAsyncHandler,
  createAnalyzeCancelHandler,
  createAnalyzeStatusHandler,
} from './endpoints/jobs.js'
import { createDictionaryAddHandler, createDictionaryDeleteHandler, createDictionaryListHandler } from './endpoints/dictionary.js'
import { loadRuleSet } from './engine/rules.js'
import { loadWordList } from './engine/dictionary.js'
import { AnalysisService } from './service.js'

export const prooflinePlugin =
  (pluginConfig: ProoflinePluginConfig = {}): Plugin =>
  (incomingConfig: Config): Config => {
    const config = { ...incomingConfig }
    const basePath = pluginConfig.endpointBasePath ?? '/proofline'
    const addDictionaryCollection = pluginConfig.addDictionaryCollection !== false

    const service = new AnalysisService(pluginConfig)
    const registry = new AnalysisJobRegistry(service)

    // 1. Custom dictionary collection
    if (addDictionaryCollection) {
      config.collections = [...(config.collections || []), createAnalysisDictionaryCollection()]
    }

    // 2. API endpoints
    config.endpoints = [
      ...(config.endpoints || []),
      {
        path: `${basePath}/analyze`,
        method: 'post' as const,
        handler: createAnalyzeHandler(pluginConfig),
      },
      {
        path: `${basePath}/analyze/async`,
        method: 'post' as const,
        handler: createAnalyzeAsyncHandler(registry, pluginConfig),
      },
      {
        path: `${basePath}/analyze/status`,
        method: 'get' as const,
        handler: createAnalyzeStatusHandler(registry),
      },
      {
        path: `${basePath}/analyze/cancel`,
        method: 'post' as const,
        handler: createAnalyzeCancelHandler(registry),
      },
      {
        path: `${basePath}/analyze/file`,
        method: 'post' as const,
        handler: createAnalyzeFileHandler(pluginConfig, service),
      },
    ]

    if (addDictionaryCollection) {
      config.endpoints.push(
        {
          path: `${basePath}/dictionary`,
          method: 'get' as const,
          handler: createDictionaryListHandler(),
        },
        {
          path: `${basePath}/dictionary`,
          method: 'post' as const,
          handler: createDictionaryAddHandler(),
        },
        {
          path: `${basePath}/dictionary`,
          method: 'delete' as const,
          handler: createDictionaryDeleteHandler(),
        },
      )
    }

    // 3. Load rule data on init so a broken data file fails at startup
    const existingOnInit = config.onInit
    config.onInit = async (payload) => {
      if (existingOnInit) await existingOnInit(payload)
      const words = loadWordList(pluginConfig.wordListPath)
      loadRuleSet(pluginConfig.rulesPath)
      payload.logger.info(`[proofline] Loaded ${words.size} known words`)
    }

    return config
  }
