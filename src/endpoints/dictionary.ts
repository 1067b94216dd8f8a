/**
 * Dictionary endpoints: manage the custom known-word list.
 * GET    /api/proofline/dictionary: list all words
 * POST   /api/proofline/dictionary: add word(s)
 * DELETE /api/proofline/dictionary: delete word(s) by id
 */

import type { Payload, PayloadHandler } from 'payload'
import type { ProoflinePluginConfig } from '../types.js'
import { DICTIONARY_COLLECTION, normalizeDictionaryWord } from '../collections/AnalysisDictionary.js'
import { internalError, readJsonBody, unauthorized } from './request.js'

function stringList(single: unknown, many: unknown): string[] {
  const values: string[] = []
  if (typeof single === 'string') values.push(single)
  if (Array.isArray(many)) values.push(...many.filter((v): v is string => typeof v === 'string'))
  return values
}

/**
 * GET: list all dictionary words sorted alphabetically.
 */
export function createDictionaryListHandler(): PayloadHandler {
  return async (req) => {
    if (!req.user) return unauthorized()

    try {
      const result = await req.payload.find({
        collection: DICTIONARY_COLLECTION,
        limit: 0,
        sort: 'word',
        overrideAccess: true,
      })

      return Response.json({
        words: result.docs,
        count: result.totalDocs,
      })
    } catch (error) {
      return internalError('dictionary', error)
    }
  }
}

/**
 * POST: add one or more words.
 * Body: { word: string } or { words: string[] }
 */
export function createDictionaryAddHandler(): PayloadHandler {
  return async (req) => {
    const { user } = req
    if (!user) return unauthorized()

    try {
      const body = await readJsonBody(req)
      const wordsToAdd = stringList(body.word, body.words)

      if (wordsToAdd.length === 0) {
        return Response.json({ error: 'Provide { word } or { words: [] }' }, { status: 400 })
      }

      const added: string[] = []
      const skipped: string[] = []

      for (const raw of wordsToAdd) {
        const word = normalizeDictionaryWord(raw)
        if (!word) continue

        const existing = await req.payload.find({
          collection: DICTIONARY_COLLECTION,
          where: { word: { equals: word } },
          limit: 1,
          overrideAccess: true,
        })
        if (existing.docs.length > 0 || added.includes(word)) {
          skipped.push(word)
          continue
        }

        await req.payload.create({
          collection: DICTIONARY_COLLECTION,
          data: { word, addedBy: user.id },
          overrideAccess: true,
        })
        added.push(word)
      }

      invalidateDictionaryCache()
      return Response.json({ added, skipped, count: added.length })
    } catch (error) {
      return internalError('dictionary', error)
    }
  }
}

/**
 * DELETE: remove word(s) by id.
 * Body: { id: string } or { ids: string[] }; `?id=` is accepted too.
 */
export function createDictionaryDeleteHandler(): PayloadHandler {
  return async (req) => {
    if (!req.user) return unauthorized()

    try {
      const body = await readJsonBody(req)
      const idsToDelete = stringList(body.id, body.ids)

      const queryId = new URL(req.url ?? '', 'http://localhost').searchParams.get('id')
      if (queryId) idsToDelete.push(queryId)

      if (idsToDelete.length === 0) {
        return Response.json({ error: 'Provide { id } or { ids: [] }' }, { status: 400 })
      }

      const result = await req.payload.delete({
        collection: DICTIONARY_COLLECTION,
        where: { id: { in: idsToDelete } },
        overrideAccess: true,
      })

      invalidateDictionaryCache()
      return Response.json({ deleted: result.docs.length, failed: result.errors.length })
    } catch (error) {
      return internalError('dictionary', error)
    }
  }
}

// --- In-memory dictionary cache (5 min TTL) ---

let cachedWords: string[] | null = null
let cacheTimestamp = 0
const CACHE_TTL = 5 * 60 * 1000

export function invalidateDictionaryCache(): void {
  cachedWords = null
  cacheTimestamp = 0
}

/**
 * Load the custom words with an in-memory cache.
 * Returns lower-cased words; an unreadable collection yields none.
 */
export async function loadDictionaryWords(payload: Pick<Payload, 'find'>): Promise<string[]> {
  const now = Date.now()
  if (cachedWords && now - cacheTimestamp < CACHE_TTL) {
    return cachedWords
  }

  try {
    const result = await payload.find({
      collection: DICTIONARY_COLLECTION,
      limit: 0,
      overrideAccess: true,
    })

    const words: string[] = []
    for (const doc of result.docs) {
      const word: unknown = doc.word
      if (typeof word === 'string') words.push(normalizeDictionaryWord(word))
    }
    cachedWords = words
    cacheTimestamp = now
    return words
  } catch (error) {
    // The collection may not exist before the first schema sync
    console.warn('[proofline/dictionary] Cannot load custom words:', error)
    return []
  }
}

/** Custom words for a request; none when the collection is disabled */
export async function customWordsFor(
  payload: Pick<Payload, 'find'>,
  pluginConfig: ProoflinePluginConfig,
): Promise<string[]> {
  if (pluginConfig.addDictionaryCollection === false) return []
  return loadDictionaryWords(payload)
}
