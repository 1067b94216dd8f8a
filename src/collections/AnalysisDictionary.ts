/**
 * Custom dictionary collection.
 * One document per known word; words are merged into every analysis.
 */

import type { CollectionConfig } from 'payload'

export const DICTIONARY_COLLECTION = 'proofline-dictionary'

export function normalizeDictionaryWord(word: string): string {
  return word.trim().toLowerCase()
}

export function createAnalysisDictionaryCollection(): CollectionConfig {
  return {
    slug: DICTIONARY_COLLECTION,
    admin: {
      useAsTitle: 'word',
      group: 'Proofline',
    },
    access: {
      read: ({ req }) => Boolean(req.user),
      create: ({ req }) => Boolean(req.user),
      update: ({ req }) => Boolean(req.user),
      delete: ({ req }) => Boolean(req.user),
    },
    hooks: {
      beforeValidate: [
        ({ data }) => {
          if (data && typeof data.word === 'string') {
            data.word = normalizeDictionaryWord(data.word)
          }
          return data
        },
      ],
    },
    fields: [
      {
        name: 'word',
        type: 'text',
        required: true,
        unique: true,
        index: true,
        admin: {
          description: 'Known word, never reported as a misspelling (lower-cased)',
        },
      },
      {
        name: 'addedBy',
        type: 'relationship',
        relationTo: 'users',
      },
    ],
  }
}
