/**
 * Rule data loader.
 * The tables the detectors run (typos, idioms, phrase lists, …) live in
 * data/rules.json; this module reads and validates them once per path.
 */

import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { RuleDataError } from '../errors.js'
import type { Script } from '../types.js'
import { DATA_DIR } from './data.js'

export const DEFAULT_RULES_PATH = join(DATA_DIR, 'rules.json')

/** How a filler expression should be rewritten */
export type FillerHint = 'state' | 'omit' | 'specify'

const FILLER_HINTS: readonly FillerHint[] = ['state', 'omit', 'specify']

export interface PairedConjunction {
  first: string
  second: string
  /** Pattern to use instead */
  preferred: string
  /** `mismatch`: the pair does not go together; `redundant`: one of the two is enough */
  kind: 'mismatch' | 'redundant'
}

const CONJUNCTION_KINDS: readonly PairedConjunction['kind'][] = ['mismatch', 'redundant']

export interface RuleSet {
  /** Common misspelling (lower-case) → correction */
  typos: Map<string, string>
  /** Misused CJK idiom → correct idiom */
  idioms: Map<string, string>
  /** Heading misspelling (lower-case) → correction */
  titleTypos: Map<string, string>
  /** Casual phrasing forbidden in headings, per script (lower-case) */
  casualTitlePhrases: Record<Script, string[]>
  /** Legitimate CJK reduplications never reported as repeats */
  reduplications: Set<string>
  contractions: Map<string, string>
  redundantPhrases: Map<string, string>
  informalExpressions: Map<string, string>
  doubleNegatives: Map<string, string>
  prepositionErrors: Map<string, string>
  agreement: {
    singularSubjects: string[]
    pluralVerbs: string[]
    pluralSubjects: string[]
    singularVerbs: string[]
  }
  /** Word prefixes that take the other article than their first letter suggests */
  articleExceptions: { a: string[]; an: string[] }
  /** Characters for the 的/地/得 checks */
  particles: { adjectives: string; verbs: string }
  passiveVoice: {
    /** Chinese passive markers, matched as substrings */
    markers: string[]
    /** Forms of "be" that start an English passive */
    auxiliaries: string[]
    irregularParticiples: Set<string>
    /** Words ending in -ed that are not participles */
    notParticiples: Set<string>
  }
  /** Chinese filler expression → rewrite hint */
  fillerExpressions: Map<string, FillerHint>
  pairedConjunctions: PairedConjunction[]
  tense: { pastMarkers: string[]; presentVerbs: string[] }
}

const cache = new Map<string, RuleSet>()

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringArray(source: string, value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new RuleDataError(source, `"${field}" must be an array of strings`)
  }
  return value
}

function stringMap(source: string, value: unknown, field: string, lowerKeys = false): Map<string, string> {
  if (!isRecord(value)) throw new RuleDataError(source, `"${field}" must be an object`)
  const map = new Map<string, string>()
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new RuleDataError(source, `"${field}.${key}" must be a string`)
    }
    map.set(lowerKeys ? key.toLowerCase() : key, entry)
  }
  return map
}

function section(source: string, value: Record<string, unknown>, field: string): Record<string, unknown> {
  const entry = value[field]
  if (!isRecord(entry)) throw new RuleDataError(source, `"${field}" must be an object`)
  return entry
}

function text(source: string, value: unknown, field: string): string {
  if (typeof value !== 'string') throw new RuleDataError(source, `"${field}" must be a string`)
  return value
}

function oneOf<T extends string>(source: string, value: unknown, field: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) throw new RuleDataError(source, `"${field}" must be one of ${allowed.join(', ')}`)
  return match
}

function fillerMap(source: string, value: unknown): Map<string, FillerHint> {
  const map = new Map<string, FillerHint>()
  for (const [phrase, hint] of stringMap(source, value, 'fillerExpressions')) {
    map.set(phrase, oneOf(source, hint, `fillerExpressions.${phrase}`, FILLER_HINTS))
  }
  return map
}

function conjunctionList(source: string, value: unknown): PairedConjunction[] {
  if (!Array.isArray(value)) throw new RuleDataError(source, '"pairedConjunctions" must be an array')
  return value.map((entry: unknown, index) => {
    const field = `pairedConjunctions[${index}]`
    if (!isRecord(entry)) throw new RuleDataError(source, `"${field}" must be an object`)
    return {
      first: text(source, entry.first, `${field}.first`),
      second: text(source, entry.second, `${field}.second`),
      preferred: text(source, entry.preferred, `${field}.preferred`),
      kind: oneOf(source, entry.kind, `${field}.kind`, CONJUNCTION_KINDS),
    }
  })
}

export function parseRuleSet(raw: unknown, source = 'rules'): RuleSet {
  if (!isRecord(raw)) throw new RuleDataError(source, 'rule data must be a JSON object')

  const casual = section(source, raw, 'casualTitlePhrases')
  const agreement = section(source, raw, 'agreement')
  const articles = section(source, raw, 'articleExceptions')
  const particles = section(source, raw, 'particles')
  const passive = section(source, raw, 'passiveVoice')
  const tense = section(source, raw, 'tense')
  const lower = (list: string[]) => list.map((p) => p.toLowerCase())

  return {
    typos: stringMap(source, raw.typos, 'typos', true),
    idioms: stringMap(source, raw.idioms, 'idioms'),
    titleTypos: stringMap(source, raw.titleTypos, 'titleTypos', true),
    casualTitlePhrases: {
      latin: lower(stringArray(source, casual.latin, 'casualTitlePhrases.latin')),
      chinese: stringArray(source, casual.chinese, 'casualTitlePhrases.chinese'),
    },
    reduplications: new Set(stringArray(source, raw.reduplications, 'reduplications')),
    contractions: stringMap(source, raw.contractions, 'contractions', true),
    redundantPhrases: stringMap(source, raw.redundantPhrases, 'redundantPhrases', true),
    informalExpressions: stringMap(source, raw.informalExpressions, 'informalExpressions'),
    doubleNegatives: stringMap(source, raw.doubleNegatives, 'doubleNegatives', true),
    prepositionErrors: stringMap(source, raw.prepositionErrors, 'prepositionErrors', true),
    agreement: {
      singularSubjects: lower(stringArray(source, agreement.singularSubjects, 'agreement.singularSubjects')),
      pluralVerbs: lower(stringArray(source, agreement.pluralVerbs, 'agreement.pluralVerbs')),
      pluralSubjects: lower(stringArray(source, agreement.pluralSubjects, 'agreement.pluralSubjects')),
      singularVerbs: lower(stringArray(source, agreement.singularVerbs, 'agreement.singularVerbs')),
    },
    articleExceptions: {
      a: lower(stringArray(source, articles.a, 'articleExceptions.a')),
      an: lower(stringArray(source, articles.an, 'articleExceptions.an')),
    },
    particles: {
      adjectives: text(source, particles.adjectives, 'particles.adjectives'),
      verbs: text(source, particles.verbs, 'particles.verbs'),
    },
    passiveVoice: {
      markers: stringArray(source, passive.markers, 'passiveVoice.markers'),
      auxiliaries: lower(stringArray(source, passive.auxiliaries, 'passiveVoice.auxiliaries')),
      irregularParticiples: new Set(lower(stringArray(source, passive.irregularParticiples, 'passiveVoice.irregularParticiples'))),
      notParticiples: new Set(lower(stringArray(source, passive.notParticiples, 'passiveVoice.notParticiples'))),
    },
    fillerExpressions: fillerMap(source, raw.fillerExpressions),
    pairedConjunctions: conjunctionList(source, raw.pairedConjunctions),
    tense: {
      pastMarkers: lower(stringArray(source, tense.pastMarkers, 'tense.pastMarkers')),
      presentVerbs: lower(stringArray(source, tense.presentVerbs, 'tense.presentVerbs')),
    },
  }
}

/**
 * Load and validate a rule file (cached per path).
 */
export function loadRuleSet(path: string = DEFAULT_RULES_PATH): RuleSet {
  const cached = cache.get(path)
  if (cached) return cached

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new RuleDataError(path, `cannot read rule data (${reason})`, { cause: error })
  }

  const rules = parseRuleSet(raw, path)
  cache.set(path, rules)
  return rules
}
