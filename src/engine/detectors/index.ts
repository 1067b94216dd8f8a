import type { DetectorId } from '../../types.js'
import type { Detector, DetectorContext, DetectorFactory } from './common.js'
import { createCitationDetector } from './citation.js'
import { createGrammarDetector } from './grammar.js'
import { createRepetitionDetector } from './repetition.js'
import { createSentenceDetector } from './sentence.js'
import { createSpellingDetector } from './spelling.js'
import { createStyleDetector } from './style.js'
import { createTitleDetector } from './title.js'
import { createTypoDetector } from './typos.js'

export const detectorRegistry: Record<DetectorId, DetectorFactory> = {
  spelling: createSpellingDetector,
  typos: createTypoDetector,
  title: createTitleDetector,
  repetition: createRepetitionDetector,
  sentence: createSentenceDetector,
  style: createStyleDetector,
  grammar: createGrammarDetector,
  citation: createCitationDetector,
}

/** Instantiate the enabled detectors in registry order */
export function createDetectors(context: DetectorContext): Detector[] {
  return context.config.detectors.map((id) => detectorRegistry[id](context))
}

export type { AnalyzedLine, Detector, DetectorContext, DetectorFactory } from './common.js'
export { isHeading } from './title.js'
