/**
 * proofline: issue and progress messages (ZH/EN).
 */

import type { FillerHint } from './engine/rules.js'
import type { MessageLocale } from './types.js'

export interface ProoflineTranslations {
  // Spelling
  misspelling: (word: string) => string
  unknownWord: (word: string) => string
  replaceWith: (correction: string) => string
  checkSpelling: string
  idiomMisuse: (idiom: string) => string

  // Headings
  casualHeading: (phrase: string) => string
  formalHeading: string
  headingPunctuation: (mark: string) => string
  removeHeadingPunctuation: string

  // Repetition
  repeatedWord: (word: string) => string
  removeRepeatedWord: (word: string) => string
  repeatedChar: (run: string) => string
  removeRepeatedChar: (ch: string) => string

  // Sentences and punctuation
  longSentence: (chars: number) => string
  splitSentence: string
  repeatedPunctuation: (run: string) => string
  singlePunctuation: string
  asciiComma: string
  useChineseComma: string
  mixedPunctuation: (mark: string) => string
  unclosedParenthesis: string
  addClosingParenthesis: string
  unopenedParenthesis: string
  removeParenthesis: string

  // Style
  contraction: (word: string) => string
  redundantPhrase: (phrase: string) => string
  informalExpression: (word: string) => string
  passiveVoice: (phrase: string) => string
  preferActiveVoice: string
  fillerExpression: (phrase: string) => string
  fillerHints: Record<FillerHint, string>

  // Grammar
  articleBeforeVowel: string
  articleBeforeConsonant: string
  doubleNegative: string
  prepositionMisuse: string
  agreement: (subject: string, verb: string) => string
  agreementHint: (subject: string) => string
  particleDi: string
  particleDe: string
  replaceParticle: (from: string, to: string) => string
  mismatchedConjunction: (first: string, second: string) => string
  redundantConjunction: (first: string, second: string) => string
  tenseMismatch: (verb: string, marker: string) => string
  usePastTense: string

  // Citations
  mixedCitationStyles: (first: string, second: string) => string
  consistentCitationStyle: string
  citationMissingComma: string
  citationMissingYear: string
  addCitationYear: string

  // Progress
  progress: (current: number, total: number) => string
}

const zh: ProoflineTranslations = {
  misspelling: (word) => `可能的拼写错误: '${word}'`,
  unknownWord: (word) => `词典中未找到: '${word}'`,
  replaceWith: (correction) => `建议修改为: '${correction}'`,
  checkSpelling: '请检查拼写是否正确',
  idiomMisuse: (idiom) => `成语使用错误: '${idiom}'`,

  casualHeading: (phrase) => `标题中使用了口语化表达: '${phrase}'`,
  formalHeading: '标题应使用正式、简洁的表达',
  headingPunctuation: (mark) => `标题末尾不应使用标点 '${mark}'`,
  removeHeadingPunctuation: '删除标题末尾的标点',

  repeatedWord: (word) => `重复使用词语 '${word}'`,
  removeRepeatedWord: (word) => `删除重复的 '${word}'`,
  repeatedChar: (run) => `重复的字: '${run}'`,
  removeRepeatedChar: (ch) => `建议修改为: '${ch}'`,

  longSentence: (chars) => `句子过长 (${chars} 字符)`,
  splitSentence: '考虑将长句拆分为多个短句，以提高可读性',
  repeatedPunctuation: (run) => `连续使用多个标点符号: '${run}'`,
  singlePunctuation: '使用单个适当的标点符号',
  asciiComma: '中文语句中使用了英文逗号',
  useChineseComma: "建议修改为: '，'",
  mixedPunctuation: (mark) => `中文语句中使用了英文标点 '${mark}'`,
  unclosedParenthesis: '括号未闭合',
  addClosingParenthesis: '添加右括号）',
  unopenedParenthesis: '多余的右括号',
  removeParenthesis: '删除多余的右括号或补充左括号（',

  contraction: (word) => `学术写作中应避免使用缩写形式: '${word}'`,
  redundantPhrase: (phrase) => `冗余表达: '${phrase}'`,
  informalExpression: (word) => `非正式表达: '${word}'`,
  passiveVoice: (phrase) => `被动语态: '${phrase}'`,
  preferActiveVoice: '考虑改用主动语态',
  fillerExpression: (phrase) => `冗余表达: '${phrase}'`,
  fillerHints: {
    state: '可以直接陈述事实',
    omit: '可以省略',
    specify: '可以更明确地表达',
  },

  articleBeforeVowel: "元音开头的单词前应使用 'an'",
  articleBeforeConsonant: "辅音开头的单词前应使用 'a'",
  doubleNegative: '检测到双重否定',
  prepositionMisuse: '介词搭配不当',
  agreement: (subject, verb) => `主谓不一致: '${subject}' 与 '${verb}'`,
  agreementHint: (subject) => `请使用与 '${subject}' 一致的动词形式`,
  particleDi: "形容词后接动词应使用'地'而非'的'",
  particleDe: "动词后接形容词应使用'得'而非'地'",
  replaceParticle: (from, to) => `将'${from}'改为'${to}'`,
  mismatchedConjunction: (first, second) => `关联词搭配不当: '${first}' 与 '${second}'`,
  redundantConjunction: (first, second) => `'${first}' 与 '${second}' 不必同时使用`,
  tenseMismatch: (verb, marker) => `时态不一致: '${verb}' 与 '${marker}'`,
  usePastTense: '描述过去的事件应使用过去时',

  mixedCitationStyles: (first, second) => `同一行混用了 ${first} 与 ${second} 引用格式`,
  consistentCitationStyle: '全文应使用统一的引用格式',
  citationMissingComma: '引用中作者与年份之间缺少逗号',
  citationMissingYear: '引用缺少年份',
  addCitationYear: '补充年份，例如 (Smith, 2020)',

  progress: (current, total) => `已分析 ${current}/${total} 行`,
}

const en: ProoflineTranslations = {
  misspelling: (word) => `Possible misspelling: '${word}'`,
  unknownWord: (word) => `Not found in dictionary: '${word}'`,
  replaceWith: (correction) => `Replace with '${correction}'`,
  checkSpelling: 'Check the spelling of this word',
  idiomMisuse: (idiom) => `Misused idiom: '${idiom}'`,

  casualHeading: (phrase) => `Casual phrasing in heading: '${phrase}'`,
  formalHeading: 'Use formal, concise wording in headings',
  headingPunctuation: (mark) => `Heading ends with '${mark}'`,
  removeHeadingPunctuation: 'Remove the trailing punctuation',

  repeatedWord: (word) => `Repeated word '${word}'`,
  removeRepeatedWord: (word) => `Remove the repeated '${word}'`,
  repeatedChar: (run) => `Repeated character: '${run}'`,
  removeRepeatedChar: (ch) => `Replace with '${ch}'`,

  longSentence: (chars) => `Sentence is too long (${chars} characters)`,
  splitSentence: 'Consider splitting it into shorter sentences',
  repeatedPunctuation: (run) => `Repeated punctuation: '${run}'`,
  singlePunctuation: 'Use a single punctuation mark',
  asciiComma: 'ASCII comma in Chinese text',
  useChineseComma: "Replace with '，'",
  mixedPunctuation: (mark) => `ASCII punctuation '${mark}' in Chinese text`,
  unclosedParenthesis: 'Unclosed parenthesis',
  addClosingParenthesis: "Add a closing '）'",
  unopenedParenthesis: 'Unmatched closing parenthesis',
  removeParenthesis: "Remove it or add an opening '（'",

  contraction: (word) => `Avoid contractions in academic writing: '${word}'`,
  redundantPhrase: (phrase) => `Redundant phrase: '${phrase}'`,
  informalExpression: (word) => `Informal expression: '${word}'`,
  passiveVoice: (phrase) => `Passive voice: '${phrase}'`,
  preferActiveVoice: 'Consider rewriting in the active voice',
  fillerExpression: (phrase) => `Filler expression: '${phrase}'`,
  fillerHints: {
    state: 'State the fact directly',
    omit: 'Can be omitted',
    specify: 'Say it more precisely',
  },

  articleBeforeVowel: "Use 'an' before words starting with a vowel sound",
  articleBeforeConsonant: "Use 'a' before words starting with a consonant sound",
  doubleNegative: 'Double negative detected',
  prepositionMisuse: 'Incorrect preposition usage',
  agreement: (subject, verb) => `Subject-verb agreement error: '${subject}' with '${verb}'`,
  agreementHint: (subject) => `Use a verb form that agrees with '${subject}'`,
  particleDi: "Use '地' rather than '的' between an adjective and a verb",
  particleDe: "Use '得' rather than '地' between a verb and an adjective",
  replaceParticle: (from, to) => `Replace '${from}' with '${to}'`,
  mismatchedConjunction: (first, second) => `Mismatched conjunctions: '${first}' with '${second}'`,
  redundantConjunction: (first, second) => `'${first}' and '${second}' need not both be used`,
  tenseMismatch: (verb, marker) => `Tense mismatch: '${verb}' with '${marker}'`,
  usePastTense: 'Use the past tense for past events',

  mixedCitationStyles: (first, second) => `${first} and ${second} citations mixed on one line`,
  consistentCitationStyle: 'Use one citation style throughout',
  citationMissingComma: 'Missing comma between author and year',
  citationMissingYear: 'Citation has no year',
  addCitationYear: 'Add the year, e.g. (Smith, 2020)',

  progress: (current, total) => `Analyzed ${current}/${total} lines`,
}

const translations: Record<MessageLocale, ProoflineTranslations> = { zh, en }

export function getTranslations(locale: MessageLocale = 'zh'): ProoflineTranslations {
  return translations[locale] || translations.zh
}
