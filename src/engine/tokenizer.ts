/**
 * Candidate word extraction.
 *
 * Latin lines are split on whitespace; Chinese lines are scanned for runs
 * of ASCII letters so that CJK sentences are never mistaken for one long
 * unknown word. CJK characters are never part of a token on either path.
 * Offsets are character offsets into the line.
 */

import type { Script } from '../types.js'
import { containsCjk, isAlphanumeric, isAsciiLetter } from './shared.js'

export interface Token {
  text: string
  /** Character offset of the first character */
  start: number
  /** Character offset after the last character */
  end: number
}

const MIN_TOKEN_CHARS = 3

function isWordChar(ch: string): boolean {
  return isAlphanumeric(ch) || ch === "'" || ch === '-'
}

function isRunChar(ch: string): boolean {
  return isAsciiLetter(ch) || ch === "'" || ch === '-'
}

function keep(chars: string[]): boolean {
  if (chars.length < MIN_TOKEN_CHARS) return false
  return !chars.every((ch) => /^\p{N}$/u.test(ch))
}

/** Trim the chunk of characters that are neither alphanumeric nor ' or - */
function trimChunk(chars: string[], start: number): Token | null {
  let from = 0
  let to = chars.length
  while (from < to && !isWordChar(chars[from])) from++
  while (to > from && !isWordChar(chars[to - 1])) to--
  if (from === to) return null
  return { text: chars.slice(from, to).join(''), start: start + from, end: start + to }
}

/**
 * Whitespace-delimited words, trimmed of surrounding punctuation but not
 * filtered by length.
 */
export function splitWords(line: string): Token[] {
  const words: Token[] = []
  let chunk: string[] = []
  let chunkStart = 0
  let index = 0

  const flush = () => {
    const word = trimChunk(chunk, chunkStart)
    if (word) words.push(word)
    chunk = []
  }

  for (const ch of line) {
    if (/^\s$/u.test(ch)) {
      if (chunk.length > 0) flush()
    } else {
      if (chunk.length === 0) chunkStart = index
      chunk.push(ch)
    }
    index++
  }
  if (chunk.length > 0) flush()

  return words
}

function extractChinese(line: string): Token[] {
  const tokens: Token[] = []
  let run: string[] = []
  let runStart = 0
  let index = 0

  const flush = () => {
    if (keep(run)) tokens.push({ text: run.join(''), start: runStart, end: runStart + run.length })
    run = []
  }

  for (const ch of line) {
    if (isRunChar(ch)) {
      if (run.length === 0) runStart = index
      run.push(ch)
    } else if (run.length > 0) {
      flush()
    }
    index++
  }
  if (run.length > 0) flush()

  return tokens
}

// A whitespace chunk glued to CJK text ("采用了machien") yields its ASCII runs
function extractLatin(line: string): Token[] {
  return splitWords(line).flatMap((word) => {
    if (!containsCjk(word.text)) return keep(Array.from(word.text)) ? [word] : []
    return extractChinese(word.text).map((run) => ({
      text: run.text,
      start: word.start + run.start,
      end: word.start + run.end,
    }))
  })
}

export function extractTokens(line: string, script: Script): Token[] {
  return script === 'chinese' ? extractChinese(line) : extractLatin(line)
}
