/**
 * Character-boundary-safe text helpers.
 *
 * A "character" here is a Unicode code point. JavaScript strings store
 * UTF-16 code units, so astral characters (emoji, CJK extension B, …)
 * occupy two units. Every cursor below advances by the unit length of the
 * code point it just consumed, which keeps all derived offsets on a
 * character boundary; every length limit is compared in code points.
 */

import { isAlphanumeric } from './shared.js'

/** Number of UTF-16 code units taken by the code point starting at `index` */
export function unitLengthAt(text: string, index: number): number {
  const cp = text.codePointAt(index)
  return cp !== undefined && cp > 0xffff ? 2 : 1
}

export function charCount(text: string): number {
  let count = 0
  for (let i = 0; i < text.length; i += unitLengthAt(text, i)) count++
  return count
}

/**
 * Prefix of `text` holding at most `maxChars` characters.
 * Stops scanning as soon as the boundary is found.
 */
export function truncateSafe(text: string, maxChars: number): string {
  const limit = Math.floor(maxChars)
  if (!(limit > 0)) return ''
  // Fewer units than the limit means fewer characters too
  if (text.length <= limit) return text

  let units = 0
  let chars = 0
  while (units < text.length && chars < limit) {
    units += unitLengthAt(text, units)
    chars++
  }
  return text.slice(0, units)
}

/** Convert a code-unit index (on a boundary) to a character offset */
export function charOffsetOf(text: string, unitIndex: number): number {
  let chars = 0
  let i = 0
  while (i < unitIndex && i < text.length) {
    i += unitLengthAt(text, i)
    chars++
  }
  return chars
}

/** Convert a character offset to a code-unit index, clamped to the text */
export function unitOffsetOf(text: string, charIndex: number): number {
  let i = 0
  let chars = 0
  while (chars < charIndex && i < text.length) {
    i += unitLengthAt(text, i)
    chars++
  }
  return i
}

/** Substring by character offsets (`end` exclusive) */
export function charSlice(text: string, start: number, end?: number): string {
  const from = unitOffsetOf(text, start)
  const to = end === undefined ? text.length : unitOffsetOf(text, end)
  return to <= from ? '' : text.slice(from, to)
}

function codePointBefore(text: string, unitIndex: number): string | undefined {
  if (unitIndex <= 0) return undefined
  return Array.from(text.slice(Math.max(0, unitIndex - 2), unitIndex)).pop()
}

function codePointAt(text: string, unitIndex: number): string | undefined {
  const cp = text.codePointAt(unitIndex)
  return cp === undefined ? undefined : String.fromCodePoint(cp)
}

/**
 * Character offset of the first occurrence of `word` that is not part of a
 * longer alphanumeric run, searching from character `fromChar`.
 */
export function findWholeWord(text: string, word: string, fromChar = 0): number | null {
  if (!word) return null

  let cursor = unitOffsetOf(text, fromChar)
  while (cursor <= text.length) {
    const pos = text.indexOf(word, cursor)
    if (pos === -1) return null

    const before = codePointBefore(text, pos)
    const after = codePointAt(text, pos + word.length)
    const startsClean = before === undefined || !isAlphanumeric(before)
    const endsClean = after === undefined || !isAlphanumeric(after)
    if (startsClean && endsClean) return charOffsetOf(text, pos)

    cursor = pos + unitLengthAt(text, pos)
  }
  return null
}

/**
 * Split text on `\n` only. A `\r` before the break stays on its line, and
 * a final line break does not start an empty line.
 */
export function splitRawLines(text: string): string[] {
  if (text === '') return []
  const lines = text.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

/** Drop one trailing `\r` */
export function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line
}

/** `splitRawLines` with each line's trailing `\r` dropped */
export function splitLines(text: string): string[] {
  return splitRawLines(text).map(stripCarriageReturn)
}
