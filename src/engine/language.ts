/**
 * Coarse script classification used to pick the tokenization strategy.
 * Not a language-ID model: CJK ideographs are counted against ASCII
 * letters and the larger count wins, ties going to Latin.
 */

import type { Script } from '../types.js'
import { isAsciiLetter, isCjkIdeograph } from './shared.js'

export function classifyScript(text: string): Script {
  let cjk = 0
  let latin = 0
  for (const ch of text) {
    if (isCjkIdeograph(ch)) cjk++
    else if (isAsciiLetter(ch)) latin++
  }
  return cjk > latin ? 'chinese' : 'latin'
}
