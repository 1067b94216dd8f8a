/**
 * Document decoders turn a file into text before analysis.
 * Only UTF-8 plain text is handled here; binary office formats need a
 * decoder supplied by the host.
 */

import { createReadStream } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { DocumentDecodeError } from '../errors.js'

export interface DocumentDecoder {
  decode(path: string): Promise<string>
  /**
   * Line-by-line access for files too large to hold in memory. Lines are
   * split on `\n` only and keep a `\r` before the break.
   */
  streamLines?(path: string): AsyncIterable<string>
}

const TEXT_EXTENSIONS = new Set(['', '.txt', '.text', '.md', '.markdown'])

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class PlainTextDecoder implements DocumentDecoder {
  private assertSupported(path: string): void {
    const extension = extname(path).toLowerCase()
    if (extension === '.docx' || extension === '.doc') {
      throw new DocumentDecodeError(path, `Unsupported document format '${extension}'`)
    }
    if (!TEXT_EXTENSIONS.has(extension)) {
      throw new DocumentDecodeError(path, `Not a plain-text file: '${extension}'`)
    }
  }

  async decode(path: string): Promise<string> {
    this.assertSupported(path)
    try {
      const text = await readFile(path, 'utf-8')
      // BOM
      return text.startsWith('\uFEFF') ? text.slice(1) : text
    } catch (error) {
      throw new DocumentDecodeError(path, `Cannot read '${path}': ${reason(error)}`, { cause: error })
    }
  }

  /**
   * Raw lines, split on `\n` only with a `\r` before the break kept, so
   * a streamed file yields the same lines as its decoded text.
   */
  async *streamLines(path: string): AsyncIterable<string> {
    this.assertSupported(path)
    const stream = createReadStream(path, { encoding: 'utf-8' })

    let pending = ''
    let first = true
    try {
      for await (const chunk of stream) {
        pending += String(chunk)
        if (first) {
          // BOM
          if (pending.startsWith('\uFEFF')) pending = pending.slice(1)
          first = false
        }
        const lines = pending.split('\n')
        pending = lines.pop() ?? ''
        for (const line of lines) yield line
      }
      if (pending !== '') yield pending
    } catch (error) {
      throw new DocumentDecodeError(path, `Cannot read '${path}': ${reason(error)}`, { cause: error })
    } finally {
      // The consumer may stop early; release the file either way
      stream.destroy()
    }
  }
}
