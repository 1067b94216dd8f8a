import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest'
import { PlainTextDecoder, type DocumentDecoder } from '../document/decoder.js'
import { AnalysisSession } from '../engine/analyzer.js'
import { DocumentDecodeError } from '../errors.js'
import { AnalysisService } from '../service.js'
import type { AsyncAnalysisResult } from '../types.js'

const TEXT = 'teh cat\nteh mat\nteh dog'

function nextComplete(service: AnalysisService): Promise<AsyncAnalysisResult> {
  return new Promise((resolve) => {
    const off = service.on('analysis_complete', (event) => {
      off()
      resolve(event)
    })
  })
}

const settle = () => new Promise((resolve) => setTimeout(resolve, 20))

describe('AnalysisService: background runs', () => {
  it('should report progress per chunk and complete exactly once', async () => {
    const service = new AnalysisService({ locale: 'en', chunkSize: 1 })
    const progress: AsyncAnalysisResult[] = []
    const completes: AsyncAnalysisResult[] = []
    service.on('analysis_progress', (event) => progress.push(event))
    service.on('analysis_complete', (event) => completes.push(event))

    const done = nextComplete(service)
    const analysisId = service.analyzeTextAsync(TEXT)
    expect(service.activeRuns).toBe(1)

    const complete = await done
    await settle()

    expect(progress.map((e) => [e.analysisId, e.completed, e.progress?.currentLine])).toEqual([
      [analysisId, false, 1],
      [analysisId, false, 2],
      [analysisId, false, 3],
    ])
    expect(completes).toHaveLength(1)
    expect(complete.analysisId).toBe(analysisId)
    expect(complete.completed).toBe(true)
    expect(complete.result).toEqual(service.analyzeText(TEXT))
    expect(service.activeRuns).toBe(0)
  })

  it('should give concurrent runs distinct ids and separate state', async () => {
    const service = new AnalysisService({ locale: 'en' })
    const results = new Map<string, AsyncAnalysisResult>()
    const both = new Promise<void>((resolve) => {
      service.on('analysis_complete', (event) => {
        results.set(event.analysisId, event)
        if (results.size === 2) resolve()
      })
    })

    const first = service.analyzeTextAsync('teh cat')
    const second = service.analyzeTextAsync('teh cat')
    await both

    expect(first).not.toBe(second)
    expect(results.get(first)?.result?.issues).toHaveLength(1)
    expect(results.get(second)?.result?.issues).toHaveLength(1)
  })

  it('should not complete a cancelled run', async () => {
    const service = new AnalysisService({ locale: 'en', chunkSize: 1 })
    const progress: AsyncAnalysisResult[] = []
    const completes: AsyncAnalysisResult[] = []
    service.on('analysis_progress', (event) => {
      progress.push(event)
      expect(service.cancelAnalysis(event.analysisId)).toBe(true)
    })
    service.on('analysis_complete', (event) => completes.push(event))

    service.analyzeTextAsync(TEXT)
    await settle()

    expect(progress).toHaveLength(1)
    expect(completes).toEqual([])
    expect(service.activeRuns).toBe(0)
  })

  it('should return the id before analyzing anything', async () => {
    const addLine = vi.spyOn(AnalysisSession.prototype, 'addLine')
    const service = new AnalysisService({ locale: 'en' })

    const done = nextComplete(service)
    service.analyzeTextAsync(TEXT)
    expect(addLine).not.toHaveBeenCalled()

    await done
    expect(addLine).toHaveBeenCalledTimes(3)
    addLine.mockRestore()
  })

  it('should report nothing for a run cancelled right away', async () => {
    const service = new AnalysisService({ locale: 'en' })
    const events: AsyncAnalysisResult[] = []
    service.on('analysis_progress', (event) => events.push(event))
    service.on('analysis_complete', (event) => events.push(event))

    const analysisId = service.analyzeTextAsync(TEXT)
    expect(service.cancelAnalysis(analysisId)).toBe(true)
    await settle()

    expect(events).toEqual([])
  })

  it('should return false when cancelling an unknown run', () => {
    expect(new AnalysisService().cancelAnalysis('missing')).toBe(false)
  })

  it('should complete with an error when the run fails', async () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const service = new AnalysisService({ rulesPath: join(tmpdir(), 'proofline-missing', 'rules.json') })

    const done = nextComplete(service)
    service.analyzeTextAsync('teh cat')
    const complete = await done

    expect(complete.completed).toBe(true)
    expect(complete.result).toBeUndefined()
    expect(complete.error).toContain('cannot read rule data')
    expect(consoleSpy).toHaveBeenCalled()
    consoleSpy.mockRestore()
  })

  it('should stop delivering events after unsubscribing', async () => {
    const service = new AnalysisService({ locale: 'en', chunkSize: 1 })
    const seen: string[] = []
    const off = service.on('analysis_progress', (event) => seen.push(event.analysisId))
    off()

    const done = nextComplete(service)
    service.analyzeTextAsync(TEXT)
    await done

    expect(seen).toEqual([])
  })
})

describe('AnalysisService: files', () => {
  let dir = ''

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'proofline-'))
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should stream a text file line by line', async () => {
    const path = join(dir, 'notes.txt')
    await writeFile(path, '\uFEFFteh cat\r\n我们的的研究\r\n', 'utf-8')

    const result = await new AnalysisService({ locale: 'en' }).analyzeLargeFile(path)

    expect(result.truncated).toBe(false)
    expect(result.stats).toMatchObject({ total_lines: 2, total_chars: 16, chinese_lines: 1, latin_lines: 1 })
    expect(result.issues.map((i) => [i.lineNumber, i.issueType, i.start])).toEqual([
      [1, 'spelling', 0],
      [2, 'repeated_char', 2],
    ])
  })

  it('should apply the text limit while streaming', async () => {
    const path = join(dir, 'long.md')
    await writeFile(path, `${TEXT}\n`, 'utf-8')

    const result = await new AnalysisService({ locale: 'en', maxTextLength: 10 }).analyzeLargeFile(path)

    expect(result.truncated).toBe(true)
    expect(result.stats.total_lines).toBe(2)
    expect(result.stats.total_chars).toBe(10)
    expect(result.issues.map((i) => i.lineNumber)).toEqual([1])
  })

  it('should agree with text analysis on CR and CRLF line breaks', async () => {
    const path = join(dir, 'breaks.txt')
    await writeFile(path, 'teh cat\r\nsat\ron teh mat', 'utf-8')
    const text = await readFile(path, 'utf-8')

    const service = new AnalysisService({ locale: 'en' })
    expect(await service.analyzeLargeFile(path)).toEqual(service.analyzeText(text))

    const limited = new AnalysisService({ locale: 'en', maxTextLength: 9 })
    const result = await limited.analyzeLargeFile(path)
    expect(result).toEqual(limited.analyzeText(text))
    expect(result.stats).toMatchObject({ total_chars: 9, total_lines: 1 })
    expect(result.truncated).toBe(true)
  })

  it('should stream raw lines split on line feeds only', async () => {
    const path = join(dir, 'raw.txt')
    await writeFile(path, 'a\r\nb\rc\n', 'utf-8')

    const lines: string[] = []
    for await (const line of new PlainTextDecoder().streamLines(path)) lines.push(line)

    expect(lines).toEqual(['a\r', 'b\rc'])
  })

  it.runIf(process.platform === 'linux')('should close the file when the text limit stops reading', async () => {
    const path = join(dir, 'large.txt')
    await writeFile(path, 'teh cat sat on the mat\n'.repeat(20_000), 'utf-8')
    const service = new AnalysisService({ locale: 'en', maxTextLength: 100 })
    const openFiles = async () => (await readdir('/proc/self/fd')).length

    await service.analyzeLargeFile(path)
    await settle()
    const before = await openFiles()

    for (let i = 0; i < 20; i++) {
      expect((await service.analyzeLargeFile(path)).truncated).toBe(true)
    }
    await settle()

    expect(await openFiles()).toBeLessThan(before + 5)
  })

  it('should reject Word documents', async () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const path = join(dir, 'report.docx')
    await writeFile(path, 'not really a document', 'utf-8')

    await expect(new AnalysisService().analyzeLargeFile(path)).rejects.toBeInstanceOf(DocumentDecodeError)
    consoleSpy.mockRestore()
  })

  it('should decode whole files when the decoder cannot stream', async () => {
    const decoder: DocumentDecoder = { decode: async () => 'teh cat\nteh mat' }
    const service = new AnalysisService({ locale: 'en' }, decoder)

    const result = await service.analyzeLargeFile('memory.txt')

    expect(result).toEqual(service.analyzeText('teh cat\nteh mat'))
  })

  it('should pass per-run custom words to file analysis', async () => {
    const decoder: DocumentDecoder = { decode: async () => 'the qwertyx' }
    const service = new AnalysisService({ locale: 'en' }, decoder)

    expect((await service.analyzeLargeFile('a.txt')).issues).toHaveLength(1)
    expect((await service.analyzeLargeFile('a.txt', { customWords: ['qwertyx'] })).issues).toEqual([])
  })
})
