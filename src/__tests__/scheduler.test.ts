import { describe, it, expect } from 'vitest'
import { createAnalyzer } from '../engine/analyzer.js'
import { runChunked, streamAnalysis, type AnalysisEvent } from '../engine/scheduler.js'
import type { AnalysisProgress } from '../types.js'

const analyzer = createAnalyzer({ locale: 'en' })

function sampleText(lines: number): string {
  const pool = ['teh cat sat on the mat', '我们的的研究很好', 'He have a apple', 'the the end', 'Short line.']
  return Array.from({ length: lines }, (_, i) => pool[i % pool.length]).join('\n')
}

async function collect(events: AsyncIterable<AnalysisEvent>): Promise<AnalysisEvent[]> {
  const out: AnalysisEvent[] = []
  for await (const event of events) out.push(event)
  return out
}

function progressOf(events: AnalysisEvent[]): AnalysisProgress[] {
  return events.flatMap((e) => (e.type === 'progress' ? [e.progress] : []))
}

describe('streamAnalysis', () => {
  it('should produce the same result as a synchronous run', async () => {
    const text = sampleText(120)
    const events = await collect(streamAnalysis(analyzer, text, { chunkSize: 50 }))
    const last = events[events.length - 1]

    expect(last.type).toBe('result')
    if (last.type === 'result') expect(last.result).toEqual(analyzer.analyze(text))
  })

  it('should emit cumulative progress after every chunk', async () => {
    const events = await collect(streamAnalysis(analyzer, sampleText(120), { chunkSize: 50 }))
    const progress = progressOf(events)

    expect(progress.map((p) => [p.currentLine, p.totalLines, p.progress])).toEqual([
      [50, 120, 41],
      [100, 120, 83],
      [120, 120, 100],
    ])
    expect(progress[2].message).toBe('Analyzed 120/120 lines')
    for (let i = 1; i < progress.length; i++) {
      expect(progress[i].issuesFound).toBeGreaterThanOrEqual(progress[i - 1].issuesFound)
    }
  })

  it('should use the configured chunk size by default', async () => {
    const small = createAnalyzer({ locale: 'en', chunkSize: 2 })
    const events = await collect(streamAnalysis(small, sampleText(5)))
    expect(progressOf(events).map((p) => p.currentLine)).toEqual([2, 4, 5])
  })

  it('should emit only a result for empty text', async () => {
    const events = await collect(streamAnalysis(analyzer, ''))
    expect(events).toHaveLength(1)
    expect(events[0].type).toBe('result')
  })

  it('should stop without a result once aborted', async () => {
    const controller = new AbortController()
    const events: AnalysisEvent[] = []

    for await (const event of streamAnalysis(analyzer, sampleText(120), { chunkSize: 50, signal: controller.signal })) {
      events.push(event)
      controller.abort()
    }

    expect(events).toHaveLength(1)
    expect(events[0].type).toBe('progress')
  })

  it('should emit nothing when aborted before starting', async () => {
    const controller = new AbortController()
    controller.abort()
    expect(await collect(streamAnalysis(analyzer, sampleText(10), { signal: controller.signal }))).toEqual([])
  })
})

describe('runChunked', () => {
  it('should resolve to the result and forward progress', async () => {
    const seen: number[] = []
    const result = await runChunked(analyzer, sampleText(7), {
      chunkSize: 3,
      onProgress: (p) => seen.push(p.currentLine),
    })
    expect(seen).toEqual([3, 6, 7])
    expect(result).toEqual(analyzer.analyze(sampleText(7)))
  })

  it('should resolve to null when aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    expect(await runChunked(analyzer, sampleText(3), { signal: controller.signal })).toBeNull()
  })
})
