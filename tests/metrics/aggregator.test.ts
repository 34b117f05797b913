// tests/metrics/aggregator.test.ts
import { describe, it, expect } from 'vitest'
import { MetricsAggregator, orderExtensions } from '../../src/metrics/aggregator.js'
import type { FileEntry } from '../../src/repo-scanner/types.js'

function entry(relativePath: string, extension: string, size: number): FileEntry {
  return { path: `/p/${relativePath}`, relativePath, extension, size }
}

const reportOptions = {
  root: '/p',
  profile: 'all' as const,
  top: 10,
  restrictToProfile: false,
  testRatio: false,
  toolFilesExcluded: 0
}

describe('MetricsAggregator', () => {
  it('should total files, bytes and lines', () => {
    const agg = new MetricsAggregator()
    const a = entry('src/a.ts', '.ts', 100)
    const b = entry('src/b.ts', '.ts', 50)
    agg.recordFile(a)
    agg.recordCounts(a, { total: 10, blank: 1, comment: 2, code: 7 })
    agg.recordFile(b)
    agg.recordCounts(b, { total: 5, blank: 0, comment: 0, code: 5 })

    const totals = agg.getTotals()
    expect(totals.files).toBe(2)
    expect(totals.bytes).toBe(150)
    expect(totals.lines).toEqual({ total: 15, blank: 1, comment: 2, code: 12 })
    expect(totals.byExtensionFiles).toEqual({ '.ts': 2 })
    expect(totals.byExtensionLines).toEqual({ '.ts': { total: 15, blank: 1, comment: 2, code: 12 } })
  })

  it('should count unreadable files in file totals only', () => {
    const agg = new MetricsAggregator()
    agg.recordFile(entry('logo.png', '.png', 2048))
    agg.recordUnreadable()

    const report = agg.toReport(reportOptions)
    expect(report.totals.files).toBe(1)
    expect(report.totals.bytes).toBe(2048)
    expect(report.totals.lines.total).toBe(0)
    expect(report.unreadableFiles).toBe(1)
    expect(report.extensions).toEqual([{ extension: '.png', files: 1, lines: null }])
    expect(report.largest).toEqual([])
  })

  it('should split test and non-test totals', () => {
    const agg = new MetricsAggregator()
    agg.recordCounts(entry('tests/a.test.ts', '.ts', 10), { total: 4, blank: 0, comment: 0, code: 4 }, true)
    agg.recordCounts(entry('src/a.ts', '.ts', 10), { total: 6, blank: 1, comment: 1, code: 4 }, false)
    agg.recordCounts(entry('src/b.ts', '.ts', 10), { total: 1, blank: 0, comment: 0, code: 1 })

    expect(agg.getTestTotals()).toEqual({
      testFiles: 1,
      nonTestFiles: 1,
      testLines: { total: 4, blank: 0, comment: 0, code: 4 },
      nonTestLines: { total: 6, blank: 1, comment: 1, code: 4 }
    })
  })

  it('should produce the same report whatever the merge order', () => {
    const build = (items: Array<[FileEntry, number]>) => {
      const agg = new MetricsAggregator()
      for (const [e, lines] of items) {
        agg.recordFile(e)
        agg.recordCounts(e, { total: lines, blank: 0, comment: 0, code: lines }, false)
      }
      return agg
    }
    const x: Array<[FileEntry, number]> = [[entry('a.py', '.py', 30), 3], [entry('b.sh', '.sh', 30), 3]]
    const y: Array<[FileEntry, number]> = [[entry('c.py', '.py', 10), 9]]
    const z: Array<[FileEntry, number]> = [[entry('d.md', '.md', 99), 1]]

    const left = build(x).merge(build(y)).merge(build(z))
    const right = build(z).merge(build(y).merge(build(x)))
    const options = { ...reportOptions, testRatio: true }

    expect(left.toReport(options)).toEqual(right.toReport(options))
  })

  it('should rank largest and longest files with path tie-breaks', () => {
    const agg = new MetricsAggregator()
    agg.recordCounts(entry('b.ts', '.ts', 500), { total: 10, blank: 0, comment: 0, code: 10 })
    agg.recordCounts(entry('a.ts', '.ts', 500), { total: 40, blank: 0, comment: 0, code: 40 })
    agg.recordCounts(entry('c.ts', '.ts', 900), { total: 10, blank: 0, comment: 0, code: 10 })

    const report = agg.toReport({ ...reportOptions, top: 2 })

    expect(report.largest.map(f => f.relativePath)).toEqual(['c.ts', 'a.ts'])
    expect(report.longest.map(f => f.relativePath)).toEqual(['a.ts', 'b.ts'])
  })

  it('should leave out test totals unless requested', () => {
    const agg = new MetricsAggregator()
    expect(agg.toReport(reportOptions).testTotals).toBeUndefined()
    expect(agg.toReport({ ...reportOptions, testRatio: true }).testTotals?.testFiles).toBe(0)
  })

  it('should clamp a negative top to zero', () => {
    const agg = new MetricsAggregator()
    agg.recordCounts(entry('a.ts', '.ts', 1), { total: 1, blank: 0, comment: 0, code: 1 })
    const report = agg.toReport({ ...reportOptions, top: -3 })
    expect(report.top).toBe(0)
    expect(report.largest).toEqual([])
  })
})

describe('orderExtensions', () => {
  const counts = { '.md': 3, '.py': 1, '.png': 5, '.txt': 3 }

  it('should order by file count then name', () => {
    expect(orderExtensions(counts, 'all', false)).toEqual(['.png', '.md', '.txt', '.py'])
  })

  it('should put profile extensions first', () => {
    expect(orderExtensions(counts, 'python', false)).toEqual(['.md', '.txt', '.py', '.png'])
  })

  it('should ignore the profile preference when output is restricted to it', () => {
    expect(orderExtensions(counts, 'python', true)).toEqual(['.png', '.md', '.txt', '.py'])
  })
})
