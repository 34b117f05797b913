// tests/reporter/text.test.ts
import { describe, it, expect } from 'vitest'
import { TextReporter } from '../../src/reporter/text.js'
import { sampleReport } from './fixtures.js'

describe('TextReporter', () => {
  const reporter = new TextReporter({ color: false })

  it('should print the summary header', () => {
    const lines = reporter.generate(sampleReport()).split('\n')

    expect(lines.slice(0, 7)).toEqual([
      '',
      'Root: /work/demo',
      'Profile: all',
      'Files counted: 3',
      'Total size: 3.5 KB',
      'Text files skipped (binary/unreadable): 1',
      'Tool files excluded: 0'
    ])
  })

  it('should print line counts', () => {
    const lines = reporter.generate(sampleReport()).split('\n')
    const start = lines.indexOf('Line counts (heuristic):')

    expect(lines.slice(start + 1, start + 5)).toEqual([
      '  Total:   120',
      '  Code:    70',
      '  Comment: 30',
      '  Blank:   20'
    ])
  })

  it('should align the per-extension table', () => {
    const lines = reporter.generate(sampleReport()).split('\n')

    expect(lines).toContain('  .ts        files=     2  lines=      120  code=       70  cmt=       30  blank=       20')
    expect(lines).toContain('  .png       files=     1  lines=   (binary/unreadable)')
  })

  it('should list the largest and longest files', () => {
    const lines = reporter.generate(sampleReport()).split('\n')

    expect(lines).toContain('Top 2 largest files:')
    expect(lines).toContain('     2.0 KB  src/big.ts')
    expect(lines).toContain('      512 B  src/small.ts')
    expect(lines).toContain('Top 2 longest files (by total lines):')
    expect(lines).toContain('         80 lines  src/big.ts')
  })

  it('should hide the rankings when top is zero', () => {
    const output = reporter.generate(sampleReport({ top: 0, largest: [], longest: [] }))
    expect(output.split('\n')).not.toContain('Top 0 largest files:')
  })

  it('should print the test ratio block when present', () => {
    const lines = reporter.generate(sampleReport({
      testTotals: {
        testFiles: 1,
        nonTestFiles: 3,
        testLines: { total: 25, blank: 5, comment: 0, code: 20 },
        nonTestLines: { total: 75, blank: 5, comment: 10, code: 60 }
      }
    })).split('\n')
    const start = lines.indexOf('Test ratio (heuristic):')

    expect(lines.slice(start + 1, start + 7)).toEqual([
      '  Test files:     1 (25.0%)',
      '  Non-test files: 3 (75.0%)',
      '  Test LOC:       25 (25.0%)',
      '  Non-test LOC:   75 (75.0%)',
      '  Test code LOC:  20 (25.0%)',
      '  Non-test code:  60 (75.0%)'
    ])
  })

  it('should omit the test ratio block by default', () => {
    expect(reporter.generate(sampleReport()).split('\n')).not.toContain('Test ratio (heuristic):')
  })
})
