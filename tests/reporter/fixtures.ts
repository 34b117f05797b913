// tests/reporter/fixtures.ts
import type { MetricsReport } from '../../src/metrics/types.js'

export function sampleReport(overrides: Partial<MetricsReport> = {}): MetricsReport {
  return {
    root: '/work/demo',
    profile: 'all',
    totals: {
      files: 3,
      bytes: 3584,
      lines: { total: 120, blank: 20, comment: 30, code: 70 },
      byExtensionFiles: { '.ts': 2, '.png': 1 },
      byExtensionLines: { '.ts': { total: 120, blank: 20, comment: 30, code: 70 } }
    },
    unreadableFiles: 1,
    toolFilesExcluded: 0,
    extensions: [
      { extension: '.ts', files: 2, lines: { total: 120, blank: 20, comment: 30, code: 70 } },
      { extension: '.png', files: 1, lines: null }
    ],
    top: 2,
    largest: [
      { relativePath: 'src/big.ts', sizeBytes: 2048, linesTotal: 80 },
      { relativePath: 'src/small.ts', sizeBytes: 512, linesTotal: 40 }
    ],
    longest: [
      { relativePath: 'src/big.ts', sizeBytes: 2048, linesTotal: 80 },
      { relativePath: 'src/small.ts', sizeBytes: 512, linesTotal: 40 }
    ],
    ...overrides
  }
}
