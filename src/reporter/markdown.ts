// src/reporter/markdown.ts
import type { FileMetrics, MetricsReport, TestTotals } from '../metrics/types.js'
import { humanBytes, pct } from './format.js'
import type { Reporter } from './types.js'

export class MarkdownReporter implements Reporter {
  generate(report: MetricsReport): string {
    const { totals } = report
    const lines: string[] = []

    // Header
    lines.push(`# Project Metrics: ${report.root}`)
    lines.push(`Profile: ${report.profile}`)
    lines.push('')

    // Summary
    lines.push('## Summary')
    lines.push(`- Files counted: ${totals.files}`)
    lines.push(`- Total size: ${humanBytes(totals.bytes)}`)
    lines.push(`- Text files skipped (binary/unreadable): ${report.unreadableFiles}`)
    lines.push(`- Tool files excluded: ${report.toolFilesExcluded}`)
    lines.push('')

    lines.push('## Line Counts')
    lines.push('| Total | Code | Comment | Blank |')
    lines.push('|------:|-----:|--------:|------:|')
    lines.push(`| ${totals.lines.total} | ${totals.lines.code} | ${totals.lines.comment} | ${totals.lines.blank} |`)
    lines.push('')

    if (report.testTotals) {
      lines.push('## Test Ratio')
      lines.push(this.formatTestTable(report.testTotals))
      lines.push('')
    }

    lines.push('## By Extension')
    lines.push('| Extension | Files | Lines | Code | Comment | Blank |')
    lines.push('|-----------|------:|------:|-----:|--------:|------:|')
    for (const { extension, files, lines: counts } of report.extensions) {
      if (counts) {
        lines.push(`| ${extension} | ${files} | ${counts.total} | ${counts.code} | ${counts.comment} | ${counts.blank} |`)
      } else {
        lines.push(`| ${extension} | ${files} | binary/unreadable | | | |`)
      }
    }

    if (report.top > 0) {
      lines.push('')
      lines.push(`## Top ${report.top} Largest Files`)
      lines.push(this.formatFileTable(report.largest, 'Size', f => humanBytes(f.sizeBytes)))
      lines.push('')
      lines.push(`## Top ${report.top} Longest Files`)
      lines.push(this.formatFileTable(report.longest, 'Lines', f => String(f.linesTotal)))
    }

    return lines.join('\n') + '\n'
  }

  private formatTestTable(t: TestTotals): string {
    const totalFiles = t.testFiles + t.nonTestFiles
    const totalLoc = t.testLines.total + t.nonTestLines.total
    const totalCode = t.testLines.code + t.nonTestLines.code

    const lines: string[] = []
    lines.push('| | Test | Non-test |')
    lines.push('|---|---:|---:|')
    lines.push(`| Files | ${t.testFiles} (${pct(t.testFiles, totalFiles)}) | ${t.nonTestFiles} (${pct(t.nonTestFiles, totalFiles)}) |`)
    lines.push(`| Lines | ${t.testLines.total} (${pct(t.testLines.total, totalLoc)}) | ${t.nonTestLines.total} (${pct(t.nonTestLines.total, totalLoc)}) |`)
    lines.push(`| Code | ${t.testLines.code} (${pct(t.testLines.code, totalCode)}) | ${t.nonTestLines.code} (${pct(t.nonTestLines.code, totalCode)}) |`)
    return lines.join('\n')
  }

  private formatFileTable(files: FileMetrics[], label: string, value: (f: FileMetrics) => string): string {
    const lines: string[] = []
    lines.push(`| # | ${label} | File |`)
    lines.push('|---|---:|------|')
    files.forEach((file, i) => {
      lines.push(`| ${i + 1} | ${value(file)} | ${file.relativePath} |`)
    })
    return lines.join('\n')
  }
}
