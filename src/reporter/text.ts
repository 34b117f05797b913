// src/reporter/text.ts
import chalk, { Chalk } from 'chalk'
import type { ChalkInstance } from 'chalk'
import type { MetricsReport, TestTotals } from '../metrics/types.js'
import { humanBytes, pct } from './format.js'
import type { Reporter } from './types.js'

export interface TextReporterOptions {
  color?: boolean
}

export class TextReporter implements Reporter {
  private paint: ChalkInstance

  constructor(options: TextReporterOptions = {}) {
    this.paint = options.color ? chalk : new Chalk({ level: 0 })
  }

  generate(report: MetricsReport): string {
    const { totals } = report
    const lines: string[] = []

    lines.push('')
    lines.push(`${this.paint.bold('Root:')} ${report.root}`)
    lines.push(`${this.paint.bold('Profile:')} ${report.profile}`)
    lines.push(`Files counted: ${totals.files}`)
    lines.push(`Total size: ${humanBytes(totals.bytes)}`)
    lines.push(`Text files skipped (binary/unreadable): ${report.unreadableFiles}`)
    lines.push(`Tool files excluded: ${report.toolFilesExcluded}`)

    lines.push('')
    lines.push(this.paint.cyan.bold('Line counts (heuristic):'))
    lines.push(`  Total:   ${totals.lines.total}`)
    lines.push(`  Code:    ${totals.lines.code}`)
    lines.push(`  Comment: ${totals.lines.comment}`)
    lines.push(`  Blank:   ${totals.lines.blank}`)

    if (report.testTotals) {
      lines.push('')
      lines.push(this.paint.cyan.bold('Test ratio (heuristic):'))
      lines.push(...this.formatTestRatio(report.testTotals))
    }

    lines.push('')
    lines.push(this.paint.cyan.bold('By extension:'))
    for (const { extension, files, lines: counts } of report.extensions) {
      const head = `  ${extension.padEnd(10)} files=${String(files).padStart(6)}`
      if (counts) {
        lines.push(
          `${head}  lines=${String(counts.total).padStart(9)}` +
          `  code=${String(counts.code).padStart(9)}` +
          `  cmt=${String(counts.comment).padStart(9)}` +
          `  blank=${String(counts.blank).padStart(9)}`
        )
      } else {
        lines.push(`${head}  lines=   ${this.paint.dim('(binary/unreadable)')}`)
      }
    }

    if (report.top > 0) {
      lines.push('')
      lines.push(this.paint.cyan.bold(`Top ${report.top} largest files:`))
      for (const file of report.largest) {
        lines.push(`  ${humanBytes(file.sizeBytes).padStart(9)}  ${file.relativePath}`)
      }

      lines.push('')
      lines.push(this.paint.cyan.bold(`Top ${report.top} longest files (by total lines):`))
      for (const file of report.longest) {
        lines.push(`  ${String(file.linesTotal).padStart(9)} lines  ${file.relativePath}`)
      }
    }

    lines.push('')
    return lines.join('\n')
  }

  private formatTestRatio(t: TestTotals): string[] {
    const totalFiles = t.testFiles + t.nonTestFiles
    const totalLoc = t.testLines.total + t.nonTestLines.total
    const totalCode = t.testLines.code + t.nonTestLines.code

    return [
      `  Test files:     ${t.testFiles} (${pct(t.testFiles, totalFiles)})`,
      `  Non-test files: ${t.nonTestFiles} (${pct(t.nonTestFiles, totalFiles)})`,
      `  Test LOC:       ${t.testLines.total} (${pct(t.testLines.total, totalLoc)})`,
      `  Non-test LOC:   ${t.nonTestLines.total} (${pct(t.nonTestLines.total, totalLoc)})`,
      `  Test code LOC:  ${t.testLines.code} (${pct(t.testLines.code, totalCode)})`,
      `  Non-test code:  ${t.nonTestLines.code} (${pct(t.nonTestLines.code, totalCode)})`
    ]
  }
}
