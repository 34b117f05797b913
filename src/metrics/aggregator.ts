// src/metrics/aggregator.ts
import { addCounts, emptyCounts } from '../line-classifier/counts.js'
import type { LineCounts } from '../line-classifier/types.js'
import { PROFILE_EXTENSIONS } from '../profiles/types.js'
import type { Profile } from '../profiles/types.js'
import type { FileEntry } from '../repo-scanner/types.js'
import type { ExtensionSummary, FileMetrics, MetricsReport, TestTotals, Totals } from './types.js'

export interface ReportOptions {
  root: string
  profile: Profile
  top: number
  restrictToProfile: boolean
  testRatio: boolean
  toolFilesExcluded: number
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function copyCounts(counts: LineCounts): LineCounts {
  return { ...counts }
}

/**
 * Order extensions by file count, most files first. When the profile names a
 * set of extensions and the output is not restricted to them, those come first.
 */
export function orderExtensions(
  byExtensionFiles: Record<string, number>,
  profile: Profile,
  restrictToProfile: boolean
): string[] {
  const profileExts = PROFILE_EXTENSIONS[profile]
  const preferProfile = profileExts.size > 0 && !restrictToProfile

  return Object.keys(byExtensionFiles).sort((a, b) => {
    if (preferProfile) {
      const rank = Number(!profileExts.has(a)) - Number(!profileExts.has(b))
      if (rank !== 0) return rank
    }
    const byCount = byExtensionFiles[b] - byExtensionFiles[a]
    return byCount !== 0 ? byCount : compareText(a, b)
  })
}

export class MetricsAggregator {
  private totals: Totals = {
    files: 0,
    bytes: 0,
    lines: emptyCounts(),
    byExtensionFiles: {},
    byExtensionLines: {}
  }
  private testTotals: TestTotals = {
    testFiles: 0,
    nonTestFiles: 0,
    testLines: emptyCounts(),
    nonTestLines: emptyCounts()
  }
  private unreadable = 0
  private measured: FileMetrics[] = []

  // Every counted file contributes to file and byte totals, readable or not
  recordFile(entry: FileEntry): void {
    this.totals.files++
    this.totals.bytes += entry.size
    this.totals.byExtensionFiles[entry.extension] = (this.totals.byExtensionFiles[entry.extension] || 0) + 1
  }

  recordUnreadable(): void {
    this.unreadable++
  }

  recordCounts(entry: FileEntry, counts: LineCounts, isTest?: boolean): void {
    addCounts(this.totals.lines, counts)
    const byExt = this.totals.byExtensionLines
    byExt[entry.extension] ??= emptyCounts()
    addCounts(byExt[entry.extension], counts)

    this.measured.push({
      relativePath: entry.relativePath,
      sizeBytes: entry.size,
      linesTotal: counts.total
    })

    if (isTest === true) {
      this.testTotals.testFiles++
      addCounts(this.testTotals.testLines, counts)
    } else if (isTest === false) {
      this.testTotals.nonTestFiles++
      addCounts(this.testTotals.nonTestLines, counts)
    }
  }

  merge(other: MetricsAggregator): this {
    this.totals.files += other.totals.files
    this.totals.bytes += other.totals.bytes
    addCounts(this.totals.lines, other.totals.lines)

    for (const [ext, files] of Object.entries(other.totals.byExtensionFiles)) {
      this.totals.byExtensionFiles[ext] = (this.totals.byExtensionFiles[ext] || 0) + files
    }
    for (const [ext, lines] of Object.entries(other.totals.byExtensionLines)) {
      this.totals.byExtensionLines[ext] ??= emptyCounts()
      addCounts(this.totals.byExtensionLines[ext], lines)
    }

    this.testTotals.testFiles += other.testTotals.testFiles
    this.testTotals.nonTestFiles += other.testTotals.nonTestFiles
    addCounts(this.testTotals.testLines, other.testTotals.testLines)
    addCounts(this.testTotals.nonTestLines, other.testTotals.nonTestLines)

    this.unreadable += other.unreadable
    this.measured.push(...other.measured)
    return this
  }

  getTotals(): Totals {
    return {
      files: this.totals.files,
      bytes: this.totals.bytes,
      lines: copyCounts(this.totals.lines),
      byExtensionFiles: { ...this.totals.byExtensionFiles },
      byExtensionLines: Object.fromEntries(
        Object.entries(this.totals.byExtensionLines).map(([ext, lines]) => [ext, copyCounts(lines)])
      )
    }
  }

  getTestTotals(): TestTotals {
    return {
      testFiles: this.testTotals.testFiles,
      nonTestFiles: this.testTotals.nonTestFiles,
      testLines: copyCounts(this.testTotals.testLines),
      nonTestLines: copyCounts(this.testTotals.nonTestLines)
    }
  }

  getUnreadableCount(): number {
    return this.unreadable
  }

  toReport(options: ReportOptions): MetricsReport {
    const totals = this.getTotals()
    const top = Math.max(0, options.top)

    const extensions: ExtensionSummary[] = orderExtensions(
      totals.byExtensionFiles,
      options.profile,
      options.restrictToProfile
    ).map(extension => ({
      extension,
      files: totals.byExtensionFiles[extension],
      lines: totals.byExtensionLines[extension] ?? null
    }))

    // Ties fall back to path order so the ranking does not depend on scan order
    const largest = [...this.measured]
      .sort((a, b) => b.sizeBytes - a.sizeBytes || compareText(a.relativePath, b.relativePath))
      .slice(0, top)
    const longest = [...this.measured]
      .sort((a, b) => b.linesTotal - a.linesTotal || compareText(a.relativePath, b.relativePath))
      .slice(0, top)

    return {
      root: options.root,
      profile: options.profile,
      totals,
      unreadableFiles: this.unreadable,
      toolFilesExcluded: options.toolFilesExcluded,
      testTotals: options.testRatio ? this.getTestTotals() : undefined,
      extensions,
      top,
      largest,
      longest
    }
  }
}
