// src/metrics/types.ts
import type { LineCounts } from '../line-classifier/types.js'
import type { Profile } from '../profiles/types.js'

export interface FileMetrics {
  relativePath: string
  sizeBytes: number
  linesTotal: number
}

export interface Totals {
  files: number
  bytes: number
  lines: LineCounts
  byExtensionFiles: Record<string, number>
  // Only extensions with at least one readable file
  byExtensionLines: Record<string, LineCounts>
}

export interface TestTotals {
  testFiles: number
  nonTestFiles: number
  testLines: LineCounts
  nonTestLines: LineCounts
}

export interface ExtensionSummary {
  extension: string
  files: number
  lines: LineCounts | null
}

export interface MetricsReport {
  root: string
  profile: Profile
  totals: Totals
  unreadableFiles: number
  toolFilesExcluded: number
  testTotals?: TestTotals
  extensions: ExtensionSummary[]
  top: number
  largest: FileMetrics[]
  longest: FileMetrics[]
}

export interface CollectSettings {
  root: string
  profile: Profile
  includeHidden: boolean
  defaultExcludes: boolean
  excludeDirs: string[]
  onlyProfileExts: boolean
  testRatio: boolean
  top: number
  concurrency: number
  selfFiles: ReadonlySet<string>
}

export interface CollectHooks {
  onSkip?: (path: string, error: Error) => void
  onUnreadable?: (relativePath: string, reason: string) => void
  onProgress?: (done: number, total: number) => void
}
