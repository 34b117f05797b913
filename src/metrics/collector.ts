// src/metrics/collector.ts
import { stat } from 'fs/promises'
import * as path from 'path'
import { countFileLines } from '../line-classifier/reader.js'
import { isTestFile } from '../profiles/test-files.js'
import { PROFILE_EXTENSIONS } from '../profiles/types.js'
import { RepoScanner } from '../repo-scanner/scanner.js'
import type { FileEntry } from '../repo-scanner/types.js'
import { MetricsAggregator } from './aggregator.js'
import type { CollectHooks, CollectSettings, MetricsReport } from './types.js'

export const DEFAULT_CONCURRENCY = 8

async function assertDirectory(root: string): Promise<void> {
  let isDirectory = false
  try {
    isDirectory = (await stat(root)).isDirectory()
  } catch {
    throw new Error(`Root directory does not exist: ${root}`)
  }
  if (!isDirectory) {
    throw new Error(`Root is not a directory: ${root}`)
  }
}

/**
 * Walk `settings.root`, classify every accepted file and fold the results
 * into a report. Files are measured by a pool of `settings.concurrency`
 * workers, each filling its own partial aggregate; the partials are merged
 * once all workers finish.
 */
export async function collectMetrics(
  settings: CollectSettings,
  hooks: CollectHooks = {}
): Promise<MetricsReport> {
  const root = path.resolve(settings.root)
  await assertDirectory(root)

  const scanner = new RepoScanner(root, {
    includeHidden: settings.includeHidden,
    defaultExcludes: settings.defaultExcludes,
    excludeDirs: settings.excludeDirs,
    selfFiles: settings.selfFiles,
    onSkip: hooks.onSkip
  })

  const profileExts = PROFILE_EXTENSIONS[settings.profile]
  const restrictToProfile = settings.onlyProfileExts && profileExts.size > 0

  const entries = (await scanner.scanFiles())
    .filter(entry => !restrictToProfile || profileExts.has(entry.extension))

  const measure = async (entry: FileEntry, partial: MetricsAggregator): Promise<void> => {
    partial.recordFile(entry)

    const result = await countFileLines(entry.path, entry.extension)
    if (!result.ok) {
      partial.recordUnreadable()
      hooks.onUnreadable?.(entry.relativePath, result.error ?? result.reason)
      return
    }

    const isTest = settings.testRatio ? isTestFile(entry.relativePath, settings.profile) : undefined
    partial.recordCounts(entry, result.counts, isTest)
  }

  const limit = Number.isInteger(settings.concurrency) && settings.concurrency > 0
    ? settings.concurrency
    : DEFAULT_CONCURRENCY
  const workerCount = Math.max(1, Math.min(limit, entries.length))
  const partials = Array.from({ length: workerCount }, () => new MetricsAggregator())
  let next = 0
  let done = 0

  await Promise.all(partials.map(async partial => {
    while (next < entries.length) {
      const entry = entries[next++]
      await measure(entry, partial)
      done++
      hooks.onProgress?.(done, entries.length)
    }
  }))

  const aggregate = partials.reduce((acc, partial) => acc.merge(partial), new MetricsAggregator())

  return aggregate.toReport({
    root,
    profile: settings.profile,
    top: settings.top,
    restrictToProfile,
    testRatio: settings.testRatio,
    toolFilesExcluded: scanner.getSelfExcludedCount()
  })
}
