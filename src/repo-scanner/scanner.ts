// src/repo-scanner/scanner.ts
import type { Dirent, Stats } from 'fs'
import { readdir, realpath, stat } from 'fs/promises'
import * as path from 'path'
import type { FileEntry, ScanOptions } from './types.js'
import { extensionKey, shouldSkipDir, shouldSkipFile } from './filter.js'

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

export class RepoScanner {
  private rootPath: string
  private options: ScanOptions
  private files: FileEntry[] = []
  private selfExcluded = 0

  constructor(rootPath: string, options: ScanOptions = {}) {
    this.rootPath = path.resolve(rootPath)
    this.options = options
  }

  async scanFiles(): Promise<FileEntry[]> {
    this.files = []
    this.selfExcluded = 0
    await this.scanDirectory(this.rootPath)
    this.files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0))
    return this.files
  }

  // Number of the tool's own files left out by the last scan
  getSelfExcludedCount(): number {
    return this.selfExcluded
  }

  private async scanDirectory(dirPath: string): Promise<void> {
    let entries: Dirent[]
    try {
      entries = await readdir(dirPath, { withFileTypes: true })
    } catch (error) {
      this.skip(dirPath, error)
      return
    }

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name)

      if (entry.isDirectory()) {
        if (!shouldSkipDir(entry.name, this.options)) {
          await this.scanDirectory(fullPath)
        }
        continue
      }

      // Symlinks count only when they point at a regular file
      if (!entry.isFile() && !entry.isSymbolicLink()) continue
      if (shouldSkipFile(entry.name, this.options)) continue

      await this.addFile(fullPath)
    }
  }

  private async addFile(fullPath: string): Promise<void> {
    if (await this.isSelfFile(fullPath)) {
      this.selfExcluded++
      return
    }

    let stats: Stats
    try {
      stats = await stat(fullPath)
    } catch (error) {
      this.skip(fullPath, error)
      return
    }
    if (!stats.isFile()) return

    const relativePath = path.relative(this.rootPath, fullPath).split(path.sep).join('/')
    this.files.push({
      path: fullPath,
      relativePath,
      extension: extensionKey(relativePath),
      size: stats.size
    })
  }

  private async isSelfFile(fullPath: string): Promise<boolean> {
    const selfFiles = this.options.selfFiles
    if (!selfFiles || selfFiles.size === 0) return false
    if (selfFiles.has(fullPath)) return true
    try {
      return selfFiles.has(await realpath(fullPath))
    } catch {
      // Dangling link: the stat below reports it
      return false
    }
  }

  private skip(filePath: string, error: unknown): void {
    this.options.onSkip?.(filePath, toError(error))
  }
}
