// src/repo-scanner/filter.ts
import { DEFAULT_EXCLUDE_DIRS, NO_EXTENSION } from './types.js'
import type { ScanOptions } from './types.js'

const DEFAULT_EXCLUDES = new Set(DEFAULT_EXCLUDE_DIRS)

export function shouldSkipDir(dirName: string, options: ScanOptions): boolean {
  if (!options.includeHidden && dirName.startsWith('.')) return true
  if (options.excludeDirs?.includes(dirName)) return true
  if (options.defaultExcludes !== false && DEFAULT_EXCLUDES.has(dirName)) return true
  return false
}

export function shouldSkipFile(fileName: string, options: ScanOptions): boolean {
  return !options.includeHidden && fileName.startsWith('.')
}

/**
 * Lower-cased suffix including the dot. Dotfiles such as `.bashrc` and
 * names without a dot have no extension.
 */
export function extensionKey(filePath: string): string {
  const name = filePath.split(/[/\\]/).pop() ?? ''
  const dot = name.lastIndexOf('.')
  if (dot <= 0 || dot === name.length - 1) return NO_EXTENSION
  return name.slice(dot).toLowerCase()
}
