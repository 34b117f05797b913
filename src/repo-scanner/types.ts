// src/repo-scanner/types.ts
export interface FileEntry {
  path: string
  relativePath: string
  extension: string
  size: number
}

export interface ScanOptions {
  includeHidden?: boolean
  defaultExcludes?: boolean
  excludeDirs?: string[]
  // Absolute paths of the tool's own files, never counted
  selfFiles?: ReadonlySet<string>
  onSkip?: (path: string, error: Error) => void
}

export const NO_EXTENSION = '(no_ext)'

export const DEFAULT_EXCLUDE_DIRS = [
  '.git', '.hg', '.svn',
  'node_modules',
  'target', 'build', 'dist', 'out',
  '.idea', '.vscode',
  '.venv', 'venv', '__pycache__',
  '.pytest_cache', '.mypy_cache',
  '.gradle', '.mvn',
  'coverage', '.coverage'
]
