// src/repo-scanner/index.ts
export { RepoScanner } from './scanner.js'
export { shouldSkipDir, shouldSkipFile, extensionKey } from './filter.js'
export * from './types.js'
