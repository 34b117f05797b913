// src/profiles/index.ts
export * from './types.js'
export { isTestFile } from './test-files.js'
