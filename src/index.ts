// src/index.ts
export * from './line-classifier/index.js'
export * from './repo-scanner/index.js'
export * from './profiles/index.js'
export * from './metrics/index.js'
export * from './reporter/index.js'
export * from './config/index.js'
