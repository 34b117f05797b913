// src/line-classifier/index.ts
export * from './types.js'
export * from './counts.js'
export * from './rules.js'
export * from './classifier.js'
export * from './sniffer.js'
export * from './reader.js'
