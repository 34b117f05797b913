// src/reporter/index.ts
export { createReporter } from './factory.js'
export { JsonReporter } from './json.js'
export { MarkdownReporter } from './markdown.js'
export { TextReporter } from './text.js'
export { humanBytes, pct } from './format.js'
export * from './types.js'
