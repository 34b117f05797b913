// src/reporter/factory.ts
import { JsonReporter } from './json.js'
import { MarkdownReporter } from './markdown.js'
import { TextReporter } from './text.js'
import type { Reporter, ReportFormat } from './types.js'

export function createReporter(format: ReportFormat, options: { color?: boolean } = {}): Reporter {
  switch (format) {
    case 'markdown':
      return new MarkdownReporter()
    case 'json':
      return new JsonReporter()
    case 'text':
      return new TextReporter(options)
  }
}
