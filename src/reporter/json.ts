// src/reporter/json.ts
import type { MetricsReport } from '../metrics/types.js'
import type { Reporter } from './types.js'

export class JsonReporter implements Reporter {
  generate(report: MetricsReport): string {
    return JSON.stringify(report, null, 2) + '\n'
  }
}
