// src/reporter/types.ts
import type { MetricsReport } from '../metrics/types.js'

export type ReportFormat = 'text' | 'markdown' | 'json'

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'markdown', 'json']

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value)
}

export interface Reporter {
  generate(report: MetricsReport): string
}
