// src/metrics/index.ts
export { MetricsAggregator, orderExtensions } from './aggregator.js'
export type { ReportOptions } from './aggregator.js'
export { collectMetrics, DEFAULT_CONCURRENCY } from './collector.js'
export * from './types.js'
