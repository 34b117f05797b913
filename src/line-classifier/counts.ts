// src/line-classifier/counts.ts
import type { LineCounts } from './types.js'

export function emptyCounts(): LineCounts {
  return { total: 0, blank: 0, comment: 0, code: 0 }
}

export function mergeCounts(a: LineCounts, b: LineCounts): LineCounts {
  return {
    total: a.total + b.total,
    blank: a.blank + b.blank,
    comment: a.comment + b.comment,
    code: a.code + b.code
  }
}

// In-place variant for accumulators
export function addCounts(target: LineCounts, other: LineCounts): void {
  target.total += other.total
  target.blank += other.blank
  target.comment += other.comment
  target.code += other.code
}
