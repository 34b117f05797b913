// src/line-classifier/types.ts
export interface LineCounts {
  total: number
  blank: number
  comment: number
  code: number
}

export type RuleFamily = 'none' | 'hash' | 'c-like' | 'python-triple'

export type TripleQuoteDelimiter = "'''" | '"""'

// Per-file scanner state. Never shared between files.
export interface ScanState {
  insideBlockComment: boolean
  insideTripleQuote: boolean
  tripleQuoteDelimiter: TripleQuoteDelimiter | null
}

export type UnreadableReason = 'binary' | 'unreadable'

export type FileCountResult =
  | { ok: true; counts: LineCounts }
  | { ok: false; reason: UnreadableReason; error?: string }

export const SNIFF_BYTES = 8192
