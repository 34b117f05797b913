// src/line-classifier/classifier.ts
import { emptyCounts } from './counts.js'
import { resolveRuleFamily } from './rules.js'
import type { LineCounts, RuleFamily, ScanState, TripleQuoteDelimiter } from './types.js'

const LINE_COMMENT = '//'
const BLOCK_OPEN = '/*'
const BLOCK_CLOSE = '*/'
const HASH_COMMENT = '#'
const TRIPLE_DELIMITERS: TripleQuoteDelimiter[] = ["'''", '"""']

export function createScanState(): ScanState {
  return {
    insideBlockComment: false,
    insideTripleQuote: false,
    tripleQuoteDelimiter: null
  }
}

function asTripleDelimiter(trimmed: string): TripleQuoteDelimiter | null {
  return TRIPLE_DELIMITERS.find(d => d === trimmed) ?? null
}

// """docstring""" on a single line: opened and closed by the same delimiter
function isOneLineDocstring(trimmed: string): boolean {
  return TRIPLE_DELIMITERS.some(
    d => trimmed.length >= d.length * 2 && trimmed.startsWith(d) && trimmed.endsWith(d)
  )
}

function classifyHash(trimmed: string, counts: LineCounts): void {
  if (trimmed.startsWith(HASH_COMMENT)) {
    counts.comment++
  } else {
    counts.code++
  }
}

function classifyCLike(trimmed: string, state: ScanState, counts: LineCounts): void {
  if (state.insideBlockComment) {
    counts.comment++
    // No nesting: the first close token ends the block
    if (trimmed.includes(BLOCK_CLOSE)) {
      state.insideBlockComment = false
    }
    return
  }

  if (trimmed.startsWith(LINE_COMMENT)) {
    counts.comment++
    return
  }

  if (trimmed.startsWith(BLOCK_OPEN)) {
    counts.comment++
    if (!trimmed.includes(BLOCK_CLOSE)) {
      state.insideBlockComment = true
    }
    return
  }

  counts.code++
}

function classifyPython(trimmed: string, state: ScanState, counts: LineCounts): void {
  if (state.insideTripleQuote) {
    counts.comment++
    if (state.tripleQuoteDelimiter && trimmed.endsWith(state.tripleQuoteDelimiter)) {
      state.insideTripleQuote = false
      state.tripleQuoteDelimiter = null
    }
    return
  }

  const delimiter = asTripleDelimiter(trimmed)
  if (delimiter) {
    state.insideTripleQuote = true
    state.tripleQuoteDelimiter = delimiter
    counts.comment++
    return
  }

  if (isOneLineDocstring(trimmed)) {
    counts.comment++
    return
  }

  classifyHash(trimmed, counts)
}

/**
 * Classify a single line and advance the scan state.
 * Blank lines never touch the state, so a blank line inside a block
 * comment is counted as blank and the block stays open.
 */
export function classifyLine(
  family: RuleFamily,
  line: string,
  state: ScanState,
  counts: LineCounts
): void {
  counts.total++
  const trimmed = line.replace(/\r?\n$/, '').trim()

  if (trimmed === '') {
    counts.blank++
    return
  }

  switch (family) {
    case 'python-triple':
      classifyPython(trimmed, state, counts)
      break
    case 'c-like':
      classifyCLike(trimmed, state, counts)
      break
    case 'hash':
      classifyHash(trimmed, counts)
      break
    case 'none':
      counts.code++
      break
  }
}

export function classifyLines(extension: string, lines: Iterable<string>): LineCounts {
  const family = resolveRuleFamily(extension)
  const state = createScanState()
  const counts = emptyCounts()

  for (const line of lines) {
    classifyLine(family, line, state, counts)
  }
  return counts
}

export async function classifyLineStream(
  extension: string,
  lines: AsyncIterable<string>
): Promise<LineCounts> {
  const family = resolveRuleFamily(extension)
  const state = createScanState()
  const counts = emptyCounts()

  for await (const line of lines) {
    classifyLine(family, line, state, counts)
  }
  return counts
}
