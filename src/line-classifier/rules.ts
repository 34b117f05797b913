// src/line-classifier/rules.ts
import type { RuleFamily } from './types.js'

const RULE_TABLE: Record<string, RuleFamily> = {
  '.py': 'python-triple',
  '.pyi': 'python-triple',

  '.java': 'c-like',
  '.kt': 'c-like',
  '.groovy': 'c-like',
  '.js': 'c-like',
  '.jsx': 'c-like',
  '.mjs': 'c-like',
  '.cjs': 'c-like',
  '.ts': 'c-like',
  '.tsx': 'c-like',
  '.mts': 'c-like',
  '.cts': 'c-like',
  '.css': 'c-like',
  '.scss': 'c-like',
  '.c': 'c-like',
  '.cc': 'c-like',
  '.cpp': 'c-like',
  '.h': 'c-like',
  '.hpp': 'c-like',
  '.cs': 'c-like',
  '.go': 'c-like',
  '.rs': 'c-like',
  '.swift': 'c-like',

  '.sh': 'hash',
  '.zsh': 'hash',
  '.bash': 'hash',
  '.yaml': 'hash',
  '.yml': 'hash',
  '.toml': 'hash',
  '.ini': 'hash',
  '.cfg': 'hash',
  '.rb': 'hash'
}

/**
 * Look up the comment rule family for a file extension.
 * Matching is case-insensitive and the leading dot is optional.
 */
export function resolveRuleFamily(extension: string): RuleFamily {
  const lower = extension.toLowerCase()
  const key = lower.startsWith('.') ? lower : '.' + lower
  return RULE_TABLE[key] ?? 'none'
}
