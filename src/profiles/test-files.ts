// src/profiles/test-files.ts
import type { Profile } from './types.js'

const TEST_DIR_HINTS = new Set(['test', 'tests', '__tests__', 'spec', 'specs', 'testing'])

const JS_TEST_EXTS = new Set(['.js', '.jsx', '.ts', '.tsx'])
const PY_TEST_EXTS = new Set(['.py', '.pyi'])
const JAVA_TEST_EXTS = new Set(['.java', '.kt', '.groovy'])

const JS_TEST_NAME = /.*(\.test|\.spec)\.(js|jsx|ts|tsx)$/i
const PY_TEST_NAME = /^(test_.*|.*_test)\.(py|pyi)$/i
const JAVA_TEST_NAME = /.*(Test|Tests|IT|ITCase)\.(java|kt|groovy)$/i
const TEST_DIR_PATH = /(?:^|\/)(?:src\/)?(?:test|tests)\//i

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.')
  return dot > 0 ? name.slice(dot).toLowerCase() : ''
}

/**
 * Name/path heuristic for test files. `relativePath` is relative to the scan root.
 */
export function isTestFile(relativePath: string, profile: Profile): boolean {
  const normalized = relativePath.replace(/\\/g, '/')
  const segments = normalized.split('/').filter(s => s)
  const name = segments[segments.length - 1] ?? ''
  const ext = extensionOf(name)

  if (segments.some(seg => TEST_DIR_HINTS.has(seg.toLowerCase()))) return true

  const matchesProfile = (p: Profile) => profile === p || profile === 'all'

  if (matchesProfile('js') && JS_TEST_EXTS.has(ext) && JS_TEST_NAME.test(name)) return true
  if (matchesProfile('python') && PY_TEST_EXTS.has(ext) && PY_TEST_NAME.test(name)) return true
  if (matchesProfile('java') && JAVA_TEST_EXTS.has(ext) && JAVA_TEST_NAME.test(name)) return true

  return TEST_DIR_PATH.test(normalized)
}
