// src/line-classifier/sniffer.ts
import { open } from 'fs/promises'
import { SNIFF_BYTES } from './types.js'

export function isTextBuffer(buffer: Uint8Array): boolean {
  return !buffer.includes(0)
}

/**
 * Heuristic text check: a NUL byte in the first `sniffBytes` bytes marks the
 * file as binary. Files that cannot be opened or read are reported as binary too.
 */
export async function isTextFile(filePath: string, sniffBytes: number = SNIFF_BYTES): Promise<boolean> {
  try {
    const handle = await open(filePath, 'r')
    try {
      const buffer = Buffer.alloc(sniffBytes)
      const { bytesRead } = await handle.read(buffer, 0, sniffBytes, 0)
      return isTextBuffer(buffer.subarray(0, bytesRead))
    } finally {
      await handle.close()
    }
  } catch {
    return false
  }
}
