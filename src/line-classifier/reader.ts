// src/line-classifier/reader.ts
import { createReadStream } from 'fs'
import { classifyLineStream } from './classifier.js'
import { isTextFile } from './sniffer.js'
import type { FileCountResult } from './types.js'

/**
 * Yield the lines of a file, splitting on \n, \r\n and bare \r.
 * Invalid UTF-8 is decoded to U+FFFD by the stream's decoder.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  const stream = createReadStream(filePath, { encoding: 'utf8' })
  const lineBreak = /\r\n|\n|\r/g
  let pending = ''

  for await (const chunk of stream) {
    pending += String(chunk)
    let start = 0
    lineBreak.lastIndex = 0
    let match: RegExpExecArray | null
    while ((match = lineBreak.exec(pending)) !== null) {
      // A trailing \r may be the first half of a \r\n split across chunks
      if (match[0] === '\r' && match.index === pending.length - 1) break
      yield pending.slice(start, match.index)
      start = match.index + match[0].length
    }
    pending = pending.slice(start)
  }

  if (pending.endsWith('\r')) {
    pending = pending.slice(0, -1)
    yield pending
    return
  }
  if (pending !== '') {
    yield pending
  }
}

export async function countFileLines(filePath: string, extension: string): Promise<FileCountResult> {
  if (!(await isTextFile(filePath))) {
    return { ok: false, reason: 'binary' }
  }

  try {
    const counts = await classifyLineStream(extension, readLines(filePath))
    return { ok: true, counts }
  } catch (error) {
    return {
      ok: false,
      reason: 'unreadable',
      error: error instanceof Error ? error.message : String(error)
    }
  }
}
