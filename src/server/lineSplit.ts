const NEWLINE = 0x0a

export interface CompletedLines {
  lines: string[]
  /** Bytes up to and including the last newline; a trailing fragment is not counted */
  consumedBytes: number
}

// Works on raw bytes so consumedBytes is a valid file offset for any UTF-8 content
export function splitCompletedLines(chunk: Buffer): CompletedLines {
  const lines: string[] = []
  let lineStart = 0
  let newline = chunk.indexOf(NEWLINE, lineStart)
  while (newline !== -1) {
    lines.push(chunk.toString('utf8', lineStart, newline))
    lineStart = newline + 1
    newline = chunk.indexOf(NEWLINE, lineStart)
  }
  return { lines, consumedBytes: lineStart }
}
