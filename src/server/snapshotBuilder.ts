import fs from 'node:fs'
import { InitialLineBuffer, type InitialLine } from './initialLines'
import { splitCompletedLines } from './lineSplit'
import { describeError, logger, type LogData } from './logger'
import { rotationFiles } from './logTargets'
import type { SortKeyExtractor } from './sortKey'

export interface FileCursor {
  /** Byte offset just past the last fully consumed line */
  offset: number
  /** File size when the cursor was last advanced; null if never read */
  lastSeenSize: number | null
}

export interface SnapshotResult {
  lines: readonly InitialLine[]
  /** Only files that could be read are present */
  cursors: Map<string, FileCursor>
}

export interface SnapshotOptions {
  extractSortKey: SortKeyExtractor
}

export function buildInitialSnapshot(
  targets: readonly string[],
  { extractSortKey }: SnapshotOptions
): SnapshotResult {
  const buffer = new InitialLineBuffer()
  const cursors = new Map<string, FileCursor>()

  for (const target of targets) {
    for (const filePath of rotationFiles(target)) {
      const cursor = addFileLines(filePath, buffer, extractSortKey)
      if (cursor) {
        cursors.set(filePath, cursor)
      }
    }
  }

  return { lines: buffer.lines(), cursors }
}

function addFileLines(
  filePath: string,
  buffer: InitialLineBuffer,
  extractSortKey: SortKeyExtractor
): FileCursor | null {
  let content: Buffer
  try {
    content = fs.readFileSync(filePath)
  } catch (error) {
    const data: LogData = { filePath, ...describeError(error) }
    if (data.code === 'ENOENT') {
      logger.debug('log_snapshot_file_missing', data)
    } else {
      logger.warn('log_snapshot_read_error', data)
    }
    return null
  }

  // A trailing fragment is still being written; the tail poller delivers it once complete
  const { lines, consumedBytes } = splitCompletedLines(content)
  let merged = 0
  for (const line of lines) {
    const sortKey = extractSortKey(line)
    if (sortKey === null) continue
    if (buffer.add(sortKey, line)) {
      merged++
    }
  }

  logger.debug('log_snapshot_file_read', {
    filePath,
    lineCount: lines.length,
    merged,
    bytes: content.length,
    offset: consumedBytes,
  })

  return { offset: consumedBytes, lastSeenSize: content.length }
}
