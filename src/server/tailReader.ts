import fsp from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { splitCompletedLines } from './lineSplit'
import { describeError, logger } from './logger'

const READ_CHUNK_BYTES = 64 * 1024

export type ReadPassResult =
  | { ok: true; lines: string[]; startOffset: number; cursor: number; endOffset: number }
  | { ok: false; error: unknown }

/**
 * Reads every newline-terminated line after `cursor`, up to the current end
 * of the file. When `size` is not past the cursor the pass starts over at 0.
 * The returned cursor never moves past a partial trailing line; `endOffset`
 * is where reading stopped, which is past `size` if the file grew meanwhile.
 */
export async function readCompletedLines(
  filePath: string,
  cursor: number,
  size: number
): Promise<ReadPassResult> {
  let handle: FileHandle
  try {
    handle = await fsp.open(filePath, 'r')
  } catch (error) {
    return { ok: false, error }
  }

  const startOffset = size > cursor ? cursor : 0
  try {
    const chunks: Buffer[] = []
    let position = startOffset
    for (;;) {
      const buffer = Buffer.alloc(READ_CHUNK_BYTES)
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, position)
      if (bytesRead === 0) break
      chunks.push(buffer.subarray(0, bytesRead))
      position += bytesRead
    }

    const { lines, consumedBytes } = splitCompletedLines(Buffer.concat(chunks))
    return {
      ok: true,
      lines,
      startOffset,
      cursor: startOffset + consumedBytes,
      endOffset: position,
    }
  } catch (error) {
    return { ok: false, error }
  } finally {
    await handle.close().catch((error: unknown) => {
      logger.debug('log_tail_close_error', { filePath, ...describeError(error) })
    })
  }
}
