import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import fs from 'node:fs/promises'
import path from 'node:path'
import { readCompletedLines } from '../tailReader'
import { makeTempDir, removeTempDir } from './testFiles'

let tempRoot: string
let filePath: string

beforeEach(async () => {
  tempRoot = await makeTempDir()
  filePath = path.join(tempRoot, 'app.txt')
})

afterEach(async () => {
  await removeTempDir(tempRoot)
})

describe('readCompletedLines', () => {
  test('reads complete lines after the cursor', async () => {
    await fs.writeFile(filePath, 'a\nb\nc\n')

    expect(await readCompletedLines(filePath, 2, 6)).toEqual({
      ok: true,
      lines: ['b', 'c'],
      startOffset: 2,
      cursor: 6,
      endOffset: 6,
    })
  })

  test('does not move the cursor past a partial line', async () => {
    await fs.writeFile(filePath, 'a\nb\npartial')

    expect(await readCompletedLines(filePath, 4, 11)).toEqual({
      ok: true,
      lines: [],
      startOffset: 4,
      cursor: 4,
      endOffset: 11,
    })
  })

  test('stops at the last newline when a partial line follows', async () => {
    await fs.writeFile(filePath, 'a\nb\nc')

    expect(await readCompletedLines(filePath, 0, 5)).toEqual({
      ok: true,
      lines: ['a', 'b'],
      startOffset: 0,
      cursor: 4,
      endOffset: 5,
    })
  })

  test('starts over when the size is not past the cursor', async () => {
    await fs.writeFile(filePath, 'x\n')

    expect(await readCompletedLines(filePath, 10, 2)).toEqual({
      ok: true,
      lines: ['x'],
      startOffset: 0,
      cursor: 2,
      endOffset: 2,
    })
  })

  test('reads to the end of the file when it grew after the size check', async () => {
    await fs.writeFile(filePath, 'a\nb\n')

    expect(await readCompletedLines(filePath, 0, 2)).toEqual({
      ok: true,
      lines: ['a', 'b'],
      startOffset: 0,
      cursor: 4,
      endOffset: 4,
    })
  })

  test('keeps carriage returns as line content', async () => {
    await fs.writeFile(filePath, 'a\r\n')

    const result = await readCompletedLines(filePath, 0, 3)
    expect(result).toEqual({
      ok: true,
      lines: ['a\r'],
      startOffset: 0,
      cursor: 3,
      endOffset: 3,
    })
  })

  test('reads past the first chunk of a large append', async () => {
    const lines = Array.from({ length: 20000 }, (_, i) => `entry-${i}`)
    const content = lines.map((line) => `${line}\n`).join('')
    await fs.writeFile(filePath, content)
    const size = Buffer.byteLength(content)

    const result = await readCompletedLines(filePath, 0, size)

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.lines).toHaveLength(20000)
    expect(result.lines[19999]).toBe('entry-19999')
    expect(result.cursor).toBe(size)
  })

  test('reports a file that cannot be opened', async () => {
    const result = await readCompletedLines(path.join(tempRoot, 'missing.txt'), 0, 10)

    expect(result.ok).toBe(false)
  })
})
