import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'log-monitor-'))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

/** Lines like "15 message" sort by their leading integer */
export function numericSortKey(line: string): number | null {
  const match = /^(\d+) /.exec(line)
  return match ? Number(match[1]) : null
}
