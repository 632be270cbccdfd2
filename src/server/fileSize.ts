import fs from 'node:fs'

export type FileSizeQuery = (filePath: string) => number | null

export function fileSize(filePath: string): number | null {
  try {
    const stats = fs.statSync(filePath)
    return stats.isFile() ? stats.size : null
  } catch {
    return null
  }
}
