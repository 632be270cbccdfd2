// Rotation naming used by the writer: <base>.txt is current, <base>.1.txt the previous file

export const CURRENT_SUFFIX = '.txt'
export const ROTATED_SUFFIX = '.1.txt'

export function currentFile(base: string): string {
  return base + CURRENT_SUFFIX
}

/** Rotation files of a target, oldest first */
export function rotationFiles(base: string): string[] {
  return [base + ROTATED_SUFFIX, currentFile(base)]
}

export function uniqueTargets(targets: readonly string[]): string[] {
  return Array.from(new Set(targets))
}

export function watchedFiles(targets: readonly string[]): string[] {
  return uniqueTargets(targets).map(currentFile)
}
