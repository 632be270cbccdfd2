export const MAX_INITIAL_LINES = 250

export interface InitialLine {
  sortKey: number
  text: string
}

/**
 * Ascending, capacity-bounded list of the most recent lines seen at startup.
 * Equal keys keep the order in which they were added, so a line from the
 * rotated file stays ahead of a same-key line from the current file.
 */
export class InitialLineBuffer {
  private entries: InitialLine[] = []
  private readonly capacity: number

  constructor(capacity = MAX_INITIAL_LINES) {
    this.capacity = Math.max(1, capacity)
  }

  get size(): number {
    return this.entries.length
  }

  /** Returns false when the line is older than everything retained */
  add(sortKey: number, text: string): boolean {
    const entry: InitialLine = { sortKey, text }
    const count = this.entries.length

    if (count === 0 || sortKey >= this.entries[count - 1].sortKey) {
      this.entries.push(entry)
    } else if (sortKey < this.entries[0].sortKey) {
      return false
    } else {
      this.entries.splice(this.firstGreaterIndex(sortKey), 0, entry)
    }

    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity)
    }
    return true
  }

  lines(): readonly InitialLine[] {
    return this.entries
  }

  // Binary search for the first entry whose key is strictly greater
  private firstGreaterIndex(sortKey: number): number {
    let low = 0
    let high = this.entries.length
    while (low < high) {
      const mid = (low + high) >>> 1
      if (this.entries[mid].sortKey > sortKey) {
        high = mid
      } else {
        low = mid + 1
      }
    }
    return low
  }
}
