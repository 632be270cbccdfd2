// The writer keeps its log open and appends in place, so change notifications
// that fire on close never arrive. Growth is detected by polling file sizes.

import { fileSize as statFileSize, type FileSizeQuery } from './fileSize'
import type { InitialLine } from './initialLines'
import { describeError, logger } from './logger'
import { uniqueTargets, watchedFiles } from './logTargets'
import { buildInitialSnapshot } from './snapshotBuilder'
import { extractSortKey as extractSpdlogSortKey, type SortKeyExtractor } from './sortKey'
import { readCompletedLines } from './tailReader'

export const POLL_INTERVAL_MS = 1000
// A current file that could not be read at startup is replayed from its start once it appears
export const UNSEEN_FILE_START_OFFSET = 0

export type NewLineCallback = (line: string) => void

export interface LogMonitorOptions {
  extractSortKey?: SortKeyExtractor
  fileSize?: FileSizeQuery
}

export interface PollStats {
  filesChecked: number
  filesRead: number
  linesDelivered: number
  errors: number
  durationMs: number
  skipped: boolean
}

interface WatchState {
  filePath: string
  offset: number
  lastSeenSize: number | null
  available: boolean
}

function emptyStats(skipped: boolean): PollStats {
  return {
    filesChecked: 0,
    filesRead: 0,
    linesDelivered: 0,
    errors: 0,
    durationMs: 0,
    skipped,
  }
}

export class LogMonitor {
  readonly watchedFiles: readonly string[]
  private readonly initialLines: readonly InitialLine[]
  private readonly states = new Map<string, WatchState>()
  private readonly onLine: NewLineCallback
  private readonly fileSize: FileSizeQuery
  private interval: ReturnType<typeof setInterval> | null = null
  private pollInFlight: Promise<PollStats> | null = null
  private stopped = false

  constructor(
    targets: readonly string[],
    onLine: NewLineCallback,
    { extractSortKey = extractSpdlogSortKey, fileSize = statFileSize }: LogMonitorOptions = {}
  ) {
    this.onLine = onLine
    this.fileSize = fileSize

    const startMs = Date.now()
    const uniqueTargetList = uniqueTargets(targets)
    const snapshot = buildInitialSnapshot(uniqueTargetList, { extractSortKey })
    this.initialLines = snapshot.lines
    this.watchedFiles = watchedFiles(uniqueTargetList)

    for (const filePath of this.watchedFiles) {
      const cursor = snapshot.cursors.get(filePath)
      this.states.set(filePath, {
        filePath,
        offset: cursor?.offset ?? UNSEEN_FILE_START_OFFSET,
        lastSeenSize: cursor?.lastSeenSize ?? null,
        available: cursor !== undefined,
      })
    }

    logger.info('log_monitor_snapshot', {
      targetCount: uniqueTargetList.length,
      initialLineCount: this.initialLines.length,
      watchedFiles: this.watchedFiles,
      snapshotMs: Date.now() - startMs,
    })

    try {
      this.interval = setInterval(() => {
        void this.pollOnce()
      }, POLL_INTERVAL_MS)
    } catch (error) {
      this.interval = null
      logger.error('log_monitor_timer_error', describeError(error))
    }
  }

  get isRunning(): boolean {
    return this.interval !== null
  }

  getInitialLines(): readonly InitialLine[] {
    return this.initialLines
  }

  getCursor(filePath: string): number | null {
    return this.states.get(filePath)?.offset ?? null
  }

  /** Clears the timer, then waits for a tick that is still running */
  async stop(): Promise<void> {
    this.stopped = true
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
    if (this.pollInFlight) {
      await this.pollInFlight
    }
  }

  async pollOnce(): Promise<PollStats> {
    if (this.stopped || this.pollInFlight) {
      return emptyStats(true)
    }
    this.pollInFlight = this.runPoll()
    try {
      return await this.pollInFlight
    } finally {
      this.pollInFlight = null
    }
  }

  private async runPoll(): Promise<PollStats> {
    const start = Date.now()
    const stats = emptyStats(false)

    for (const state of this.states.values()) {
      if (this.stopped) break
      stats.filesChecked++

      const size = this.querySize(state)
      if (size === null) {
        stats.errors++
        continue
      }
      if (size === state.lastSeenSize) continue

      const result = await readCompletedLines(state.filePath, state.offset, size)
      if (!result.ok) {
        this.markUnavailable(state, 'log_monitor_read_error', describeError(result.error))
        stats.errors++
        continue
      }

      if (result.startOffset !== state.offset) {
        logger.warn('log_monitor_cursor_reset', {
          filePath: state.filePath,
          previousOffset: state.offset,
          size,
        })
      }

      for (const line of result.lines) {
        if (this.deliver(state.filePath, line)) {
          stats.linesDelivered++
        } else {
          stats.errors++
        }
      }
      state.offset = result.cursor
      // Bytes appended after the size check were read too; the next tick must not see them as growth
      state.lastSeenSize = result.endOffset
      stats.filesRead++
    }

    stats.durationMs = Date.now() - start
    if (stats.filesRead > 0) {
      logger.debug('log_monitor_poll', { ...stats })
    }
    return stats
  }

  private querySize(state: WatchState): number | null {
    let size: number | null
    try {
      size = this.fileSize(state.filePath)
    } catch (error) {
      this.markUnavailable(state, 'log_monitor_size_error', describeError(error))
      return null
    }
    if (size === null) {
      this.markUnavailable(state, 'log_monitor_file_unavailable', {})
    } else {
      this.markAvailable(state)
    }
    return size
  }

  // The line counts as delivered even when the consumer throws
  private deliver(filePath: string, line: string): boolean {
    try {
      this.onLine(line)
      return true
    } catch (error) {
      logger.warn('log_monitor_callback_error', { filePath, ...describeError(error) })
      return false
    }
  }

  private markUnavailable(
    state: WatchState,
    event: string,
    data: Record<string, unknown>
  ): void {
    if (state.available) {
      state.available = false
      logger.warn(event, { filePath: state.filePath, ...data })
    } else {
      logger.debug(event, { filePath: state.filePath, ...data })
    }
  }

  private markAvailable(state: WatchState): void {
    if (!state.available) {
      state.available = true
      logger.info('log_monitor_file_available', { filePath: state.filePath })
    }
  }
}
