import { config } from './config'
import { flushLogger, logger } from './logger'
import { LogMonitor } from './logMonitor'

if (config.targets.length === 0) {
  logger.error('log_monitor_no_targets', {
    hint: 'set LOG_MONITOR_TARGETS to a comma separated list of base paths',
  })
  flushLogger()
  process.exit(1)
}

const monitor = new LogMonitor(config.targets, (line) => {
  process.stdout.write(`${line}\n`)
})

for (const { text } of monitor.getInitialLines()) {
  process.stdout.write(`${text}\n`)
}

logger.info('log_monitor_started', {
  targets: config.targets,
  watchedFiles: monitor.watchedFiles,
  tailing: monitor.isRunning,
})

async function shutdown(signal: string): Promise<void> {
  await monitor.stop()
  logger.info('log_monitor_stopped', { signal })
  flushLogger()
  process.exit(0)
}

process.on('SIGINT', () => {
  void shutdown('SIGINT')
})

process.on('SIGTERM', () => {
  void shutdown('SIGTERM')
})
