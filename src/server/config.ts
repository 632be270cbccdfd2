const logLevelRaw = process.env.LOG_LEVEL?.toLowerCase()
const logLevel =
  logLevelRaw === 'debug' ||
  logLevelRaw === 'info' ||
  logLevelRaw === 'warn' ||
  logLevelRaw === 'error'
    ? logLevelRaw
    : 'info'

export const config = {
  logLevel,
  logFile: process.env.LOG_FILE || '',
  // Base paths of the streams to follow, e.g. "/var/log/app" for app.txt/app.1.txt
  targets: (process.env.LOG_MONITOR_TARGETS || '')
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean),
}
