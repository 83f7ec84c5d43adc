import { existsSync, renameSync } from 'node:fs'
import { join } from 'node:path'
import log from 'electron-log/node'
import { getOperationContext } from './operationContext'

const LOG_FILE_NAME = 'netops.log'
/** 保留的归档数：netops.log.1 ~ netops.log.3 */
const LOG_ARCHIVE_COUNT = 3

/** 轮转归档：.1 → .2 → .3，最旧的被覆盖，当前文件变为 .1 */
export function archiveLogFile(file: string, count = LOG_ARCHIVE_COUNT): void {
  for (let i = count - 1; i >= 1; i--) {
    const older = `${file}.${i}`
    if (existsSync(older)) renameSync(older, `${file}.${i + 1}`)
  }
  renameSync(file, `${file}.1`)
}

// 日志文件轮转：单文件约 2MB
log.transports.file.maxSize = 2 * 1000 * 1000
log.transports.file.archiveLogFn = (oldLogFile) => {
  try {
    archiveLogFile(oldLogFile.path)
  } catch (err) {
    // 文件 transport 内部不能再写日志
    console.warn(`Could not rotate log ${oldLogFile.path}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

// 日志格式
log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}'
log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}'

// 自动注入 OperationContext 前缀（requestId:kind）
log.hooks.push((message) => {
  const ctx = getOperationContext()
  if (ctx && message.data.length > 0 && typeof message.data[0] === 'string') {
    const rid = ctx.requestId.slice(-8)
    message.data[0] = `[${rid}:${ctx.kind}] ${message.data[0]}`
  }
  return message
})

/** electron-log 支持的级别 */
export type LogLevelName = 'error' | 'warn' | 'info' | 'verbose' | 'debug'

/** LOG_LEVEL 取值 → electron-log 级别 */
const LEVEL_ALIASES: Record<string, LogLevelName> = {
  critical: 'error',
  error: 'error',
  warning: 'warn',
  warn: 'warn',
  info: 'info',
  verbose: 'verbose',
  debug: 'debug'
}

/** 解析日志级别，未知取值回退到 info */
export function resolveLogLevel(raw: string | undefined): LogLevelName {
  if (!raw) return 'info'
  return LEVEL_ALIASES[raw.trim().toLowerCase()] ?? 'info'
}

/** 配置日志输出目录与级别（进程启动时调用一次） */
export function configureLogging(logsDir: string, level: string | undefined): string {
  const file = join(logsDir, LOG_FILE_NAME)
  const resolved = resolveLogLevel(level)
  log.transports.file.resolvePathFn = () => file
  log.transports.file.level = resolved
  log.transports.console.level = resolved
  return file
}

/** 创建带模块标签的 logger（使用 electron-log scope） */
export function createLogger(tag: string): ReturnType<typeof log.scope> {
  return log.scope(tag)
}

export default log
