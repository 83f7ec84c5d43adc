import { createLogger } from '../logger'
import type { OperationEvent, OperationSink } from '../types'

type EventLogger = Pick<ReturnType<typeof createLogger>, 'info' | 'warn'>

/** 事件 → 单行日志文本 */
export function formatOperationEvent(event: OperationEvent): string {
  return (
    `operation=${event.kind} device=${event.device} status=${event.status} ` +
    `at=${event.timestamp} duration=${event.durationMs}ms id=${event.id}`
  )
}

/**
 * 操作日志 Sink — 每次操作尝试写一条结构化日志
 * 成功记 info，其余记 warn
 */
export class LogOperationSink implements OperationSink {
  constructor(private readonly logger: EventLogger = createLogger('Operation')) {}

  record(event: OperationEvent): void {
    const line = formatOperationEvent(event)
    if (event.status === 'success') {
      this.logger.info(line)
    } else {
      this.logger.warn(line)
    }
  }
}
