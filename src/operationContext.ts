import { AsyncLocalStorage } from 'node:async_hooks'
import { v7 as uuidv7 } from 'uuid'
import type { OperationKind } from './types'

/** 操作上下文 — 每次设备操作一个实例 */
export interface OperationContext {
  requestId: string
  device: string
  kind: OperationKind
  timestamp: number
}

/** 全局 AsyncLocalStorage 实例 */
export const operationContext = new AsyncLocalStorage<OperationContext>()

/** 读取当前上下文（run() 外返回 undefined） */
export function getOperationContext(): OperationContext | undefined {
  return operationContext.getStore()
}

/** 工厂：设备操作上下文 */
export function createOperationContext(device: string, kind: OperationKind, timestamp: number): OperationContext {
  return { requestId: uuidv7(), device, kind, timestamp }
}
