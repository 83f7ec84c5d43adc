/** 操作类型 */
export const OPERATION_KINDS = [
  'configure_interface',
  'show_status',
  'ping',
  'backup',
  'configure_ospf'
] as const
export type OperationKind = (typeof OPERATION_KINDS)[number]

/** 操作请求 — 判别联合，每个操作一个变体，参数均为用户原始输入 */
export type OperationRequest =
  | {
      kind: 'configure_interface'
      params: { interfaceName: string; ipv4: string; subnetMask: string }
    }
  | { kind: 'show_status'; params: Record<string, never> }
  | { kind: 'ping'; params: { target: string; count?: string | number } }
  | { kind: 'backup'; params: Record<string, never> }
  | {
      kind: 'configure_ospf'
      params: {
        processId: string | number
        routerId: string
        network: string
        wildcard: string
        area: string | number
      }
    }

/** 操作结果状态 */
export type OperationStatus =
  | 'success'
  | 'validation_error'
  | 'timeout'
  | 'auth_error'
  | 'execution_error'
  | 'filesystem_error'

/** 备份产物 */
export interface BackupArtifact {
  readonly hostname: string
  /** YYYYMMDD-HHMMSS（UTC） */
  readonly timestamp: string
  readonly path: string
}

/** 操作结果（创建后冻结） */
export interface OperationResult {
  readonly kind: OperationKind
  readonly device: string
  readonly status: OperationStatus
  readonly rawOutput: string
  readonly detail: string
  /** 仅 backup 成功时存在 */
  readonly artifact?: BackupArtifact
}

/** 每次操作尝试产生一条的结构化日志事件 */
export interface OperationEvent {
  id: string
  device: string
  kind: OperationKind
  status: OperationStatus
  /** ISO 8601 */
  timestamp: string
  durationMs: number
}

/** 操作日志接收端（由调用方注入） */
export interface OperationSink {
  record(event: OperationEvent): void
}

/** 时钟（便于测试注入） */
export type Clock = () => Date
