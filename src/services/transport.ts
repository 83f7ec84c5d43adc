/**
 * 传输层抽象 — 一个已认证的远程命令通道
 * ConnectionManager 只依赖这里的接口，SSH 实现见 sshTransport.ts
 */

/** 传输错误分类 */
export type TransportErrorKind = 'timeout' | 'auth' | 'closed' | 'io'

export class TransportError extends Error {
  readonly kind: TransportErrorKind

  constructor(kind: TransportErrorKind, message: string) {
    super(message)
    this.name = 'TransportError'
    this.kind = kind
  }
}

/** 建立连接所需参数（secret 仅在内存中传递） */
export interface ConnectParams {
  host: string
  port: number
  username: string
  secret: string
  timeoutMs: number
}

/** 已建立的会话 */
export interface TransportSession {
  /** 发送一条命令，返回到下一个提示符之前的输出 */
  send(command: string, timeoutMs: number): Promise<string>
  /** 进入配置模式 */
  enterConfig(timeoutMs: number): Promise<string>
  /** 退出配置模式 */
  exitConfig(timeoutMs: number): Promise<string>
  /** 释放底层资源，可重复调用 */
  close(): Promise<void>
}

export interface DeviceTransport {
  connect(params: ConnectParams): Promise<TransportSession>
}
