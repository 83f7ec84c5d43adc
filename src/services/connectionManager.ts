/**
 * 设备连接管理器
 * 一次只持有一个设备的一个会话：open → execute → close
 * 状态机：idle → connecting → connected ⇄ executing → closing → idle
 */

import { createLogger } from '../logger'
import type { Credential, DeviceRecord } from '../types'
import { TransportError, type DeviceTransport, type TransportSession } from './transport'
const log = createLogger('Connection')

export type SessionState = 'idle' | 'connecting' | 'connected' | 'executing' | 'closing'

/** 连接/执行失败的分类 */
export type ConnectionFailureStatus = 'timeout' | 'auth_error' | 'execution_error'

export type OpenOutcome = { success: true } | { success: false; status: ConnectionFailureStatus; error: string }

export type ExecuteOutcome =
  | { success: true; output: string }
  | { success: false; status: ConnectionFailureStatus; error: string; output: string }

export interface ExecuteOptions {
  /** 在配置模式下执行（前后自动进入/退出） */
  configMode: boolean
  /** 单条命令超时（毫秒） */
  timeoutMs: number
}

/** TransportError → 结果状态 */
export function classifyTransportError(err: unknown): { status: ConnectionFailureStatus; error: string } {
  if (err instanceof TransportError) {
    switch (err.kind) {
      case 'timeout':
        return { status: 'timeout', error: err.message }
      case 'auth':
        return { status: 'auth_error', error: err.message }
      default:
        return { status: 'execution_error', error: err.message }
    }
  }
  return { status: 'execution_error', error: err instanceof Error ? err.message : String(err) }
}

export class ConnectionManager {
  /** 进程内当前占用会话的管理器（同一时刻最多一个） */
  private static active: ConnectionManager | null = null

  private currentState: SessionState = 'idle'
  private session: TransportSession | null = null
  private deviceName = ''

  constructor(private readonly transport: DeviceTransport) {}

  get state(): SessionState {
    return this.currentState
  }

  /** 建立连接并认证 */
  async open(device: DeviceRecord, credential: Credential, timeoutMs: number): Promise<OpenOutcome> {
    if (this.currentState !== 'idle') {
      throw new Error(`Cannot open a session while ${this.currentState}`)
    }
    if (ConnectionManager.active && ConnectionManager.active !== this) {
      throw new Error(`Another session is already active (${ConnectionManager.active.deviceName})`)
    }

    ConnectionManager.active = this
    this.deviceName = device.name
    this.currentState = 'connecting'
    log.info(`连接 ${device.name} (${device.address}:${device.port}) ...`)

    try {
      this.session = await this.transport.connect({
        host: device.address,
        port: device.port,
        username: credential.username,
        secret: credential.secret,
        timeoutMs
      })
    } catch (err) {
      this.reset()
      const failure = classifyTransportError(err)
      log.error(`连接 ${device.name} 失败 [${failure.status}]: ${failure.error}`)
      return { success: false, ...failure }
    }

    this.currentState = 'connected'
    log.info(`已连接 ${device.name}`)
    return { success: true }
  }

  /** 按顺序执行命令并收集输出；传输错误中止剩余命令并关闭会话 */
  async execute(commands: readonly string[], options: ExecuteOptions): Promise<ExecuteOutcome> {
    const session = this.session
    if (this.currentState !== 'connected' || !session) {
      throw new Error(`Cannot execute commands while ${this.currentState}`)
    }

    this.currentState = 'executing'
    const outputs: string[] = []
    try {
      if (options.configMode) {
        outputs.push(await session.enterConfig(options.timeoutMs))
      }
      for (const command of commands) {
        log.debug(`> ${command}`)
        outputs.push(await session.send(command, options.timeoutMs))
      }
      if (options.configMode) {
        outputs.push(await session.exitConfig(options.timeoutMs))
      }
    } catch (err) {
      const failure = classifyTransportError(err)
      log.error(`${this.deviceName} 执行中断 [${failure.status}]: ${failure.error}`)
      await this.close()
      return { success: false, ...failure, output: joinOutput(outputs) }
    }

    // 执行期间会话已被 close() 释放
    if (this.session !== session) {
      return {
        success: false,
        status: 'execution_error',
        error: 'Session was closed during execution',
        output: joinOutput(outputs)
      }
    }
    this.currentState = 'connected'
    return { success: true, output: joinOutput(outputs) }
  }

  /** 释放会话；重复调用或从未打开时为 no-op */
  async close(): Promise<void> {
    const session = this.session
    if (!session) return
    this.currentState = 'closing'
    this.session = null
    try {
      await session.close()
      log.info(`已断开 ${this.deviceName}`)
    } catch (err) {
      log.warn(`断开 ${this.deviceName} 时出错: ${err instanceof Error ? err.message : String(err)}`)
    } finally {
      this.reset()
    }
  }

  private reset(): void {
    this.currentState = 'idle'
    this.session = null
    if (ConnectionManager.active === this) {
      ConnectionManager.active = null
    }
  }
}

function joinOutput(outputs: string[]): string {
  return outputs.filter(Boolean).join('\n')
}
