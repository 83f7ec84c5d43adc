/**
 * SSH 传输 — 通过 ssh2 打开交互式 shell，按 IOS 提示符切分每条命令的输出
 * 凭据仅在内存中传递，不持久化
 */

import type { Duplex } from 'node:stream'
import { Client, type ConnectConfig } from 'ssh2'
import { createLogger } from '../logger'
import { TransportError, type ConnectParams, type DeviceTransport, type TransportSession } from './transport'
const log = createLogger('SSH')

/** IOS 提示符：主机名 + 可选模式（如 (config-if)）+ > 或 #，位于缓冲区末尾 */
export const PROMPT_PATTERN = /(?:^|\r?\n)([A-Za-z0-9_.-]+(?:\([A-Za-z0-9-]+\))?[>#])[ \t]*$/

/** 心跳保活：每 30 秒一次，连续 3 次无响应则断开 */
const KEEPALIVE_INTERVAL_MS = 30_000
const KEEPALIVE_COUNT_MAX = 3

/** ssh2 抛出的错误带 level 字段（client-authentication / client-timeout / client-socket ...） */
export type SshClientError = Error & { level?: string; code?: string }

/** ssh2 错误 → TransportError */
export function classifySshError(err: SshClientError): TransportError {
  if (err.level === 'client-authentication') {
    return new TransportError('auth', `Authentication failed: ${err.message}`)
  }
  if (err.level === 'client-timeout' || err.code === 'ETIMEDOUT') {
    return new TransportError('timeout', `Connection timed out: ${err.message}`)
  }
  return new TransportError('io', err.message)
}

/** 去掉输出首行的命令回显，统一换行符 */
export function stripEcho(raw: string, command: string): string {
  const lines = raw.replace(/\r\n?/g, '\n').split('\n')
  if (lines.length > 0 && lines[0].trim().endsWith(command.trim())) {
    lines.shift()
  }
  return lines.join('\n').replace(/\n+$/, '')
}

interface PromptWaiter {
  resolve: (output: string) => void
  reject: (err: TransportError) => void
  timer: ReturnType<typeof setTimeout>
}

/**
 * 交互式 shell 会话
 * 每条命令写入后读取到下一个提示符为止
 */
export class ShellSession implements TransportSession {
  private buffer = ''
  private waiter: PromptWaiter | null = null
  /** 远端或本端已关闭 */
  private closed = false
  /** 底层资源已释放 */
  private released = false
  private lastPrompt = ''

  constructor(
    private readonly stream: Duplex,
    private readonly release: () => void = () => {}
  ) {
    stream.on('data', (chunk: Buffer | string) => {
      this.buffer += chunk.toString()
      this.checkPrompt()
    })
    stream.on('close', () => this.handleClosed('Shell channel closed by device'))
    stream.on('error', (err: Error) => this.handleClosed(`Shell channel error: ${err.message}`))
  }

  /** 最近一次看到的提示符 */
  get prompt(): string {
    return this.lastPrompt
  }

  /** 等待登录提示符并关闭分页 */
  async initialize(timeoutMs: number): Promise<void> {
    await this.readUntilPrompt(timeoutMs)
    await this.send('terminal length 0', timeoutMs)
    await this.send('terminal width 511', timeoutMs)
    if (this.lastPrompt.endsWith('>')) {
      log.warn(`设备处于用户模式 (${this.lastPrompt})，配置命令可能被拒绝`)
    }
  }

  async send(command: string, timeoutMs: number): Promise<string> {
    if (this.closed) {
      throw new TransportError('closed', 'Session is closed')
    }
    this.buffer = ''
    const pending = this.readUntilPrompt(timeoutMs)
    this.stream.write(`${command}\n`)
    return stripEcho(await pending, command)
  }

  enterConfig(timeoutMs: number): Promise<string> {
    return this.send('configure terminal', timeoutMs)
  }

  exitConfig(timeoutMs: number): Promise<string> {
    return this.send('end', timeoutMs)
  }

  async close(): Promise<void> {
    if (this.released) return
    this.released = true
    this.handleClosed('Session closed')
    try {
      this.stream.end()
    } finally {
      this.release()
    }
  }

  private readUntilPrompt(timeoutMs: number): Promise<string> {
    if (this.closed) {
      return Promise.reject(new TransportError('closed', 'Session is closed'))
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null
        reject(new TransportError('timeout', `No prompt received within ${timeoutMs}ms`))
      }, timeoutMs)
      this.waiter = { resolve, reject, timer }
      this.checkPrompt()
    })
  }

  private checkPrompt(): void {
    if (!this.waiter) return
    const match = PROMPT_PATTERN.exec(this.buffer)
    if (!match) return
    const output = this.buffer.slice(0, match.index)
    this.lastPrompt = match[1]
    this.buffer = ''
    const { resolve, timer } = this.waiter
    this.waiter = null
    clearTimeout(timer)
    resolve(output)
  }

  private handleClosed(reason: string): void {
    this.closed = true
    if (!this.waiter) return
    const { reject, timer } = this.waiter
    this.waiter = null
    clearTimeout(timer)
    reject(new TransportError('closed', reason))
  }
}

/** ssh2 实现的设备传输 */
export class SshTransport implements DeviceTransport {
  connect(params: ConnectParams): Promise<TransportSession> {
    const { host, port, username, secret, timeoutMs } = params

    return new Promise((resolve, reject) => {
      const client = new Client()
      let settled = false

      const fail = (err: TransportError): void => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        client.end()
        log.error(`SSH 连接失败 ${host}:${port}: ${err.message}`)
        reject(err)
      }

      // 握手 + 认证 + 首个提示符的总超时
      const timer = setTimeout(() => {
        fail(new TransportError('timeout', `Connection timed out (${host}:${port})`))
      }, timeoutMs)

      // IOS 常用 keyboard-interactive 方式询问密码
      client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
        finish(prompts.map(() => secret))
      })

      client.on('ready', () => {
        client.shell({ term: 'vt100', cols: 511, rows: 24 }, (err, stream) => {
          if (err) {
            fail(new TransportError('io', `Unable to open shell: ${err.message}`))
            return
          }
          const session = new ShellSession(stream, () => client.end())
          session.initialize(timeoutMs).then(
            () => {
              if (settled) {
                // 已超时：丢弃迟到的会话
                session.close().catch((closeErr: unknown) => {
                  log.warn(`丢弃迟到会话失败 ${host}:${port}: ${String(closeErr)}`)
                })
                return
              }
              settled = true
              clearTimeout(timer)
              log.info(`SSH 连接成功 ${username}@${host}:${port} (${session.prompt})`)
              resolve(session)
            },
            (initErr: unknown) => {
              fail(
                initErr instanceof TransportError
                  ? initErr
                  : new TransportError('io', initErr instanceof Error ? initErr.message : String(initErr))
              )
            }
          )
        })
      })

      client.on('error', (err) => {
        if (settled) {
          log.error(`SSH 连接异常 ${host}:${port}: ${err.message}`)
          return
        }
        fail(classifySshError(err))
      })

      const connectConfig: ConnectConfig = {
        host,
        port,
        username,
        password: secret,
        tryKeyboard: true,
        // 跳过 host key 验证（设备来自受信任的 inventory）
        hostVerifier: () => true,
        readyTimeout: timeoutMs,
        keepaliveInterval: KEEPALIVE_INTERVAL_MS,
        keepaliveCountMax: KEEPALIVE_COUNT_MAX
      }
      client.connect(connectConfig)
    })
  }
}

export const sshTransport = new SshTransport()
