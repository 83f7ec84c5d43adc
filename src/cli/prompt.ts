/**
 * 终端输入 — readline 封装
 * 密码输入时静音回显，凭据只返回给调用方，不缓存
 */

import { createInterface } from 'node:readline'
import { Writable } from 'node:stream'
import { t } from '../i18n'
import type { Credential, CredentialProvider, DeviceRecord } from '../types'

/** 输入流已关闭（Ctrl-D / 管道结束） */
export class PromptClosedError extends Error {
  constructor() {
    super('Input closed')
    this.name = 'PromptClosedError'
  }
}

export interface Prompter {
  /** 读取一行（已去除首尾空白） */
  ask(question: string): Promise<string>
  /** 读取一行，不回显 */
  askSecret(question: string): Promise<string>
  print(text: string): void
  close(): void
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  let muted = false
  let closed = false

  // readline 的输出经过这里，静音时丢弃回显
  const echo = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) output.write(chunk)
      callback()
    }
  })

  const rl = createInterface({
    input,
    output: echo,
    terminal: 'isTTY' in input && input.isTTY === true
  })
  rl.on('close', () => {
    closed = true
  })

  const question = (text: string): Promise<string> =>
    new Promise((resolve, reject) => {
      if (closed) {
        reject(new PromptClosedError())
        return
      }
      const onClose = (): void => reject(new PromptClosedError())
      rl.once('close', onClose)
      rl.question(text, (answer) => {
        rl.off('close', onClose)
        resolve(answer)
      })
    })

  return {
    async ask(text) {
      return (await question(text)).trim()
    },
    async askSecret(text) {
      output.write(text)
      muted = true
      try {
        return await question('')
      } finally {
        muted = false
        output.write('\n')
      }
    },
    print(text) {
      output.write(`${text}\n`)
    },
    close() {
      rl.close()
    }
  }
}

/** 每次操作询问一次密码；空输入视为取消 */
export function createCredentialPrompt(prompter: Prompter): CredentialProvider {
  return async (device: DeviceRecord): Promise<Credential | null> => {
    const secret = await prompter.askSecret(t('prompt.password', { username: device.username, device: device.name }))
    if (!secret) return null
    return { username: device.username, secret }
  }
}
