import { mkdir, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { createLogger } from '../logger'
import type { BackupArtifact, Clock } from '../types'
const log = createLogger('Backup')

/** 同一秒内重名时最多尝试的后缀数 */
const MAX_SUFFIX = 999

export class BackupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BackupError'
  }
}

/** UTC 时间 → YYYYMMDD-HHMMSS */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0')
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  )
}

/** 主机名中的非法文件名字符替换为 _ */
export function sanitizeHostname(hostname: string): string {
  const cleaned = hostname.trim().replace(/[^A-Za-z0-9._-]/g, '_')
  return cleaned || 'device'
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST'
}

/**
 * 备份处理 — 把 running-config 原样写入 <hostname>_running_<YYYYMMDD-HHMMSS>.txt
 * 文件只创建不覆盖，同秒重名追加 -1、-2 ...
 */
export class BackupHandler {
  constructor(private readonly backupsDir: string) {}

  async save(hostname: string, rawConfig: string, clock: Clock = () => new Date()): Promise<BackupArtifact> {
    const safeName = sanitizeHostname(hostname)
    const timestamp = formatTimestamp(clock())
    const dir = resolve(this.backupsDir)

    try {
      await mkdir(dir, { recursive: true })
    } catch (err) {
      throw new BackupError(`Unable to create backups directory ${dir}`, { cause: err })
    }

    const base = `${safeName}_running_${timestamp}`
    for (let attempt = 0; attempt <= MAX_SUFFIX; attempt++) {
      const fileName = attempt === 0 ? `${base}.txt` : `${base}-${attempt}.txt`
      const path = join(dir, fileName)
      try {
        await writeFile(path, rawConfig, { encoding: 'utf-8', flag: 'wx' })
      } catch (err) {
        if (isAlreadyExists(err)) continue
        throw new BackupError(`Unable to write backup ${path}`, { cause: err })
      }
      log.info(`备份已保存 ${path}`)
      return Object.freeze({ hostname: safeName, timestamp, path })
    }

    throw new BackupError(`Too many backups for ${safeName} at ${timestamp}`)
  }
}
