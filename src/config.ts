/**
 * 运行配置 — 从 .env 与进程环境变量读取
 */

import { existsSync } from 'node:fs'
import { resolve } from 'node:path'
import { config as loadDotenv } from 'dotenv'
import { createLogger } from './logger'
const log = createLogger('Config')

export interface GlobalSettings {
  inventoryPath: string
  backupsDir: string
  logsDir: string
  logLevel: string
  defaultPingCount: number
  connectTimeoutMs: number
  commandTimeoutMs: number
  language: string
}

export const DEFAULT_SETTINGS: GlobalSettings = {
  inventoryPath: 'devices.yaml',
  backupsDir: 'backups',
  logsDir: 'logs',
  logLevel: 'info',
  defaultPingCount: 5,
  connectTimeoutMs: 15_000,
  commandTimeoutMs: 60_000,
  language: 'en'
}

/** 加载 .env（存在时），不覆盖已有环境变量 */
export function loadEnv(envPath = '.env'): boolean {
  const path = resolve(envPath)
  if (!existsSync(path)) return false
  const result = loadDotenv({ path })
  if (result.error) {
    log.warn(`无法解析 ${path}: ${result.error.message}`)
    return false
  }
  return true
}

/** 解析正整数，非法时回退默认值并告警 */
function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim()
  if (!raw) return fallback
  if (/^\d+$/.test(raw) && Number(raw) > 0) return Number(raw)
  log.warn(`Invalid ${key}=${raw}; falling back to ${fallback}`)
  return fallback
}

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key]?.trim()
  return raw ? raw : fallback
}

/** 从环境变量构建全局配置（超时以秒配置） */
export function getGlobalSettings(env: NodeJS.ProcessEnv = process.env): GlobalSettings {
  return {
    inventoryPath: readString(env, 'INVENTORY_PATH', DEFAULT_SETTINGS.inventoryPath),
    backupsDir: readString(env, 'BACKUPS_DIR', DEFAULT_SETTINGS.backupsDir),
    logsDir: readString(env, 'LOGS_DIR', DEFAULT_SETTINGS.logsDir),
    logLevel: readString(env, 'LOG_LEVEL', DEFAULT_SETTINGS.logLevel),
    defaultPingCount: readPositiveInt(env, 'DEFAULT_PING_COUNT', DEFAULT_SETTINGS.defaultPingCount),
    connectTimeoutMs: readPositiveInt(env, 'CONNECT_TIMEOUT', DEFAULT_SETTINGS.connectTimeoutMs / 1000) * 1000,
    commandTimeoutMs: readPositiveInt(env, 'COMMAND_TIMEOUT', DEFAULT_SETTINGS.commandTimeoutMs / 1000) * 1000,
    language: readString(env, 'NETOPS_LANG', DEFAULT_SETTINGS.language)
  }
}
