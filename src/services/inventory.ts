/**
 * 设备清单加载 — devices.yaml → DeviceRecord[]
 *
 * devices:
 *   - name: R1
 *     ip: 192.168.50.10
 *     username: admin
 *     device_type: cisco_ios
 */

import { readFile } from 'node:fs/promises'
import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { parse as parseYaml } from 'yaml'
import { createLogger } from '../logger'
import { SUPPORTED_PLATFORMS, type DevicePlatform, type DeviceRecord } from '../types'
import { validateIpv4 } from './validators'
const log = createLogger('Inventory')

const DEFAULT_SSH_PORT = 22
const DEFAULT_DEVICE_TYPE: DevicePlatform = 'cisco_ios'

const ScalarSchema = Type.Union([Type.String(), Type.Number()])

const DeviceEntrySchema = Type.Object({
  name: ScalarSchema,
  ip: ScalarSchema,
  username: ScalarSchema,
  device_type: Type.Optional(Type.String()),
  port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 }))
})
type DeviceEntry = Static<typeof DeviceEntrySchema>

const InventorySchema = Type.Object({
  devices: Type.Array(Type.Unknown())
})

function isSupportedPlatform(value: string): value is DevicePlatform {
  return SUPPORTED_PLATFORMS.some((platform) => platform === value)
}

/** 把单条清单条目转换为 DeviceRecord，不合法时返回原因 */
export function toDeviceRecord(entry: unknown): DeviceRecord | string {
  if (!Value.Check(DeviceEntrySchema, entry)) {
    const first = Value.Errors(DeviceEntrySchema, entry).First()
    return first ? `${first.path || '/'} ${first.message}` : 'entry is not a mapping'
  }
  const device: DeviceEntry = entry
  const name = String(device.name).trim()
  const username = String(device.username).trim()
  if (!name || !username) {
    return "required keys 'name', 'ip', 'username' must not be empty"
  }

  const address = validateIpv4('ip', String(device.ip))
  if (!address.ok) return `${name}: ${address.reason}`

  const platform = device.device_type?.trim() || DEFAULT_DEVICE_TYPE
  if (!isSupportedPlatform(platform)) {
    return `${name}: unsupported device_type "${platform}"`
  }

  return Object.freeze({
    name,
    address: address.value,
    platform,
    username,
    port: device.port ?? DEFAULT_SSH_PORT
  })
}

/** 解析清单文本；格式错误返回空列表，单条错误跳过 */
export function parseInventory(text: string, source = 'inventory'): DeviceRecord[] {
  let parsed: unknown
  try {
    parsed = parseYaml(text)
  } catch (err) {
    log.error(`Unable to parse ${source}: ${err instanceof Error ? err.message : String(err)}`)
    return []
  }

  if (parsed === null || parsed === undefined) {
    log.warn(`${source} is empty.`)
    return []
  }
  if (!Value.Check(InventorySchema, parsed)) {
    log.error(`${source} must contain a mapping with a 'devices' list.`)
    return []
  }

  const devices: DeviceRecord[] = []
  const seen = new Set<string>()
  parsed.devices.forEach((entry, index) => {
    const record = toDeviceRecord(entry)
    if (typeof record === 'string') {
      log.warn(`Skipping device entry #${index + 1}: ${record}`)
      return
    }
    if (seen.has(record.name)) {
      log.warn(`Skipping duplicate device name ${record.name}`)
      return
    }
    seen.add(record.name)
    devices.push(record)
  })
  return devices
}

/** 读取清单文件；文件不存在返回空列表 */
export async function loadDevices(path: string): Promise<DeviceRecord[]> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    const reason = err instanceof Error && 'code' in err && err.code === 'ENOENT' ? 'not found' : String(err)
    log.error(`Device inventory ${path}: ${reason}`)
    return []
  }
  return parseInventory(text, path)
}
