/**
 * 交互菜单 — 只负责输入与展示，设备操作全部委托给 OperationExecutor
 */

import { t } from '../i18n'
import { createLogger } from '../logger'
import type { OperationExecutor } from '../services/operationExecutor'
import type { DeviceRecord, OperationResult } from '../types'
import type { Prompter } from './prompt'
const log = createLogger('Menu')

export const VALID_MENU_CHOICES: ReadonlySet<string> = new Set(['0', '1', '2', '3', '4', '5'])

/** 菜单依赖的操作面 */
export type DeviceOperations = Pick<
  OperationExecutor,
  'configureInterface' | 'showStatus' | 'ping' | 'backup' | 'configureOspf'
>

export function isValidChoice(choice: string, validChoices: ReadonlySet<string> = VALID_MENU_CHOICES): boolean {
  return validChoices.has(choice)
}

/** 选择设备：只有一台时自动选中；没有设备返回 null */
export async function chooseDevice(devices: DeviceRecord[], prompter: Prompter): Promise<DeviceRecord | null> {
  if (devices.length === 0) return null

  if (devices.length === 1) {
    const only = devices[0]
    log.info(`Auto-selected sole device: ${only.name} (${only.address})`)
    prompter.print(t('device.autoSelected', { name: only.name, address: only.address }))
    return only
  }

  for (;;) {
    prompter.print(t('device.header'))
    devices.forEach((device, i) => {
      prompter.print(t('device.item', { index: i + 1, name: device.name, address: device.address }))
    })
    const selection = await prompter.ask(t('device.prompt'))
    if (!/^\d+$/.test(selection)) {
      prompter.print(t('device.invalidNumber'))
      continue
    }
    const index = Number(selection)
    if (index >= 1 && index <= devices.length) {
      const chosen = devices[index - 1]
      log.info(`User selected device: ${chosen.name} (${chosen.address})`)
      return chosen
    }
    prompter.print(t('device.outOfRange'))
  }
}

/** 结果 → 终端文本 */
export function renderResult(result: OperationResult): string {
  const lines = [t('result.header', { status: result.status, kind: result.kind, device: result.device })]
  if (result.rawOutput) lines.push(result.rawOutput)
  if (result.detail) lines.push(result.detail)
  return lines.join('\n')
}

/** 按菜单项收集输入并调用对应操作 */
async function dispatch(
  choice: string,
  ops: DeviceOperations,
  device: DeviceRecord,
  prompter: Prompter,
  defaultPingCount: number
): Promise<OperationResult> {
  switch (choice) {
    case '1': {
      const interfaceName = await prompter.ask(t('prompt.interface'))
      const ipv4 = await prompter.ask(t('prompt.ipv4'))
      const mask = await prompter.ask(t('prompt.mask'))
      return ops.configureInterface(device, interfaceName, ipv4, mask)
    }
    case '2':
      return ops.showStatus(device)
    case '3': {
      const target = await prompter.ask(t('prompt.pingTarget'))
      const count = await prompter.ask(t('prompt.pingCount', { count: defaultPingCount }))
      return ops.ping(device, target, count || undefined)
    }
    case '4':
      return ops.backup(device)
    case '5': {
      const processId = await prompter.ask(t('prompt.processId'))
      const routerId = await prompter.ask(t('prompt.routerId'))
      const network = await prompter.ask(t('prompt.network'))
      const wildcard = await prompter.ask(t('prompt.wildcard'))
      const area = await prompter.ask(t('prompt.area'))
      return ops.configureOspf(device, processId, routerId, network, wildcard, area)
    }
    default:
      throw new Error(`Unhandled menu choice: ${choice}`)
  }
}

/** 菜单主循环，选择 0 时返回 */
export async function runMenu(
  ops: DeviceOperations,
  device: DeviceRecord,
  prompter: Prompter,
  defaultPingCount: number
): Promise<void> {
  for (;;) {
    prompter.print(t('menu.text'))
    const choice = await prompter.ask(t('menu.prompt'))

    if (!isValidChoice(choice)) {
      prompter.print(t('menu.invalid'))
      log.warn(`Invalid menu choice: ${choice}`)
      continue
    }

    log.info(`Menu selection: ${choice}`)
    if (choice === '0') {
      prompter.print(t('app.exited'))
      log.info('User exited via menu.')
      return
    }

    const result = await dispatch(choice, ops, device, prompter, defaultPingCount)
    prompter.print(renderResult(result))
  }
}
