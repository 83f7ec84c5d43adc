/**
 * 设备操作执行器
 * 每个操作：校验全部输入 → 获取凭据 → open → execute → close → 解析输出
 * 任何失败都收敛为一个已分类的 OperationResult，不向调用方抛出
 */

import { createLogger } from '../logger'
import { createOperationContext, operationContext, type OperationContext } from '../operationContext'
import type {
  BackupArtifact,
  Clock,
  CredentialProvider,
  DeviceRecord,
  OperationKind,
  OperationRequest,
  OperationResult,
  OperationSink,
  OperationStatus
} from '../types'
import { BackupError, type BackupHandler } from './backupHandler'
import { ConnectionManager, type ExecuteOutcome } from './connectionManager'
import type { DeviceTransport } from './transport'
import {
  validateArea,
  validateInterfaceName,
  validateIpv4,
  validatePingCount,
  validateProcessId,
  validateRouterId,
  validateSubnetMask,
  validateWildcardMask,
  type ValidationResult
} from './validators'
const log = createLogger('Executor')

/** 设备状态查询命令 */
export const SHOW_STATUS_COMMAND = 'show ip interface brief'
/** 配置导出命令 */
export const BACKUP_COMMAND = 'show running-config'

/** IOS 错误标记：以 "% " 开头的行（syslog 形如 %LINK-3-UPDOWN 不带空格） */
const DEVICE_ERROR_PREFIX = '% '

const SUCCESS_RATE_PATTERN = /Success rate is (\d+) percent \((\d+)\/(\d+)\)/

/** 已校验的命令计划 */
export interface CommandPlan {
  kind: OperationKind
  commands: string[]
  configMode: boolean
  /** 成功时的说明 */
  summary: string
  /** ping 目标 */
  target?: string
}

export interface ExecutorSettings {
  connectTimeoutMs: number
  commandTimeoutMs: number
  defaultPingCount: number
}

export interface OperationExecutorOptions {
  transport: DeviceTransport
  requestCredentials: CredentialProvider
  sink: OperationSink
  backupHandler: Pick<BackupHandler, 'save'>
  settings: ExecutorSettings
  clock?: Clock
}

/** 按操作类型生成命令模板（判别联合分派，输入全部校验通过才返回计划） */
export function buildCommandPlan(request: OperationRequest, defaultPingCount: number): ValidationResult<CommandPlan> {
  switch (request.kind) {
    case 'configure_interface': {
      const name = validateInterfaceName(request.params.interfaceName)
      if (!name.ok) return name
      const ip = validateIpv4('ipv4', request.params.ipv4)
      if (!ip.ok) return ip
      const mask = validateSubnetMask('subnetMask', request.params.subnetMask)
      if (!mask.ok) return mask
      return {
        ok: true,
        value: {
          kind: request.kind,
          commands: [`interface ${name.value}`, `ip address ${ip.value} ${mask.value}`, 'no shutdown'],
          configMode: true,
          summary: `Interface ${name.value} configured with ${ip.value} ${mask.value}`
        }
      }
    }
    case 'show_status':
      return {
        ok: true,
        value: { kind: request.kind, commands: [SHOW_STATUS_COMMAND], configMode: false, summary: 'Interface status retrieved' }
      }
    case 'ping': {
      const target = validateIpv4('target', request.params.target)
      if (!target.ok) return target
      const count = validatePingCount(request.params.count ?? defaultPingCount)
      if (!count.ok) return count
      return {
        ok: true,
        value: {
          kind: request.kind,
          commands: [`ping ${target.value} repeat ${count.value}`],
          configMode: false,
          summary: `Ping to ${target.value} completed`,
          target: target.value
        }
      }
    }
    case 'backup':
      return {
        ok: true,
        value: { kind: request.kind, commands: [BACKUP_COMMAND], configMode: false, summary: 'Running configuration captured' }
      }
    case 'configure_ospf': {
      const processId = validateProcessId(request.params.processId)
      if (!processId.ok) return processId
      const routerId = validateRouterId(request.params.routerId)
      if (!routerId.ok) return routerId
      const network = validateIpv4('network', request.params.network)
      if (!network.ok) return network
      const wildcard = validateWildcardMask('wildcard', request.params.wildcard)
      if (!wildcard.ok) return wildcard
      const area = validateArea(request.params.area)
      if (!area.ok) return area
      return {
        ok: true,
        value: {
          kind: request.kind,
          commands: [
            `router ospf ${processId.value}`,
            `router-id ${routerId.value}`,
            `network ${network.value} ${wildcard.value} area ${area.value}`
          ],
          configMode: true,
          summary:
            `OSPF process ${processId.value} configured: router-id ${routerId.value}, ` +
            `network ${network.value} ${wildcard.value} area ${area.value}`
        }
      }
    }
    default: {
      const unknown: never = request
      throw new Error(`Unknown operation: ${JSON.stringify(unknown)}`)
    }
  }
}

/** 提取设备报告的错误行 */
export function findDeviceErrors(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith(DEVICE_ERROR_PREFIX))
}

/** 解析 ping 输出中的可达性；目标不可达不算失败 */
export function summarizePing(target: string, output: string): string {
  const match = SUCCESS_RATE_PATTERN.exec(output)
  if (!match) {
    return `No reachability summary found in ping output for ${target}`
  }
  const [, percent, received, sent] = match
  if (Number(percent) === 0) {
    return `${target} is unreachable: ${received}/${sent} replies (0% success)`
  }
  return `${target} is reachable: ${received}/${sent} replies (${percent}% success)`
}

function makeResult(
  kind: OperationKind,
  device: DeviceRecord,
  status: OperationStatus,
  rawOutput: string,
  detail: string,
  artifact?: BackupArtifact
): OperationResult {
  return Object.freeze({
    kind,
    device: device.name,
    status,
    rawOutput,
    detail,
    ...(artifact ? { artifact } : {})
  })
}

export class OperationExecutor {
  private readonly connections: ConnectionManager
  private readonly requestCredentials: CredentialProvider
  private readonly sink: OperationSink
  private readonly backupHandler: Pick<BackupHandler, 'save'>
  private readonly settings: ExecutorSettings
  private readonly clock: Clock

  constructor(options: OperationExecutorOptions) {
    this.connections = new ConnectionManager(options.transport)
    this.requestCredentials = options.requestCredentials
    this.sink = options.sink
    this.backupHandler = options.backupHandler
    this.settings = options.settings
    this.clock = options.clock ?? (() => new Date())
  }

  configureInterface(device: DeviceRecord, interfaceName: string, ipv4: string, subnetMask: string): Promise<OperationResult> {
    return this.run(device, { kind: 'configure_interface', params: { interfaceName, ipv4, subnetMask } })
  }

  showStatus(device: DeviceRecord): Promise<OperationResult> {
    return this.run(device, { kind: 'show_status', params: {} })
  }

  ping(device: DeviceRecord, target: string, count?: string | number): Promise<OperationResult> {
    return this.run(device, { kind: 'ping', params: { target, count } })
  }

  backup(device: DeviceRecord): Promise<OperationResult> {
    return this.run(device, { kind: 'backup', params: {} })
  }

  configureOspf(
    device: DeviceRecord,
    processId: string | number,
    routerId: string,
    network: string,
    wildcard: string,
    area: string | number
  ): Promise<OperationResult> {
    return this.run(device, { kind: 'configure_ospf', params: { processId, routerId, network, wildcard, area } })
  }

  /** 执行一次操作；每次调用恰好产生一个结果和一条日志事件 */
  run(device: DeviceRecord, request: OperationRequest): Promise<OperationResult> {
    const startedAt = this.clock()
    const ctx = createOperationContext(device.name, request.kind, startedAt.getTime())
    return operationContext.run(ctx, async () => {
      const result = await this.attempt(device, request)
      log.info(`${request.kind} @ ${device.name}: ${result.status}${result.detail ? ` (${result.detail})` : ''}`)
      this.emit(ctx, result, startedAt)
      return result
    })
  }

  private async attempt(device: DeviceRecord, request: OperationRequest): Promise<OperationResult> {
    // 全部字段校验通过之前不获取凭据、不建立连接
    const plan = buildCommandPlan(request, this.settings.defaultPingCount)
    if (!plan.ok) {
      return makeResult(request.kind, device, 'validation_error', '', `${plan.field}: ${plan.reason}`)
    }

    try {
      return await this.perform(device, plan.value)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      log.error(`${request.kind} @ ${device.name} 异常: ${message}`)
      return makeResult(request.kind, device, 'execution_error', '', `Unexpected error: ${message}`)
    }
  }

  private async perform(device: DeviceRecord, plan: CommandPlan): Promise<OperationResult> {
    const credential = await this.requestCredentials(device)
    if (!credential) {
      return makeResult(plan.kind, device, 'auth_error', '', 'Credentials were not provided')
    }

    // 会话被另一次操作占用时直接失败，不触碰它的会话
    if (this.connections.state !== 'idle') {
      log.warn(`${plan.kind} @ ${device.name} 被拒绝: 会话处于 ${this.connections.state}`)
      return makeResult(
        plan.kind,
        device,
        'execution_error',
        '',
        `Another operation is in progress (${this.connections.state})`
      )
    }

    const opened = await this.connections.open(device, credential, this.settings.connectTimeoutMs)
    if (!opened.success) {
      return makeResult(plan.kind, device, opened.status, '', opened.error)
    }

    // 只有打开会话的这次操作负责关闭；解析输出和写备份都在释放之后
    let executed: ExecuteOutcome
    try {
      executed = await this.connections.execute(plan.commands, {
        configMode: plan.configMode,
        timeoutMs: this.settings.commandTimeoutMs
      })
    } finally {
      await this.connections.close()
    }
    if (!executed.success) {
      return makeResult(plan.kind, device, executed.status, executed.output, executed.error)
    }

    return this.interpret(device, plan, executed.output)
  }

  private async interpret(device: DeviceRecord, plan: CommandPlan, output: string): Promise<OperationResult> {
    // 状态查询不做设备错误判定
    if (plan.kind !== 'show_status') {
      const errors = findDeviceErrors(output)
      if (errors.length > 0) {
        return makeResult(plan.kind, device, 'execution_error', output, errors.join('\n'))
      }
    }

    switch (plan.kind) {
      case 'ping':
        return makeResult(plan.kind, device, 'success', output, summarizePing(plan.target ?? '', output))
      case 'backup':
        try {
          const artifact = await this.backupHandler.save(device.name, output, this.clock)
          return makeResult(plan.kind, device, 'success', output, `Running configuration saved to ${artifact.path}`, artifact)
        } catch (err) {
          if (!(err instanceof BackupError)) throw err
          const cause = err.cause instanceof Error ? `: ${err.cause.message}` : ''
          return makeResult(plan.kind, device, 'filesystem_error', output, `${err.message}${cause}`)
        }
      default:
        return makeResult(plan.kind, device, 'success', output, plan.summary)
    }
  }

  private emit(ctx: OperationContext, result: OperationResult, startedAt: Date): void {
    try {
      this.sink.record({
        id: ctx.requestId,
        device: result.device,
        kind: result.kind,
        status: result.status,
        timestamp: startedAt.toISOString(),
        durationMs: Math.max(0, this.clock().getTime() - startedAt.getTime())
      })
    } catch (err) {
      log.error(`操作日志写入失败: ${err instanceof Error ? err.message : String(err)}`)
    }
  }
}
