export * from './types'
export * from './services/validators'
export { TransportError } from './services/transport'
export type { ConnectParams, DeviceTransport, TransportSession, TransportErrorKind } from './services/transport'
export { SshTransport, ShellSession, sshTransport } from './services/sshTransport'
export { ConnectionManager } from './services/connectionManager'
export type { SessionState, OpenOutcome, ExecuteOutcome, ExecuteOptions } from './services/connectionManager'
export { OperationExecutor, buildCommandPlan, findDeviceErrors, summarizePing } from './services/operationExecutor'
export type { CommandPlan, ExecutorSettings, OperationExecutorOptions } from './services/operationExecutor'
export { BackupHandler, BackupError, formatTimestamp } from './services/backupHandler'
export { LogOperationSink } from './services/operationLog'
export { loadDevices, parseInventory } from './services/inventory'
export { getGlobalSettings, loadEnv } from './config'
export type { GlobalSettings } from './config'
export { configureLogging, createLogger } from './logger'
