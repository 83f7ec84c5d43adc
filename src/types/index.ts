export type { DeviceRecord, DevicePlatform, Credential, CredentialProvider } from './device'
export { SUPPORTED_PLATFORMS } from './device'
export type {
  OperationKind,
  OperationRequest,
  OperationStatus,
  OperationResult,
  OperationEvent,
  OperationSink,
  BackupArtifact,
  Clock
} from './operation'
export { OPERATION_KINDS } from './operation'
