/** 支持的设备平台 */
export const SUPPORTED_PLATFORMS = ['cisco_ios'] as const
export type DevicePlatform = (typeof SUPPORTED_PLATFORMS)[number]

/** 设备记录（来自 inventory，进程生命周期内只读） */
export interface DeviceRecord {
  readonly name: string
  /** 管理地址（IPv4） */
  readonly address: string
  readonly platform: DevicePlatform
  /** 登录用户名（固定，密码在会话时单独提供） */
  readonly username: string
  readonly port: number
}

/** 登录凭据（仅在单次操作内存中存在，不持久化、不写日志） */
export interface Credential {
  username: string
  secret: string
}

/** 凭据提供者：每次操作调用一次，返回 null 表示用户取消 */
export type CredentialProvider = (device: DeviceRecord) => Promise<Credential | null>
