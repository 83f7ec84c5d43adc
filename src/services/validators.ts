/**
 * 输入校验 — 纯函数，不做 I/O
 * 每个函数返回已规范化的值，或带字段名的失败原因
 */

/** 校验结果 */
export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; field: string; reason: string }

const OCTET_PATTERN = /^(0|[1-9]\d{0,2})$/
const INTEGER_PATTERN = /^\d+$/

const MAX_PROCESS_ID = 65535
const MAX_AREA_ID = 4294967295
const MAX_PING_COUNT = 2147483647

/** 接口名：类型 + 槽位路径，可选子接口，如 GigabitEthernet0/0、Loopback0、Gi0/1.100 */
const INTERFACE_PATTERN = /^[A-Za-z][A-Za-z-]*\s?\d+(\/\d+)*(\.\d+)?(:\d+)?$/

function fail<T>(field: string, reason: string): ValidationResult<T> {
  return { ok: false, field, reason }
}

/** 解析点分十进制为 4 个八位组，失败返回原因 */
function parseDottedQuad(raw: string): number[] | string {
  const parts = raw.split('.')
  if (parts.length !== 4) {
    return `expected 4 dot-separated octets, got ${parts.length}`
  }
  const octets: number[] = []
  for (const part of parts) {
    if (!OCTET_PATTERN.test(part)) {
      return `"${part}" is not a decimal octet`
    }
    const value = Number(part)
    if (value > 255) {
      return `octet ${value} is out of range 0-255`
    }
    octets.push(value)
  }
  return octets
}

/** 八位组 → 32 位无符号整数 */
export function octetsToNumber(octets: number[]): number {
  return octets.reduce((acc, octet) => acc * 256 + octet, 0)
}

/** 32 位无符号整数 → 点分十进制 */
export function numberToDotted(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join('.')
}

/** 是否为连续掩码（若干个 1 后接若干个 0） */
export function isContiguousMask(value: number): boolean {
  const inverted = 0xffffffff - value
  // 取反后必须形如 0...01...1，即 inverted + 1 为 2 的幂
  return ((inverted + 1) & inverted) === 0
}

/** IPv4 地址 */
export function validateIpv4(field: string, raw: string): ValidationResult<string> {
  const candidate = raw.trim()
  if (!candidate) return fail(field, 'value is required')
  const parsed = parseDottedQuad(candidate)
  if (typeof parsed === 'string') return fail(field, `invalid IPv4 address: ${parsed}`)
  return { ok: true, value: parsed.join('.') }
}

/** 子网掩码：点分十进制（必须连续）或前缀长度 24 / /24 */
export function validateSubnetMask(field: string, raw: string): ValidationResult<string> {
  const candidate = raw.trim()
  if (!candidate) return fail(field, 'value is required')

  const prefix = candidate.startsWith('/') ? candidate.slice(1) : candidate
  if (INTEGER_PATTERN.test(prefix)) {
    const length = Number(prefix)
    if (length > 32) return fail(field, `prefix length ${length} is out of range 0-32`)
    const value = length === 0 ? 0 : 0xffffffff - (2 ** (32 - length) - 1)
    return { ok: true, value: numberToDotted(value) }
  }

  const parsed = parseDottedQuad(candidate)
  if (typeof parsed === 'string') return fail(field, `invalid subnet mask: ${parsed}`)
  if (!isContiguousMask(octetsToNumber(parsed))) {
    return fail(field, `${candidate} is not a contiguous subnet mask`)
  }
  return { ok: true, value: parsed.join('.') }
}

/** 通配符掩码：任意合法点分十进制，按取反位解释，不校验连续性 */
export function validateWildcardMask(field: string, raw: string): ValidationResult<string> {
  const candidate = raw.trim()
  if (!candidate) return fail(field, 'value is required')
  const parsed = parseDottedQuad(candidate)
  if (typeof parsed === 'string') return fail(field, `invalid wildcard mask: ${parsed}`)
  return { ok: true, value: parsed.join('.') }
}

/** 有界整数 */
function validateInteger(
  field: string,
  raw: string | number,
  min: number,
  max: number
): ValidationResult<number> {
  const candidate = String(raw).trim()
  if (!candidate) return fail(field, 'value is required')
  if (!INTEGER_PATTERN.test(candidate)) return fail(field, `"${candidate}" is not an unsigned integer`)
  const value = Number(candidate)
  if (value < min || value > max) return fail(field, `${value} is out of range ${min}-${max}`)
  return { ok: true, value }
}

/** OSPF 进程号 1-65535 */
export function validateProcessId(raw: string | number): ValidationResult<number> {
  return validateInteger('processId', raw, 1, MAX_PROCESS_ID)
}

/** OSPF 区域：整数 0-4294967295，或点分十进制形式 */
export function validateArea(raw: string | number): ValidationResult<string> {
  const candidate = String(raw).trim()
  if (candidate.includes('.')) {
    const dotted = validateIpv4('area', candidate)
    return dotted.ok ? dotted : fail('area', dotted.reason.replace('IPv4 address', 'area ID'))
  }
  const numeric = validateInteger('area', candidate, 0, MAX_AREA_ID)
  return numeric.ok ? { ok: true, value: String(numeric.value) } : numeric
}

/** OSPF router-id（与 IPv4 规则相同） */
export function validateRouterId(raw: string): ValidationResult<string> {
  return validateIpv4('routerId', raw)
}

/** 接口名：只校验形态，首字母大写后原样交给设备 */
export function validateInterfaceName(raw: string): ValidationResult<string> {
  const candidate = raw.trim()
  if (!candidate) return fail('interfaceName', 'interface name cannot be empty')
  if (!INTERFACE_PATTERN.test(candidate)) {
    return fail('interfaceName', `"${candidate}" does not look like an interface name (e.g. GigabitEthernet0/0)`)
  }
  return { ok: true, value: candidate[0].toUpperCase() + candidate.slice(1) }
}

/** ping 重复次数 */
export function validatePingCount(raw: string | number): ValidationResult<number> {
  return validateInteger('count', raw, 1, MAX_PING_COUNT)
}
