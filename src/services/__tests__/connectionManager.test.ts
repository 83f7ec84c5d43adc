import { describe, it, expect, vi, afterEach } from 'vitest'

// mock logger
vi.mock('../../logger', () => ({
  createLogger: () => ({
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {}
  })
}))

import { ConnectionManager, classifyTransportError } from '../connectionManager'
import { TransportError } from '../transport'
import { FakeSession, FakeTransport, HangingTransport, TEST_DEVICE } from './helpers/fakeTransport'

const CREDENTIAL = { username: 'admin', secret: 'test-secret' }
const EXEC = { configMode: false, timeoutMs: 1000 }

afterEach(() => {
  vi.useRealTimers()
})

describe('ConnectionManager.open', () => {
  it('成功后进入 connected，凭据透传给传输层', async () => {
    const transport = new FakeTransport(new FakeSession())
    const manager = new ConnectionManager(transport)

    await expect(manager.open(TEST_DEVICE, CREDENTIAL, 5000)).resolves.toEqual({ success: true })
    expect(manager.state).toBe('connected')
    expect(transport.connects).toEqual([
      { host: '192.168.50.10', port: 22, username: 'admin', secret: 'test-secret', timeoutMs: 5000 }
    ])
    await manager.close()
    expect(manager.state).toBe('idle')
  })

  it('认证失败返回 auth_error 并回到 idle', async () => {
    const manager = new ConnectionManager(
      new FakeTransport(new TransportError('auth', 'Authentication failed: All configured authentication methods failed'))
    )
    await expect(manager.open(TEST_DEVICE, CREDENTIAL, 5000)).resolves.toEqual({
      success: false,
      status: 'auth_error',
      error: 'Authentication failed: All configured authentication methods failed'
    })
    expect(manager.state).toBe('idle')
  })

  it('握手超时返回 timeout，期间处于 connecting，之后回到 idle 而非 connected', async () => {
    vi.useFakeTimers()
    const manager = new ConnectionManager(new HangingTransport())

    const pending = manager.open(TEST_DEVICE, CREDENTIAL, 3000)
    expect(manager.state).toBe('connecting')
    await vi.advanceTimersByTimeAsync(3000)

    await expect(pending).resolves.toEqual({
      success: false,
      status: 'timeout',
      error: 'Connection timed out (192.168.50.10:22)'
    })
    expect(manager.state).toBe('idle')
  })

  it('非 idle 时再次 open 抛出', async () => {
    const manager = new ConnectionManager(new FakeTransport(new FakeSession()))
    await manager.open(TEST_DEVICE, CREDENTIAL, 5000)
    await expect(manager.open(TEST_DEVICE, CREDENTIAL, 5000)).rejects.toThrow('Cannot open a session while connected')
    await manager.close()
  })

  it('进程内同一时刻只允许一个活动会话', async () => {
    const first = new ConnectionManager(new FakeTransport(new FakeSession()))
    const second = new ConnectionManager(new FakeTransport(new FakeSession()))
    await first.open(TEST_DEVICE, CREDENTIAL, 5000)

    await expect(second.open(TEST_DEVICE, CREDENTIAL, 5000)).rejects.toThrow('Another session is already active (R1)')
    await first.close()
    await expect(second.open(TEST_DEVICE, CREDENTIAL, 5000)).resolves.toEqual({ success: true })
    await second.close()
  })
})

describe('ConnectionManager.execute', () => {
  it('按顺序发送命令并合并输出', async () => {
    const session = new FakeSession({ responses: { 'show clock': '10:00:00 UTC', 'show version': 'Cisco IOS' } })
    const manager = new ConnectionManager(new FakeTransport(session))
    await manager.open(TEST_DEVICE, CREDENTIAL, 5000)

    await expect(manager.execute(['show clock', 'show version'], EXEC)).resolves.toEqual({
      success: true,
      output: '10:00:00 UTC\nCisco IOS'
    })
    expect(session.sent).toEqual(['show clock', 'show version'])
    expect(session.modeChanges).toEqual([])
    expect(manager.state).toBe('connected')
    await manager.close()
  })

  it('配置模式前后进入/退出配置', async () => {
    const session = new FakeSession()
    const manager = new ConnectionManager(new FakeTransport(session))
    await manager.open(TEST_DEVICE, CREDENTIAL, 5000)

    await manager.execute(['router ospf 1'], { configMode: true, timeoutMs: 1000 })
    expect(session.modeChanges).toEqual(['enter', 'exit'])
    await manager.close()
  })

  it('中途传输错误中止剩余命令、关闭会话并保留已捕获输出', async () => {
    const session = new FakeSession({
      responses: { first: 'one' },
      failOn: { command: 'second', error: new TransportError('closed', 'Shell channel closed by device') }
    })
    const manager = new ConnectionManager(new FakeTransport(session))
    await manager.open(TEST_DEVICE, CREDENTIAL, 5000)

    await expect(manager.execute(['first', 'second', 'third'], EXEC)).resolves.toEqual({
      success: false,
      status: 'execution_error',
      error: 'Shell channel closed by device',
      output: 'one'
    })
    expect(session.sent).toEqual(['first', 'second'])
    expect(session.closeCalls).toBe(1)
    expect(manager.state).toBe('idle')
  })

  it('命令超时返回 timeout', async () => {
    const session = new FakeSession({
      failOn: { command: 'show tech-support', error: new TransportError('timeout', 'No prompt received within 1000ms') }
    })
    const manager = new ConnectionManager(new FakeTransport(session))
    await manager.open(TEST_DEVICE, CREDENTIAL, 5000)

    const outcome = await manager.execute(['show tech-support'], EXEC)
    expect(outcome).toMatchObject({ success: false, status: 'timeout' })
    expect(manager.state).toBe('idle')
  })

  it('执行期间会话被关闭时返回失败并保持 idle', async () => {
    let release = (): void => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    const session = new FakeSession({ gate })
    const manager = new ConnectionManager(new FakeTransport(session))
    await manager.open(TEST_DEVICE, CREDENTIAL, 5000)

    const pending = manager.execute(['show version'], EXEC)
    expect(manager.state).toBe('executing')
    await manager.close()
    release()

    await expect(pending).resolves.toEqual({
      success: false,
      status: 'execution_error',
      error: 'Session was closed during execution',
      output: ''
    })
    expect(manager.state).toBe('idle')
    expect(session.closeCalls).toBe(1)
    await expect(manager.open(TEST_DEVICE, CREDENTIAL, 5000)).resolves.toEqual({ success: true })
    await manager.close()
  })

  it('未连接时执行抛出', async () => {
    const manager = new ConnectionManager(new FakeTransport(new FakeSession()))
    await expect(manager.execute(['show clock'], EXEC)).rejects.toThrow('Cannot execute commands while idle')
  })
})

describe('ConnectionManager.close', () => {
  it('从未打开时为 no-op', async () => {
    const manager = new ConnectionManager(new FakeTransport(new FakeSession()))
    await manager.close()
    expect(manager.state).toBe('idle')
  })

  it('重复关闭只释放一次', async () => {
    const session = new FakeSession()
    const manager = new ConnectionManager(new FakeTransport(session))
    await manager.open(TEST_DEVICE, CREDENTIAL, 5000)
    await manager.close()
    await manager.close()
    expect(session.closeCalls).toBe(1)
  })
})

describe('classifyTransportError', () => {
  it('按 kind 分类', () => {
    expect(classifyTransportError(new TransportError('timeout', 't'))).toEqual({ status: 'timeout', error: 't' })
    expect(classifyTransportError(new TransportError('auth', 'a'))).toEqual({ status: 'auth_error', error: 'a' })
    expect(classifyTransportError(new TransportError('io', 'i'))).toEqual({ status: 'execution_error', error: 'i' })
    expect(classifyTransportError(new Error('boom'))).toEqual({ status: 'execution_error', error: 'boom' })
  })
})
