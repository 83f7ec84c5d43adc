#!/usr/bin/env node
/**
 * netops 命令行入口
 */

import { getGlobalSettings, loadEnv } from '../config'
import { initI18n, t } from '../i18n'
import { configureLogging, createLogger } from '../logger'
import { BackupHandler } from '../services/backupHandler'
import { loadDevices } from '../services/inventory'
import { OperationExecutor } from '../services/operationExecutor'
import { LogOperationSink } from '../services/operationLog'
import { sshTransport } from '../services/sshTransport'
import { chooseDevice, runMenu } from './menu'
import { PromptClosedError, createCredentialPrompt, createPrompter } from './prompt'
const log = createLogger('CLI')

async function main(): Promise<number> {
  loadEnv()
  const settings = getGlobalSettings()
  const logFile = configureLogging(settings.logsDir, settings.logLevel)
  await initI18n(settings.language)
  log.info(`Logging initialized at ${settings.logLevel} → ${logFile}`)

  const prompter = createPrompter()
  prompter.print(t('app.title'))
  try {
    const devices = await loadDevices(settings.inventoryPath)
    if (devices.length === 0) {
      prompter.print(t('inventory.empty', { path: settings.inventoryPath }))
      log.error(`No devices found in ${settings.inventoryPath}; exiting.`)
      return 1
    }

    const device = await chooseDevice(devices, prompter)
    if (!device) return 1

    const executor = new OperationExecutor({
      transport: sshTransport,
      requestCredentials: createCredentialPrompt(prompter),
      sink: new LogOperationSink(),
      backupHandler: new BackupHandler(settings.backupsDir),
      settings
    })
    await runMenu(executor, device, prompter, settings.defaultPingCount)
    return 0
  } catch (err) {
    if (err instanceof PromptClosedError) {
      log.info('Input closed; exiting.')
      return 0
    }
    throw err
  } finally {
    prompter.close()
    log.info('Program exited.')
  }
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    log.error(err instanceof Error ? (err.stack ?? err.message) : String(err))
    process.exitCode = 1
  }
)
