import fs from 'node:fs'
import path from 'node:path'
import { getConfigPath, loadConfig, projectRoot, resolveTokensPath } from './config.js'
import { LaundryEngine } from './engine.js'
import createLogger, { setLogLevel } from './logger.js'
import Mqtt from './mqtt.js'
import { MqttDeviceRegistry } from './registry.js'
import { ApplianceStatusFetcher } from './smartthings/status-fetcher.js'
import { TokenManager } from './tokens/token-manager.js'
import { TokenStore } from './tokens/token-store.js'

const readPackageVersion = (): string => {
  try {
    const packageJson: unknown = JSON.parse(fs.readFileSync(path.join(projectRoot, 'package.json'), 'utf8'))
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version)
    }
  } catch {
    // running without package.json next to dist/
  }
  return 'unknown'
}

const appVersion = process.env.APP_VERSION ?? readPackageVersion()
const logger = createLogger('app')

const main = () => {
  const configPath = getConfigPath()
  const config = loadConfig(configPath)
  if (config.logging.debug) {
    setLogLevel('debug')
  }

  const { smartthings } = config
  logger.info(`Starting SmartThings Washer/Dryer to MQTT version: "${appVersion}"`)
  logger.info(
    `Base URL: ${smartthings.apiUrl || '(empty)'}, Washer Device ID: ${smartthings.washerDeviceId ?? '(disabled)'}, ` +
      `Dryer Device ID: ${smartthings.dryerDeviceId ?? '(disabled)'}`,
  )

  const mqtt = new Mqtt(config.mqtt)
  const registry = new MqttDeviceRegistry(mqtt, { autoDiscovery: config.homeAssistant.autoDiscovery })
  const tokens = new TokenManager(
    {
      clientId: smartthings.clientId,
      clientSecret: smartthings.clientSecret,
      tokenUrl: smartthings.tokenUrl,
    },
    new TokenStore(resolveTokensPath(config, configPath)),
  )
  const engine = new LaundryEngine({
    registry,
    tokens,
    fetcher: new ApplianceStatusFetcher(smartthings.apiUrl),
  })

  engine.start({
    appliances: [
      { kind: 'washer', deviceId: smartthings.washerDeviceId },
      { kind: 'dryer', deviceId: smartthings.dryerDeviceId },
    ],
    pollOnSeconds: smartthings.pollOnInterval,
    pollOffSeconds: smartthings.pollOffInterval,
    heartbeatSeconds: smartthings.heartbeatInterval,
    showChanges: config.logging.showChanges,
    apiUrl: smartthings.apiUrl,
    clientId: smartthings.clientId,
    clientSecret: smartthings.clientSecret,
  })

  const heartbeat = setInterval(() => {
    engine.tick().catch((error: unknown) => {
      logger.error('Heartbeat failed:', error)
    })
  }, smartthings.heartbeatInterval * 1000)
  logger.info(`Heartbeat set to ${smartthings.heartbeatInterval} seconds.`)

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`)
    clearInterval(heartbeat)
    engine.stop()
    mqtt.disconnect()
  }

  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main()
