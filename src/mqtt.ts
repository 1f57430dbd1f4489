import mqtt, { type IClientPublishOptions, type MqttClient } from 'mqtt'
import type { AppConfig } from './config.js'
import createLogger from './logger.js'
import type { HAComponent } from './types/homeassistant.js'

type QoS = 0 | 1 | 2

const logger = createLogger('mqtt')

const AVAILABILITY_ONLINE = 'online'
const AVAILABILITY_OFFLINE = 'offline'

export interface IMqtt {
  topicPrefix: string
  availabilityTopic: string
  resolveDeviceTopic(deviceId: string): string
  publish(deviceId: string, message: string, options?: IClientPublishOptions): void
  subscribe(deviceId: string, callback: (topic: string, message: Buffer) => void): void
  unsubscribe(deviceId: string): void
  autoDiscovery(component: HAComponent, objectId: string, message: string): void
  disconnect(): void
}

const toQoS = (value: number): QoS => (value === 0 || value === 1 ? value : 2)

class Mqtt implements IMqtt {
  public client: MqttClient
  public topicPrefix: string
  public availabilityTopic: string
  private readonly defaultOptions: IClientPublishOptions
  private readonly topicHandlers = new Map<string, (topic: string, message: Buffer) => void>()

  constructor(config: AppConfig['mqtt']) {
    this.topicPrefix = `${config.topicPrefix}laundry`
    this.availabilityTopic = `${this.topicPrefix}/availability`
    this.defaultOptions = {
      retain: config.retain,
      qos: toQoS(config.qos),
    }

    this.client = mqtt.connect(config.url, {
      clientId: `${config.clientId ?? config.username}-smartthings`,
      username: config.username,
      password: config.password,
      clean: true,
      will: {
        topic: this.availabilityTopic,
        payload: Buffer.from(AVAILABILITY_OFFLINE),
        qos: 1,
        retain: true,
      },
    })

    this.client
      .on('connect', () => {
        logger.info(`Connected to MQTT broker: ${config.url}`)
        this._publish(this.availabilityTopic, AVAILABILITY_ONLINE, { retain: true, qos: 1 })
      })
      .on('error', (error) => {
        logger.error('MQTT connection error:', error)
      })
      .on('reconnect', () => {
        logger.info('Reconnecting to MQTT broker...')
      })
      .on('close', () => {
        logger.info('MQTT connection closed')
      })
      .on('offline', () => {
        logger.warn('MQTT client is offline')
      })
      .on('message', (incomingTopic, message) => {
        const handler = this.topicHandlers.get(incomingTopic)
        if (!handler) return

        logger.debug('Received message on topic:', incomingTopic, 'Message:', message.toString())
        try {
          handler(incomingTopic, message)
        } catch (e) {
          logger.error('Handler error for topic', incomingTopic, e)
        }
      })
  }

  private _publish(topic: string, message: string, options?: IClientPublishOptions) {
    logger.debug('Publishing to topic:', topic, 'Message:', message)
    const publishOptions = {
      ...this.defaultOptions,
      ...options,
    }
    this.client.publish(topic, message, publishOptions, (error) => {
      if (error) {
        logger.error(`Error publishing message to topic "${topic}":`, error)
      } else {
        logger.debug(`Message published to topic "${topic}" successfully`, publishOptions)
      }
    })
  }

  public resolveDeviceTopic(deviceId: string) {
    return `${this.topicPrefix}/${deviceId}`
  }

  public publish(deviceId: string, message: string, options?: IClientPublishOptions) {
    this._publish(`${this.resolveDeviceTopic(deviceId)}/state`, message, options)
  }

  /**
   * Listen on a device's state topic, including the retained message the broker replays
   */
  public subscribe(deviceId: string, callback: (topic: string, message: Buffer) => void) {
    const topic = `${this.resolveDeviceTopic(deviceId)}/state`
    logger.debug('Subscribing to topic:', topic)
    this.topicHandlers.set(topic, callback)

    this.client.subscribe(topic, (error) => {
      if (error) {
        logger.error('Error subscribing to topic:', error)
        this.topicHandlers.delete(topic)
        return
      }
      logger.debug(`Subscribed to topic "${topic}" successfully`)
    })
  }

  public unsubscribe(deviceId: string) {
    const topic = `${this.resolveDeviceTopic(deviceId)}/state`
    logger.debug('Unsubscribing from topic:', topic)
    this.topicHandlers.delete(topic)

    this.client.unsubscribe(topic, (error) => {
      if (error) {
        logger.error('Error unsubscribing from topic:', error)
      }
    })
  }

  public autoDiscovery(component: HAComponent, objectId: string, message: string) {
    logger.info(`Publishing auto-discovery config for device: ${objectId}`)
    this._publish(`homeassistant/${component}/${objectId}/config`, message, {
      retain: true,
      qos: 1,
    })
  }

  public disconnect() {
    this._publish(this.availabilityTopic, AVAILABILITY_OFFLINE, { retain: true, qos: 1 })
    this.client.end(() => {
      logger.info('Disconnected from MQTT broker')
    })
  }
}

export default Mqtt
