import { z } from 'zod'
import { formatAxiosError } from './errors.js'
import createLogger from './logger.js'
import type { IMqtt } from './mqtt.js'
import type {
  HABinarySensorDiscoveryConfig,
  HADeviceInfo,
  HADiscoveryConfig,
  HASensorDiscoveryConfig,
} from './types/homeassistant.js'

const logger = createLogger('registry')

/**
 * switch: on/off device (numeric state 1 or 0); text: free text plus a numeric value
 */
export type DeviceKind = 'switch' | 'text'

export interface DeviceHandle {
  numericState: number
  textState: string
}

/**
 * Host device registry contract
 */
export interface DeviceRegistry {
  createDevice(id: string, kind: DeviceKind, displayName: string): void
  readDevice(id: string): DeviceHandle | undefined
  updateDevice(id: string, numericState: number, textState: string): void
  exists(id: string): boolean
}

export type MqttDeviceRegistryOptions = {
  autoDiscovery: boolean
}

const stateMessageSchema = z.object({
  value: z.number(),
  text: z.string(),
})

const HA_DEVICE: HADeviceInfo = {
  identifiers: ['smartthings_laundry'],
  manufacturer: 'Samsung',
  model: 'SmartThings Washer/Dryer',
  name: 'SmartThings Laundry',
}

/**
 * Registry backed by MQTT: devices are announced through Home Assistant discovery
 * and their state is published as retained JSON `{ value, text }`.
 * The last published handle of every device is kept in memory. On creation a device
 * takes over its retained state from a previous run, until its first update.
 */
export class MqttDeviceRegistry implements DeviceRegistry {
  private readonly devices = new Map<string, DeviceHandle>()
  private readonly pendingRestore = new Set<string>()

  constructor(
    private readonly mqtt: IMqtt,
    private readonly options: MqttDeviceRegistryOptions,
  ) {}

  public exists(id: string): boolean {
    return this.devices.has(id)
  }

  public createDevice(id: string, kind: DeviceKind, displayName: string): void {
    if (this.devices.has(id)) {
      logger.debug(`Device ${id} already exists`)
      return
    }

    this.devices.set(id, { numericState: 0, textState: '' })
    logger.info(`Created device ${id} (${displayName})`)

    this.pendingRestore.add(id)
    this.mqtt.subscribe(id, (_topic, message) => this.restoreDevice(id, message))

    if (this.options.autoDiscovery) {
      const config = this.buildDiscoveryConfig(id, kind, displayName)
      this.mqtt.autoDiscovery(kind === 'switch' ? 'binary_sensor' : 'sensor', config.object_id, JSON.stringify(config))
    }
  }

  public readDevice(id: string): DeviceHandle | undefined {
    const handle = this.devices.get(id)
    return handle ? { ...handle } : undefined
  }

  public updateDevice(id: string, numericState: number, textState: string): void {
    if (!this.devices.has(id)) {
      logger.warn(`Ignoring update for unknown device ${id}`)
      return
    }

    this.stopRestore(id)
    this.devices.set(id, { numericState, textState })
    this.mqtt.publish(id, JSON.stringify({ value: numericState, text: textState }))
  }

  private restoreDevice(id: string, message: Buffer): void {
    if (!this.pendingRestore.has(id)) {
      return
    }
    this.stopRestore(id)

    let parsed: unknown
    try {
      parsed = JSON.parse(message.toString())
    } catch (error) {
      logger.warn(`Ignoring retained state of ${id}: ${formatAxiosError(error)}`)
      return
    }
    const result = stateMessageSchema.safeParse(parsed)
    if (!result.success) {
      logger.warn(`Ignoring retained state of ${id}: not a { value, text } object`)
      return
    }

    this.devices.set(id, { numericState: result.data.value, textState: result.data.text })
    logger.info(`Restored ${id} from retained state: ${result.data.text}`)
  }

  private stopRestore(id: string): void {
    if (this.pendingRestore.delete(id)) {
      this.mqtt.unsubscribe(id)
    }
  }

  public buildDiscoveryConfig(id: string, kind: DeviceKind, displayName: string): HADiscoveryConfig {
    const objectId = `smartthings_${id.toLowerCase()}`
    const base = {
      name: displayName,
      object_id: objectId,
      uniq_id: objectId,
      device: HA_DEVICE,
      availability_topic: this.mqtt.availabilityTopic,
      payload_available: 'online',
      payload_not_available: 'offline',
      state_topic: `${this.mqtt.resolveDeviceTopic(id)}/state`,
      json_attributes_topic: `${this.mqtt.resolveDeviceTopic(id)}/state`,
    }

    if (kind === 'switch') {
      const config: HABinarySensorDiscoveryConfig = {
        ...base,
        value_template: '{{ value_json.value }}',
        device_class: 'running',
        payload_on: '1',
        payload_off: '0',
      }
      return config
    }

    const config: HASensorDiscoveryConfig = {
      ...base,
      value_template: '{{ value_json.text }}',
      icon: id.endsWith('_Remaining') ? 'mdi:timer-outline' : 'mdi:washing-machine',
    }
    return config
  }
}
