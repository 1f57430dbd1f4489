/**
 * Home Assistant MQTT discovery types
 * Based on: https://www.home-assistant.io/integrations/mqtt/#mqtt-discovery
 */

export type HAComponent = 'binary_sensor' | 'sensor'

export interface HADeviceInfo {
  identifiers: string[]
  manufacturer: string
  model: string
  name: string
}

interface HABaseDiscoveryConfig {
  name: string
  object_id: string
  uniq_id: string
  device: HADeviceInfo
  availability_topic: string
  payload_available: string
  payload_not_available: string
  state_topic: string
  value_template: string
  json_attributes_topic: string
  icon?: string
}

export interface HABinarySensorDiscoveryConfig extends HABaseDiscoveryConfig {
  device_class: 'running'
  payload_on: string
  payload_off: string
}

export interface HASensorDiscoveryConfig extends HABaseDiscoveryConfig {
  unit_of_measurement?: string
}

export type HADiscoveryConfig = HABinarySensorDiscoveryConfig | HASensorDiscoveryConfig
