/**
 * SmartThings `/v1/devices/{deviceId}/status` response types
 * Only the attributes this service reads are spelled out; everything in the
 * document is optional because the API omits capabilities a device does not report.
 */

export type AttributeState<T = unknown> = {
  value?: T | null
  unit?: string
  timestamp?: string
}

export type SwitchCapability = {
  switch?: AttributeState<string>
}

export type WasherOperatingStateCapability = {
  washerJobState?: AttributeState<string>
  remainingTime?: AttributeState<number | string>
  operatingState?: AttributeState<string>
}

export type DryerOperatingStateCapability = {
  dryerJobState?: AttributeState<string>
  remainingTime?: AttributeState<number | string>
  operatingState?: AttributeState<string>
}

export type ComponentStatus = {
  switch?: SwitchCapability
  'samsungce.washerOperatingState'?: WasherOperatingStateCapability
  'samsungce.dryerOperatingState'?: DryerOperatingStateCapability
  [capability: string]: Record<string, AttributeState | undefined> | undefined
}

export type DeviceStatus = {
  components?: {
    main?: ComponentStatus
    [component: string]: ComponentStatus | undefined
  }
}

