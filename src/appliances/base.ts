import type { DeviceKind } from '../registry.js'
import {
  type ApplianceKind,
  type ApplianceSignal,
  type CycleState,
  NO_ACTIVE_CYCLE,
} from '../types/normalized.js'
import { isActiveCycle, normalizeStatus } from './normalizers.js'

export type SignalField = 'power' | 'cycleState' | 'remainingMinutes'

/**
 * A host device record backing one field of an appliance signal
 */
export interface DeviceDefinition {
  id: string
  field: SignalField
  kind: DeviceKind
  name: string
}

/**
 * Base class for the SmartThings laundry appliances
 * Each kind supplies its labels and host device naming; normalization is shared
 */
export abstract class BaseAppliance {
  protected readonly deviceId: string

  constructor(deviceId: string) {
    this.deviceId = deviceId
  }

  /**
   * The SmartThings device id polled for this appliance
   */
  public getDeviceId(): string {
    return this.deviceId
  }

  abstract readonly kind: ApplianceKind

  /**
   * Human readable label used in logs, e.g. "Washer"
   */
  abstract getLabel(): string

  /**
   * Prefix of the host device ids, e.g. "WM" for WM_Power
   */
  abstract getDevicePrefix(): string

  /**
   * Text shown when the appliance reports no running job
   */
  abstract getNoActiveCycleText(): string

  /**
   * Display names of the power, cycle and remaining time devices
   */
  protected abstract getDeviceNames(): Record<SignalField, string>

  public getDeviceDefinitions(): DeviceDefinition[] {
    const prefix = this.getDevicePrefix()
    const names = this.getDeviceNames()
    return [
      { id: `${prefix}_Power`, field: 'power', kind: 'switch', name: names.power },
      { id: `${prefix}_JobState`, field: 'cycleState', kind: 'text', name: names.cycleState },
      { id: `${prefix}_Remaining`, field: 'remainingMinutes', kind: 'text', name: names.remainingMinutes },
    ]
  }

  public getPowerDeviceId(): string {
    return `${this.getDevicePrefix()}_Power`
  }

  public normalizeState(rawStatus: unknown): ApplianceSignal {
    return normalizeStatus(this.kind, rawStatus)
  }

  public describeCycleState(cycleState: CycleState): string {
    if (isActiveCycle(cycleState)) {
      return cycleState
    }
    return cycleState === NO_ACTIVE_CYCLE ? this.getNoActiveCycleText() : 'Unknown'
  }
}
