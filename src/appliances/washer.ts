import type { ApplianceKind } from '../types/normalized.js'
import { BaseAppliance, type SignalField } from './base.js'

/**
 * Samsung washer reporting through the samsungce.washerOperatingState capability
 */
export class WasherAppliance extends BaseAppliance {
  readonly kind: ApplianceKind = 'washer'

  public getLabel(): string {
    return 'Washer'
  }

  public getDevicePrefix(): string {
    return 'WM'
  }

  public getNoActiveCycleText(): string {
    return 'No active wash'
  }

  protected getDeviceNames(): Record<SignalField, string> {
    return {
      power: 'Washer Status (ON/OFF)',
      cycleState: 'Washing Cycle',
      remainingMinutes: 'Washer Remaining Time (min)',
    }
  }
}
