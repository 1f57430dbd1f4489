import type { ApplianceKind } from '../types/normalized.js'
import { BaseAppliance, type SignalField } from './base.js'

/**
 * Samsung dryer reporting through the samsungce.dryerOperatingState capability
 */
export class DryerAppliance extends BaseAppliance {
  readonly kind: ApplianceKind = 'dryer'

  public getLabel(): string {
    return 'Dryer'
  }

  public getDevicePrefix(): string {
    return 'DR'
  }

  public getNoActiveCycleText(): string {
    return 'No active dry'
  }

  protected getDeviceNames(): Record<SignalField, string> {
    return {
      power: 'Dryer Status (ON/OFF)',
      cycleState: 'Drying Cycle',
      remainingMinutes: 'Dryer Remaining Time (min)',
    }
  }
}
