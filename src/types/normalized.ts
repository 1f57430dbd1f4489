/**
 * Normalized appliance types
 * These represent the canonical signal derived from a SmartThings status document
 */

export type ApplianceKind = 'washer' | 'dryer'

export type PowerState = 'on' | 'off'

export const NO_ACTIVE_CYCLE = Symbol('NoActiveCycle')
export const UNKNOWN_CYCLE = Symbol('UnknownCycle')

/**
 * The job state reported by the appliance, or one of the two markers:
 * NO_ACTIVE_CYCLE when the appliance reports "none", UNKNOWN_CYCLE when the field is missing
 */
export type CycleState = string | typeof NO_ACTIVE_CYCLE | typeof UNKNOWN_CYCLE

export interface ApplianceSignal {
  power: PowerState
  cycleState: CycleState
  // Whole minutes, always 0 when cycleState is NO_ACTIVE_CYCLE
  remainingMinutes: number
}

export interface ApplianceConfig {
  kind: ApplianceKind
  deviceId: string | undefined
}
