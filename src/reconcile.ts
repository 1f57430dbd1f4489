import type { BaseAppliance, SignalField } from './appliances/base.js'
import type { DeviceHandle } from './registry.js'
import type { ApplianceSignal } from './types/normalized.js'

/**
 * Last values written to the host registry, keyed by host device id
 */
export type PublishedState = ReadonlyMap<string, DeviceHandle>

export type FieldUpdate = {
  deviceId: string
  field: SignalField
  from: DeviceHandle | undefined
  to: DeviceHandle
}

export type ReconcileResult = {
  updates: FieldUpdate[]
  published: PublishedState
}

/**
 * Render a signal as the numeric/text pair each host device stores
 */
export function renderSignal(appliance: BaseAppliance, signal: ApplianceSignal): Record<SignalField, DeviceHandle> {
  const isOn = signal.power === 'on'
  return {
    power: { numericState: isOn ? 1 : 0, textState: isOn ? 'On' : 'Off' },
    cycleState: { numericState: 0, textState: appliance.describeCycleState(signal.cycleState) },
    remainingMinutes: { numericState: signal.remainingMinutes, textState: `${signal.remainingMinutes} min` },
  }
}

// Power devices are compared on their on/off value, text devices on the text they show
const hasChanged = (field: SignalField, previous: DeviceHandle | undefined, next: DeviceHandle): boolean => {
  if (!previous) {
    return true
  }
  return field === 'power' ? previous.numericState !== next.numericState : previous.textState !== next.textState
}

/**
 * Compare a fresh signal with what was last published and return only the fields that changed.
 * The given published state is left untouched; the returned one includes the updates.
 */
export function reconcile(
  appliance: BaseAppliance,
  signal: ApplianceSignal,
  published: PublishedState,
): ReconcileResult {
  const rendered = renderSignal(appliance, signal)
  const updates: FieldUpdate[] = []
  const next = new Map(published)

  for (const definition of appliance.getDeviceDefinitions()) {
    const previous = published.get(definition.id)
    const value = rendered[definition.field]

    if (hasChanged(definition.field, previous, value)) {
      updates.push({ deviceId: definition.id, field: definition.field, from: previous, to: value })
      next.set(definition.id, value)
    }
  }

  return { updates, published: next }
}

export function formatFieldUpdates(updates: FieldUpdate[]): string {
  return updates.map(({ deviceId, from, to }) => `\n  ${deviceId}: ${from?.textState ?? '(none)'} → ${to.textState}`).join('')
}
