import {
  type ApplianceKind,
  type ApplianceSignal,
  type CycleState,
  NO_ACTIVE_CYCLE,
  type PowerState,
  UNKNOWN_CYCLE,
} from '../types/normalized.js'

/**
 * Utility functions for normalizing SmartThings status documents.
 * Every function here is total: malformed or missing input degrades to a default.
 */

type StatusFieldPaths = {
  power: readonly string[]
  cycleState: readonly string[]
  remainingTime: readonly string[]
}

const POWER_PATH = ['components', 'main', 'switch', 'switch', 'value'] as const

export const STATUS_FIELD_PATHS: Record<ApplianceKind, StatusFieldPaths> = {
  washer: {
    power: POWER_PATH,
    cycleState: ['components', 'main', 'samsungce.washerOperatingState', 'washerJobState', 'value'],
    remainingTime: ['components', 'main', 'samsungce.washerOperatingState', 'remainingTime', 'value'],
  },
  dryer: {
    power: POWER_PATH,
    cycleState: ['components', 'main', 'samsungce.dryerOperatingState', 'dryerJobState', 'value'],
    remainingTime: ['components', 'main', 'samsungce.dryerOperatingState', 'remainingTime', 'value'],
  },
}

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Walk a fixed path through a JSON document, returning undefined as soon as a step is missing
 */
export function readPath(document: unknown, path: readonly string[]): unknown {
  let current: unknown = document
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined
    }
    current = current[key]
  }
  return current
}

/**
 * "on" in any casing is on, everything else (including a missing value) is off
 */
export function normalizePower(value: unknown): PowerState {
  return typeof value === 'string' && value.toLowerCase() === 'on' ? 'on' : 'off'
}

/**
 * Map the reported job state: missing → UNKNOWN_CYCLE, "none" → NO_ACTIVE_CYCLE, anything else verbatim
 */
export function normalizeCycleState(value: unknown): CycleState {
  if (value === 'none') {
    return NO_ACTIVE_CYCLE
  }
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return UNKNOWN_CYCLE
}

/**
 * Parse a remaining time in minutes. Integers, floats and numeric strings are
 * truncated toward zero; anything else yields 0.
 */
export function parseRemainingMinutes(value: unknown): number {
  let parsed: number
  if (typeof value === 'number') {
    parsed = value
  } else if (typeof value === 'string' && NUMERIC_PATTERN.test(value.trim())) {
    parsed = Number(value.trim())
  } else {
    return 0
  }

  if (!Number.isFinite(parsed)) {
    return 0
  }
  return Math.max(0, Math.trunc(parsed))
}

export function isActiveCycle(cycleState: CycleState): cycleState is string {
  return typeof cycleState === 'string'
}

/**
 * Convert a raw status document into the canonical signal for the given appliance kind.
 *
 * Only an explicit "none" job state forces the remaining time to zero; a missing
 * job state still reads whatever remaining time is reported.
 */
export function normalizeStatus(kind: ApplianceKind, rawStatus: unknown): ApplianceSignal {
  const paths = STATUS_FIELD_PATHS[kind]
  const cycleState = normalizeCycleState(readPath(rawStatus, paths.cycleState))

  return {
    power: normalizePower(readPath(rawStatus, paths.power)),
    cycleState,
    remainingMinutes:
      cycleState === NO_ACTIVE_CYCLE ? 0 : parseRemainingMinutes(readPath(rawStatus, paths.remainingTime)),
  }
}
