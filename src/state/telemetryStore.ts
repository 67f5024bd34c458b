import { derived, writable } from 'svelte/store'
import type { Readable, Writable } from 'svelte/store'

import type { EntityId, HandlerName } from '@/behavior/types'

export const MAX_FAULTS = 100

// Where a reported fault came from: a handler, a class level hook or a layer's teardown.
export type FaultSource = HandlerName | 'staticUpdate' | 'exit'

export interface DispatchFault {
  tick: number
  // null for archetype level hooks such as staticUpdate.
  entity: EntityId | null
  behavior: string
  handler: FaultSource
  category: string
  message: string
}

export interface RuntimeStats {
  ticks: number
  dispatches: number
  transitions: number
  faults: number
}

export interface TelemetrySummary extends RuntimeStats {
  faultRate: number
  lastFault: DispatchFault | null
}

export interface Telemetry {
  faults: Writable<DispatchFault[]>
  stats: Writable<RuntimeStats>
  summary: Readable<TelemetrySummary>
}

const emptyStats = (): RuntimeStats => ({ ticks: 0, dispatches: 0, transitions: 0, faults: 0 })

export function createTelemetry(): Telemetry {
  const faults = writable<DispatchFault[]>([])
  const stats = writable<RuntimeStats>(emptyStats())
  const summary = derived([stats, faults], ([$stats, $faults]) => ({
    ...$stats,
    faultRate: $stats.dispatches > 0 ? $stats.faults / $stats.dispatches : 0,
    lastFault: $faults.length > 0 ? $faults[$faults.length - 1] : null,
  }))
  return { faults, stats, summary }
}

export function recordFault(telemetry: Telemetry, fault: DispatchFault) {
  telemetry.faults.update((current) => [...current, fault].slice(-MAX_FAULTS))
  bumpStat(telemetry, 'faults')
}

export function bumpStat(telemetry: Telemetry, key: keyof RuntimeStats) {
  telemetry.stats.update((current) => ({ ...current, [key]: current[key] + 1 }))
}
