import type { IWorld } from 'bitecs'

import type { TagBank } from './tags'

import type { BehaviorRuntime } from '@/behavior/runtime'
import type { EntityId } from '@/behavior/types'
import type { SimulationHost } from '@/types/host'
import type { WorldConfig } from '@/types/sim'
import type { RNG } from '@/utils/rand'
import type { SpatialHash } from '@/utils/spatialHash'

export interface SimulationMetrics {
  spawned: number
  died: number
}

export interface SimulationContext {
  world: IWorld
  config: WorldConfig
  rng: RNG
  tick: number
  // Simulation seconds since the world was created.
  time: number
  delta: number
  // Stable creature id -> bitecs entity.
  creatures: Map<EntityId, number>
  index: SpatialHash<EntityId>
  tags: TagBank
  // Killed this tick, removed once the tick is over.
  dead: Set<EntityId>
  // Pairs that were touching at the end of the previous collision pass.
  contacts: Set<string>
  host: SimulationHost
  runtime: BehaviorRuntime<SimulationHost>
  nextCreatureId: number
  metrics: SimulationMetrics
}
