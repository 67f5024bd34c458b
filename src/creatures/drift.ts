import { bobDelta } from '@/behavior/procedural'
import type { EntityId } from '@/behavior/types'
import type { SimulationHost } from '@/types/host'
import type { WanderProfile } from '@/types/sim'

/** Moves `entity` along its seeded wander path by what changed since the previous tick. */
export function drift(host: SimulationHost, entity: EntityId, profile: WanderProfile) {
  const { seed, lastTime } = host.fields.wander(entity)
  const delta = bobDelta(profile, seed, host.now(), lastTime)
  host.fields.move(entity, delta)
  if (delta.x !== 0) {
    host.fields.setFacing(entity, delta.x < 0 ? 'left' : 'right')
  }
}
