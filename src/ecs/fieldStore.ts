import { COLLISION_GROUPS, Collider, Creature, Looks, Position, Wander, decodeArchetype } from './components'
import type { SimulationContext } from './types'

import type { EntityId } from '@/behavior/types'
import type { FieldStore } from '@/types/host'

/** Field access by stable creature id over the bitecs component arrays. */
export function createFieldStore(ctx: Pick<SimulationContext, 'creatures' | 'tags' | 'index'>): FieldStore {
  const eid = (entity: EntityId) => {
    const resolved = ctx.creatures.get(entity)
    if (resolved === undefined) {
      throw new Error(`Creature ${entity} does not exist`)
    }
    return resolved
  }

  const place = (entity: EntityId, x: number, y: number) => {
    const e = eid(entity)
    Position.x[e] = x
    Position.y[e] = y
    ctx.index.set({ x: Position.x[e], y: Position.y[e] }, { id: entity, data: entity })
  }

  return {
    position(entity) {
      const e = eid(entity)
      return { x: Position.x[e], y: Position.y[e] }
    },
    setPosition(entity, position) {
      place(entity, position.x, position.y)
    },
    move(entity, delta) {
      const e = eid(entity)
      place(entity, Position.x[e] + delta.x, Position.y[e] + delta.y)
    },
    size: (entity) => Looks.scale[eid(entity)],
    setSize(entity, size) {
      Looks.scale[eid(entity)] = size
    },
    facing: (entity) => (Looks.flipX[eid(entity)] === 1 ? 'left' : 'right'),
    setFacing(entity, facing) {
      Looks.flipX[eid(entity)] = facing === 'left' ? 1 : 0
    },
    archetype: (entity) => {
      const e = ctx.creatures.get(entity)
      return e === undefined ? undefined : decodeArchetype(Creature.archetype[e])
    },
    wander(entity) {
      const e = eid(entity)
      return { seed: Wander.seed[e], lastTime: Wander.lastTime[e] }
    },
    collides: (entity, group) => (Collider.groups[eid(entity)] & COLLISION_GROUPS[group]) !== 0,
    toggleCollisionWhitelist(entity, group, desired) {
      const e = eid(entity)
      const bit = COLLISION_GROUPS[group]
      const next = desired ?? (Collider.groups[e] & bit) === 0
      Collider.groups[e] = next ? Collider.groups[e] | bit : Collider.groups[e] & ~bit
      return next
    },
    hasTag: (entity, tag) => ctx.tags.hasTag(entity, tag),
    tagVal: (entity, tag) => ctx.tags.tagVal(entity, tag),
  }
}
