import { hasComponent } from 'bitecs'

import { Wander } from '../components'
import type { SimulationContext } from '../types'

// Stamped every tick whether or not a behavior drifted this tick.
export function wanderSystem(ctx: SimulationContext) {
  ctx.creatures.forEach((entity) => {
    if (!hasComponent(ctx.world, Wander, entity)) return
    Wander.lastTime[entity] = ctx.time
  })
}
