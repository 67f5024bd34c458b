import { drift } from './drift'

import { defineBehavior } from '@/behavior/definition'
import type { SimulationHost } from '@/types/host'

export const WORM = 'Worm'

// Worms only wander. Slimes eat them and portals carry them around.
export function createWorm() {
  const behavior = defineBehavior<SimulationHost>({
    name: WORM,
    handlers: {
      update: (ctx) => drift(ctx.host, ctx.entity, ctx.host.config.worm.wander),
    },
  })
  return { behavior, layers: {} }
}
