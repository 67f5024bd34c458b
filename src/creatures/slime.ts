import { drift } from './drift'

import { defineBehavior } from '@/behavior/definition'
import { unknownMessage } from '@/behavior/errors'
import { defineLayer } from '@/behavior/layer'
import { closestEntity, randomVector } from '@/behavior/procedural'
import type { EntityId } from '@/behavior/types'
import type { SimulationHost } from '@/types/host'
import type { Vector2 } from '@/types/sim'
import { moveToward, scale } from '@/utils/math'
import { jitter } from '@/utils/rand'

export const SLIME = 'Slime'

export interface FleeFields {
  start: number
  direction: Vector2
  duration: number
}

export interface HuntFields {
  // Worm chased on the latest update, null when there was none.
  target: EntityId | null
}

export interface HungryFields {
  lastEaten: number
  wormsEaten: number
}

/**
 * Slimes hunt worms by default. Eating makes them hungry; a hungry slime
 * that goes `hungerTimeout` seconds without another meal splits into one
 * more slime than it ate, and each of those runs off before hunting.
 */
export function createSlime() {
  const hungry = defineLayer<SimulationHost, HungryFields>({
    name: 'hungry',
    fields: ({ now }) => ({ lastEaten: now, wormsEaten: 0 }),
    wraps: {
      update(ctx, next) {
        const { host } = ctx
        const { lastEaten, wormsEaten } = ctx.fields
        if (ctx.now - lastEaten <= host.config.slime.hungerTimeout) return next()

        const here = host.fields.position(ctx.entity)
        for (let i = 0; i < wormsEaten + 1; i++) {
          const child = host.spawn('slime', jitter(host.rng, here, host.config.slime.spawnSpread))
          host.send(child, 'flee')
        }
        host.kill(ctx.entity)
        return undefined
      },
    },
  })

  const hunt = defineLayer<SimulationHost, HuntFields>({
    name: 'hunt',
    fields: () => ({ target: null }),
    overlays: [hungry],
    wraps: {
      update(ctx, next) {
        const { host } = ctx
        const worms = host.instancesOf('worm')
        if (worms.length === 0) {
          ctx.fields.target = null
          return next()
        }
        const here = host.fields.position(ctx.entity)
        const target = closestEntity(here, worms, (worm) => host.fields.position(worm))
        const there = host.fields.position(target)
        ctx.fields.target = target
        host.fields.setPosition(ctx.entity, moveToward(here, there, host.config.slime.huntSpeed * host.delta))
        if (there.x !== here.x) host.fields.setFacing(ctx.entity, there.x < here.x ? 'left' : 'right')
        return undefined
      },
      collision(ctx, next, other) {
        const { host } = ctx
        if (host.fields.archetype(other) !== 'worm' || !host.isAlive(other)) return next()
        host.kill(other)
        if (!ctx.isEnabled(hungry)) ctx.enable(hungry)
        const belly = ctx.fieldsOf(hungry)
        belly.lastEaten = ctx.now
        belly.wormsEaten++
        return undefined
      },
    },
  })

  const flee = defineLayer<SimulationHost, FleeFields, [duration?: number]>({
    name: 'flee',
    params: ['duration'],
    fields: ({ host, now }) => ({
      start: now,
      direction: randomVector(host.rng, 1),
      duration: host.config.slime.fleeDuration,
    }),
    init(ctx, duration) {
      if (duration !== undefined) ctx.fields.duration = duration
    },
    wraps: {
      update(ctx, next) {
        const { start, direction, duration } = ctx.fields
        if (ctx.now - start >= duration) {
          // Hunt takes over the rest of this update.
          ctx.transition(hunt)
          return undefined
        }
        const { host } = ctx
        host.fields.move(ctx.entity, scale(direction, host.config.slime.fleeSpeed * host.delta))
        return next()
      },
    },
  })

  const behavior = defineBehavior<SimulationHost>({
    name: SLIME,
    groups: {
      mood: { members: [flee, hunt], initial: hunt },
    },
    handlers: {
      update: (ctx) => drift(ctx.host, ctx.entity, ctx.host.config.slime.wander),
      message(ctx, message) {
        if (message.name !== 'flee') {
          throw unknownMessage(message.name, { entity: ctx.entity, behavior: ctx.behavior })
        }
        const [duration] = message.args
        if (typeof duration === 'number') {
          ctx.enable(flee, duration)
        } else {
          ctx.enable(flee)
        }
      },
      reload(ctx, previous) {
        if (previous.layers.includes('mood/flee')) ctx.enable(flee)
      },
    },
  })

  return { behavior, layers: { flee, hunt, hungry } }
}
