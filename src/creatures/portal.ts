import { defineBehavior } from '@/behavior/definition'
import { unknownMessage } from '@/behavior/errors'
import { defineLayer } from '@/behavior/layer'
import { teleportBlend, teleportTransit } from '@/behavior/procedural'
import type { EntityId } from '@/behavior/types'
import { runtimeFlags } from '@/config/runtimeFlags'
import type { SimulationHost } from '@/types/host'
import type { Vector2 } from '@/types/sim'
import { distance, lerp, lerpVector } from '@/utils/math'
import { randItem } from '@/utils/rand'

export const PORTAL = 'Portal'
export const NETWORK_TAG = 'network'

export interface TeleportFields {
  start: number
  payload: EntityId
  destination: EntityId
  from: Vector2
  to: Vector2
  duration: number
  restingSize: number
  // `receive` is on its way; waiting for the destination to confirm.
  sent: boolean
  delivered: boolean
}

export interface CoolingFields {
  start: number
  payload: EntityId
}

const setCollisions = (host: SimulationHost, entity: EntityId, enabled: boolean) => {
  host.fields.toggleCollisionWhitelist(entity, 'creature', enabled)
  host.fields.toggleCollisionWhitelist(entity, 'portal', enabled)
}

/**
 * Portals sit still and carry worms that touch them to another portal on
 * the same network. The worm shrinks on the way out, slides across, and
 * grows back as it arrives.
 */
export function createPortal() {
  const teleporting = defineLayer<SimulationHost, TeleportFields, [payload: EntityId, destination: EntityId]>({
    name: 'teleporting',
    params: ['payload', 'destination'],
    fields: ({ now }) => ({
      start: now,
      payload: 0,
      destination: 0,
      from: { x: 0, y: 0 },
      to: { x: 0, y: 0 },
      duration: 0,
      restingSize: 0,
      sent: false,
      delivered: false,
    }),
    init(ctx, payload, destination) {
      const { fields: store, config } = ctx.host
      const hop = ctx.fields
      hop.payload = payload
      hop.destination = destination
      hop.from = store.position(payload)
      hop.to = store.position(destination)
      hop.restingSize = store.size(payload)
      hop.duration = Math.max(config.portal.minDuration, distance(hop.from, hop.to) / config.portal.speed)
      setCollisions(ctx.host, payload, false)
    },
    // Cut short (death, reload or a lost destination) before the handoff: put the payload back to normal where it is.
    exit(ctx) {
      const hop = ctx.fields
      if (hop.delivered || !ctx.host.isAlive(hop.payload)) return
      ctx.host.fields.setSize(hop.payload, hop.restingSize)
      setCollisions(ctx.host, hop.payload, true)
    },
    wraps: {
      update(ctx, next) {
        const { host } = ctx
        const hop = ctx.fields
        if (!host.isAlive(hop.payload) || !host.isAlive(hop.destination)) {
          ctx.disable(ctx.layer)
          return next()
        }
        if (hop.sent) return next()
        const elapsed = ctx.now - hop.start
        if (elapsed >= hop.duration) {
          host.send(hop.destination, 'receive', hop.payload, hop.restingSize, ctx.entity)
          hop.sent = true
          return next()
        }
        const tn = teleportBlend(elapsed, hop.duration)
        host.fields.setSize(hop.payload, lerp(hop.restingSize, host.config.portal.transitSize, tn))
        host.fields.setPosition(hop.payload, lerpVector(hop.from, hop.to, teleportTransit(elapsed, hop.duration)))
        return next()
      },
      message(ctx, next, message) {
        if (message.name !== 'delivered' || message.args[0] !== ctx.fields.payload) return next()
        ctx.fields.delivered = true
        ctx.disable(ctx.layer)
        return undefined
      },
      // One payload at a time.
      collision: () => undefined,
    },
  })

  const cooling = defineLayer<SimulationHost, CoolingFields, [payload: EntityId]>({
    name: 'cooling',
    params: ['payload'],
    fields: ({ now }) => ({ start: now, payload: 0 }),
    init(ctx, payload) {
      ctx.fields.payload = payload
    },
    wraps: {
      update(ctx, next) {
        if (ctx.now - ctx.fields.start >= ctx.host.config.portal.cooldown) ctx.disable(ctx.layer)
        return next()
      },
      collision(ctx, next, other) {
        if (other === ctx.fields.payload) return undefined
        return next()
      },
    },
  })

  const behavior = defineBehavior<SimulationHost>({
    name: PORTAL,
    overlays: [teleporting, cooling],
    handlers: {
      collision(ctx, other) {
        const { host } = ctx
        if (host.fields.archetype(other) !== 'worm' || !host.isAlive(other)) return
        // Already picked up by another portal this tick.
        if (!host.fields.collides(other, 'portal')) return
        const network = host.fields.tagVal(ctx.entity, NETWORK_TAG)
        const siblings =
          network === undefined
            ? []
            : host.allTaggedWithVal(NETWORK_TAG, network).filter((portal) => portal !== ctx.entity)
        if (siblings.length === 0) {
          if (runtimeFlags.trace) {
            console.debug(`[behavior] portal ${ctx.entity} has nowhere to send ${other} on network ${network ?? '-'}`)
          }
          return
        }
        ctx.enable(teleporting, other, randItem(host.rng, siblings))
      },
      message(ctx, message) {
        // A late confirmation for a hop that already ended.
        if (message.name === 'delivered') return
        if (message.name !== 'receive') {
          throw unknownMessage(message.name, { entity: ctx.entity, behavior: ctx.behavior })
        }
        const { host } = ctx
        const [payload, restingSize, source] = message.args
        if (typeof payload !== 'number' || !host.isAlive(payload)) return
        if (typeof source === 'number') host.send(source, 'delivered', payload)
        host.fields.setPosition(payload, host.fields.position(ctx.entity))
        host.fields.setSize(payload, typeof restingSize === 'number' ? restingSize : host.config.worm.size)
        setCollisions(host, payload, true)
        // Restart the cooldown for the newest arrival.
        ctx.disable(cooling)
        ctx.enable(cooling, payload)
      },
    },
  })

  return { behavior, layers: { teleporting, cooling } }
}
