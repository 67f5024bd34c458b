import { Collider, Position } from '../components'
import type { SimulationContext } from '../types'

const pairKey = (a: number, b: number) => (a < b ? `${a}:${b}` : `${b}:${a}`)

/**
 * Broad phase through the spatial hash, then a radius check. Only contacts
 * that were not already touching last pass are queued, once per side.
 */
export function collisionSystem(ctx: SimulationContext) {
  let maxRadius = 0
  ctx.creatures.forEach((entity) => {
    maxRadius = Math.max(maxRadius, Collider.radius[entity])
  })

  const touching = new Set<string>()
  const fresh: [number, number][] = []

  ctx.creatures.forEach((entity, id) => {
    if (ctx.dead.has(id) || Collider.groups[entity] === 0) return
    const position = { x: Position.x[entity], y: Position.y[entity] }
    const neighbors = ctx.index
      .query(position, Collider.radius[entity] + maxRadius)
      .map((bucket) => bucket.id)
      .filter((other) => other > id)
      .sort((a, b) => a - b)

    neighbors.forEach((otherId) => {
      const other = ctx.creatures.get(otherId)
      if (other === undefined || ctx.dead.has(otherId)) return
      if ((Collider.groups[entity] & Collider.groups[other]) === 0) return
      const dx = Position.x[other] - position.x
      const dy = Position.y[other] - position.y
      const reach = Collider.radius[entity] + Collider.radius[other]
      if (dx * dx + dy * dy > reach * reach) return
      const key = pairKey(id, otherId)
      touching.add(key)
      if (!ctx.contacts.has(key)) fresh.push([id, otherId])
    })
  })

  ctx.contacts = touching
  fresh.forEach(([a, b]) => {
    ctx.runtime.collide(a, b)
    ctx.runtime.collide(b, a)
  })
  return fresh.length
}
