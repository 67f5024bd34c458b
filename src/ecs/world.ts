import { addComponent, addEntity, createWorld, removeEntity } from 'bitecs'

import { ARCHETYPE_CODES, COLLISION_GROUPS, Collider, Creature, Looks, Position, Wander } from './components'
import { createFieldStore } from './fieldStore'
import { collisionSystem } from './systems/collisionSystem'
import { wanderSystem } from './systems/wanderSystem'
import { TagBank } from './tags'
import type { SimulationContext } from './types'

import type { BehaviorDefinition } from '@/behavior/definition'
import { BehaviorRuntime, type RuntimeOptions } from '@/behavior/runtime'
import type { EntityId } from '@/behavior/types'
import { BEHAVIOR_FOR_ARCHETYPE, CREATURE_BEHAVIORS } from '@/creatures'
import type { CollisionGroupName, SimulationHost, SpawnOptions } from '@/types/host'
import type { ArchetypeName, Vector2, WorldConfig } from '@/types/sim'
import { DEFAULT_WORLD_CONFIG } from '@/types/sim'
import { jitter, mulberry32, randRange } from '@/utils/rand'
import { SpatialHash } from '@/utils/spatialHash'

const now = () => (typeof performance !== 'undefined' ? performance.now() : Date.now())

const COLLIDES_WITH: Record<ArchetypeName, readonly CollisionGroupName[]> = {
  worm: ['creature', 'portal'],
  slime: ['creature'],
  portal: ['portal'],
}

export interface SimulationOptions {
  definitions?: readonly BehaviorDefinition<SimulationHost>[]
  runtime?: RuntimeOptions
}

function cloneConfig(config: WorldConfig): WorldConfig {
  return {
    ...config,
    bounds: { ...config.bounds },
    population: { ...config.population },
    worm: { ...config.worm },
    slime: { ...config.slime },
    portal: { ...config.portal },
  }
}

/** An empty world with a behavior runtime attached to it. */
export function createSimulation(
  config: WorldConfig = DEFAULT_WORLD_CONFIG,
  options: SimulationOptions = {},
): SimulationContext {
  const settings = cloneConfig(config)
  const world = createWorld()
  const rng = mulberry32(settings.rngSeed)
  const creatures = new Map<EntityId, number>()
  const tags = new TagBank()
  const index = new SpatialHash<EntityId>(settings.spatialHashCellSize)

  const host: SimulationHost = {
    fields: createFieldStore({ creatures, tags, index }),
    rng,
    config: settings,
    get delta() {
      return ctx.delta
    },
    spawn: (archetype, position, spawnOptions) => spawnCreature(ctx, archetype, position, spawnOptions),
    kill: (entity) => killCreature(ctx, entity),
    isAlive: (entity) => isAlive(ctx, entity),
    instancesOf: (archetype) => instancesOf(ctx, archetype),
    allTaggedWithVal: (tag, value) => tags.allTaggedWithVal(tag, value).filter((entity) => isAlive(ctx, entity)),
    send: (target, name, ...args) => ctx.runtime.send(target, { name, args }),
    now: () => ctx.time,
  }

  const ctx: SimulationContext = {
    world,
    config: settings,
    rng,
    tick: 0,
    time: 0,
    delta: 0,
    creatures,
    index,
    tags,
    dead: new Set(),
    contacts: new Set(),
    host,
    runtime: new BehaviorRuntime(host, options.definitions ?? CREATURE_BEHAVIORS, options.runtime),
    nextCreatureId: 1,
    metrics: { spawned: 0, died: 0 },
  }
  return ctx
}

export function initWorld(config: WorldConfig, options: SimulationOptions = {}): SimulationContext {
  const ctx = createSimulation(config, options)
  spawnInitialPopulation(ctx)
  console.info(`[sim] world ready with ${ctx.creatures.size} creatures (seed ${config.rngSeed})`)
  return ctx
}

function spawnInitialPopulation(ctx: SimulationContext) {
  const { bounds, population } = ctx.config
  const randomPoint = (): Vector2 => ({ x: randRange(ctx.rng, 0, bounds.x), y: randRange(ctx.rng, 0, bounds.y) })

  ctx.config.networks.forEach((network) => {
    for (let i = 0; i < population.portalsPerNetwork; i++) {
      spawnCreature(ctx, 'portal', randomPoint(), { tags: { network } })
    }
  })
  for (let i = 0; i < population.worms; i++) {
    spawnCreature(ctx, 'worm', randomPoint())
  }
  const center = { x: bounds.x / 2, y: bounds.y / 2 }
  for (let i = 0; i < population.slimes; i++) {
    spawnCreature(ctx, 'slime', jitter(ctx.rng, center, Math.min(bounds.x, bounds.y) * 0.25))
  }
}

export function spawnCreature(
  ctx: SimulationContext,
  archetype: ArchetypeName,
  position: Vector2,
  options: SpawnOptions = {},
): EntityId {
  const { world } = ctx
  const tuning = ctx.config[archetype]
  const entity = addEntity(world)
  const id = ctx.nextCreatureId++

  addComponent(world, Creature, entity)
  Creature.id[entity] = id
  Creature.archetype[entity] = ARCHETYPE_CODES[archetype]

  addComponent(world, Position, entity)
  Position.x[entity] = position.x
  Position.y[entity] = position.y

  addComponent(world, Looks, entity)
  Looks.scale[entity] = options.size ?? tuning.size
  Looks.flipX[entity] = 0

  addComponent(world, Collider, entity)
  Collider.radius[entity] = tuning.radius
  Collider.groups[entity] = COLLIDES_WITH[archetype].reduce((bits, group) => bits | COLLISION_GROUPS[group], 0)

  if (archetype !== 'portal') {
    addComponent(world, Wander, entity)
    Wander.seed[entity] = randRange(ctx.rng, 0, 1000)
    Wander.lastTime[entity] = ctx.time
  }

  ctx.creatures.set(id, entity)
  ctx.index.set({ x: Position.x[entity], y: Position.y[entity] }, { id, data: id })
  Object.entries(options.tags ?? {}).forEach(([tag, value]) => ctx.tags.tag(id, tag, value))
  ctx.metrics.spawned++

  ctx.runtime.attach(id, BEHAVIOR_FOR_ARCHETYPE[archetype])
  return id
}

export function killCreature(ctx: SimulationContext, id: EntityId) {
  if (!ctx.creatures.has(id)) return
  ctx.dead.add(id)
}

export function isAlive(ctx: SimulationContext, id: EntityId) {
  return ctx.creatures.has(id) && !ctx.dead.has(id)
}

export function instancesOf(ctx: SimulationContext, archetype: ArchetypeName): EntityId[] {
  const code = ARCHETYPE_CODES[archetype]
  const out: EntityId[] = []
  ctx.creatures.forEach((entity, id) => {
    if (Creature.archetype[entity] === code && !ctx.dead.has(id)) out.push(id)
  })
  return out
}

export function populationCounts(ctx: SimulationContext): Record<ArchetypeName, number> {
  return {
    worm: instancesOf(ctx, 'worm').length,
    slime: instancesOf(ctx, 'slime').length,
    portal: instancesOf(ctx, 'portal').length,
  }
}

/** Removes everything killed this tick. Death hooks may kill more, so this runs until nothing is left. */
export function cleanupDead(ctx: SimulationContext) {
  let removed = 0
  while (ctx.dead.size > 0) {
    const batch = [...ctx.dead]
    batch.forEach((id) => {
      try {
        ctx.runtime.detach(id)
      } finally {
        const entity = ctx.creatures.get(id)
        if (entity !== undefined) removeEntity(ctx.world, entity)
        ctx.creatures.delete(id)
        ctx.index.delete(id)
        ctx.tags.forget(id)
        ctx.dead.delete(id)
        ctx.metrics.died++
        removed++
      }
    })
  }
  return removed
}

export function stepWorld(ctx: SimulationContext, dtMs: number = ctx.config.timeStep * 1000): Record<string, number> {
  const timings: Record<string, number> = {}
  const measure = <T>(label: string, fn: () => T): T => {
    const start = now()
    const result = fn()
    timings[label] = (timings[label] ?? 0) + (now() - start)
    return result
  }

  ctx.delta = dtMs / 1000
  ctx.time += ctx.delta
  measure('collision', () => collisionSystem(ctx))
  measure('behavior', () => ctx.runtime.tick())
  measure('wander', () => wanderSystem(ctx))
  measure('cleanup', () => cleanupDead(ctx))

  ctx.tick++
  return timings
}
