import { get } from 'svelte/store'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { CREATURES, createCreatureKit } from '@/creatures'
import { createSimulation, spawnCreature, stepWorld } from '@/ecs/world'
import { DEFAULT_WORLD_CONFIG, type WorldConfig } from '@/types/sim'

// No wander drift, so every movement below comes from a behavior layer.
const config: WorldConfig = {
  ...DEFAULT_WORLD_CONFIG,
  rngSeed: 42,
  worm: { ...DEFAULT_WORLD_CONFIG.worm, wander: { x: [], y: [] } },
  slime: { ...DEFAULT_WORLD_CONFIG.slime, wander: { x: [], y: [] } },
}

const { flee, hunt, hungry } = CREATURES.slime.layers

describe('slime behaviour', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('starts out hunting', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 100, y: 100 })
    expect(sim.runtime.activeMember(slime, 'mood')).toBe(hunt)
  })

  it('runs in a straight line while fleeing', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 100, y: 100 })
    sim.runtime.enable(slime, flee)
    const { direction } = sim.runtime.fields(slime, flee)

    stepWorld(sim, 50)

    // fleeSpeed 40 for 0.05s
    const position = sim.host.fields.position(slime)
    expect(position.x).toBeCloseTo(100 + direction.x * 2, 4)
    expect(position.y).toBeCloseTo(100 + direction.y * 2, 4)
    expect(sim.runtime.activeMember(slime, 'mood')).toBe(flee)
  })

  it('switches to hunting within the update where flee runs out', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 100, y: 100 })
    const worm = spawnCreature(sim, 'worm', { x: 200, y: 100 })
    sim.runtime.enable(slime, flee, 7.5)
    expect(sim.runtime.fields(slime, flee).start).toBe(0)

    sim.time = 7.95
    stepWorld(sim, 50)

    expect(sim.runtime.activeMember(slime, 'mood')).toBe(hunt)
    expect(sim.runtime.fields(slime, hunt).target).toBe(worm)
    // huntSpeed 28 for 0.05s, straight at the worm
    const position = sim.host.fields.position(slime)
    expect(position.x).toBeCloseTo(101.4, 4)
    expect(position.y).toBeCloseTo(100, 4)
    expect(get(sim.runtime.telemetry.stats).transitions).toBe(1)
  })

  it('eats worms it touches and gets hungry', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 100, y: 100 })
    const worm = spawnCreature(sim, 'worm', { x: 105, y: 100 })

    stepWorld(sim, 50)

    expect(sim.host.isAlive(worm)).toBe(false)
    expect(sim.runtime.has(worm)).toBe(false)
    expect(sim.runtime.isEnabled(slime, hungry)).toBe(true)
    const belly = sim.runtime.fields(slime, hungry)
    expect(belly.wormsEaten).toBe(1)
    expect(belly.lastEaten).toBeCloseTo(0.05, 10)
    expect(sim.runtime.fields(slime, hunt).target).toBeNull()
  })

  it('pushes the split back with every meal', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 100, y: 100 })
    spawnCreature(sim, 'worm', { x: 105, y: 100 })
    stepWorld(sim, 50)

    sim.time = 10
    spawnCreature(sim, 'worm', { x: 105, y: 100 })
    stepWorld(sim, 50)

    const belly = sim.runtime.fields(slime, hungry)
    expect(belly.wormsEaten).toBe(2)
    expect(belly.lastEaten).toBeCloseTo(10.05, 10)

    // Past the timeout of the first meal, well inside the second one's.
    sim.time = 15.05
    stepWorld(sim, 50)
    expect(sim.host.isAlive(slime)).toBe(true)
    expect(sim.host.instancesOf('slime')).toEqual([slime])

    sim.time = 25.05
    stepWorld(sim, 50)
    expect(sim.host.isAlive(slime)).toBe(false)
    expect(sim.host.instancesOf('slime')).toHaveLength(3)
  })

  it('splits into one more slime than it ate once hunger runs out', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 300, y: 200 })
    sim.runtime.enable(slime, hungry)
    sim.time = 20
    const belly = sim.runtime.fields(slime, hungry)
    belly.lastEaten = 4
    belly.wormsEaten = 2

    stepWorld(sim, 50)

    expect(sim.host.isAlive(slime)).toBe(false)
    expect(sim.runtime.has(slime)).toBe(false)
    const children = sim.host.instancesOf('slime')
    expect(children).toHaveLength(3)
    expect(sim.metrics.died).toBe(1)

    // The flee orders arrive on the next tick.
    stepWorld(sim, 50)
    children.forEach((child) => {
      expect(sim.runtime.activeMember(child, 'mood')).toBe(flee)
    })
  })

  it('stays put while a meal is recent', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 300, y: 200 })
    sim.runtime.enable(slime, hungry)
    sim.time = 10

    stepWorld(sim, 50)

    expect(sim.host.isAlive(slime)).toBe(true)
    expect(sim.host.instancesOf('slime')).toEqual([slime])
  })

  it('reports unknown messages without stopping', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 100, y: 100 })
    sim.host.send(slime, 'dance')

    stepWorld(sim, 50)

    const faults = get(sim.runtime.telemetry.faults)
    expect(faults.map((fault) => [fault.entity, fault.category])).toEqual([[slime, 'UNKNOWN_MESSAGE']])
    expect(sim.host.isAlive(slime)).toBe(true)
  })

  it('keeps fleeing across a hot reload', () => {
    const kit = createCreatureKit()
    const sim = createSimulation(config, { definitions: kit.definitions, runtime: { trace: false } })
    const slime = spawnCreature(sim, 'slime', { x: 100, y: 100 })
    sim.runtime.enable(slime, kit.slime.layers.flee)

    const reloaded = createCreatureKit()
    sim.runtime.reload(reloaded.definitions)

    expect(sim.runtime.activeMember(slime, 'mood')).toBe(reloaded.slime.layers.flee)
    expect(sim.runtime.isEnabled(slime, kit.slime.layers.flee)).toBe(false)
  })
})
