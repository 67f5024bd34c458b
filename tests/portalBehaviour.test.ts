import { get } from 'svelte/store'
import { describe, expect, it } from 'vitest'

import { CREATURES, NETWORK_TAG } from '@/creatures'
import { createSimulation, spawnCreature, stepWorld } from '@/ecs/world'
import { DEFAULT_WORLD_CONFIG, type WorldConfig } from '@/types/sim'

const config: WorldConfig = {
  ...DEFAULT_WORLD_CONFIG,
  rngSeed: 7,
  worm: { ...DEFAULT_WORLD_CONFIG.worm, wander: { x: [], y: [] } },
}

const { teleporting, cooling } = CREATURES.portal.layers

function setup() {
  const sim = createSimulation(config, { runtime: { trace: false } })
  const source = spawnCreature(sim, 'portal', { x: 0, y: 0 }, { tags: { [NETWORK_TAG]: 'amber' } })
  const destination = spawnCreature(sim, 'portal', { x: 320, y: 0 }, { tags: { [NETWORK_TAG]: 'amber' } })
  spawnCreature(sim, 'portal', { x: 0, y: 300 }, { tags: { [NETWORK_TAG]: 'cobalt' } })
  const worm = spawnCreature(sim, 'worm', { x: 6, y: 0 })
  return { sim, source, destination, worm }
}

describe('portal behaviour', () => {
  it('picks up a touching worm and heads for the other portal on its network', () => {
    const { sim, source, destination, worm } = setup()

    stepWorld(sim, 50)

    expect(sim.runtime.isEnabled(source, teleporting)).toBe(true)
    const hop = sim.runtime.fields(source, teleporting)
    expect(hop.payload).toBe(worm)
    expect(hop.destination).toBe(destination)
    expect(hop.from).toEqual({ x: 6, y: 0 })
    expect(hop.to).toEqual({ x: 320, y: 0 })
    // 314 units at 160 per second
    expect(hop.duration).toBeCloseTo(1.9625, 10)
    expect(sim.host.fields.collides(worm, 'creature')).toBe(false)
    expect(sim.host.fields.collides(worm, 'portal')).toBe(false)
  })

  it('shrinks the worm and slides it along the way', () => {
    const { sim, worm } = setup()
    for (let i = 0; i < 21; i++) stepWorld(sim, 50)

    expect(sim.host.fields.size(worm)).toBeCloseTo(DEFAULT_WORLD_CONFIG.portal.transitSize, 5)
    const { x, y } = sim.host.fields.position(worm)
    expect(x).toBeGreaterThan(6)
    expect(x).toBeLessThan(320)
    expect(y).toBe(0)
  })

  it('hands the worm to the destination, which then ignores it for a while', () => {
    const { sim, source, destination, worm } = setup()
    stepWorld(sim, 50)

    let steps = 0
    while (sim.runtime.isEnabled(source, teleporting) && steps < 100) {
      stepWorld(sim, 50)
      steps++
    }
    expect(steps).toBeLessThan(100)
    expect(sim.runtime.isEnabled(source, teleporting)).toBe(false)

    const position = sim.host.fields.position(worm)
    expect(position.x).toBeCloseTo(320, 4)
    expect(position.y).toBeCloseTo(0, 4)
    expect(sim.host.fields.size(worm)).toBe(DEFAULT_WORLD_CONFIG.worm.size)
    expect(sim.host.fields.collides(worm, 'creature')).toBe(true)
    expect(sim.runtime.isEnabled(destination, cooling)).toBe(true)
    expect(sim.runtime.fields(destination, cooling).payload).toBe(worm)

    // Touching the destination now is ignored instead of sending the worm back.
    stepWorld(sim, 50)
    expect(sim.runtime.isEnabled(destination, teleporting)).toBe(false)

    for (let i = 0; i < 45; i++) stepWorld(sim, 50)
    expect(sim.runtime.isEnabled(destination, cooling)).toBe(false)
    expect(get(sim.runtime.telemetry.faults)).toEqual([])
  })

  it('does nothing when it is alone on its network', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const lonely = spawnCreature(sim, 'portal', { x: 0, y: 0 }, { tags: { [NETWORK_TAG]: 'amber' } })
    const worm = spawnCreature(sim, 'worm', { x: 6, y: 0 })

    stepWorld(sim, 50)

    expect(sim.runtime.isEnabled(lonely, teleporting)).toBe(false)
    expect(sim.host.fields.collides(worm, 'portal')).toBe(true)
    expect(sim.host.fields.size(worm)).toBe(DEFAULT_WORLD_CONFIG.worm.size)
    expect(get(sim.runtime.telemetry.faults)).toEqual([])
  })

  it('lets only one portal take a worm touching two at once', () => {
    const sim = createSimulation(config, { runtime: { trace: false } })
    const first = spawnCreature(sim, 'portal', { x: 0, y: 0 }, { tags: { [NETWORK_TAG]: 'amber' } })
    const second = spawnCreature(sim, 'portal', { x: 14, y: 0 }, { tags: { [NETWORK_TAG]: 'amber' } })
    const worm = spawnCreature(sim, 'worm', { x: 7, y: 0 })

    stepWorld(sim, 50)

    expect(sim.runtime.isEnabled(first, teleporting)).toBe(true)
    expect(sim.runtime.fields(first, teleporting).payload).toBe(worm)
    expect(sim.runtime.isEnabled(second, teleporting)).toBe(false)
  })

  it('puts the worm back to normal when the destination dies before taking it', () => {
    const { sim, source, destination, worm } = setup()
    stepWorld(sim, 50)

    let steps = 0
    while (!sim.runtime.fields(source, teleporting).sent && steps < 100) {
      stepWorld(sim, 50)
      steps++
    }
    expect(steps).toBeLessThan(100)

    sim.host.kill(destination)
    stepWorld(sim, 50)

    expect(sim.runtime.has(destination)).toBe(false)
    expect(sim.runtime.isEnabled(source, teleporting)).toBe(false)
    expect(sim.host.fields.size(worm)).toBe(DEFAULT_WORLD_CONFIG.worm.size)
    expect(sim.host.fields.collides(worm, 'creature')).toBe(true)
    expect(sim.host.fields.collides(worm, 'portal')).toBe(true)
    expect(get(sim.runtime.telemetry.faults)).toEqual([])
  })

  it('puts the worm back to normal when the portal dies mid hop', () => {
    const { sim, source, worm } = setup()
    for (let i = 0; i < 10; i++) stepWorld(sim, 50)

    sim.host.kill(source)
    stepWorld(sim, 50)

    expect(sim.runtime.has(source)).toBe(false)
    expect(sim.host.fields.size(worm)).toBe(DEFAULT_WORLD_CONFIG.worm.size)
    expect(sim.host.fields.collides(worm, 'creature')).toBe(true)
  })
})
