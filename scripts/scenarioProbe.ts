import { get } from 'svelte/store'

import { initWorld, populationCounts, stepWorld } from '../src/ecs/world'
import { DEFAULT_WORLD_CONFIG, type WorldConfig } from '../src/types/sim'

type ProbeResult = {
  label: string
  tick: number
  worms: number
  slimes: number
  spawned: number
  died: number
  transitions: number
  faults: number
}

function runProbe(label: string, patch: Partial<WorldConfig>, steps = 6_000): ProbeResult {
  const config: WorldConfig = { ...DEFAULT_WORLD_CONFIG, ...patch, rngSeed: 1337 }
  const ctx = initWorld(config)
  const dtMs = config.timeStep * 1000

  for (let i = 0; i < steps; i++) {
    stepWorld(ctx, dtMs)
    if ((i + 1) % 1000 === 0) {
      const counts = populationCounts(ctx)
      console.log(
        `[${label}] tick=${ctx.tick} t=${ctx.time.toFixed(1)}s worms=${counts.worm} slimes=${counts.slime} spawned=${ctx.metrics.spawned} died=${ctx.metrics.died}`,
      )
    }
  }

  const counts = populationCounts(ctx)
  const summary = get(ctx.runtime.telemetry.summary)
  return {
    label,
    tick: ctx.tick,
    worms: counts.worm,
    slimes: counts.slime,
    spawned: ctx.metrics.spawned,
    died: ctx.metrics.died,
    transitions: summary.transitions,
    faults: summary.faults,
  }
}

const results: ProbeResult[] = [
  runProbe('baseline', {}),
  runProbe('crowded', {
    population: { ...DEFAULT_WORLD_CONFIG.population, worms: 80, slimes: 6 },
  }),
]

for (const r of results) {
  console.log(
    [
      r.label.padEnd(10),
      `tick=${r.tick}`,
      `worms=${r.worms}`,
      `slimes=${r.slimes}`,
      `spawned=${r.spawned}`,
      `died=${r.died}`,
      `transitions=${r.transitions}`,
      `faults=${r.faults}`,
    ].join(' '),
  )
}
