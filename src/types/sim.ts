export type ArchetypeName = 'worm' | 'slime' | 'portal'

export interface Vector2 {
  x: number
  y: number
}

export type Facing = 'left' | 'right'

export interface BobTerm {
  height: number
  frequency: number
}

// Two or more terms per axis at different frequencies read as organic drifting.
export interface WanderProfile {
  x: readonly BobTerm[]
  y: readonly BobTerm[]
}

export interface WormTuning {
  radius: number
  size: number
  wander: WanderProfile
}

export interface SlimeTuning {
  radius: number
  size: number
  huntSpeed: number
  fleeSpeed: number
  // Seconds a freshly split slime runs before it starts hunting again.
  fleeDuration: number
  // Seconds without eating before a hungry slime splits.
  hungerTimeout: number
  spawnSpread: number
  wander: WanderProfile
}

export interface PortalTuning {
  radius: number
  size: number
  // Distance units per second; sets how long a hop takes.
  speed: number
  minDuration: number
  // Seconds a receiving portal ignores the payload it just placed.
  cooldown: number
  // Payload size while it is in transit.
  transitSize: number
}

export interface WorldConfig {
  bounds: Vector2
  // Seconds of simulated time per tick.
  timeStep: number
  spatialHashCellSize: number
  rngSeed: number
  population: {
    worms: number
    slimes: number
    portalsPerNetwork: number
  }
  networks: readonly string[]
  worm: WormTuning
  slime: SlimeTuning
  portal: PortalTuning
}

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  bounds: { x: 640, y: 480 },
  timeStep: 1 / 20,
  spatialHashCellSize: 32,
  rngSeed: Date.now(),
  population: {
    worms: 24,
    slimes: 3,
    portalsPerNetwork: 3,
  },
  networks: ['amber', 'cobalt'],
  worm: {
    radius: 4,
    size: 1,
    wander: {
      x: [
        { height: 6, frequency: 0.9 },
        { height: 2.5, frequency: 2.3 },
      ],
      y: [
        { height: 5, frequency: 1.1 },
        { height: 2, frequency: 2.9 },
      ],
    },
  },
  slime: {
    radius: 8,
    size: 1.5,
    huntSpeed: 28,
    fleeSpeed: 40,
    fleeDuration: 7.5,
    hungerTimeout: 15,
    spawnSpread: 12,
    wander: {
      x: [
        { height: 4, frequency: 0.5 },
        { height: 1.5, frequency: 1.7 },
      ],
      y: [
        { height: 4, frequency: 0.6 },
        { height: 1.5, frequency: 1.3 },
      ],
    },
  },
  portal: {
    radius: 10,
    size: 2,
    speed: 160,
    minDuration: 1.5,
    cooldown: 2,
    transitSize: 0.2,
  },
}
