import type { BehaviorHost, EntityId } from '@/behavior/types'
import type { ArchetypeName, Facing, Vector2, WorldConfig } from '@/types/sim'
import type { RNG } from '@/utils/rand'

export type CollisionGroupName = 'creature' | 'portal'

export interface WanderClock {
  seed: number
  // Simulation time of the previous tick, stamped by the host every tick.
  lastTime: number
}

/** Per-entity data the behaviors read and write. */
export interface FieldStore {
  position(entity: EntityId): Vector2
  setPosition(entity: EntityId, position: Vector2): void
  move(entity: EntityId, delta: Vector2): void
  size(entity: EntityId): number
  setSize(entity: EntityId, size: number): void
  facing(entity: EntityId): Facing
  setFacing(entity: EntityId, facing: Facing): void
  archetype(entity: EntityId): ArchetypeName | undefined
  wander(entity: EntityId): WanderClock
  collides(entity: EntityId, group: CollisionGroupName): boolean
  /** Flips (or sets, when `desired` is given) one whitelist bit and returns the new state. */
  toggleCollisionWhitelist(entity: EntityId, group: CollisionGroupName, desired?: boolean): boolean
  hasTag(entity: EntityId, tag: string): boolean
  tagVal(entity: EntityId, tag: string): string | undefined
}

export interface SpawnOptions {
  tags?: Record<string, string | undefined>
  size?: number
}

export interface SimulationHost extends BehaviorHost {
  readonly fields: FieldStore
  readonly rng: RNG
  readonly config: WorldConfig
  // Seconds covered by the current tick.
  readonly delta: number
  spawn(archetype: ArchetypeName, position: Vector2, options?: SpawnOptions): EntityId
  // The entity stays in the world until the end of the tick.
  kill(entity: EntityId): void
  isAlive(entity: EntityId): boolean
  instancesOf(archetype: ArchetypeName): EntityId[]
  allTaggedWithVal(tag: string, value: string): EntityId[]
  send(target: EntityId, name: string, ...args: unknown[]): void
  now(): number
}
