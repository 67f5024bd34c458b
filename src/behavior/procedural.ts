import { BEHAVIOR_ERROR, BehaviorError } from './errors'

import type { BobTerm, Vector2, WanderProfile } from '@/types/sim'
import { distanceSquared, scale, smoothstep } from '@/utils/math'
import { randRange, type RNG } from '@/utils/rand'

// Seconds spent easing in and out at either end of a teleport.
export const TELEPORT_RAMP = 0.5

/**
 * The candidate nearest to `reference` by squared distance. Ties go to the
 * earlier candidate. Callers must branch on an empty list before calling.
 */
export function closestEntity<T>(
  reference: Vector2,
  candidates: readonly T[],
  positionOf: (candidate: T) => Vector2,
): T {
  if (candidates.length === 0) {
    throw new BehaviorError(BEHAVIOR_ERROR.EMPTY_SELECTION, 'closestEntity needs at least one candidate')
  }
  let best = candidates[0]
  let bestDistance = distanceSquared(reference, positionOf(best))
  for (let i = 1; i < candidates.length; i++) {
    const d = distanceSquared(reference, positionOf(candidates[i]))
    if (d < bestDistance) {
      best = candidates[i]
      bestDistance = d
    }
  }
  return best
}

export const bobOffset = (height: number, frequency: number, time: number, seed: number) =>
  height * Math.sin(frequency * (time + seed))

const sumTerms = (terms: readonly BobTerm[], time: number, seed: number) =>
  terms.reduce((total, term) => total + bobOffset(term.height, term.frequency, time, seed), 0)

export const wanderOffset = (profile: WanderProfile, time: number, seed: number): Vector2 => ({
  x: sumTerms(profile.x, time, seed),
  y: sumTerms(profile.y, time, seed),
})

/**
 * Movement between two samples of the wander path. Summing deltas over
 * consecutive ticks lands where one delta over the whole span would.
 */
export function bobDelta(profile: WanderProfile, seed: number, now: number, previous: number): Vector2 {
  const a = wanderOffset(profile, previous, seed)
  const b = wanderOffset(profile, now, seed)
  return { x: b.x - a.x, y: b.y - a.y }
}

/** Uniform direction from one angle draw, with a magnitude drawn from [min, max]. */
export function randomVector(rng: RNG, min: number, max = min): Vector2 {
  const angle = randRange(rng, 0, Math.PI * 2)
  return scale({ x: Math.cos(angle), y: Math.sin(angle) }, randRange(rng, min, max))
}

/**
 * 0 at rest, 1 in transit. Ramps up over the first half second and back
 * down over the last; the ramp-out wins when the two overlap.
 */
export function teleportBlend(elapsed: number, duration: number) {
  const timeLeft = duration - elapsed
  if (timeLeft < TELEPORT_RAMP) return Math.max(0, timeLeft) / TELEPORT_RAMP
  if (elapsed < TELEPORT_RAMP) return Math.max(0, elapsed) / TELEPORT_RAMP
  return 1
}

/** Progress along the hop itself, which only starts once the ramp-in is over. */
export function teleportTransit(elapsed: number, duration: number) {
  if (elapsed <= TELEPORT_RAMP) return 0
  if (duration <= TELEPORT_RAMP) return 1
  return smoothstep((elapsed - TELEPORT_RAMP) / (duration - TELEPORT_RAMP))
}
