import { describe, expect, it } from 'vitest'

import { BEHAVIOR_ERROR, isBehaviorError } from '@/behavior/errors'
import {
  bobDelta,
  bobOffset,
  closestEntity,
  randomVector,
  teleportBlend,
  teleportTransit,
  wanderOffset,
} from '@/behavior/procedural'
import type { Vector2, WanderProfile } from '@/types/sim'
import { lerpAngle, magnitude, moveToward, slerp, smoothstep } from '@/utils/math'
import { mulberry32 } from '@/utils/rand'

const profile: WanderProfile = {
  x: [
    { height: 6, frequency: 0.9 },
    { height: 2.5, frequency: 2.3 },
  ],
  y: [
    { height: 5, frequency: 1.1 },
    { height: 2, frequency: 2.9 },
  ],
}

describe('closestEntity', () => {
  const positions: Record<string, Vector2> = {
    far: { x: 3, y: 0 },
    near: { x: 1, y: 0 },
    middle: { x: 0, y: 2 },
    alsoNear: { x: 0, y: -1 },
  }
  const at = (name: string) => positions[name]

  it('picks the smallest squared distance', () => {
    expect(closestEntity({ x: 0, y: 0 }, ['far', 'near', 'middle'], at)).toBe('near')
  })

  it('keeps the first candidate on ties', () => {
    expect(closestEntity({ x: 0, y: 0 }, ['alsoNear', 'near'], at)).toBe('alsoNear')
    expect(closestEntity({ x: 0, y: 0 }, ['near', 'alsoNear'], at)).toBe('near')
  })

  it('rejects an empty candidate list', () => {
    let category = 'NONE'
    try {
      closestEntity({ x: 0, y: 0 }, [], at)
    } catch (error) {
      category = isBehaviorError(error) ? error.category : 'OTHER'
    }
    expect(category).toBe(BEHAVIOR_ERROR.EMPTY_SELECTION)
  })
})

describe('bobbing', () => {
  it('follows height * sin(frequency * (time + seed))', () => {
    expect(bobOffset(2, 3, 1, 0.5)).toBeCloseTo(2 * Math.sin(4.5), 12)
    expect(bobOffset(4, 1, 0, 0)).toBe(0)
  })

  it('sums every term of an axis', () => {
    const offset = wanderOffset(profile, 2, 1)
    expect(offset.x).toBeCloseTo(6 * Math.sin(0.9 * 3) + 2.5 * Math.sin(2.3 * 3), 12)
    expect(offset.y).toBeCloseTo(5 * Math.sin(1.1 * 3) + 2 * Math.sin(2.9 * 3), 12)
  })

  it('gives path independent deltas', () => {
    const seed = 3.7
    const [t1, t2, t3] = [1.2, 2.5, 4.1]
    const stepped = [bobDelta(profile, seed, t2, t1), bobDelta(profile, seed, t3, t2)]
    const direct = bobDelta(profile, seed, t3, t1)
    expect(stepped[0].x + stepped[1].x).toBeCloseTo(direct.x, 10)
    expect(stepped[0].y + stepped[1].y).toBeCloseTo(direct.y, 10)
  })

  it('does not move when no time passed', () => {
    expect(bobDelta(profile, 9, 3, 3)).toEqual({ x: 0, y: 0 })
  })
})

describe('randomVector', () => {
  it('keeps the magnitude inside the range', () => {
    const rng = mulberry32(7)
    for (let i = 0; i < 50; i++) {
      const length = magnitude(randomVector(rng, 2, 5))
      expect(length).toBeGreaterThanOrEqual(2 - 1e-9)
      expect(length).toBeLessThanOrEqual(5 + 1e-9)
    }
  })

  it('settles on a direction with a constant stub generator', () => {
    // Half way round the circle: pointing left.
    const v = randomVector(() => 0.5, 2)
    expect(v.x).toBeCloseTo(-2, 10)
    expect(v.y).toBeCloseTo(0, 10)
  })

  it('uses a fixed magnitude when only min is given', () => {
    const rng = mulberry32(11)
    expect(magnitude(randomVector(rng, 3))).toBeCloseTo(3, 10)
  })
})

describe('teleport ease', () => {
  it('blends in, holds, and blends out', () => {
    expect(teleportBlend(0, 2)).toBe(0)
    expect(teleportBlend(0.25, 2)).toBe(0.5)
    expect(teleportBlend(1, 2)).toBe(1)
    expect(teleportBlend(1.75, 2)).toBe(0.5)
    expect(teleportBlend(2, 2)).toBe(0)
  })

  it('has no jumps at either end of the hold', () => {
    const epsilon = 1e-9
    expect(teleportBlend(0.5 - epsilon, 2)).toBeCloseTo(teleportBlend(0.5, 2), 6)
    expect(teleportBlend(1.5 + epsilon, 2)).toBeCloseTo(teleportBlend(1.5, 2), 6)
  })

  it('lets the ramp-out win on short hops', () => {
    expect(teleportBlend(0.1, 0.8)).toBeCloseTo(0.2, 12)
    expect(teleportBlend(0.4, 0.8)).toBeCloseTo(0.8, 12)
  })

  it('only slides once the ramp-in is over', () => {
    expect(teleportTransit(0.3, 2)).toBe(0)
    expect(teleportTransit(0.5, 2)).toBe(0)
    expect(teleportTransit(1.25, 2)).toBe(0.5)
    expect(teleportTransit(2, 2)).toBe(1)
    expect(teleportTransit(3, 2)).toBe(1)
    expect(teleportTransit(0.6, 0.4)).toBe(1)
  })
})

describe('motion primitives', () => {
  it('steps toward a target without overshooting', () => {
    expect(moveToward({ x: 0, y: 0 }, { x: 10, y: 0 }, 4)).toEqual({ x: 4, y: 0 })
    expect(moveToward({ x: 0, y: 0 }, { x: 3, y: 4 }, 6)).toEqual({ x: 3, y: 4 })
  })

  it('smoothsteps with clamping', () => {
    expect(smoothstep(-1)).toBe(0)
    expect(smoothstep(0.5)).toBe(0.5)
    expect(smoothstep(2)).toBe(1)
  })

  it('slerps along the short arc', () => {
    const halfway = slerp({ x: 1, y: 0 }, { x: 0, y: 1 }, 0.5)
    expect(halfway.x).toBeCloseTo(Math.SQRT1_2, 10)
    expect(halfway.y).toBeCloseTo(Math.SQRT1_2, 10)
    expect(lerpAngle(3, -3, 0.5)).toBeCloseTo(Math.PI, 10)
  })
})
