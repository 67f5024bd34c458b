import type { Vector2 } from '@/types/sim'

export const add = (a: Vector2, b: Vector2): Vector2 => ({ x: a.x + b.x, y: a.y + b.y })

export const sub = (a: Vector2, b: Vector2): Vector2 => ({ x: a.x - b.x, y: a.y - b.y })

export const scale = (v: Vector2, s: number): Vector2 => ({ x: v.x * s, y: v.y * s })

export const dot = (a: Vector2, b: Vector2) => a.x * b.x + a.y * b.y

export const distanceSquared = (a: Vector2, b: Vector2) => {
  const dx = a.x - b.x
  const dy = a.y - b.y
  return dx * dx + dy * dy
}

export const distance = (a: Vector2, b: Vector2) => Math.sqrt(distanceSquared(a, b))

export const magnitude = (v: Vector2) => Math.sqrt(dot(v, v))

// Zero stays zero instead of turning into NaN.
export const normalize = (v: Vector2): Vector2 => {
  const len = magnitude(v)
  return len > 0 ? scale(v, 1 / len) : { x: 0, y: 0 }
}

export const clamp = (value: number, min = 0, max = 1) => Math.min(max, Math.max(min, value))

export const lerp = (a: number, b: number, t: number) => a + (b - a) * t

export const lerpVector = (a: Vector2, b: Vector2, t: number): Vector2 => ({
  x: lerp(a.x, b.x, t),
  y: lerp(a.y, b.y, t),
})

export const smoothstep = (t: number) => {
  const x = clamp(t, 0, 1)
  return x * x * (3 - 2 * x)
}

/** Unit vector from `from` toward `to`, scaled by `amount`. */
export const toward = (from: Vector2, to: Vector2, amount = 1): Vector2 =>
  scale(normalize(sub(to, from)), amount)

/** Steps `current` toward `target` by at most `step`, landing exactly on it when close enough. */
export function moveToward(current: Vector2, target: Vector2, step: number): Vector2 {
  const delta = sub(target, current)
  const len = magnitude(delta)
  if (len <= step || len === 0) return { x: target.x, y: target.y }
  return add(current, scale(delta, step / len))
}

/**
 * Spherical interpolation between two direction vectors. Magnitudes are
 * interpolated linearly so non-unit inputs keep a sensible length.
 */
export function slerp(from: Vector2, to: Vector2, t: number): Vector2 {
  const a = Math.atan2(from.y, from.x)
  const b = Math.atan2(to.y, to.x)
  const angle = lerpAngle(a, b, t)
  const len = lerp(magnitude(from), magnitude(to), t)
  return { x: Math.cos(angle) * len, y: Math.sin(angle) * len }
}

export const lerpAngle = (a: number, b: number, t: number) => {
  const diff = ((b - a + Math.PI * 3) % (Math.PI * 2)) - Math.PI
  return a + diff * t
}
