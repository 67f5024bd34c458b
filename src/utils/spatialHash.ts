import type { Vector2 } from '@/types/sim'

export interface SpatialBucket<T> {
  id: number
  data: T
}

/** Uniform grid broad phase. Each id lives in exactly one cell, the one holding its last position. */
export class SpatialHash<T = number> {
  #cellSize: number
  #cells = new Map<string, Map<number, SpatialBucket<T>>>()
  #index = new Map<number, string>()

  constructor(cellSize: number) {
    if (!(cellSize > 0)) {
      throw new RangeError(`Spatial hash cell size must be positive, got ${cellSize}`)
    }
    this.#cellSize = cellSize
  }

  #key(x: number, y: number) {
    return `${Math.floor(x / this.#cellSize)}:${Math.floor(y / this.#cellSize)}`
  }

  set(position: Vector2, bucket: SpatialBucket<T>) {
    const key = this.#key(position.x, position.y)
    const previousKey = this.#index.get(bucket.id)
    if (previousKey !== undefined && previousKey !== key) {
      this.#evict(previousKey, bucket.id)
    }
    let cell = this.#cells.get(key)
    if (!cell) {
      cell = new Map()
      this.#cells.set(key, cell)
    }
    cell.set(bucket.id, bucket)
    this.#index.set(bucket.id, key)
  }

  delete(id: number) {
    const key = this.#index.get(id)
    if (key === undefined) return
    this.#evict(key, id)
    this.#index.delete(id)
  }

  /** Everything in the cells overlapping the square around `position`. Callers do the exact distance check. */
  query(position: Vector2, radius: number) {
    const results: SpatialBucket<T>[] = []
    const minX = Math.floor((position.x - radius) / this.#cellSize)
    const maxX = Math.floor((position.x + radius) / this.#cellSize)
    const minY = Math.floor((position.y - radius) / this.#cellSize)
    const maxY = Math.floor((position.y + radius) / this.#cellSize)

    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        this.#cells.get(`${cx}:${cy}`)?.forEach((bucket) => results.push(bucket))
      }
    }
    return results
  }

  #evict(key: string, id: number) {
    const cell = this.#cells.get(key)
    if (!cell) return
    cell.delete(id)
    if (cell.size === 0) this.#cells.delete(key)
  }
}
