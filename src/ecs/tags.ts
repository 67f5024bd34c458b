import type { EntityId } from '@/behavior/types'

/**
 * Named tags with an optional string value, looked up in both directions.
 * Iteration follows tagging order.
 */
export class TagBank {
  #byTag = new Map<string, Map<EntityId, string | undefined>>()
  #byEntity = new Map<EntityId, Set<string>>()

  tag(entity: EntityId, tag: string, value?: string) {
    let holders = this.#byTag.get(tag)
    if (!holders) {
      holders = new Map()
      this.#byTag.set(tag, holders)
    }
    holders.set(entity, value)

    let tags = this.#byEntity.get(entity)
    if (!tags) {
      tags = new Set()
      this.#byEntity.set(entity, tags)
    }
    tags.add(tag)
  }

  untag(entity: EntityId, tag: string) {
    const holders = this.#byTag.get(tag)
    if (holders) {
      holders.delete(entity)
      if (holders.size === 0) this.#byTag.delete(tag)
    }
    this.#byEntity.get(entity)?.delete(tag)
  }

  hasTag(entity: EntityId, tag: string) {
    return this.#byTag.get(tag)?.has(entity) ?? false
  }

  tagVal(entity: EntityId, tag: string) {
    return this.#byTag.get(tag)?.get(entity)
  }

  allTagged(tag: string): EntityId[] {
    return [...(this.#byTag.get(tag)?.keys() ?? [])]
  }

  allTaggedWithVal(tag: string, value: string): EntityId[] {
    const out: EntityId[] = []
    this.#byTag.get(tag)?.forEach((held, entity) => {
      if (held === value) out.push(entity)
    })
    return out
  }

  /** The single entity carrying `tag`. */
  entTagged(tag: string): EntityId {
    const holders = this.allTagged(tag)
    if (holders.length !== 1) {
      throw new Error(`Expected exactly one entity tagged "${tag}", found ${holders.length}`)
    }
    return holders[0]
  }

  tagsOf(entity: EntityId): string[] {
    return [...(this.#byEntity.get(entity) ?? [])]
  }

  forget(entity: EntityId) {
    this.tagsOf(entity).forEach((tag) => this.untag(entity, tag))
    this.#byEntity.delete(entity)
  }
}
