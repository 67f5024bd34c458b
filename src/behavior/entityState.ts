import type { BehaviorDefinition } from './definition'
import type { AnyLayer, LayerScope } from './layer'
import type { EntityId } from './types'

const groupKey = <THost>(group: string, owner: AnyLayer<THost> | undefined) =>
  owner ? `${owner.id}:${group}` : `root:${group}`

/**
 * The active-layer stack of one live entity. Layers key their field storage
 * by this object, so dropping it releases everything the entity held.
 */
export class EntityBehaviorState<THost> implements LayerScope {
  #definition: BehaviorDefinition<THost>
  // Active layer -> activation sequence number. Higher means more recent.
  #active = new Map<AnyLayer<THost>, number>()
  #switching = new Set<string>()
  #sequence = 0
  // Nesting level of dispatches currently running on this entity.
  depth = 0

  constructor(
    readonly entity: EntityId,
    definition: BehaviorDefinition<THost>,
  ) {
    this.#definition = definition
  }

  get definition() {
    return this.#definition
  }

  swap(definition: BehaviorDefinition<THost>) {
    this.#definition = definition
  }

  isActive(layer: AnyLayer<THost>) {
    return this.#active.has(layer)
  }

  markActive(layer: AnyLayer<THost>) {
    this.#active.set(layer, ++this.#sequence)
  }

  markInactive(layer: AnyLayer<THost>) {
    this.#active.delete(layer)
  }

  get size() {
    return this.#active.size
  }

  /** Members of `group` inside `owner` (or the definition root). */
  members(group: string, owner?: AnyLayer<THost>): readonly AnyLayer<THost>[] {
    const groups = owner ? owner.groups : this.#definition.groups
    return groups[group]?.members ?? []
  }

  activeMember(group: string, owner?: AnyLayer<THost>) {
    return this.members(group, owner).find((layer) => this.#active.has(layer))
  }

  /** Active direct children of `owner`, most recently activated first. */
  activeChildren(owner?: AnyLayer<THost>): AnyLayer<THost>[] {
    const children = owner ? owner.children : this.#definition.layers
    return children
      .filter((layer) => this.#active.has(layer))
      .sort((a, b) => (this.#active.get(b) ?? 0) - (this.#active.get(a) ?? 0))
  }

  /**
   * Handler resolution order: deepest active layer first, siblings most
   * recent first, each layer after all of its own active descendants.
   */
  chain(): AnyLayer<THost>[] {
    const out: AnyLayer<THost>[] = []
    const visit = (owner?: AnyLayer<THost>) => {
      this.activeChildren(owner).forEach((layer) => {
        visit(layer)
        out.push(layer)
      })
    }
    visit()
    return out
  }

  /** Paths of the active layers in activation order. */
  activeLayers(): string[] {
    return [...this.#active.entries()].sort((a, b) => a[1] - b[1]).map(([layer]) => layer.path())
  }

  beginSwitch(group: string, owner: AnyLayer<THost> | undefined) {
    const key = groupKey(group, owner)
    if (this.#switching.has(key)) return false
    this.#switching.add(key)
    return true
  }

  endSwitch(group: string, owner: AnyLayer<THost> | undefined) {
    this.#switching.delete(groupKey(group, owner))
  }
}
