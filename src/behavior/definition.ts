import { BEHAVIOR_ERROR, BehaviorError } from './errors'
import { bindScope, type AnyLayer } from './layer'
import type { BaseHandlers, GroupDecls } from './types'

export const DEFAULT_BEHAVIOR = 'DefaultBehavior'

export interface BehaviorDecl<THost> {
  name: string
  handlers?: BaseHandlers<THost>
  groups?: GroupDecls<THost>
  overlays?: readonly AnyLayer<THost>[]
  // Runs once per tick for the whole archetype, before any entity dispatch.
  staticUpdate?: (host: THost) => void
}

export interface BehaviorDefinition<THost> {
  readonly name: string
  readonly handlers: BaseHandlers<THost>
  readonly groups: GroupDecls<THost>
  readonly overlays: readonly AnyLayer<THost>[]
  // Root layers: members of the root groups followed by the root overlays.
  readonly layers: readonly AnyLayer<THost>[]
  readonly staticUpdate?: (host: THost) => void
  owns(layer: AnyLayer<THost>): boolean
  layer(path: string): AnyLayer<THost> | undefined
}

export function defineBehavior<THost>(decl: BehaviorDecl<THost>): BehaviorDefinition<THost> {
  if (!decl.name) {
    throw new BehaviorError(BEHAVIOR_ERROR.INVALID_DEFINITION, 'Behavior definitions need a name')
  }
  const groups = decl.groups ?? {}
  const overlays = decl.overlays ?? []
  const layers = bindScope(undefined, groups, overlays, decl.name)

  const byPath = new Map<string, AnyLayer<THost>>()
  const index = (layer: AnyLayer<THost>) => {
    byPath.set(layer.path(), layer)
    layer.children.forEach(index)
  }
  layers.forEach(index)
  const members = new Set(byPath.values())

  return Object.freeze({
    name: decl.name,
    handlers: Object.freeze({ ...decl.handlers }),
    groups,
    overlays,
    layers,
    staticUpdate: decl.staticUpdate,
    owns: (layer: AnyLayer<THost>) => members.has(layer),
    layer: (path: string) => byPath.get(path),
  })
}
