import { BEHAVIOR_ERROR, BehaviorError } from './errors'
import type {
  ActivationContext,
  Continuation,
  EntityId,
  GroupDecls,
  HandlerArgs,
  HandlerContext,
  HandlerName,
  LayerContext,
  LayerWraps,
} from './types'

/** Per-entity key under which a layer keeps its live fields. */
export interface LayerScope {
  readonly entity: EntityId
}

export interface LayerPlacement<THost> {
  // undefined when the layer sits at the root of a behavior definition.
  owner: AnyLayer<THost> | undefined
  group: string | undefined
}

export type EmptyFields = Record<never, never>

export interface LayerDecl<THost, F extends object, A extends unknown[]> {
  name: string
  /** Names of the init arguments, checked against `init` when the layer is defined. */
  params?: readonly string[]
  /** Evaluated on every activation, so re-enabling never sees stale values. */
  fields: (activation: ActivationContext<THost>) => F
  wraps?: LayerWraps<THost, F>
  init?: (ctx: LayerContext<THost, F>, ...args: A) => void
  exit?: (ctx: LayerContext<THost, F>) => void
  groups?: GroupDecls<THost>
  overlays?: readonly AnyLayer<THost>[]
}

export interface StateLayer<THost, F extends object = EmptyFields, A extends unknown[] = []> {
  readonly id: number
  readonly name: string
  readonly params: readonly string[]
  readonly groups: GroupDecls<THost>
  readonly overlays: readonly AnyLayer<THost>[]
  // Group members and overlays declared directly inside this layer.
  readonly children: readonly AnyLayer<THost>[]
  placement(): LayerPlacement<THost> | undefined
  bind(placement: LayerPlacement<THost>): void
  path(): string
  handles(handler: HandlerName): boolean
  read(scope: LayerScope): F | undefined
  readonly open: (scope: LayerScope, activation: ActivationContext<THost>) => void
  readonly start: (scope: LayerScope, ctx: HandlerContext<THost>, args: A) => void
  readonly close: (scope: LayerScope, ctx: HandlerContext<THost>) => void
  invoke<H extends HandlerName>(
    handler: H,
    scope: LayerScope,
    ctx: HandlerContext<THost>,
    next: Continuation,
    args: HandlerArgs[H],
  ): unknown
}

// Any layer, whatever its fields or init arguments.
export type AnyLayer<THost> = StateLayer<THost, object, never>

let nextLayerId = 1

function invalid(message: string, context?: Record<string, unknown>) {
  return new BehaviorError(BEHAVIOR_ERROR.INVALID_DEFINITION, message, context)
}

export function defineLayer<THost, F extends object = EmptyFields, A extends unknown[] = []>(
  decl: LayerDecl<THost, F, A>,
): StateLayer<THost, F, A> {
  if (!decl.name || decl.name.includes('/')) {
    throw invalid(`Layer name "${decl.name}" must be non-empty and contain no "/"`)
  }
  const params = decl.params ?? []
  // The first parameter is the context; default-valued parameters do not count towards length.
  if (decl.init && decl.init.length - 1 > params.length) {
    throw invalid(`Layer "${decl.name}" init takes ${decl.init.length - 1} arguments but declares ${params.length}`, {
      layer: decl.name,
      params,
    })
  }

  const slots = new WeakMap<LayerScope, F>()
  const wraps: LayerWraps<THost, F> = decl.wraps ?? {}
  const groups = decl.groups ?? {}
  const overlays = decl.overlays ?? []
  const children = collectChildren(groups, overlays)
  let placement: LayerPlacement<THost> | undefined

  const contextFor = (scope: LayerScope, ctx: HandlerContext<THost>): LayerContext<THost, F> => ({
    ...ctx,
    layer,
    get fields() {
      const fields = slots.get(scope)
      if (!fields) {
        throw new BehaviorError(
          BEHAVIOR_ERROR.INACTIVE_FIELD_ACCESS,
          `Fields of layer "${layer.path()}" read while it is inactive`,
          { entity: scope.entity, layer: layer.path() },
        )
      }
      return fields
    },
  })

  const layer: StateLayer<THost, F, A> = {
    id: nextLayerId++,
    name: decl.name,
    params,
    groups,
    overlays,
    children,
    placement: () => placement,
    bind(next) {
      if (placement) {
        throw invalid(`Layer "${decl.name}" is declared in more than one place`, { layer: decl.name })
      }
      placement = next
    },
    path() {
      if (!placement) return decl.name
      const prefix = placement.owner ? `${placement.owner.path()}/` : ''
      return placement.group === undefined ? `${prefix}${decl.name}` : `${prefix}${placement.group}/${decl.name}`
    },
    handles: (handler) => wraps[handler] !== undefined,
    read: (scope) => slots.get(scope),
    open(scope, activation) {
      if (slots.has(scope)) {
        throw new BehaviorError(BEHAVIOR_ERROR.LAYER_INVARIANT, `Layer "${layer.path()}" opened twice`, {
          entity: scope.entity,
        })
      }
      slots.set(scope, decl.fields(activation))
    },
    start(scope, ctx, args) {
      if (!decl.init) return
      try {
        decl.init(contextFor(scope, ctx), ...args)
      } catch (error) {
        slots.delete(scope)
        throw error
      }
    },
    close(scope, ctx) {
      try {
        decl.exit?.(contextFor(scope, ctx))
      } finally {
        slots.delete(scope)
      }
    },
    invoke(handler, scope, ctx, next, args) {
      const wrap = wraps[handler]
      return wrap ? wrap(contextFor(scope, ctx), next, ...args) : next()
    },
  }

  bindScope(layer, groups, overlays, decl.name)
  return layer
}

function collectChildren<THost>(groups: GroupDecls<THost>, overlays: readonly AnyLayer<THost>[]) {
  const children: AnyLayer<THost>[] = []
  Object.values(groups).forEach((group) => children.push(...group.members))
  children.push(...overlays)
  return children
}

/**
 * Validates a scope (a definition root or a layer) and claims its layers.
 * Names are unique per scope and a group's initial member must be one of its members.
 */
export function bindScope<THost>(
  owner: AnyLayer<THost> | undefined,
  groups: GroupDecls<THost>,
  overlays: readonly AnyLayer<THost>[],
  scopeName: string,
): readonly AnyLayer<THost>[] {
  const seen = new Set<string>()
  const claim = (member: AnyLayer<THost>, group: string | undefined) => {
    if (seen.has(member.name)) {
      throw invalid(`Duplicate layer "${member.name}" in ${scopeName}`, { scope: scopeName })
    }
    seen.add(member.name)
    member.bind({ owner, group })
  }

  Object.entries(groups).forEach(([group, decl]) => {
    if (!group || group.includes('/')) {
      throw invalid(`Group name "${group}" in ${scopeName} must be non-empty and contain no "/"`)
    }
    if (decl.members.length === 0) {
      throw invalid(`Group "${group}" in ${scopeName} has no members`)
    }
    if (decl.initial && !decl.members.includes(decl.initial)) {
      throw invalid(`Initial layer "${decl.initial.name}" is not a member of group "${group}"`, { scope: scopeName })
    }
    decl.members.forEach((member) => claim(member, group))
  })
  overlays.forEach((overlay) => claim(overlay, undefined))

  return collectChildren(groups, overlays)
}
