import type { EntityBehaviorState } from './entityState'
import { BEHAVIOR_ERROR, BehaviorError } from './errors'
import type { AnyLayer, StateLayer } from './layer'
import type { HandlerContext, HandlerName } from './types'

export interface DispatchFrame {
  redispatch: boolean
}

/** The parts of the runtime that activation and dispatch call back into. */
export interface RuntimeKernel<THost> {
  readonly host: THost
  readonly maxDispatchDepth: number
  context(state: EntityBehaviorState<THost>, frame?: DispatchFrame): HandlerContext<THost>
  trace(state: EntityBehaviorState<THost>, message: string): void
  noteDispatch(): void
  noteTransition(state: EntityBehaviorState<THost>, handler: HandlerName): void
}

export function enableLayer<THost, A extends unknown[]>(
  kernel: RuntimeKernel<THost>,
  state: EntityBehaviorState<THost>,
  layer: StateLayer<THost, object, A>,
  args: A,
) {
  if (!state.definition.owns(layer)) {
    throw new BehaviorError(
      BEHAVIOR_ERROR.LAYER_INVARIANT,
      `Layer "${layer.path()}" is not part of behavior "${state.definition.name}"`,
      { entity: state.entity },
    )
  }
  if (state.isActive(layer)) return

  const placement = layer.placement()
  if (!placement) {
    throw new BehaviorError(BEHAVIOR_ERROR.LAYER_INVARIANT, `Layer "${layer.name}" was never bound to a scope`)
  }
  const { owner, group } = placement
  if (owner && !state.isActive(owner)) {
    throw new BehaviorError(
      BEHAVIOR_ERROR.INACTIVE_PARENT,
      `Cannot enable "${layer.path()}" while "${owner.path()}" is inactive`,
      { entity: state.entity },
    )
  }

  if (group === undefined) {
    activate(kernel, state, layer, args)
    return
  }

  if (!state.beginSwitch(group, owner)) {
    throw new BehaviorError(
      BEHAVIOR_ERROR.LAYER_INVARIANT,
      `Group "${group}" switched again while switching to "${layer.path()}"`,
      { entity: state.entity },
    )
  }
  try {
    const current = state.activeMember(group, owner)
    if (current) deactivate(kernel, state, current)
    activate(kernel, state, layer, args)
  } finally {
    state.endSwitch(group, owner)
  }
}

function activate<THost, A extends unknown[]>(
  kernel: RuntimeKernel<THost>,
  state: EntityBehaviorState<THost>,
  layer: StateLayer<THost, object, A>,
  args: A,
) {
  const ctx = kernel.context(state)
  layer.open(state, { entity: state.entity, host: kernel.host, now: ctx.now })
  layer.start(state, ctx, args)
  state.markActive(layer)
  kernel.trace(state, `enabled ${layer.path()}`)
  activateDefaults(kernel, state, layer)
}

/** Enters the initial member of every group declared in `owner` (or the definition root). */
export function activateDefaults<THost>(
  kernel: RuntimeKernel<THost>,
  state: EntityBehaviorState<THost>,
  owner?: AnyLayer<THost>,
) {
  const groups = owner ? owner.groups : state.definition.groups
  Object.entries(groups).forEach(([group, decl]) => {
    // An enable during an earlier initial's hook already decided this group.
    if (!decl.initial || state.activeMember(group, owner)) return
    // Stop if the owner was torn down by a hook further up this loop.
    if (owner && !state.isActive(owner)) return
    enableLayer(kernel, state, decl.initial, [])
  })
}

export function deactivate<THost>(
  kernel: RuntimeKernel<THost>,
  state: EntityBehaviorState<THost>,
  layer: AnyLayer<THost>,
) {
  if (!state.isActive(layer)) return
  state.activeChildren(layer).forEach((child) => deactivate(kernel, state, child))
  try {
    layer.close(state, kernel.context(state))
  } finally {
    state.markInactive(layer)
    kernel.trace(state, `disabled ${layer.path()}`)
  }
}

export function disableGroup<THost>(
  kernel: RuntimeKernel<THost>,
  state: EntityBehaviorState<THost>,
  group: string,
  owner?: AnyLayer<THost>,
) {
  const current = state.activeMember(group, owner)
  if (current) deactivate(kernel, state, current)
}

