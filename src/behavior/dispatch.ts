import type { DispatchFrame, RuntimeKernel } from './activation'
import type { EntityBehaviorState } from './entityState'
import { BEHAVIOR_ERROR, BehaviorError } from './errors'
import type { Continuation, DispatchResult, HandlerArgs, HandlerName } from './types'

const UNHANDLED: DispatchResult = Object.freeze({ handled: false, result: undefined })

/**
 * Runs `handler` through the entity's chain. A wrap that calls
 * `ctx.transition` gets the whole dispatch re-run through the new chain
 * after it returns; re-runs and same-entity nesting are both bounded.
 */
export function dispatch<THost, H extends HandlerName>(
  kernel: RuntimeKernel<THost>,
  state: EntityBehaviorState<THost>,
  handler: H,
  args: HandlerArgs[H],
): DispatchResult {
  if (state.depth >= kernel.maxDispatchDepth) {
    throw new BehaviorError(
      BEHAVIOR_ERROR.HANDLER_LOOP,
      `Dispatch of "${handler}" nested ${state.depth} deep on entity ${state.entity}`,
      { entity: state.entity, handler, depth: state.depth },
    )
  }

  state.depth++
  try {
    let reruns = 0
    for (;;) {
      const frame: DispatchFrame = { redispatch: false }
      const outcome = runChain(kernel, state, handler, args, frame)
      if (!frame.redispatch) return outcome
      reruns++
      kernel.noteTransition(state, handler)
      if (reruns > kernel.maxDispatchDepth) {
        throw new BehaviorError(
          BEHAVIOR_ERROR.HANDLER_LOOP,
          `"${handler}" on entity ${state.entity} kept transitioning after ${reruns - 1} re-runs`,
          { entity: state.entity, handler, reruns: reruns - 1, layers: state.activeLayers() },
        )
      }
      kernel.trace(state, `re-running ${handler} after transition`)
    }
  } finally {
    state.depth--
  }
}

function runChain<THost, H extends HandlerName>(
  kernel: RuntimeKernel<THost>,
  state: EntityBehaviorState<THost>,
  handler: H,
  args: HandlerArgs[H],
  frame: DispatchFrame,
): DispatchResult {
  kernel.noteDispatch()
  const chain = state.chain().filter((layer) => layer.handles(handler))
  const base = state.definition.handlers[handler]
  const ctx = kernel.context(state, frame)

  const step = (from: number): DispatchResult => {
    for (let i = from; i < chain.length; i++) {
      const layer = chain[i]
      // Disabled by a wrap earlier in this same dispatch.
      if (!state.isActive(layer)) continue
      let called = false
      const next: Continuation = () => {
        if (called) {
          throw new BehaviorError(
            BEHAVIOR_ERROR.CONTINUATION_REUSED,
            `Layer "${layer.path()}" called next() twice in one "${handler}" dispatch`,
            { entity: state.entity },
          )
        }
        called = true
        return step(i + 1).result
      }
      return { handled: true, result: layer.invoke(handler, state, ctx, next, args) }
    }
    if (base) return { handled: true, result: base(ctx, ...args) }
    return UNHANDLED
  }

  return step(0)
}
