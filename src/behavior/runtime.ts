import {
  activateDefaults,
  deactivate,
  disableGroup,
  enableLayer,
  type DispatchFrame,
  type RuntimeKernel,
} from './activation'
import { DEFAULT_BEHAVIOR, defineBehavior, type BehaviorDefinition } from './definition'
import { dispatch } from './dispatch'
import { EntityBehaviorState } from './entityState'
import { BEHAVIOR_ERROR, BehaviorError, isBehaviorError, unknownMessage } from './errors'
import type { AnyLayer, StateLayer } from './layer'
import type {
  BehaviorHost,
  BehaviorMessage,
  DispatchResult,
  EntityId,
  HandlerArgs,
  HandlerContext,
  HandlerName,
  ReloadInfo,
} from './types'

import { runtimeFlags } from '@/config/runtimeFlags'
import { bumpStat, createTelemetry, recordFault, type FaultSource, type Telemetry } from '@/state/telemetryStore'

export interface RuntimeOptions {
  maxDispatchDepth?: number
  trace?: boolean
  telemetry?: Telemetry
}

interface Intake {
  messages: Map<EntityId, BehaviorMessage[]>
  collisions: Map<EntityId, EntityId[]>
}

const emptyIntake = (): Intake => ({ messages: new Map(), collisions: new Map() })

const queue = <T>(map: Map<EntityId, T[]>, entity: EntityId, item: T) => {
  const list = map.get(entity)
  if (list) {
    list.push(item)
  } else {
    map.set(entity, [item])
  }
}

/**
 * Drives every scripted entity: owns their layer stacks, queues messages and
 * collisions, and delivers them once per tick ahead of `update`.
 */
export class BehaviorRuntime<THost extends BehaviorHost> implements RuntimeKernel<THost> {
  readonly maxDispatchDepth: number
  readonly telemetry: Telemetry
  #trace: boolean
  #definitions = new Map<string, BehaviorDefinition<THost>>()
  #states = new Map<EntityId, EntityBehaviorState<THost>>()
  #intake = emptyIntake()
  #fallback: BehaviorDefinition<THost>
  #tick = 0

  constructor(
    readonly host: THost,
    definitions: readonly BehaviorDefinition<THost>[],
    options: RuntimeOptions = {},
  ) {
    this.maxDispatchDepth = options.maxDispatchDepth ?? runtimeFlags.maxDispatchDepth
    this.#trace = options.trace ?? runtimeFlags.trace
    this.telemetry = options.telemetry ?? createTelemetry()
    this.#fallback = defineBehavior<THost>({ name: DEFAULT_BEHAVIOR })
    this.#load(definitions)
  }

  get tickCount() {
    return this.#tick
  }

  definition(name: string) {
    return this.#definitions.get(name)
  }

  has(entity: EntityId) {
    return this.#states.has(entity)
  }

  behaviorOf(entity: EntityId) {
    return this.#states.get(entity)?.definition.name
  }

  /** Gives `entity` its behavior: base `init` runs, then root defaults activate. */
  attach(entity: EntityId, behavior: string) {
    if (this.#states.has(entity)) {
      throw new BehaviorError(BEHAVIOR_ERROR.LAYER_INVARIANT, `Entity ${entity} already has a behavior`, {
        entity,
        behavior: this.behaviorOf(entity),
      })
    }
    const state = new EntityBehaviorState(entity, this.#resolve(behavior))
    this.#states.set(entity, state)
    dispatch(this, state, 'init', [])
    activateDefaults(this, state)
  }

  /**
   * Forgets `entity`. `death` is dispatched first, then every active layer is
   * torn down, most recent first.
   */
  detach(entity: EntityId) {
    const state = this.#states.get(entity)
    if (!state) return
    try {
      this.#guard(state, 'death', () => dispatch(this, state, 'death', []))
    } finally {
      try {
        this.#teardown(state)
      } finally {
        this.#states.delete(entity)
      }
    }
  }

  dispatch<H extends HandlerName>(entity: EntityId, handler: H, ...args: HandlerArgs[H]): DispatchResult {
    return dispatch(this, this.#state(entity), handler, args)
  }

  enable<A extends unknown[]>(entity: EntityId, layer: StateLayer<THost, object, A>, ...args: A) {
    enableLayer(this, this.#state(entity), layer, args)
  }

  disable(entity: EntityId, layer: AnyLayer<THost>) {
    deactivate(this, this.#state(entity), layer)
  }

  disableGroup(entity: EntityId, group: string, owner?: AnyLayer<THost>) {
    disableGroup(this, this.#state(entity), group, owner)
  }

  isEnabled(entity: EntityId, layer: AnyLayer<THost>) {
    return this.#state(entity).isActive(layer)
  }

  activeMember(entity: EntityId, group: string, owner?: AnyLayer<THost>) {
    return this.#state(entity).activeMember(group, owner)
  }

  activeLayers(entity: EntityId) {
    return this.#state(entity).activeLayers()
  }

  fields<F extends object>(entity: EntityId, layer: StateLayer<THost, F, never>): F {
    return readFields(this.#state(entity), layer)
  }

  send(entity: EntityId, message: BehaviorMessage) {
    queue(this.#intake.messages, entity, message)
  }

  collide(entity: EntityId, other: EntityId) {
    queue(this.#intake.collisions, entity, other)
  }

  /**
   * One simulation step: archetype static updates, then per entity (in
   * attach order) queued messages, queued collisions and `update`.
   * Events raised during the tick are delivered on the next one.
   */
  tick() {
    this.#tick++
    bumpStat(this.telemetry, 'ticks')
    const { messages, collisions } = this.#intake
    this.#intake = emptyIntake()

    this.#definitions.forEach((definition) => {
      const staticUpdate = definition.staticUpdate
      if (!staticUpdate) return
      try {
        staticUpdate(this.host)
      } catch (error) {
        this.#report(null, definition.name, 'staticUpdate', error)
      }
    })

    const order = [...this.#states.values()]
    order.forEach((state) => {
      messages.get(state.entity)?.forEach((message) => {
        if (!this.#live(state)) return
        this.#guard(state, 'message', () => this.#deliver(state, message))
      })
      collisions.get(state.entity)?.forEach((other) => {
        if (!this.#live(state)) return
        this.#guard(state, 'collision', () => dispatch(this, state, 'collision', [other]))
      })
      if (!this.#live(state)) return
      this.#guard(state, 'update', () => dispatch(this, state, 'update', []))
    })

    messages.forEach((list, entity) => {
      if (!this.#states.has(entity)) {
        this.trace(null, `dropped ${list.length} message(s) for unknown entity ${entity}`)
      }
    })
  }

  /**
   * Hot reload. Every entity moves to the new definition of the same name,
   * starting from that definition's defaults; `reload` then tells it which
   * layers were active before.
   */
  reload(definitions: readonly BehaviorDefinition<THost>[]) {
    this.#load(definitions)
    this.#states.forEach((state) => {
      const previous: ReloadInfo = { definition: state.definition.name, layers: state.activeLayers() }
      try {
        this.#teardown(state)
      } finally {
        state.swap(this.#resolve(previous.definition))
      }
      this.#guard(state, 'reload', () => {
        activateDefaults(this, state)
        dispatch(this, state, 'reload', [previous])
      })
    })
    console.info(`[behavior] reloaded ${definitions.length} definition(s) for ${this.#states.size} entities`)
  }

  context(state: EntityBehaviorState<THost>, frame?: DispatchFrame): HandlerContext<THost> {
    return {
      entity: state.entity,
      host: this.host,
      now: this.host.now(),
      behavior: state.definition.name,
      enable: (layer, ...args) => enableLayer(this, state, layer, args),
      transition: (layer, ...args) => {
        enableLayer(this, state, layer, args)
        if (frame) frame.redispatch = true
      },
      disable: (layer) => deactivate(this, state, layer),
      disableGroup: (group, owner) => disableGroup(this, state, group, owner),
      isEnabled: (layer) => state.isActive(layer),
      fieldsOf: (layer) => readFields(state, layer),
      dispatch: (handler, ...args) => dispatch(this, state, handler, args),
    }
  }

  trace(state: EntityBehaviorState<THost> | null, message: string) {
    if (!this.#trace) return
    const who = state ? `${state.definition.name}#${state.entity}` : 'runtime'
    console.debug(`[behavior] ${who} ${message}`)
  }

  noteDispatch() {
    bumpStat(this.telemetry, 'dispatches')
  }

  noteTransition(state: EntityBehaviorState<THost>, handler: HandlerName) {
    bumpStat(this.telemetry, 'transitions')
    this.trace(state, `transitioned during ${handler}`)
  }

  #load(definitions: readonly BehaviorDefinition<THost>[]) {
    this.#definitions = new Map(definitions.map((definition) => [definition.name, definition]))
  }

  #resolve(name: string) {
    const definition = this.#definitions.get(name)
    if (definition) return definition
    console.warn(`[behavior] couldn't find ${name}, had to use ${DEFAULT_BEHAVIOR}`)
    return this.#fallback
  }

  #state(entity: EntityId) {
    const state = this.#states.get(entity)
    if (!state) {
      throw new BehaviorError(BEHAVIOR_ERROR.UNKNOWN_ENTITY, `Entity ${entity} has no behavior attached`, { entity })
    }
    return state
  }

  #live(state: EntityBehaviorState<THost>) {
    if (this.#states.get(state.entity) !== state) return false
    return this.host.isAlive ? this.host.isAlive(state.entity) : true
  }

  #deliver(state: EntityBehaviorState<THost>, message: BehaviorMessage) {
    const outcome = dispatch(this, state, 'message', [message])
    if (!outcome.handled) {
      throw unknownMessage(message.name, { entity: state.entity, behavior: state.definition.name })
    }
  }

  // Each root layer comes down on its own, so a failing `exit` does not keep the rest active.
  #teardown(state: EntityBehaviorState<THost>) {
    for (let layer = state.activeChildren()[0]; layer; layer = state.activeChildren()[0]) {
      const current = layer
      this.#guard(state, 'exit', () => deactivate(this, state, current))
    }
  }

  // Content faults stay with their entity; broken engine invariants propagate.
  #guard(state: EntityBehaviorState<THost>, handler: FaultSource, run: () => unknown) {
    try {
      run()
    } catch (error) {
      this.#report(state.entity, state.definition.name, handler, error)
    }
  }

  #report(entity: EntityId | null, behavior: string, handler: FaultSource, error: unknown) {
    if (isBehaviorError(error) && !error.isOperational) throw error
    const who = entity === null ? behavior : `${behavior}#${entity}`
    console.error(`[behavior] couldn't run ${handler} on ${who}:`, error)
    recordFault(this.telemetry, {
      tick: this.#tick,
      entity,
      behavior,
      handler,
      category: isBehaviorError(error) ? error.category : 'CONTENT_ERROR',
      message: error instanceof Error ? error.message : String(error),
    })
  }
}

function readFields<THost, F extends object>(state: EntityBehaviorState<THost>, layer: StateLayer<THost, F, never>): F {
  const fields = layer.read(state)
  if (!fields) {
    throw new BehaviorError(
      BEHAVIOR_ERROR.INACTIVE_FIELD_ACCESS,
      `Fields of layer "${layer.path()}" read while it is inactive`,
      { entity: state.entity, layer: layer.path() },
    )
  }
  return fields
}
