import type { AnyLayer, StateLayer } from './layer'

export type EntityId = number

/** What the core needs from the world it runs in. */
export interface BehaviorHost {
  now(): number
  // Killed-but-not-yet-cleaned-up entities are skipped for the rest of the tick.
  isAlive?(entity: EntityId): boolean
}

export interface BehaviorMessage {
  name: string
  args: readonly unknown[]
}

export interface ReloadInfo {
  definition: string
  layers: readonly string[]
}

export interface HandlerArgs {
  init: []
  update: []
  message: [message: BehaviorMessage]
  collision: [other: EntityId]
  reload: [previous: ReloadInfo]
  death: []
}

export type HandlerName = keyof HandlerArgs

export interface DispatchResult {
  handled: boolean
  result: unknown
}

export interface HandlerContext<THost> {
  readonly entity: EntityId
  readonly host: THost
  readonly now: number
  readonly behavior: string
  enable<A extends unknown[]>(layer: StateLayer<THost, object, A>, ...args: A): void
  /** Enables `layer`, then re-runs the current dispatch through the new chain once this handler returns. */
  transition<A extends unknown[]>(layer: StateLayer<THost, object, A>, ...args: A): void
  disable(layer: AnyLayer<THost>): void
  disableGroup(group: string, owner?: AnyLayer<THost>): void
  isEnabled(layer: AnyLayer<THost>): boolean
  fieldsOf<F extends object>(layer: StateLayer<THost, F, never>): F
  dispatch<H extends HandlerName>(handler: H, ...args: HandlerArgs[H]): DispatchResult
}

export interface LayerContext<THost, F> extends HandlerContext<THost> {
  readonly layer: AnyLayer<THost>
  readonly fields: F
}

export interface ActivationContext<THost> {
  readonly entity: EntityId
  readonly host: THost
  readonly now: number
}

export type Continuation = () => unknown

export type LayerWrap<THost, F, H extends HandlerName> = (
  ctx: LayerContext<THost, F>,
  next: Continuation,
  ...args: HandlerArgs[H]
) => unknown

export type LayerWraps<THost, F> = { [H in HandlerName]?: LayerWrap<THost, F, H> }

export type BaseHandler<THost, H extends HandlerName> = (ctx: HandlerContext<THost>, ...args: HandlerArgs[H]) => unknown

export type BaseHandlers<THost> = { [H in HandlerName]?: BaseHandler<THost, H> }

export interface GroupDecl<THost> {
  members: readonly AnyLayer<THost>[]
  // Activated when the owning scope is entered; must take no init arguments.
  initial?: StateLayer<THost, object, []>
}

export type GroupDecls<THost> = Readonly<Record<string, GroupDecl<THost>>>
