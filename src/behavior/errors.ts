export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly isOperational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

export enum BEHAVIOR_ERROR {
  // Content level: reported for the entity, the tick carries on.
  UNKNOWN_MESSAGE = 'UNKNOWN_MESSAGE',
  HANDLER_LOOP = 'HANDLER_LOOP',
  // Programming errors and broken engine invariants.
  INACTIVE_FIELD_ACCESS = 'INACTIVE_FIELD_ACCESS',
  EMPTY_SELECTION = 'EMPTY_SELECTION',
  INVALID_DEFINITION = 'INVALID_DEFINITION',
  INACTIVE_PARENT = 'INACTIVE_PARENT',
  CONTINUATION_REUSED = 'CONTINUATION_REUSED',
  LAYER_INVARIANT = 'LAYER_INVARIANT',
  UNKNOWN_ENTITY = 'UNKNOWN_ENTITY',
}

const OPERATIONAL = new Set<BEHAVIOR_ERROR>([BEHAVIOR_ERROR.UNKNOWN_MESSAGE, BEHAVIOR_ERROR.HANDLER_LOOP])

export class BehaviorError extends AppError {
  constructor(
    public readonly category: BEHAVIOR_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, OPERATIONAL.has(category), context)
  }
}

export function isBehaviorError(error: unknown): error is BehaviorError {
  return error instanceof BehaviorError
}

export function unknownMessage(name: string, context?: Record<string, unknown>) {
  return new BehaviorError(BEHAVIOR_ERROR.UNKNOWN_MESSAGE, `Unknown message "${name}"`, {
    message: name,
    ...context,
  })
}
