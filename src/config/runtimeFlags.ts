const processEnv: Record<string, string | undefined> = typeof process !== 'undefined' ? process.env : {}

const maxDepthFlag = processEnv.BEHAVIOR_MAX_DISPATCH_DEPTH
const traceFlag = processEnv.BEHAVIOR_TRACE

const parseFlag = (value: string | undefined, fallback = false) =>
  value === undefined ? fallback : value === '1' || value === 'true'

const parseDepth = (value: string | undefined, fallback: number) => {
  if (value === undefined) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback
}

export const DEFAULT_MAX_DISPATCH_DEPTH = 8

export const runtimeFlags = {
  // Bound on self-transition re-runs and same-entity re-entrant dispatch.
  maxDispatchDepth: parseDepth(maxDepthFlag, DEFAULT_MAX_DISPATCH_DEPTH),
  trace: parseFlag(traceFlag, false),
}
