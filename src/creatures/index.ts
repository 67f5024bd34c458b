import { createPortal, PORTAL } from './portal'
import { createSlime, SLIME } from './slime'
import { createWorm, WORM } from './worm'

import type { ArchetypeName } from '@/types/sim'

export const BEHAVIOR_FOR_ARCHETYPE: Record<ArchetypeName, string> = {
  worm: WORM,
  slime: SLIME,
  portal: PORTAL,
}

/**
 * A fresh set of creature definitions. Layers belong to exactly one
 * definition, so hot reload needs a new kit rather than the shared one.
 */
export function createCreatureKit() {
  const worm = createWorm()
  const slime = createSlime()
  const portal = createPortal()
  return {
    worm,
    slime,
    portal,
    definitions: [worm.behavior, slime.behavior, portal.behavior],
  }
}

export type CreatureKit = ReturnType<typeof createCreatureKit>

export const CREATURES: CreatureKit = createCreatureKit()

export const CREATURE_BEHAVIORS = CREATURES.definitions

export { NETWORK_TAG } from './portal'
