import { Types, defineComponent } from 'bitecs'

import type { ArchetypeName } from '@/types/sim'
import type { CollisionGroupName } from '@/types/host'

export enum ArchetypeCode {
  Worm = 1,
  Slime = 2,
  Portal = 3,
}

export const ARCHETYPE_CODES: Record<ArchetypeName, ArchetypeCode> = {
  worm: ArchetypeCode.Worm,
  slime: ArchetypeCode.Slime,
  portal: ArchetypeCode.Portal,
}

export const decodeArchetype = (code: number): ArchetypeName | undefined => {
  switch (code) {
    case ArchetypeCode.Worm:
      return 'worm'
    case ArchetypeCode.Slime:
      return 'slime'
    case ArchetypeCode.Portal:
      return 'portal'
    default:
      return undefined
  }
}

// Whitelist bits. Two colliders touch only when their bits intersect.
export enum CollisionGroup {
  Creature = 1 << 0,
  Portal = 1 << 1,
}

export const COLLISION_GROUPS: Record<CollisionGroupName, CollisionGroup> = {
  creature: CollisionGroup.Creature,
  portal: CollisionGroup.Portal,
}

export const Position = defineComponent({
  x: Types.f32,
  y: Types.f32,
})

export const Looks = defineComponent({
  scale: Types.f32,
  // 1 when facing left.
  flipX: Types.ui8,
})

export const Collider = defineComponent({
  radius: Types.f32,
  groups: Types.ui8,
})

// Seeded wobble for creatures that drift around on their own.
export const Wander = defineComponent({
  seed: Types.f64,
  lastTime: Types.f64,
})

export const Creature = defineComponent({
  id: Types.ui32,
  archetype: Types.ui8,
})
