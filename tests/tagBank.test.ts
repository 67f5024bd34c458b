import { describe, expect, it } from 'vitest'

import { TagBank } from '@/ecs/tags'

describe('TagBank', () => {
  it('stores tags with and without values', () => {
    const tags = new TagBank()
    tags.tag(1, 'network', 'amber')
    tags.tag(1, 'glowing')

    expect(tags.hasTag(1, 'network')).toBe(true)
    expect(tags.tagVal(1, 'network')).toBe('amber')
    expect(tags.hasTag(1, 'glowing')).toBe(true)
    expect(tags.tagVal(1, 'glowing')).toBeUndefined()
    expect(tags.hasTag(2, 'network')).toBe(false)
  })

  it('lists holders in tagging order and filters by value', () => {
    const tags = new TagBank()
    tags.tag(3, 'network', 'amber')
    tags.tag(1, 'network', 'cobalt')
    tags.tag(2, 'network', 'amber')

    expect(tags.allTagged('network')).toEqual([3, 1, 2])
    expect(tags.allTaggedWithVal('network', 'amber')).toEqual([3, 2])
    expect(tags.allTaggedWithVal('network', 'teal')).toEqual([])
  })

  it('overwrites the value when tagged again', () => {
    const tags = new TagBank()
    tags.tag(1, 'network', 'amber')
    tags.tag(1, 'network', 'cobalt')
    expect(tags.tagVal(1, 'network')).toBe('cobalt')
    expect(tags.allTagged('network')).toEqual([1])
  })

  it('finds the single holder of a tag', () => {
    const tags = new TagBank()
    tags.tag(4, 'queen')
    expect(tags.entTagged('queen')).toBe(4)

    tags.tag(5, 'queen')
    expect(() => tags.entTagged('queen')).toThrowError('Expected exactly one entity tagged "queen", found 2')
    expect(() => tags.entTagged('king')).toThrowError('Expected exactly one entity tagged "king", found 0')
  })

  it('forgets every tag of a removed entity', () => {
    const tags = new TagBank()
    tags.tag(1, 'network', 'amber')
    tags.tag(1, 'glowing')
    tags.tag(2, 'network', 'amber')

    tags.forget(1)

    expect(tags.tagsOf(1)).toEqual([])
    expect(tags.allTagged('network')).toEqual([2])
    expect(tags.allTagged('glowing')).toEqual([])
  })
})
