import {
  hasTag,
  normalizeTagLabel,
  withoutTag,
  withTag,
} from '@utils/tags.js'
import { describe, expect, it } from 'vitest'

describe('tags', () => {
  describe('normalizeTagLabel', () => {
    it('should lowercase and hyphenate labels', () => {
      expect(normalizeTagLabel('Upgrade CF')).toBe('upgrade-cf')
      expect(normalizeTagLabel('upgrade-cf')).toBe('upgrade-cf')
    })

    it('should collapse and trim hyphens', () => {
      expect(normalizeTagLabel('--Test__Tag--')).toBe('test-tag')
      expect(normalizeTagLabel('a  b')).toBe('a-b')
    })
  })

  describe('hasTag', () => {
    it('should report membership', () => {
      expect(hasTag([1, 4], 4)).toBe(true)
      expect(hasTag([1, 4], 2)).toBe(false)
      expect(hasTag(undefined, 1)).toBe(false)
    })
  })

  describe('withTag', () => {
    it('should add the tag once and sort', () => {
      expect(withTag([3, 1], 2)).toEqual([1, 2, 3])
      expect(withTag([1, 2], 2)).toEqual([1, 2])
      expect(withTag(undefined, 5)).toEqual([5])
    })

    it('should not modify its input', () => {
      const tags = [3, 1]
      withTag(tags, 2)
      expect(tags).toEqual([3, 1])
    })
  })

  describe('withoutTag', () => {
    it('should remove every occurrence', () => {
      expect(withoutTag([1, 2, 3], 2)).toEqual([1, 3])
      expect(withoutTag([2, 2], 2)).toEqual([])
      expect(withoutTag(undefined, 2)).toEqual([])
    })
  })
})
