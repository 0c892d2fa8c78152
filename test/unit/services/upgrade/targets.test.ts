import {
  kindsForTarget,
  requireSingleKind,
  resolveTarget,
} from '@services/upgrade/targets.js'
import { ValidationError } from '@utils/errors.js'
import { describe, expect, it } from 'vitest'

describe('targets', () => {
  it('should resolve the legacy service names', () => {
    expect(resolveTarget('radarr')).toBe('movies')
    expect(resolveTarget('sonarr')).toBe('episodes')
    expect(resolveTarget('movies')).toBe('movies')
    expect(resolveTarget('episodes')).toBe('episodes')
    expect(resolveTarget('both')).toBe('both')
  })

  it('should expand both to movies then episodes', () => {
    expect(kindsForTarget('both')).toEqual(['movies', 'episodes'])
    expect(kindsForTarget('episodes')).toEqual(['episodes'])
  })

  it('should reject both for single-item operations', () => {
    expect(requireSingleKind('movies')).toBe('movies')
    expect(() => requireSingleKind('both')).toThrow(ValidationError)
    expect(() => requireSingleKind('both')).toThrow(
      "Invalid target (expected 'movies' or 'episodes')",
    )
  })
})
