import type { CatalogKind, UpgradeTarget } from '@root/types/upgrade.types.js'
import { ValidationError } from '@utils/errors.js'

/** Target names accepted at the HTTP boundary, legacy aliases included. */
export const TARGET_INPUTS = [
  'movies',
  'episodes',
  'both',
  'radarr',
  'sonarr',
] as const

export type TargetInput = (typeof TARGET_INPUTS)[number]

export function resolveTarget(input: TargetInput): UpgradeTarget {
  switch (input) {
    case 'movies':
    case 'radarr':
      return 'movies'
    case 'episodes':
    case 'sonarr':
      return 'episodes'
    case 'both':
      return 'both'
    default: {
      const unreachable: never = input
      throw new ValidationError(`Invalid target: ${String(unreachable)}`)
    }
  }
}

/** Kinds a target expands to, movies first. */
export function kindsForTarget(target: UpgradeTarget): CatalogKind[] {
  switch (target) {
    case 'movies':
      return ['movies']
    case 'episodes':
      return ['episodes']
    case 'both':
      return ['movies', 'episodes']
    default: {
      const unreachable: never = target
      throw new ValidationError(`Invalid target: ${String(unreachable)}`)
    }
  }
}

/** Single-item operations act on exactly one catalog. */
export function requireSingleKind(target: UpgradeTarget): CatalogKind {
  if (target === 'both') {
    throw new ValidationError(
      "Invalid target (expected 'movies' or 'episodes')",
    )
  }
  return target
}
