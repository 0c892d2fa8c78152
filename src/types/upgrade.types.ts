/** The two catalog services the engine cycles through. */
export type CatalogKind = 'movies' | 'episodes'

export type UpgradeTarget = CatalogKind | 'both'

/**
 * An item eligible for upgrade in the current cycle. For movies `itemId` is
 * the movie id, for episodes it is the episode file id.
 */
export interface Candidate {
  itemId: number
  title: string
  currentScore: number
  requiredScore: number
  seriesId?: number
}

/** A monitored item with a file, scored against its profile cutoff. */
export interface ScoredItem {
  id: number
  title: string
  score: number
  cutoff: number
  tagged: boolean
  seriesId?: number
  seriesTitle?: string
}

export interface RecentUpgrade {
  id: number
  title: string
  seriesId?: number
}

export type RecentUpgrades = Record<CatalogKind, RecentUpgrade[]>

export type CycleOutcome =
  | { kind: CatalogKind; state: 'disabled' }
  | { kind: CatalogKind; state: 'full-cycle-reset'; resetCount: number }
  | { kind: CatalogKind; state: 'no-candidates'; scanned: number }
  | {
      kind: CatalogKind
      state: 'upgraded'
      selected: RecentUpgrade[]
      searchedIds: number[]
    }
  | { kind: CatalogKind; state: 'failed'; error: string }

export interface RunResult {
  ok: boolean
  target: UpgradeTarget
  outcomes: CycleOutcome[]
  error?: string
}

export interface RunStatus {
  started: string | null
  finished: string | null
  running: boolean
  lastResult: RunResult | null
}

export interface KindSettings {
  enabled: boolean
  upgradeCount: number
}

export interface EngineSettings {
  tagLabel: string
  concurrency: number
  movies: KindSettings
  episodes: KindSettings
}
