import type {
  CatalogKind,
  RecentUpgrade,
  RecentUpgrades,
  RunResult,
  RunStatus,
} from '@root/types/upgrade.types.js'

/**
 * Process-wide run state: the current {@link RunStatus} and the
 * RecentUpgrades cache.
 *
 * Lifecycle: created once when the engine plugin loads. Status is mutated
 * only by the run coordinator while it holds the run lock; recent upgrades
 * are replaced only by a cycle running under that lock. Everything else
 * reads copies.
 */
export class RunStateStore {
  private status: RunStatus = {
    started: null,
    finished: null,
    running: false,
    lastResult: null,
  }

  private recent: RecentUpgrades = { movies: [], episodes: [] }

  getStatus(): RunStatus {
    return { ...this.status }
  }

  getRecentUpgrades(): RecentUpgrades {
    return {
      movies: this.recent.movies.map((entry) => ({ ...entry })),
      episodes: this.recent.episodes.map((entry) => ({ ...entry })),
    }
  }

  markStarted(at: Date): void {
    this.status = {
      started: at.toISOString(),
      finished: null,
      running: true,
      lastResult: null,
    }
  }

  markFinished(at: Date, result: RunResult): void {
    this.status = {
      ...this.status,
      finished: at.toISOString(),
      running: false,
      lastResult: result,
    }
  }

  /** Replaces (never appends to) the cache for one kind. */
  replaceRecentUpgrades(kind: CatalogKind, entries: RecentUpgrade[]): void {
    this.recent = { ...this.recent, [kind]: [...entries] }
  }
}
