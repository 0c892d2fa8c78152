import type {
  EpisodeCatalog,
  MovieCatalog,
} from '@root/types/catalog.types.js'
import type { ProgressPublisher } from '@root/types/progress.types.js'
import type {
  CatalogKind,
  CycleOutcome,
  EngineSettings,
  RecentUpgrades,
  UpgradeTarget,
} from '@root/types/upgrade.types.js'
import { errorMessage, ValidationError } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { CandidateCollector } from './upgrade/candidate-collector.js'
import {
  buildEpisodeQueue,
  buildMovieQueue,
  type DownloadQueueView,
  listEligibleEpisodeFiles,
  listEligibleMovies,
} from './upgrade/download-queue.js'
import type { RunStateStore } from './upgrade/run-state.js'
import type { RandomSource } from './upgrade/selection.js'
import {
  forceUpgradeEpisode,
  forceUpgradeMovie,
  upgradeEpisode,
  upgradeMovie,
} from './upgrade/single-item.js'
import {
  disabledSummary,
  type KindSummary,
  summarizeEpisodes,
  summarizeMovies,
  type UpgradeSummary,
} from './upgrade/summary.js'
import { type Catalogs, TagCycleController } from './upgrade/tag-cycle.js'
import { kindsForTarget, requireSingleKind } from './upgrade/targets.js'

export type DownloadQueueMode = DownloadQueueView['mode']

export interface UpgradeEngineDeps {
  movies: MovieCatalog | null
  episodes: EpisodeCatalog | null
  settings: EngineSettings
  state: RunStateStore
  progress: ProgressPublisher
  random?: RandomSource
}

/**
 * Entry point to the upgrade engine: tag cycles per target, plus the
 * read-only views and single-item actions the API exposes.
 */
export class UpgradeEngineService {
  private readonly log: FastifyBaseLogger
  private readonly collector: CandidateCollector
  private readonly controller: TagCycleController
  private readonly catalogs: Catalogs

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly deps: UpgradeEngineDeps,
  ) {
    this.log = createServiceLogger(baseLog, 'UPGRADE_ENGINE')
    this.catalogs = { movies: deps.movies, episodes: deps.episodes }
    this.collector = new CandidateCollector(baseLog, deps.settings.concurrency)
    this.controller = new TagCycleController(baseLog, {
      collector: this.collector,
      state: deps.state,
      progress: deps.progress,
      concurrency: deps.settings.concurrency,
      random: deps.random,
    })
  }

  get settings(): EngineSettings {
    return this.deps.settings
  }

  /**
   * Runs the cycle of every kind the target names, movies first. A failing
   * kind does not stop the next one.
   */
  async runTarget(target: UpgradeTarget): Promise<CycleOutcome[]> {
    const outcomes: CycleOutcome[] = []
    for (const kind of kindsForTarget(target)) {
      outcomes.push(
        await this.controller.runKind(
          kind,
          this.catalogs,
          this.deps.settings[kind],
          this.deps.settings.tagLabel,
        ),
      )
    }
    return outcomes
  }

  getRecentUpgrades(): RecentUpgrades {
    return this.deps.state.getRecentUpgrades()
  }

  async getUpgradeSummary(detailed: boolean): Promise<UpgradeSummary> {
    const { tagLabel } = this.deps.settings
    const [movies, episodes] = await Promise.all([
      this.summarizeKind('movies', this.catalogs.movies, (catalog) =>
        summarizeMovies(this.collector, catalog, tagLabel, detailed),
      ),
      this.summarizeKind('episodes', this.catalogs.episodes, (catalog) =>
        summarizeEpisodes(this.collector, catalog, tagLabel, detailed),
      ),
    ])
    return { movies, episodes }
  }

  async getDownloadQueue(mode: DownloadQueueMode): Promise<DownloadQueueView> {
    const { tagLabel } = this.deps.settings

    switch (mode) {
      case 'tagged': {
        const recent = this.deps.state.getRecentUpgrades()
        return { mode, movies: recent.movies, episodes: recent.episodes }
      }
      case 'eligible': {
        const [movies, episodes] = await Promise.all([
          this.collectKind('movies', this.catalogs.movies, (catalog) =>
            listEligibleMovies(this.collector, catalog, tagLabel),
          ),
          this.collectKind('episodes', this.catalogs.episodes, (catalog) =>
            listEligibleEpisodeFiles(this.collector, catalog, tagLabel),
          ),
        ])
        return {
          mode,
          movies: movies.items,
          episodes: episodes.items,
          ...(movies.error !== undefined && { moviesError: movies.error }),
          ...(episodes.error !== undefined && { episodesError: episodes.error }),
        }
      }
      case 'queue': {
        const [movies, episodes] = await Promise.all([
          this.collectKind('movies', this.catalogs.movies, (catalog) =>
            buildMovieQueue(catalog),
          ),
          this.collectKind('episodes', this.catalogs.episodes, (catalog) =>
            buildEpisodeQueue(this.log, catalog),
          ),
        ])
        return {
          mode,
          movies: movies.items,
          episodes: episodes.items,
          ...(movies.error !== undefined && { moviesError: movies.error }),
          ...(episodes.error !== undefined && { episodesError: episodes.error }),
        }
      }
      default: {
        const unreachable: never = mode
        throw new ValidationError(`Unknown queue mode: ${String(unreachable)}`)
      }
    }
  }

  /** Tags and searches one item. For episodes `id` is an episode id. */
  async upgradeItem(target: UpgradeTarget, id: number): Promise<void> {
    const { tagLabel } = this.deps.settings
    const kind = requireSingleKind(target)
    if (kind === 'movies') {
      await upgradeMovie(this.log, this.requireMovies(), tagLabel, id)
    } else {
      await upgradeEpisode(this.log, this.requireEpisodes(), tagLabel, id)
    }
  }

  /** Deletes the item's file and searches it. */
  async forceUpgradeItem(target: UpgradeTarget, id: number): Promise<void> {
    const kind = requireSingleKind(target)
    if (kind === 'movies') {
      await forceUpgradeMovie(this.log, this.requireMovies(), id)
    } else {
      await forceUpgradeEpisode(this.log, this.requireEpisodes(), id)
    }
  }

  private requireMovies(): MovieCatalog {
    if (!this.catalogs.movies) {
      throw new ValidationError('Movie catalog is not configured')
    }
    return this.catalogs.movies
  }

  private requireEpisodes(): EpisodeCatalog {
    if (!this.catalogs.episodes) {
      throw new ValidationError('Episode catalog is not configured')
    }
    return this.catalogs.episodes
  }

  private async summarizeKind<C>(
    kind: CatalogKind,
    catalog: C | null,
    summarize: (catalog: C) => Promise<KindSummary>,
  ): Promise<KindSummary> {
    if (!this.deps.settings[kind].enabled) return disabledSummary()
    try {
      if (!catalog) {
        throw new ValidationError(`The ${kind} catalog is not configured`)
      }
      return await summarize(catalog)
    } catch (error) {
      this.log.error({ error }, `Failed to summarize ${kind}`)
      return { ...disabledSummary(), enabled: true, error: errorMessage(error) }
    }
  }

  private async collectKind<C, T>(
    kind: CatalogKind,
    catalog: C | null,
    load: (catalog: C) => Promise<T[]>,
  ): Promise<{ items: T[]; error?: string }> {
    if (!this.deps.settings[kind].enabled) return { items: [] }
    try {
      if (!catalog) {
        throw new ValidationError(`The ${kind} catalog is not configured`)
      }
      return { items: await load(catalog) }
    } catch (error) {
      this.log.error({ error }, `Failed to load ${kind} queue view`)
      return { items: [], error: errorMessage(error) }
    }
  }
}
