import type {
  EpisodeCatalog,
  MovieCatalog,
} from '@root/types/catalog.types.js'
import type { ProgressPublisher } from '@root/types/progress.types.js'
import type {
  Candidate,
  CatalogKind,
  CycleOutcome,
  KindSettings,
  RecentUpgrade,
} from '@root/types/upgrade.types.js'
import {
  errorMessage,
  errorName,
  ResolutionError,
  ValidationError,
} from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import { mapSettled } from '@utils/parallel.js'
import { hasTag, withoutTag, withTag } from '@utils/tags.js'
import type { FastifyBaseLogger } from 'fastify'
import type { CandidateCollector } from './candidate-collector.js'
import type { RunStateStore } from './run-state.js'
import { type RandomSource, sampleDistinct } from './selection.js'

export interface Catalogs {
  movies: MovieCatalog | null
  episodes: EpisodeCatalog | null
}

export interface TagCycleDeps {
  collector: CandidateCollector
  state: RunStateStore
  progress: ProgressPublisher
  concurrency: number
  random?: RandomSource
}

/**
 * Runs one upgrade cycle per catalog kind:
 * ensure tag → (full-cycle reset | collect → select → tag → search).
 *
 * Each kind is its own unit of failure; see {@link runKind}.
 */
export class TagCycleController {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly deps: TagCycleDeps,
  ) {
    this.log = createServiceLogger(baseLog, 'TAG_CYCLE')
  }

  /**
   * Runs the cycle for `kind`. Never rejects: a failure is logged, published
   * as an `error` event and returned as a `failed` outcome.
   */
  async runKind(
    kind: CatalogKind,
    catalogs: Catalogs,
    settings: KindSettings,
    tagLabel: string,
  ): Promise<CycleOutcome> {
    if (!settings.enabled) {
      this.log.info(`${kind} disabled, skipping`)
      return { kind, state: 'disabled' }
    }

    this.deps.progress.publish('info', `starting ${kind}`)
    try {
      const outcome = await this.dispatch(kind, catalogs, settings, tagLabel)
      this.deps.progress.publish('info', `finished ${kind}`)
      return outcome
    } catch (error) {
      this.log.error({ error }, `Upgrade cycle for ${kind} failed`)
      this.deps.progress.publish(
        'error',
        `${errorName(error)}: ${errorMessage(error)}`,
      )
      return { kind, state: 'failed', error: errorMessage(error) }
    }
  }

  private dispatch(
    kind: CatalogKind,
    catalogs: Catalogs,
    settings: KindSettings,
    tagLabel: string,
  ): Promise<CycleOutcome> {
    switch (kind) {
      case 'movies': {
        if (!catalogs.movies) {
          throw new ValidationError(
            'Movie catalog is enabled but not configured',
          )
        }
        return this.runMovieCycle(catalogs.movies, settings, tagLabel)
      }
      case 'episodes': {
        if (!catalogs.episodes) {
          throw new ValidationError(
            'Episode catalog is enabled but not configured',
          )
        }
        return this.runEpisodeCycle(catalogs.episodes, settings, tagLabel)
      }
      default: {
        const unreachable: never = kind
        throw new ValidationError(
          `Unknown catalog kind: ${String(unreachable)}`,
        )
      }
    }
  }

  async runMovieCycle(
    catalog: MovieCatalog,
    settings: KindSettings,
    tagLabel: string,
  ): Promise<CycleOutcome> {
    const tagId = await catalog.ensureTag(tagLabel)
    const movies = await catalog.listMovies()
    const monitored = movies.filter((movie) => movie.monitored)

    if (monitored.length === 0) {
      this.log.info('No monitored movies returned')
      return { kind: 'movies', state: 'no-candidates', scanned: 0 }
    }

    // Full cycle: everything has been tried once, start over
    if (monitored.every((movie) => hasTag(movie.tags, tagId))) {
      const tagged = movies.filter((movie) => hasTag(movie.tags, tagId))
      this.log.info(
        `All ${monitored.length} monitored movies carry '${tagLabel}', removing it to restart the cycle`,
      )
      for (const movie of tagged) {
        await catalog.updateMovie({
          ...movie,
          tags: withoutTag(movie.tags, tagId),
        })
      }
      this.log.info(`Upgrade tag removed from ${tagged.length} movies`)
      return {
        kind: 'movies',
        state: 'full-cycle-reset',
        resetCount: tagged.length,
      }
    }

    const { scanned, candidates } =
      await this.deps.collector.collectMovieCandidates(catalog, tagId, movies)
    if (candidates.length === 0) {
      this.log.info('No movies found for upgrade')
      return { kind: 'movies', state: 'no-candidates', scanned }
    }

    const selected = this.select(candidates, settings.upgradeCount)
    this.log.info(
      `Selected movie ids for upgrade: ${selected.map((c) => c.itemId).join(', ')}`,
    )

    const recorded: RecentUpgrade[] = []
    this.deps.state.replaceRecentUpgrades('movies', recorded)
    for (const candidate of selected) {
      // Re-read so the update does not act on the tag state of the listing
      const fresh = await catalog.getMovie(candidate.itemId)
      await catalog.updateMovie({ ...fresh, tags: withTag(fresh.tags, tagId) })
      recorded.push({ id: candidate.itemId, title: candidate.title })
      this.deps.state.replaceRecentUpgrades('movies', recorded)
      this.log.info(`Tagged movie '${candidate.title}' with '${tagLabel}'`)
    }

    const searchedIds = selected.map((candidate) => candidate.itemId)
    await catalog.searchMovies(searchedIds)
    this.log.info(`Triggered MoviesSearch for ${searchedIds.length} movies`)

    return {
      kind: 'movies',
      state: 'upgraded',
      selected: recorded,
      searchedIds,
    }
  }

  async runEpisodeCycle(
    catalog: EpisodeCatalog,
    settings: KindSettings,
    tagLabel: string,
  ): Promise<CycleOutcome> {
    const tagId = await catalog.ensureTag(tagLabel)
    const { scanned, candidates } =
      await this.deps.collector.collectEpisodeCandidates(catalog, tagId)

    if (candidates.length === 0) {
      this.log.info('No episodes found for upgrade')
      return { kind: 'episodes', state: 'no-candidates', scanned }
    }

    const selected = this.select(candidates, settings.upgradeCount)
    this.log.info(
      `Selected episode file ids for upgrade: ${selected.map((c) => c.itemId).join(', ')}`,
    )

    const recorded: RecentUpgrade[] = []
    const taggedSeries = new Set<number>()
    this.deps.state.replaceRecentUpgrades('episodes', recorded)

    for (const candidate of selected) {
      const seriesId = candidate.seriesId
      if (seriesId === undefined) {
        throw new ResolutionError(
          `Episode file ${candidate.itemId} has no owning series`,
        )
      }

      if (!taggedSeries.has(seriesId)) {
        const series = await catalog.getSeries(seriesId)
        await catalog.updateSeries({
          ...series,
          tags: withTag(series.tags, tagId),
        })
        taggedSeries.add(seriesId)
        this.log.info(
          `Tagged series '${series.title}' for episode file ${candidate.itemId} with '${tagLabel}'`,
        )
      }

      recorded.push({ id: candidate.itemId, title: candidate.title, seriesId })
      this.deps.state.replaceRecentUpgrades('episodes', recorded)
    }

    const searchedIds = await this.resolveEpisodeIds(
      catalog,
      selected.map((candidate) => candidate.itemId),
    )

    if (searchedIds.length === 0) {
      this.log.info(
        'Could not resolve any episode ids from the selected episode files, skipping EpisodeSearch',
      )
    } else {
      await catalog.searchEpisodes(searchedIds)
      this.log.info(
        `Triggered EpisodeSearch for ${searchedIds.length} episodes`,
      )
    }

    return {
      kind: 'episodes',
      state: 'upgraded',
      selected: recorded,
      searchedIds,
    }
  }

  /**
   * Best-effort episode file → episode id mapping. Files that cannot be
   * resolved are dropped from the search batch; their series stays tagged.
   *
   * @returns Distinct episode ids, ascending
   */
  private async resolveEpisodeIds(
    catalog: EpisodeCatalog,
    episodeFileIds: number[],
  ): Promise<number[]> {
    const resolved = await mapSettled(
      episodeFileIds,
      this.deps.concurrency,
      async (episodeFileId) => {
        const episodes = await catalog.getEpisodesByFileId(episodeFileId)
        if (episodes.length === 0) {
          throw new ResolutionError(
            `No episode references episode file ${episodeFileId}`,
          )
        }
        return episodes.map((episode) => episode.id)
      },
      (episodeFileId, error) => {
        this.log.warn(
          { episodeFileId, error: errorMessage(error) },
          'Failed to resolve episode ids for episode file',
        )
      },
    )

    return [...new Set(resolved.flat())].sort((a, b) => a - b)
  }

  private select(candidates: Candidate[], upgradeCount: number): Candidate[] {
    return sampleDistinct(candidates, upgradeCount, this.deps.random)
  }
}
