import type {
  EpisodeCatalog,
  MovieCatalog,
  RadarrMovie,
  SonarrSeries,
} from '@root/types/catalog.types.js'
import type { Candidate, ScoredItem } from '@root/types/upgrade.types.js'
import { errorMessage } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import { mapSettled } from '@utils/parallel.js'
import { hasTag } from '@utils/tags.js'
import type { FastifyBaseLogger } from 'fastify'

export interface EpisodeScanOptions {
  /** Also score files of series that already carry the engine tag */
  includeTaggedSeries?: boolean
}

export interface CandidateScan {
  /** Items (movies or episode files) that were scored */
  scanned: number
  candidates: Candidate[]
}

export function hasMovieFile(movie: RadarrMovie): boolean {
  return Boolean(movie.movieFileId)
}

export function seriesHasFiles(series: SonarrSeries): boolean {
  return (series.statistics?.episodeFileCount ?? 0) > 0
}

export function isBelowCutoff(item: ScoredItem): boolean {
  return item.score < item.cutoff
}

export function toCandidate(item: ScoredItem): Candidate {
  return {
    itemId: item.id,
    title: item.title,
    currentScore: item.score,
    requiredScore: item.cutoff,
    ...(item.seriesId !== undefined && { seriesId: item.seriesId }),
  }
}

/**
 * Computes the below-cutoff, untagged item set for each catalog kind.
 *
 * Score lookups fan out over a bounded pool. A lookup that fails drops only
 * its own item (or series) from the result.
 */
export class CandidateCollector {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly concurrency: number,
  ) {
    this.log = createServiceLogger(baseLog, 'COLLECTOR')
  }

  /**
   * Scores every monitored movie that has a file.
   *
   * @param movies - An already fetched listing to reuse; fetched when omitted
   */
  async scoreMovies(
    catalog: MovieCatalog,
    tagId: number,
    movies?: RadarrMovie[],
  ): Promise<ScoredItem[]> {
    const cutoffs = await catalog.getQualityProfileCutoffs()
    const listing = movies ?? (await catalog.listMovies())
    const withFiles = listing.filter(
      (movie) => movie.monitored && hasMovieFile(movie),
    )

    return mapSettled(
      withFiles,
      this.concurrency,
      async (movie): Promise<ScoredItem> => {
        const file = await catalog.getMovieFile(Number(movie.movieFileId))
        return {
          id: movie.id,
          title: movie.title,
          score: file.customFormatScore,
          cutoff: cutoffs.get(movie.qualityProfileId) ?? 0,
          tagged: hasTag(movie.tags, tagId),
        }
      },
      (movie, error) => {
        this.log.warn(
          { movieId: movie.id, error: errorMessage(error) },
          'Failed to fetch movie file score, skipping movie',
        )
      },
    )
  }

  async collectMovieCandidates(
    catalog: MovieCatalog,
    tagId: number,
    movies?: RadarrMovie[],
  ): Promise<CandidateScan> {
    const scored = await this.scoreMovies(catalog, tagId, movies)
    const candidates = scored
      .filter((item) => isBelowCutoff(item) && !item.tagged)
      .map(toCandidate)

    this.log.info(
      `movies=${scored.length} below_cutoff_untagged=${candidates.length} already_tagged=${scored.filter((item) => item.tagged).length}`,
    )
    return { scanned: scored.length, candidates }
  }

  /**
   * Scores the episode files of every series that has files. Tag membership
   * is a series-level property: files of a tagged series inherit `tagged`.
   */
  async scoreEpisodeFiles(
    catalog: EpisodeCatalog,
    tagId: number,
    options: EpisodeScanOptions = {},
  ): Promise<ScoredItem[]> {
    const cutoffs = await catalog.getQualityProfileCutoffs()
    const seriesList = await catalog.listSeries()
    const scanned = seriesList.filter(
      (series) =>
        seriesHasFiles(series) &&
        (options.includeTaggedSeries || !hasTag(series.tags, tagId)),
    )

    const perSeries = await mapSettled(
      scanned,
      this.concurrency,
      async (series): Promise<ScoredItem[]> => {
        const files = await catalog.listEpisodeFiles(series.id)
        const cutoff = cutoffs.get(series.qualityProfileId) ?? 0
        const tagged = hasTag(series.tags, tagId)
        return files.map((file) => ({
          id: file.id,
          title: `${series.title || 'Series'} (EpisodeFile ${file.id})`,
          score: file.customFormatScore,
          cutoff,
          tagged,
          seriesId: series.id,
          seriesTitle: series.title,
        }))
      },
      (series, error) => {
        this.log.warn(
          { seriesId: series.id, error: errorMessage(error) },
          'Failed to fetch episode files, skipping series',
        )
      },
    )

    return perSeries.flat()
  }

  async collectEpisodeCandidates(
    catalog: EpisodeCatalog,
    tagId: number,
  ): Promise<CandidateScan> {
    const scored = await this.scoreEpisodeFiles(catalog, tagId)
    const candidates = scored.filter(isBelowCutoff).map(toCandidate)

    this.log.info(
      `episode_files=${scored.length} below_cutoff_untagged=${candidates.length}`,
    )
    return { scanned: scored.length, candidates }
  }
}
