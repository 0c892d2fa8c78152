import type {
  EpisodeCatalog,
  MovieCatalog,
  SonarrEpisode,
} from '@root/types/catalog.types.js'
import { errorMessage, ResolutionError } from '@utils/errors.js'
import { withTag } from '@utils/tags.js'
import type { FastifyBaseLogger } from 'fastify'

// Operations on one item chosen by the user, outside the cycle and its lock.

export async function upgradeMovie(
  log: FastifyBaseLogger,
  catalog: MovieCatalog,
  tagLabel: string,
  movieId: number,
): Promise<void> {
  const tagId = await catalog.ensureTag(tagLabel)
  const movie = await catalog.getMovie(movieId)
  await catalog.updateMovie({ ...movie, tags: withTag(movie.tags, tagId) })
  await catalog.searchMovies([movieId])
  log.info(`Triggered upgrade for movie '${movie.title}' (id=${movieId})`)
}

function requireSeriesId(episode: SonarrEpisode): number {
  if (!episode.seriesId) {
    throw new ResolutionError(`No seriesId found for episode ${episode.id}`)
  }
  return episode.seriesId
}

/** Tags the episode's series and searches the episode. */
export async function upgradeEpisode(
  log: FastifyBaseLogger,
  catalog: EpisodeCatalog,
  tagLabel: string,
  episodeId: number,
): Promise<void> {
  const tagId = await catalog.ensureTag(tagLabel)
  const episode = await catalog.getEpisode(episodeId)
  const series = await catalog.getSeries(requireSeriesId(episode))
  await catalog.updateSeries({ ...series, tags: withTag(series.tags, tagId) })
  await catalog.searchEpisodes([episodeId])
  log.info(
    `Triggered upgrade for episode id=${episodeId} (series '${series.title}')`,
  )
}

/**
 * Deletes the movie's current file, if any, then searches it. A failed
 * delete is logged and the search still goes out.
 */
export async function forceUpgradeMovie(
  log: FastifyBaseLogger,
  catalog: MovieCatalog,
  movieId: number,
): Promise<void> {
  const movie = await catalog.getMovie(movieId)
  const fileId = movie.movieFileId
  if (fileId) {
    try {
      await catalog.deleteMovieFile(fileId)
      log.info(`Deleted movie file for movie id=${movieId}`)
    } catch (error) {
      log.warn(
        { movieId, fileId, error: errorMessage(error) },
        'Failed deleting movie file',
      )
    }
  }
  await catalog.searchMovies([movieId])
}

export async function forceUpgradeEpisode(
  log: FastifyBaseLogger,
  catalog: EpisodeCatalog,
  episodeId: number,
): Promise<void> {
  const episode = await catalog.getEpisode(episodeId)
  const fileId = episode.episodeFileId
  if (fileId) {
    try {
      await catalog.deleteEpisodeFile(fileId)
      log.info(`Deleted episode file for episode id=${episodeId}`)
    } catch (error) {
      log.warn(
        { episodeId, fileId, error: errorMessage(error) },
        'Failed deleting episode file',
      )
    }
  }
  await catalog.searchEpisodes([episodeId])
}
