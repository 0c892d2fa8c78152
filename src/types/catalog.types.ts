import type {
  ArrCommandResponse,
  ArrQueueRecord,
} from '@schemas/arr/common.schema.js'
import type {
  RadarrMovie,
  RadarrMovieFile,
} from '@schemas/arr/radarr.schema.js'
import type {
  SonarrEpisode,
  SonarrEpisodeFile,
  SonarrSeries,
} from '@schemas/arr/sonarr.schema.js'

export type {
  ArrQueueRecord,
  RadarrMovie,
  RadarrMovieFile,
  SonarrEpisode,
  SonarrEpisodeFile,
  SonarrSeries,
}

export interface CatalogCommonOperations {
  /** Idempotent: looks the label up and creates the tag on a miss */
  ensureTag(label: string): Promise<number>
  /** quality profile id → cutoff score */
  getQualityProfileCutoffs(): Promise<Map<number, number>>
  listQueue(): Promise<ArrQueueRecord[]>
}

/** The movie catalog operations the upgrade engine depends on. */
export interface MovieCatalog extends CatalogCommonOperations {
  listMovies(): Promise<RadarrMovie[]>
  getMovie(movieId: number): Promise<RadarrMovie>
  getMovieFile(fileId: number): Promise<RadarrMovieFile>
  updateMovie(movie: RadarrMovie): Promise<void>
  deleteMovieFile(fileId: number): Promise<void>
  searchMovies(movieIds: number[]): Promise<ArrCommandResponse>
}

/** The episode catalog operations the upgrade engine depends on. */
export interface EpisodeCatalog extends CatalogCommonOperations {
  listSeries(): Promise<SonarrSeries[]>
  getSeries(seriesId: number): Promise<SonarrSeries>
  updateSeries(series: SonarrSeries): Promise<void>
  listEpisodeFiles(seriesId: number): Promise<SonarrEpisodeFile[]>
  /** `GET /episode/{id}`; a list answer is reduced to its first entry */
  getEpisode(episodeId: number): Promise<SonarrEpisode>
  /** `GET /episode?episodeFileId=`; an empty list means nothing resolved */
  getEpisodesByFileId(episodeFileId: number): Promise<SonarrEpisode[]>
  deleteEpisodeFile(fileId: number): Promise<void>
  searchEpisodes(episodeIds: number[]): Promise<ArrCommandResponse>
}
