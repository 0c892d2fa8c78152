import type { ArrCommandResponse } from '@schemas/arr/common.schema.js'
import {
  type RadarrMovie,
  type RadarrMovieFile,
  RadarrMovieFileSchema,
  RadarrMovieListSchema,
  RadarrMovieSchema,
} from '@schemas/arr/radarr.schema.js'
import type { MovieCatalog } from '@root/types/catalog.types.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  type ArrClientConfig,
  type ArrClientHooks,
  ArrCatalogClient,
} from './arr/catalog-client.js'

export class RadarrService extends ArrCatalogClient implements MovieCatalog {
  constructor(
    baseLog: FastifyBaseLogger,
    config: ArrClientConfig,
    hooks?: ArrClientHooks,
  ) {
    super(baseLog, 'RADARR', config, hooks)
  }

  async listMovies(): Promise<RadarrMovie[]> {
    return RadarrMovieListSchema.parse(await this.http.get(this.url('movie')))
  }

  async getMovie(movieId: number): Promise<RadarrMovie> {
    return RadarrMovieSchema.parse(
      await this.http.get(this.url('movie', movieId)),
    )
  }

  async getMovieFile(fileId: number): Promise<RadarrMovieFile> {
    return RadarrMovieFileSchema.parse(
      await this.http.get(this.url('moviefile', fileId)),
    )
  }

  /**
   * PUTs the whole movie resource back. Pass an object obtained from
   * {@link getMovie} so fields the engine does not model are preserved.
   */
  async updateMovie(movie: RadarrMovie): Promise<void> {
    await this.http.put(this.url('movie', movie.id), movie)
    this.log.debug({ movieId: movie.id, tags: movie.tags }, 'Updated movie')
  }

  async deleteMovieFile(fileId: number): Promise<void> {
    await this.http.delete(this.url('moviefile', fileId))
  }

  async searchMovies(movieIds: number[]): Promise<ArrCommandResponse> {
    return this.command('MoviesSearch', { movieIds })
  }
}
