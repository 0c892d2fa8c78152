import type { ArrCommandResponse } from '@schemas/arr/common.schema.js'
import {
  type SonarrEpisode,
  type SonarrEpisodeFile,
  SonarrEpisodeFileListSchema,
  SonarrEpisodeLookupSchema,
  type SonarrSeries,
  SonarrSeriesListSchema,
  SonarrSeriesSchema,
} from '@schemas/arr/sonarr.schema.js'
import type { EpisodeCatalog } from '@root/types/catalog.types.js'
import { ResolutionError } from '@utils/errors.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  type ArrClientConfig,
  type ArrClientHooks,
  ArrCatalogClient,
} from './arr/catalog-client.js'

function asList(value: SonarrEpisode | SonarrEpisode[]): SonarrEpisode[] {
  return Array.isArray(value) ? value : [value]
}

export class SonarrService extends ArrCatalogClient implements EpisodeCatalog {
  constructor(
    baseLog: FastifyBaseLogger,
    config: ArrClientConfig,
    hooks?: ArrClientHooks,
  ) {
    super(baseLog, 'SONARR', config, hooks)
  }

  async listSeries(): Promise<SonarrSeries[]> {
    return SonarrSeriesListSchema.parse(await this.http.get(this.url('series')))
  }

  async getSeries(seriesId: number): Promise<SonarrSeries> {
    return SonarrSeriesSchema.parse(
      await this.http.get(this.url('series', seriesId)),
    )
  }

  async updateSeries(series: SonarrSeries): Promise<void> {
    await this.http.put(this.url('series', series.id), series)
    this.log.debug({ seriesId: series.id, tags: series.tags }, 'Updated series')
  }

  async listEpisodeFiles(seriesId: number): Promise<SonarrEpisodeFile[]> {
    return SonarrEpisodeFileListSchema.parse(
      await this.http.get(this.urlWithQuery(['episodefile'], { seriesId })),
    )
  }

  async getEpisode(episodeId: number): Promise<SonarrEpisode> {
    const [episode] = asList(
      SonarrEpisodeLookupSchema.parse(
        await this.http.get(this.url('episode', episodeId)),
      ),
    )
    if (!episode) {
      throw new ResolutionError(`Episode ${episodeId} not found`)
    }
    return episode
  }

  async getEpisodesByFileId(episodeFileId: number): Promise<SonarrEpisode[]> {
    const payload = await this.http.get(
      this.urlWithQuery(['episode'], { episodeFileId }),
    )
    const parsed = SonarrEpisodeLookupSchema.safeParse(payload)
    if (!parsed.success) {
      throw new ResolutionError(
        `Unexpected episode lookup payload for episode file ${episodeFileId}`,
      )
    }
    return asList(parsed.data)
  }

  async deleteEpisodeFile(fileId: number): Promise<void> {
    await this.http.delete(this.url('episodefile', fileId))
  }

  async searchEpisodes(episodeIds: number[]): Promise<ArrCommandResponse> {
    return this.command('EpisodeSearch', { episodeIds })
  }

  protected override queueParams(): Record<string, string | number | boolean> {
    return { pageSize: 1000, includeSeries: true, includeEpisode: true }
  }
}
