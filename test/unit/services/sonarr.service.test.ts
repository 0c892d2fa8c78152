import type { ArrClientConfig } from '@services/arr/catalog-client.js'
import { SonarrService } from '@services/sonarr.service.js'
import { ResolutionError } from '@utils/errors.js'
import { HttpResponse, http, type JsonBodyType } from 'msw'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import { server } from '../../setup/msw-setup.js'

const API = 'http://sonarr.test/api/v3'

const config: ArrClientConfig = {
  baseUrl: 'http://sonarr.test',
  apiKey: 'test-api-key',
  apiPath: '/api/v3/',
  timeoutMs: 1000,
  retry: { maxRetries: 1, backoffFactorMs: 0 },
}

function createService() {
  return new SonarrService(createMockLogger(), config)
}

describe('SonarrService', () => {
  it('should list series with their file statistics', async () => {
    server.use(
      http.get(`${API}/series`, () =>
        HttpResponse.json([
          {
            id: 5,
            title: 'Show',
            monitored: true,
            qualityProfileId: 2,
            tags: [],
            statistics: { episodeFileCount: 12, sizeOnDisk: 1 },
          },
        ]),
      ),
    )

    const [first] = await createService().listSeries()

    expect(first.statistics?.episodeFileCount).toBe(12)
    expect(first.qualityProfileId).toBe(2)
  })

  it('should list the episode files of one series', async () => {
    let seriesId: string | null = null
    server.use(
      http.get(`${API}/episodefile`, ({ request }) => {
        seriesId = new URL(request.url).searchParams.get('seriesId')
        return HttpResponse.json([
          { id: 501, seriesId: 5, customFormatScore: 40 },
          { id: 502, seriesId: 5 },
        ])
      }),
    )

    const files = await createService().listEpisodeFiles(5)

    expect(seriesId).toBe('5')
    expect(files.map((file) => file.customFormatScore)).toEqual([40, 0])
  })

  describe('getEpisode', () => {
    it('should return a single episode', async () => {
      server.use(
        http.get(`${API}/episode/31`, () =>
          HttpResponse.json({ id: 31, seriesId: 5, episodeFileId: 501 }),
        ),
      )

      await expect(createService().getEpisode(31)).resolves.toEqual({
        id: 31,
        seriesId: 5,
        episodeFileId: 501,
      })
    })

    it('should reduce a list answer to its first entry', async () => {
      server.use(
        http.get(`${API}/episode/31`, () =>
          HttpResponse.json([
            { id: 31, seriesId: 5 },
            { id: 32, seriesId: 5 },
          ]),
        ),
      )

      const episode = await createService().getEpisode(31)

      expect(episode.id).toBe(31)
    })

    it('should raise ResolutionError for an empty list', async () => {
      server.use(http.get(`${API}/episode/31`, () => HttpResponse.json([])))

      await expect(createService().getEpisode(31)).rejects.toBeInstanceOf(
        ResolutionError,
      )
    })
  })

  describe('getEpisodesByFileId', () => {
    it('should accept a list answer', async () => {
      let fileId: string | null = null
      server.use(
        http.get(`${API}/episode`, ({ request }) => {
          fileId = new URL(request.url).searchParams.get('episodeFileId')
          return HttpResponse.json([
            { id: 31, episodeFileId: 501 },
            { id: 32, episodeFileId: 501 },
          ])
        }),
      )

      const episodes = await createService().getEpisodesByFileId(501)

      expect(fileId).toBe('501')
      expect(episodes.map((episode) => episode.id)).toEqual([31, 32])
    })

    it('should accept a single object answer', async () => {
      server.use(
        http.get(`${API}/episode`, () =>
          HttpResponse.json({ id: 40, episodeFileId: 600 }),
        ),
      )

      const episodes = await createService().getEpisodesByFileId(600)

      expect(episodes).toEqual([{ id: 40, episodeFileId: 600 }])
    })

    it('should raise ResolutionError for an unexpected payload', async () => {
      server.use(
        http.get(`${API}/episode`, () => HttpResponse.json({ nope: true })),
      )

      await expect(
        createService().getEpisodesByFileId(600),
      ).rejects.toThrow('Unexpected episode lookup payload for episode file 600')
    })
  })

  it('should PUT the series back', async () => {
    let putBody: JsonBodyType
    server.use(
      http.put(`${API}/series/5`, async ({ request }) => {
        putBody = await request.json()
        return HttpResponse.json(putBody)
      }),
    )

    await createService().updateSeries({
      id: 5,
      title: 'Show',
      monitored: true,
      qualityProfileId: 2,
      tags: [7],
    })

    expect(putBody).toEqual({
      id: 5,
      title: 'Show',
      monitored: true,
      qualityProfileId: 2,
      tags: [7],
    })
  })

  it('should send an EpisodeSearch command', async () => {
    let commandBody: unknown
    server.use(
      http.post(`${API}/command`, async ({ request }) => {
        commandBody = await request.json()
        return HttpResponse.json({ id: 8, name: 'EpisodeSearch' })
      }),
    )

    await createService().searchEpisodes([31, 32])

    expect(commandBody).toEqual({ name: 'EpisodeSearch', episodeIds: [31, 32] })
  })

  it('should delete an episode file', async () => {
    let deleted = false
    server.use(
      http.delete(`${API}/episodefile/501`, () => {
        deleted = true
        return new HttpResponse(null, { status: 200 })
      }),
    )

    await createService().deleteEpisodeFile(501)

    expect(deleted).toBe(true)
  })

  it('should ask the queue for series and episode details', async () => {
    let requestedUrl = ''
    server.use(
      http.get(`${API}/queue`, ({ request }) => {
        requestedUrl = request.url
        return HttpResponse.json({ records: [] })
      }),
    )

    await expect(createService().listQueue()).resolves.toEqual([])
    const params = new URL(requestedUrl).searchParams
    expect(params.get('pageSize')).toBe('1000')
    expect(params.get('includeSeries')).toBe('true')
    expect(params.get('includeEpisode')).toBe('true')
  })
})
