import {
  forceUpgradeEpisode,
  forceUpgradeMovie,
  upgradeEpisode,
  upgradeMovie,
} from '@services/upgrade/single-item.js'
import { HttpStatusError, ResolutionError } from '@utils/errors.js'
import { describe, expect, it, vi } from 'vitest'
import {
  FakeEpisodeCatalog,
  FakeMovieCatalog,
  movie,
  series,
} from '../../../mocks/catalogs.js'
import { createMockLogger } from '../../../mocks/logger.js'

describe('single-item operations', () => {
  describe('upgradeMovie', () => {
    it('should add the engine tag and search the movie', async () => {
      const catalog = new FakeMovieCatalog([movie(3, { tags: [2] })])
      catalog.tagStore.tags.push(
        { id: 2, label: 'hd' },
        { id: 5, label: 'upgrade-cf' },
      )

      await upgradeMovie(createMockLogger(), catalog, 'upgrade-cf', 3)

      expect(catalog.tagsOf(3)).toEqual([2, 5])
      expect(catalog.searches).toEqual([[3]])
      expect(catalog.tagStore.createdTags).toEqual([])
    })

    it('should propagate a missing movie without searching', async () => {
      const catalog = new FakeMovieCatalog()

      await expect(
        upgradeMovie(createMockLogger(), catalog, 'upgrade-cf', 404),
      ).rejects.toBeInstanceOf(HttpStatusError)
      expect(catalog.searches).toEqual([])
    })
  })

  describe('upgradeEpisode', () => {
    it('should tag the owning series and search the episode', async () => {
      const catalog = new FakeEpisodeCatalog([series(4)])
      catalog.addEpisode({ id: 31, seriesId: 4, episodeFileId: 501 })

      await upgradeEpisode(createMockLogger(), catalog, 'upgrade-cf', 31)

      expect(catalog.tagsOf(4)).toEqual([1])
      expect(catalog.searches).toEqual([[31]])
    })

    it('should reject an episode without a series', async () => {
      const catalog = new FakeEpisodeCatalog()
      catalog.addEpisode({ id: 31, seriesId: null })

      const attempt = upgradeEpisode(
        createMockLogger(),
        catalog,
        'upgrade-cf',
        31,
      )

      await expect(attempt).rejects.toBeInstanceOf(ResolutionError)
      await expect(attempt).rejects.toThrow('No seriesId found for episode 31')
      expect(catalog.searches).toEqual([])
    })
  })

  describe('forceUpgradeMovie', () => {
    it('should delete the current file before searching', async () => {
      const catalog = new FakeMovieCatalog([movie(3)])

      await forceUpgradeMovie(createMockLogger(), catalog, 3)

      expect(catalog.deletedFiles).toEqual([103])
      expect(catalog.searches).toEqual([[3]])
    })

    it('should search even when the delete fails', async () => {
      const log = createMockLogger()
      const catalog = new FakeMovieCatalog([movie(3)])
      catalog.failDelete = true

      await forceUpgradeMovie(log, catalog, 3)

      expect(catalog.searches).toEqual([[3]])
      expect(log.warn).toHaveBeenCalledWith(
        {
          movieId: 3,
          fileId: 103,
          error: 'DELETE moviefile answered 500',
        },
        'Failed deleting movie file',
      )
    })

    it('should only search a movie without a file', async () => {
      const catalog = new FakeMovieCatalog([movie(3, { movieFileId: null })])

      await forceUpgradeMovie(createMockLogger(), catalog, 3)

      expect(catalog.deletedFiles).toEqual([])
      expect(catalog.searches).toEqual([[3]])
    })
  })

  describe('forceUpgradeEpisode', () => {
    it('should delete the episode file then search', async () => {
      const catalog = new FakeEpisodeCatalog()
      catalog.addEpisode({ id: 31, seriesId: 4, episodeFileId: 501 })

      await forceUpgradeEpisode(createMockLogger(), catalog, 31)

      expect(catalog.deletedFiles).toEqual([501])
      expect(catalog.searches).toEqual([[31]])
    })

    it('should search even when the delete fails', async () => {
      const catalog = new FakeEpisodeCatalog()
      catalog.addEpisode({ id: 31, seriesId: 4, episodeFileId: 501 })
      vi.spyOn(catalog, 'deleteEpisodeFile').mockRejectedValue(
        new Error('disk busy'),
      )

      await forceUpgradeEpisode(createMockLogger(), catalog, 31)

      expect(catalog.searches).toEqual([[31]])
    })
  })
})
