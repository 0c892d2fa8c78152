import type { EngineSettings } from '@root/types/upgrade.types.js'
import { RunStateStore } from '@services/upgrade/run-state.js'
import {
  UpgradeEngineService,
  type UpgradeEngineDeps,
} from '@services/upgrade-engine.service.js'
import { ValidationError } from '@utils/errors.js'
import { describe, expect, it, vi } from 'vitest'
import {
  FakeEpisodeCatalog,
  FakeMovieCatalog,
  movie,
  series,
} from '../../mocks/catalogs.js'
import { createMockLogger } from '../../mocks/logger.js'
import { createProgressRecorder } from '../../mocks/progress.js'

function settings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    tagLabel: 'upgrade-cf',
    concurrency: 2,
    movies: { enabled: true, upgradeCount: 1 },
    episodes: { enabled: true, upgradeCount: 1 },
    ...overrides,
  }
}

function createEngine(overrides: Partial<UpgradeEngineDeps> = {}) {
  const movies = new FakeMovieCatalog([movie(1), movie(2)])
  movies.cutoffs.set(1, 50)
  movies.scores.set(102, 70)
  const episodes = new FakeEpisodeCatalog([series(1)])
  episodes.cutoffs.set(1, 50)
  episodes.addFile(1, 501, 10)
  episodes.addEpisode({ id: 31, seriesId: 1, episodeFileId: 501 })
  const { progress, events } = createProgressRecorder()

  const engine = new UpgradeEngineService(createMockLogger(), {
    movies,
    episodes,
    settings: settings(),
    state: new RunStateStore(),
    progress,
    random: () => 0,
    ...overrides,
  })
  return { engine, movies, episodes, events }
}

describe('UpgradeEngineService', () => {
  describe('runTarget', () => {
    it('should run movies before episodes for both', async () => {
      const { engine, events } = createEngine()

      const outcomes = await engine.runTarget('both')

      expect(outcomes.map((o) => [o.kind, o.state])).toEqual([
        ['movies', 'upgraded'],
        ['episodes', 'upgraded'],
      ])
      expect(events).toEqual([
        ['info', 'starting movies'],
        ['info', 'finished movies'],
        ['info', 'starting episodes'],
        ['info', 'finished episodes'],
      ])
      expect(engine.getRecentUpgrades()).toEqual({
        movies: [{ id: 1, title: 'Movie 1' }],
        episodes: [
          { id: 501, title: 'Series 1 (EpisodeFile 501)', seriesId: 1 },
        ],
      })
    })

    it('should continue with episodes after movies fail', async () => {
      const { engine, movies, episodes } = createEngine()
      vi.spyOn(movies, 'listMovies').mockRejectedValue(new Error('offline'))

      const outcomes = await engine.runTarget('both')

      expect(outcomes[0]).toEqual({
        kind: 'movies',
        state: 'failed',
        error: 'offline',
      })
      expect(outcomes[1].state).toBe('upgraded')
      expect(episodes.searches).toEqual([[31]])
    })

    it('should run only the requested kind', async () => {
      const { engine, movies } = createEngine()

      const outcomes = await engine.runTarget('episodes')

      expect(outcomes).toHaveLength(1)
      expect(movies.searches).toEqual([])
    })
  })

  describe('getUpgradeSummary', () => {
    it('should summarize both kinds', async () => {
      const { engine } = createEngine()

      expect(await engine.getUpgradeSummary(false)).toEqual({
        movies: { enabled: true, totalBelowCutoff: 1, eligibleForUpgrade: 1 },
        episodes: {
          enabled: true,
          totalBelowCutoff: 1,
          eligibleForUpgrade: 1,
        },
      })
    })

    it('should report disabled and unconfigured kinds', async () => {
      const { engine } = createEngine({
        episodes: null,
        settings: settings({ movies: { enabled: false, upgradeCount: 1 } }),
      })

      expect(await engine.getUpgradeSummary(true)).toEqual({
        movies: { enabled: false, totalBelowCutoff: 0, eligibleForUpgrade: 0 },
        episodes: {
          enabled: true,
          totalBelowCutoff: 0,
          eligibleForUpgrade: 0,
          error: 'The episodes catalog is not configured',
        },
      })
    })
  })

  describe('getDownloadQueue', () => {
    it('should return recent upgrades in tagged mode', async () => {
      const { engine } = createEngine()
      await engine.runTarget('movies')

      expect(await engine.getDownloadQueue('tagged')).toEqual({
        mode: 'tagged',
        movies: [{ id: 1, title: 'Movie 1' }],
        episodes: [],
      })
    })

    it('should attach per-kind errors in queue mode', async () => {
      const { engine, movies, episodes } = createEngine()
      movies.queue = [{ title: 'Movie 1', status: 'queued' }]
      vi.spyOn(episodes, 'listQueue').mockRejectedValue(new Error('timeout'))

      const view = await engine.getDownloadQueue('queue')

      expect(view).toMatchObject({
        mode: 'queue',
        episodes: [],
        episodesError: 'timeout',
      })
      expect(view.movies).toHaveLength(1)
      expect('moviesError' in view).toBe(false)
    })

    it('should list eligible items', async () => {
      const { engine } = createEngine()

      const view = await engine.getDownloadQueue('eligible')
      if (view.mode !== 'eligible') throw new Error('expected eligible view')

      expect(view.movies.map((entry) => entry.title)).toEqual(['Movie 1'])
      expect(view.episodes.map((entry) => entry.title)).toEqual([
        'Series 1 (EpisodeFile 501)',
      ])
    })
  })

  describe('single items', () => {
    it('should upgrade one movie', async () => {
      const { engine, movies } = createEngine()

      await engine.upgradeItem('movies', 2)

      expect(movies.tagsOf(2)).toEqual([1])
      expect(movies.searches).toEqual([[2]])
    })

    it('should force-upgrade one episode', async () => {
      const { engine, episodes } = createEngine()

      await engine.forceUpgradeItem('episodes', 31)

      expect(episodes.deletedFiles).toEqual([501])
      expect(episodes.searches).toEqual([[31]])
    })

    it('should reject both as a single-item target', async () => {
      const { engine } = createEngine()

      await expect(engine.upgradeItem('both', 1)).rejects.toBeInstanceOf(
        ValidationError,
      )
    })

    it('should reject a kind without a client', async () => {
      const { engine } = createEngine({ movies: null })

      await expect(engine.forceUpgradeItem('movies', 1)).rejects.toThrow(
        'Movie catalog is not configured',
      )
    })
  })
})
