import type { ScoredItem } from '@root/types/upgrade.types.js'
import { CandidateCollector } from '@services/upgrade/candidate-collector.js'
import {
  disabledSummary,
  summarize,
  summarizeEpisodes,
  summarizeMovies,
} from '@services/upgrade/summary.js'
import { describe, expect, it } from 'vitest'
import {
  FakeEpisodeCatalog,
  FakeMovieCatalog,
  movie,
  series,
} from '../../../mocks/catalogs.js'
import { createMockLogger } from '../../../mocks/logger.js'

const scored: ScoredItem[] = [
  { id: 1, title: 'A', score: 10, cutoff: 20, tagged: false },
  { id: 2, title: 'B', score: 5, cutoff: 20, tagged: true, seriesId: 3 },
  { id: 3, title: 'C', score: 30, cutoff: 20, tagged: false },
]

describe('summary', () => {
  it('should count below-cutoff and eligible items', () => {
    expect(summarize(scored, false)).toEqual({
      enabled: true,
      totalBelowCutoff: 2,
      eligibleForUpgrade: 1,
    })
  })

  it('should list only below-cutoff items when detailed', () => {
    expect(summarize(scored, true).items).toEqual([
      { id: 1, title: 'A', score: 10, cutoff: 20, tagged: false },
      { id: 2, title: 'B', score: 5, cutoff: 20, tagged: true, seriesId: 3 },
    ])
  })

  it('should describe a disabled kind with zero counts', () => {
    expect(disabledSummary()).toEqual({
      enabled: false,
      totalBelowCutoff: 0,
      eligibleForUpgrade: 0,
    })
  })

  it('should count tagged movies as below cutoff but not eligible', async () => {
    const catalog = new FakeMovieCatalog([movie(1), movie(2, { tags: [1] })])
    catalog.cutoffs.set(1, 50)

    const summary = await summarizeMovies(
      new CandidateCollector(createMockLogger(), 2),
      catalog,
      'upgrade-cf',
      false,
    )

    expect(summary).toEqual({
      enabled: true,
      totalBelowCutoff: 2,
      eligibleForUpgrade: 1,
    })
  })

  it('should include files of tagged series', async () => {
    const catalog = new FakeEpisodeCatalog([
      series(1, { tags: [1] }),
      series(2),
    ])
    catalog.cutoffs.set(1, 80)
    catalog.addFile(1, 501, 0).addFile(2, 601, 0)

    const summary = await summarizeEpisodes(
      new CandidateCollector(createMockLogger(), 2),
      catalog,
      'upgrade-cf',
      true,
    )

    expect(summary.totalBelowCutoff).toBe(2)
    expect(summary.eligibleForUpgrade).toBe(1)
    expect(summary.items?.map((item) => [item.id, item.tagged])).toEqual([
      [501, true],
      [601, false],
    ])
  })
})
