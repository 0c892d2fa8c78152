import type {
  EpisodeCatalog,
  MovieCatalog,
} from '@root/types/catalog.types.js'
import type { ScoredItem } from '@root/types/upgrade.types.js'
import {
  type CandidateCollector,
  isBelowCutoff,
} from './candidate-collector.js'

export interface SummaryItem {
  id: number
  title: string
  score: number
  cutoff: number
  tagged: boolean
  seriesId?: number
}

export interface KindSummary {
  enabled: boolean
  totalBelowCutoff: number
  eligibleForUpgrade: number
  items?: SummaryItem[]
  error?: string
}

export interface UpgradeSummary {
  movies: KindSummary
  episodes: KindSummary
}

export function disabledSummary(): KindSummary {
  return { enabled: false, totalBelowCutoff: 0, eligibleForUpgrade: 0 }
}

/**
 * Counts below-cutoff items (tagged or not) and the eligible subset among
 * them. With `detailed` the below-cutoff entries are listed too.
 */
export function summarize(
  scored: ScoredItem[],
  detailed: boolean,
): KindSummary {
  const below = scored.filter(isBelowCutoff)
  const summary: KindSummary = {
    enabled: true,
    totalBelowCutoff: below.length,
    eligibleForUpgrade: below.filter((item) => !item.tagged).length,
  }

  if (detailed) {
    summary.items = below.map((item) => ({
      id: item.id,
      title: item.title,
      score: item.score,
      cutoff: item.cutoff,
      tagged: item.tagged,
      ...(item.seriesId !== undefined && { seriesId: item.seriesId }),
    }))
  }

  return summary
}

export async function summarizeMovies(
  collector: CandidateCollector,
  catalog: MovieCatalog,
  tagLabel: string,
  detailed: boolean,
): Promise<KindSummary> {
  const tagId = await catalog.ensureTag(tagLabel)
  return summarize(await collector.scoreMovies(catalog, tagId), detailed)
}

export async function summarizeEpisodes(
  collector: CandidateCollector,
  catalog: EpisodeCatalog,
  tagLabel: string,
  detailed: boolean,
): Promise<KindSummary> {
  const tagId = await catalog.ensureTag(tagLabel)
  const scored = await collector.scoreEpisodeFiles(catalog, tagId, {
    includeTaggedSeries: true,
  })
  return summarize(scored, detailed)
}
