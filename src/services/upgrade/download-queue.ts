import type {
  ArrQueueRecord,
  EpisodeCatalog,
  MovieCatalog,
} from '@root/types/catalog.types.js'
import type { RecentUpgrade, ScoredItem } from '@root/types/upgrade.types.js'
import { errorMessage } from '@utils/errors.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  type CandidateCollector,
  isBelowCutoff,
} from './candidate-collector.js'

const BYTES_PER_GIB = 1024 ** 3

export interface MovieQueueEntry {
  title: string | null
  status: string | null
  protocol: string | null
  size: number
  sizeLeft: number
  timeLeft: string | null
  errorMessage: string | null
  indexer: string | null
  downloadId: string | null
}

export interface EpisodeQueueEntry {
  series: string
  episode: string
  status: string
  protocol: string
  size: number
  sizeLeft: number
  timeLeft: string
  indexer: string
  downloadId: string | null
}

export interface EligibleEntry {
  id: number
  title: string
  status: string
  score: number
  cutoff: number
  series?: string
  episode?: string
}

export type DownloadQueueView =
  | { mode: 'tagged'; movies: RecentUpgrade[]; episodes: RecentUpgrade[] }
  | {
      mode: 'eligible'
      movies: EligibleEntry[]
      episodes: EligibleEntry[]
      moviesError?: string
      episodesError?: string
    }
  | {
      mode: 'queue'
      movies: MovieQueueEntry[]
      episodes: EpisodeQueueEntry[]
      moviesError?: string
      episodesError?: string
    }

/** Bytes → GiB rounded to two decimals. */
export function toGiB(bytes: number | null | undefined): number {
  return Math.round(((bytes ?? 0) / BYTES_PER_GIB) * 100) / 100
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * @example
 * formatEpisodeLabel(1, 5) // 'S01E05'
 * formatEpisodeLabel(2, null) // 'S02'
 * formatEpisodeLabel(null, null) // '-'
 */
export function formatEpisodeLabel(
  seasonNumber: number | null | undefined,
  episodeNumber: number | null | undefined,
): string {
  if (seasonNumber == null) return '-'
  if (episodeNumber == null) return `S${pad2(seasonNumber)}`
  return `S${pad2(seasonNumber)}E${pad2(episodeNumber)}`
}

export function toMovieQueueEntry(record: ArrQueueRecord): MovieQueueEntry {
  return {
    title: record.title ?? null,
    status: record.status ?? null,
    protocol: record.protocol ?? null,
    size: toGiB(record.size),
    sizeLeft: toGiB(record.sizeleft),
    timeLeft: record.timeleft ?? null,
    errorMessage: record.errorMessage ?? null,
    indexer: record.indexer ?? null,
    downloadId: record.downloadId ?? null,
  }
}

export function toEligibleMovie(item: ScoredItem): EligibleEntry {
  return {
    id: item.id,
    title: item.title,
    status: `Score ${item.score} / ${item.cutoff}`,
    score: item.score,
    cutoff: item.cutoff,
  }
}

export function toEligibleEpisodeFile(item: ScoredItem): EligibleEntry {
  return {
    ...toEligibleMovie(item),
    series: item.seriesTitle ?? '-',
    episode: `EpisodeFile ${item.id}`,
  }
}

/**
 * Builds the episode queue view. Records without a series are skipped; a
 * series title missing from the record is fetched once per series.
 */
export async function buildEpisodeQueue(
  log: FastifyBaseLogger,
  catalog: EpisodeCatalog,
): Promise<EpisodeQueueEntry[]> {
  const records = await catalog.listQueue()
  const titles = new Map<number, string>()
  const entries: EpisodeQueueEntry[] = []

  for (const record of records) {
    const seriesId = record.seriesId
    if (!seriesId) continue

    let title = record.series?.title ?? titles.get(seriesId)
    if (title === undefined || title === null) {
      try {
        title = (await catalog.getSeries(seriesId)).title
      } catch (error) {
        log.warn(
          { seriesId, error: errorMessage(error) },
          'Failed to fetch series for queue entry',
        )
        title = `Series ${seriesId}`
      }
      titles.set(seriesId, title)
    }

    entries.push({
      series: title || '-',
      episode: formatEpisodeLabel(
        record.seasonNumber ?? record.episode?.seasonNumber,
        record.episode?.episodeNumber,
      ),
      status: record.status ?? '-',
      protocol: record.protocol ?? '-',
      size: toGiB(record.size),
      sizeLeft: toGiB(record.sizeleft),
      timeLeft: record.timeleft ?? '-',
      indexer: record.indexer ?? '-',
      downloadId: record.downloadId ?? null,
    })
  }

  return entries
}

export async function buildMovieQueue(
  catalog: MovieCatalog,
): Promise<MovieQueueEntry[]> {
  return (await catalog.listQueue()).map(toMovieQueueEntry)
}

export async function listEligibleMovies(
  collector: CandidateCollector,
  catalog: MovieCatalog,
  tagLabel: string,
): Promise<EligibleEntry[]> {
  const tagId = await catalog.ensureTag(tagLabel)
  const scored = await collector.scoreMovies(catalog, tagId)
  return scored
    .filter((item) => isBelowCutoff(item) && !item.tagged)
    .map(toEligibleMovie)
}

export async function listEligibleEpisodeFiles(
  collector: CandidateCollector,
  catalog: EpisodeCatalog,
  tagLabel: string,
): Promise<EligibleEntry[]> {
  const tagId = await catalog.ensureTag(tagLabel)
  const scored = await collector.scoreEpisodeFiles(catalog, tagId)
  return scored.filter(isBelowCutoff).map(toEligibleEpisodeFile)
}
