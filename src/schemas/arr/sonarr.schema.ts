import { z } from 'zod'

export const SonarrSeriesSchema = z.looseObject({
  id: z.number().int(),
  title: z.string().catch('').default(''),
  monitored: z.boolean().catch(false).default(false),
  qualityProfileId: z.number().int(),
  tags: z.array(z.number().int()).catch([]).default([]),
  statistics: z
    .looseObject({
      episodeFileCount: z.number().int().catch(0).default(0),
    })
    .optional(),
})

export const SonarrSeriesListSchema = z.array(SonarrSeriesSchema)

export const SonarrEpisodeFileSchema = z.looseObject({
  id: z.number().int(),
  seriesId: z.number().int().optional(),
  seasonNumber: z.number().int().optional(),
  customFormatScore: z.number().int().catch(0).default(0),
})

export const SonarrEpisodeFileListSchema = z.array(SonarrEpisodeFileSchema)

export const SonarrEpisodeSchema = z.looseObject({
  id: z.number().int(),
  seriesId: z.number().int().nullish(),
  episodeFileId: z.number().int().nullish(),
  seasonNumber: z.number().int().optional(),
  episodeNumber: z.number().int().optional(),
  title: z.string().optional(),
})

// `/episode?episodeFileId=` answers with a list on most versions and a
// single object on some
export const SonarrEpisodeLookupSchema = z.union([
  z.array(SonarrEpisodeSchema),
  SonarrEpisodeSchema,
])

export type SonarrSeries = z.infer<typeof SonarrSeriesSchema>
export type SonarrEpisodeFile = z.infer<typeof SonarrEpisodeFileSchema>
export type SonarrEpisode = z.infer<typeof SonarrEpisodeSchema>
