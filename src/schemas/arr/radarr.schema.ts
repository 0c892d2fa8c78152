import { z } from 'zod'

export const RadarrMovieSchema = z.looseObject({
  id: z.number().int(),
  title: z.string().catch('').default(''),
  monitored: z.boolean().catch(false).default(false),
  qualityProfileId: z.number().int(),
  hasFile: z.boolean().optional(),
  movieFileId: z.number().int().nullish(),
  tags: z.array(z.number().int()).catch([]).default([]),
})

export const RadarrMovieListSchema = z.array(RadarrMovieSchema)

export const RadarrMovieFileSchema = z.looseObject({
  id: z.number().int(),
  movieId: z.number().int().optional(),
  customFormatScore: z.number().int().catch(0).default(0),
})

export type RadarrMovie = z.infer<typeof RadarrMovieSchema>
export type RadarrMovieFile = z.infer<typeof RadarrMovieFileSchema>
