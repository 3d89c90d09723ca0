import { z } from 'zod'

export const RANKING_MODES = [
  'daily',
  'weekly',
  'monthly',
  'rookie',
  'weekly_original',
  'male',
  'female',
  'daily_r18',
  'weekly_r18',
  'male_r18',
  'female_r18',
] as const

export type RankingMode = typeof RANKING_MODES[number]

export function isRankingMode(value: string): value is RankingMode {
  return RANKING_MODES.some(mode => mode === value)
}

export function isRestrictedMode(mode: RankingMode): boolean {
  return mode.endsWith('_r18')
}

/** 0 general, 1 restricted, 2 restricted (grotesque). */
export const ratingSchema = z.union([z.literal(0), z.literal(1), z.literal(2)])

export type Rating = z.infer<typeof ratingSchema>

export const listingRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  tags: z.array(z.string()),
  rating: ratingSchema,
  bookmarkCount: z.number().int().nonnegative(),
  textCount: z.number().int().nonnegative(),
  description: z.string(),
  authorId: z.string(),
  authorName: z.string(),
})

export type ListingRecord = z.infer<typeof listingRecordSchema>

export const listingRecordsSchema = z.array(listingRecordSchema)

export const novelDetailSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  content: z.string(),
  rating: ratingSchema,
  bookmarkCount: z.number().int().nonnegative(),
  authorId: z.string(),
  authorName: z.string(),
  createDate: z.string(),
  tags: z.array(z.string()),
  embeddedImages: z.record(z.string()),
})

export type NovelDetail = z.infer<typeof novelDetailSchema>

export interface ExtractionContext {
  rating: Rating
}

export type MismatchPolicy = 'fail' | 'skip-page'

/** What the aggregator needs from the site. */
export interface ListingSource {
  /** Raw HTML of one ranking page; `date` is YYYY-MM-DD. */
  fetchRankingPage: (mode: RankingMode, date: string, page: number) => Promise<string>
  fetchSearchPage: (term: string, page: number) => Promise<ListingRecord[]>
  fetchAuthorNovelIds: (authorId: string) => Promise<string[]>
  /** At most `AUTHOR_BATCH_SIZE` ids; records come back in `novelIds` order. */
  fetchAuthorNovels: (authorId: string, novelIds: string[]) => Promise<ListingRecord[]>
  fetchNovelPage: (novelId: string) => Promise<string>
}

export const AUTHOR_BATCH_SIZE = 100

export interface SearchQuery {
  term: string
  page: number
  pageCount: number
  minBookmarks: number
}

export interface RankingQuery {
  mode: RankingMode
  /** YYYY-MM-DD; missing, malformed or future dates fall back to yesterday. */
  date?: string
  minBookmarks: number
}

export interface AuthorQuery {
  authorId: string
  minBookmarks: number
}
