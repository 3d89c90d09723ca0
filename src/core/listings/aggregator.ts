import { createHash } from 'node:crypto'
import type { z } from 'zod'
import type { JsonValue, ResilientCache } from '../cache/resilient-cache.js'
import { ExtractionMismatchError, ListingRequestError } from '../errors.js'
import { extractNovelDetail } from '../extract/novel.js'
import { DEFAULT_MAX_RECORDS, RankingPageExtractor, type RecordExtractor } from '../extract/ranking.js'
import { createLogger } from '../../utils/logger.js'
import { compactDate, DEFAULT_TIMEZONE, getYesterday, isIsoDate } from '../../utils/time.js'
import {
  AUTHOR_BATCH_SIZE,
  isRestrictedMode,
  listingRecordsSchema,
  novelDetailSchema,
  type AuthorQuery,
  type ListingRecord,
  type ListingSource,
  type MismatchPolicy,
  type NovelDetail,
  type RankingMode,
  type RankingQuery,
  type SearchQuery,
} from './types.js'

export const DEFAULT_RANKING_PAGES = 2
export const DEFAULT_SEARCH_CACHE_SECONDS = 600
export const DEFAULT_RANKING_CACHE_SECONDS = 3600
export const DEFAULT_NOVEL_CACHE_SECONDS = 3 * 86400

export type FrozenRecord = Readonly<Omit<ListingRecord, 'tags'>> & { readonly tags: readonly string[] }

export interface RankingListing {
  mode: RankingMode
  date: string
  records: FrozenRecord[]
}

export interface SearchListing {
  term: string
  page: number
  pageCount: number
  records: FrozenRecord[]
}

export interface AuthorListing {
  authorId: string
  records: FrozenRecord[]
}

export interface ListingAggregatorOptions {
  source: ListingSource
  cache: ResilientCache
  extractor?: RecordExtractor
  maxRecordsPerPage?: number
  rankingPages?: number
  searchCacheSeconds?: number
  rankingCacheSeconds?: number
  novelCacheSeconds?: number
  mismatchPolicy?: MismatchPolicy
  timezone?: string
  now?: () => Date
}

const log = createLogger('listings')

/** Records with `bookmarkCount >= minBookmarks`, in their original order. */
export function filterByScore<T extends Pick<ListingRecord, 'bookmarkCount'>>(records: readonly T[], minBookmarks: number): T[] {
  return records.filter(record => record.bookmarkCount >= minBookmarks)
}

/** The requested day when it is a real date no later than yesterday, otherwise yesterday. */
export function resolveRankingDate(date: string | undefined, now: Date, timeZone: string): string {
  const yesterday = getYesterday(now, timeZone)
  if (!date || !isIsoDate(date)) return yesterday
  return date <= yesterday ? date : yesterday
}

export function rankingCacheKey(mode: RankingMode, date: string): string {
  return `site-ranking-${mode}-${compactDate(date)}`
}

export function searchCacheKey(term: string, page: number): string {
  const digest = createHash('sha256').update(term).digest('hex').slice(0, 16)
  return `site-search-${digest}-p${page}`
}

function freeze(records: ListingRecord[]): FrozenRecord[] {
  return records.map(record => Object.freeze({ ...record, tags: Object.freeze([...record.tags]) }))
}

function parseCached<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: JsonValue, key: string): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new ExtractionMismatchError({ field: 'cached value', source: key }, { cause: parsed.error })
  }
  return parsed.data
}

/**
 * Runs the fetch, cache and extract cycle for each listing kind and applies
 * the score threshold. Pages are fetched one after another in page order.
 */
export class ListingAggregator {
  private readonly source: ListingSource
  private readonly cache: ResilientCache
  private readonly extractor: RecordExtractor
  private readonly maxRecordsPerPage: number
  private readonly rankingPages: number
  private readonly searchCacheSeconds: number
  private readonly rankingCacheSeconds: number
  private readonly novelCacheSeconds: number
  private readonly mismatchPolicy: MismatchPolicy
  private readonly timezone: string
  private readonly now: () => Date

  constructor(options: ListingAggregatorOptions) {
    this.source = options.source
    this.cache = options.cache
    this.extractor = options.extractor ?? new RankingPageExtractor()
    this.maxRecordsPerPage = options.maxRecordsPerPage ?? DEFAULT_MAX_RECORDS
    this.rankingPages = Math.max(1, options.rankingPages ?? DEFAULT_RANKING_PAGES)
    this.searchCacheSeconds = options.searchCacheSeconds ?? DEFAULT_SEARCH_CACHE_SECONDS
    this.rankingCacheSeconds = options.rankingCacheSeconds ?? DEFAULT_RANKING_CACHE_SECONDS
    this.novelCacheSeconds = options.novelCacheSeconds ?? DEFAULT_NOVEL_CACHE_SECONDS
    this.mismatchPolicy = options.mismatchPolicy ?? 'fail'
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE
    this.now = options.now ?? (() => new Date())
  }

  async search(query: SearchQuery): Promise<SearchListing> {
    const term = query.term.trim()
    if (!term) {
      throw new ListingRequestError('Search term is empty')
    }
    if (!Number.isInteger(query.page) || query.page < 1) {
      throw new ListingRequestError(`Invalid page ${query.page}`)
    }
    if (!Number.isInteger(query.pageCount) || query.pageCount < 1) {
      throw new ListingRequestError(`Invalid page count ${query.pageCount}`)
    }

    const records: ListingRecord[] = []
    for (let page = query.page; page < query.page + query.pageCount; page += 1) {
      const key = searchCacheKey(term, page)
      const pageRecords = await this.applyMismatchPolicy(`search page ${page}`, async () => {
        const value = await this.cache.getOrCompute(key, () => this.source.fetchSearchPage(term, page), this.searchCacheSeconds)
        return parseCached(listingRecordsSchema, value, key)
      })
      records.push(...pageRecords)
    }

    const filtered = filterByScore(records, query.minBookmarks)
    log.debug('Search aggregated', { term, page: query.page, pageCount: query.pageCount, total: records.length, kept: filtered.length })
    return { term, page: query.page, pageCount: query.pageCount, records: freeze(filtered) }
  }

  async ranking(query: RankingQuery): Promise<RankingListing> {
    const date = resolveRankingDate(query.date, this.now(), this.timezone)
    const key = rankingCacheKey(query.mode, date)
    const value = await this.cache.getOrCompute(
      key,
      () => this.collectRanking(query.mode, date),
      this.rankingCacheSeconds,
    )
    const records = parseCached(listingRecordsSchema, value, key)
    const filtered = filterByScore(records, query.minBookmarks)
    log.debug('Ranking aggregated', { mode: query.mode, date, total: records.length, kept: filtered.length })
    return { mode: query.mode, date, records: freeze(filtered) }
  }

  async author(query: AuthorQuery): Promise<AuthorListing> {
    const key = `site-author-${query.authorId}`
    const value = await this.cache.getOrCompute(key, () => this.collectAuthor(query.authorId), this.searchCacheSeconds)
    const records = parseCached(listingRecordsSchema, value, key)
    const filtered = filterByScore(records, query.minBookmarks)
    log.debug('Author listing aggregated', { authorId: query.authorId, total: records.length, kept: filtered.length })
    return { authorId: query.authorId, records: freeze(filtered) }
  }

  async novel(novelId: string): Promise<NovelDetail> {
    const key = `site-novel-${novelId}`
    const value = await this.cache.getOrCompute(key, async () => {
      const detail = extractNovelDetail(await this.source.fetchNovelPage(novelId))
      if (!detail.ok) throw detail.error
      return detail.value
    }, this.novelCacheSeconds)
    return parseCached(novelDetailSchema, value, key)
  }

  private async collectRanking(mode: RankingMode, date: string): Promise<ListingRecord[]> {
    const context = { rating: isRestrictedMode(mode) ? 1 as const : 0 as const }
    const records: ListingRecord[] = []
    for (let page = 1; page <= this.rankingPages; page += 1) {
      const html = await this.source.fetchRankingPage(mode, date, page)
      const pageRecords = await this.applyMismatchPolicy(`ranking ${mode} ${date} page ${page}`, async () => {
        const extracted = this.extractor.extractListing(html, this.maxRecordsPerPage, context)
        if (!extracted.ok) throw extracted.error
        return extracted.value
      })
      records.push(...pageRecords)
    }
    return records
  }

  private async collectAuthor(authorId: string): Promise<ListingRecord[]> {
    const novelIds = await this.source.fetchAuthorNovelIds(authorId)
    const records: ListingRecord[] = []
    // 0 ids = 0 requests, 1-100 = 1 request, 101-200 = 2 ...
    for (let start = 0; start < novelIds.length; start += AUTHOR_BATCH_SIZE) {
      const batch = novelIds.slice(start, start + AUTHOR_BATCH_SIZE)
      records.push(...await this.source.fetchAuthorNovels(authorId, batch))
    }
    return records
  }

  private async applyMismatchPolicy(label: string, run: () => Promise<ListingRecord[]>): Promise<ListingRecord[]> {
    try {
      return await run()
    }
    catch (error) {
      if (this.mismatchPolicy === 'skip-page' && error instanceof ExtractionMismatchError) {
        log.warn('Page shape changed; skipping page', { page: label, error })
        return []
      }
      throw error
    }
  }
}
