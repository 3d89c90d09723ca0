import { z } from 'zod'
import { ExtractionMismatchError, FetchError, ListingRequestError } from '../../core/errors.js'
import type { HeaderLayer, RateLimitedFetcher } from '../../core/fetch/fetcher.js'
import {
  AUTHOR_BATCH_SIZE,
  isRestrictedMode,
  ratingSchema,
  type ListingRecord,
  type ListingSource,
  type RankingMode,
} from '../../core/listings/types.js'
import { createLogger } from '../../utils/logger.js'
import {
  buildBaseHeaders,
  buildCookieHeaders,
  DEFAULT_SITE_BASE_URL,
  DEFAULT_USER_AGENT,
  IMAGE_HEADERS,
  JSON_HEADERS,
} from './headers.js'

export interface SiteClientOptions {
  fetcher: RateLimitedFetcher
  baseUrl?: string
  userAgent?: string
  cookie?: string
}

const workSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  tags: z.array(z.string()).default([]),
  description: z.string().default(''),
  xRestrict: ratingSchema.default(0),
  bookmarkCount: z.number().int().nonnegative().default(0),
  textCount: z.number().int().nonnegative().default(0),
  userId: z.string().default(''),
  userName: z.string().default(''),
})

type Work = z.infer<typeof workSchema>

const searchResponseSchema = z.object({
  body: z.object({
    novel: z.object({
      data: z.array(workSchema),
    }),
  }),
})

const authorAllResponseSchema = z.object({
  body: z.object({
    // the site sends an empty array instead of an empty object
    novels: z.union([z.record(z.unknown()), z.array(z.unknown()).length(0)]),
  }),
})

const authorWorksResponseSchema = z.object({
  body: z.object({
    works: z.record(workSchema),
  }),
})

const artworkPagesResponseSchema = z.object({
  body: z.array(z.object({
    urls: z.object({ original: z.string().min(1) }),
  })),
})

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/
const NUMERIC_ID = /^\d+$/

const log = createLogger('site')

function toRecord(work: Work): ListingRecord {
  return {
    id: work.id,
    title: work.title,
    tags: work.tags,
    rating: work.xRestrict,
    bookmarkCount: work.bookmarkCount,
    textCount: work.textCount,
    description: work.description,
    authorId: work.userId,
    authorName: work.userName,
  }
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, source: string): T {
  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path.join('.') || 'body'
    throw new ExtractionMismatchError({ field, source }, { cause: parsed.error })
  }
  return parsed.data
}

function encodeSearchTerm(term: string, endpoint: string): string {
  try {
    return encodeURIComponent(term)
  }
  catch (error) {
    throw new FetchError(`Search term cannot be URL-encoded: ${JSON.stringify(term)}`, { url: endpoint, cause: error })
  }
}

function assertNumericId(value: string, label: string): void {
  if (!NUMERIC_ID.test(value)) {
    throw new ListingRequestError(`Invalid ${label} "${value}"`)
  }
}

export class SiteClient implements ListingSource {
  readonly baseUrl: string
  private readonly fetcher: RateLimitedFetcher
  private readonly baseHeaders: HeaderLayer
  private readonly cookieHeaders: HeaderLayer

  constructor(options: SiteClientOptions) {
    this.fetcher = options.fetcher
    this.baseUrl = (options.baseUrl ?? DEFAULT_SITE_BASE_URL).replace(/\/+$/, '')
    this.baseHeaders = buildBaseHeaders(this.baseUrl, options.userAgent ?? DEFAULT_USER_AGENT)
    this.cookieHeaders = buildCookieHeaders(options.cookie)
  }

  hasCookie(): boolean {
    return 'cookie' in this.cookieHeaders
  }

  async fetchRankingPage(mode: RankingMode, date: string, page: number): Promise<string> {
    const restricted = isRestrictedMode(mode)
    if (restricted && !this.hasCookie()) {
      throw new ListingRequestError(`A cookie is needed to view the ${mode} ranking`)
    }
    if (!DATE_PATTERN.test(date)) {
      throw new ListingRequestError(`Invalid ranking date "${date}" (expected YYYY-MM-DD)`)
    }

    let url = `${this.baseUrl}/novel/ranking.php?mode=${mode}&date=${date.replaceAll('-', '')}`
    if (page > 1) {
      url += `&page=${page}`
    }
    log.debug('Ranking page request', { mode, date, page })
    return this.fetcher.fetch(url, 'text', restricted ? [this.baseHeaders, this.cookieHeaders] : [this.baseHeaders])
  }

  async fetchSearchPage(term: string, page: number): Promise<ListingRecord[]> {
    const endpoint = `${this.baseUrl}/ajax/search/novels/`
    const word = encodeSearchTerm(term, endpoint)
    const url = `${endpoint}${word}?word=${word}&order=date_d&mode=all&p=${page}&s_mode=s_tag&lang=ja`
    log.debug('Search page request', { term, page })
    const payload = await this.fetcher.fetch(url, 'json', [this.baseHeaders, this.cookieHeaders, JSON_HEADERS])
    return parsePayload(searchResponseSchema, payload, 'search').body.novel.data.map(toRecord)
  }

  async fetchAuthorNovelIds(authorId: string): Promise<string[]> {
    assertNumericId(authorId, 'author id')
    const url = `${this.baseUrl}/ajax/user/${authorId}/profile/all?lang=ja`
    const payload = await this.fetcher.fetch(url, 'json', [this.baseHeaders, this.cookieHeaders, JSON_HEADERS])
    const novels = parsePayload(authorAllResponseSchema, payload, 'author').body.novels
    return Array.isArray(novels) ? [] : Object.keys(novels)
  }

  async fetchAuthorNovels(authorId: string, novelIds: string[]): Promise<ListingRecord[]> {
    assertNumericId(authorId, 'author id')
    if (novelIds.length === 0) {
      throw new ListingRequestError('At least one novel id is required')
    }
    if (novelIds.length > AUTHOR_BATCH_SIZE) {
      throw new ListingRequestError(`At most ${AUTHOR_BATCH_SIZE} novel ids can be queried at once; got ${novelIds.length}`)
    }
    novelIds.forEach(id => assertNumericId(id, 'novel id'))

    const idsParams = novelIds.map(id => `ids[]=${id}`).join('&')
    const url = `${this.baseUrl}/ajax/user/${authorId}/profile/novels?${idsParams}`
    const payload = await this.fetcher.fetch(url, 'json', [this.baseHeaders, this.cookieHeaders, JSON_HEADERS])
    const works = parsePayload(authorWorksResponseSchema, payload, 'author-works').body.works

    // keyed by id, so object order is numeric, not the requested order
    const byId = new Map(Object.values(works).map(work => [work.id, work]))
    return novelIds.flatMap((id) => {
      const work = byId.get(id)
      return work ? [toRecord(work)] : []
    })
  }

  async fetchNovelPage(novelId: string): Promise<string> {
    assertNumericId(novelId, 'novel id')
    const url = `${this.baseUrl}/novel/show.php?id=${novelId}`
    return this.fetcher.fetch(url, 'text', [this.baseHeaders, this.cookieHeaders])
  }

  async fetchArtworkImageUrls(artworkId: string): Promise<string[]> {
    assertNumericId(artworkId, 'artwork id')
    const url = `${this.baseUrl}/ajax/illust/${artworkId}/pages?lang=ja`
    const payload = await this.fetcher.fetch(url, 'json', [this.baseHeaders, this.cookieHeaders, JSON_HEADERS])
    return parsePayload(artworkPagesResponseSchema, payload, 'artwork').body.map(page => page.urls.original)
  }

  async fetchImage(url: string): Promise<Uint8Array> {
    return this.fetcher.fetch(url, 'bytes', [this.baseHeaders, IMAGE_HEADERS])
  }
}
