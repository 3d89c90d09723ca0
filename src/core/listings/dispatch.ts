import { z } from 'zod'
import { ListingRequestError } from '../errors.js'
import type { AuthorListing, ListingAggregator, RankingListing, SearchListing } from './aggregator.js'
import { RANKING_MODES, type AuthorQuery, type NovelDetail, type RankingQuery, type SearchQuery } from './types.js'

export interface ListingParams {
  ranking: RankingQuery
  search: SearchQuery
  author: AuthorQuery
  novel: { novelId: string }
}

export interface ListingResponses {
  ranking: RankingListing
  search: SearchListing
  author: AuthorListing
  novel: NovelDetail
}

export type ListingKind = keyof ListingParams

export type ListingHandlers = {
  [K in ListingKind]: (params: ListingParams[K]) => Promise<ListingResponses[K]>
}

export type ListingRequest = {
  [K in ListingKind]: { kind: K; params: ListingParams[K] }
}[ListingKind]

export function createListingHandlers(aggregator: ListingAggregator): ListingHandlers {
  return {
    ranking: params => aggregator.ranking(params),
    search: params => aggregator.search(params),
    author: params => aggregator.author(params),
    novel: params => aggregator.novel(params.novelId),
  }
}

export function dispatchListing<K extends ListingKind>(
  handlers: ListingHandlers,
  kind: K,
  params: ListingParams[K],
): Promise<ListingResponses[K]> {
  const handler = handlers[kind]
  return handler(params)
}

export function handleListingRequest(handlers: ListingHandlers, request: ListingRequest): Promise<ListingResponses[ListingKind]> {
  return dispatchListing(handlers, request.kind, request.params)
}

const emptyAsUndefined = (value: unknown) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}

const integerParam = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  const normalized = emptyAsUndefined(value)
  if (typeof normalized === 'string') {
    const parsed = Number(normalized)
    return Number.isFinite(parsed) ? parsed : normalized
  }
  return normalized
}, z.number().int().min(minValue).default(defaultValue))

const numericId = z.string().trim().regex(/^\d+$/, 'must be numeric')

const paramSchemas = {
  ranking: z.object({
    mode: z.preprocess(emptyAsUndefined, z.enum(RANKING_MODES).default('daily')),
    date: z.preprocess(emptyAsUndefined, z.string().optional()),
    bookmarks: integerParam(0, 0),
  }).transform((raw): RankingQuery => ({ mode: raw.mode, date: raw.date, minBookmarks: raw.bookmarks })),
  search: z.object({
    q: z.string().trim().min(1, 'is required'),
    page: integerParam(1, 1),
    npages: integerParam(1, 1),
    bookmarks: integerParam(0, 0),
  }).transform((raw): SearchQuery => ({
    term: raw.q,
    page: raw.page,
    pageCount: raw.npages,
    minBookmarks: raw.bookmarks,
  })),
  author: z.object({
    id: numericId,
    bookmarks: integerParam(0, 0),
  }).transform((raw): AuthorQuery => ({ authorId: raw.id, minBookmarks: raw.bookmarks })),
  novel: z.object({
    id: numericId,
  }).transform(raw => ({ novelId: raw.id })),
}

function isListingKind(value: string): value is ListingKind {
  return Object.hasOwn(paramSchemas, value)
}

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: string, raw: Record<string, string | undefined>): T {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join('.') || 'params'
    throw new ListingRequestError(`Invalid ${kind} request: ${field} ${issue?.message ?? 'is invalid'}`)
  }
  return parsed.data
}

/** Turns the string parameters a router hands over into a typed request. */
export function parseListingRequest(kind: string, raw: Record<string, string | undefined>): ListingRequest {
  if (!isListingKind(kind)) {
    throw new ListingRequestError(`Unknown listing kind "${kind}"`)
  }
  switch (kind) {
    case 'ranking':
      return { kind, params: parseParams(paramSchemas.ranking, kind, raw) }
    case 'search':
      return { kind, params: parseParams(paramSchemas.search, kind, raw) }
    case 'author':
      return { kind, params: parseParams(paramSchemas.author, kind, raw) }
    case 'novel':
      return { kind, params: parseParams(paramSchemas.novel, kind, raw) }
  }
}
