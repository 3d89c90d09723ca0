import { z } from 'zod'
import { ExtractionMismatchError } from '../errors.js'
import { ratingSchema, type NovelDetail } from '../listings/types.js'
import { err, ok, type Result } from '../result.js'
import { decodeEntities } from './html.js'
import { TokenScanner } from './scanner.js'

const preloadNovelSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().default(''),
  content: z.string(),
  xRestrict: ratingSchema.default(0),
  bookmarkCount: z.number().int().nonnegative().default(0),
  userId: z.string().default(''),
  userName: z.string().default(''),
  createDate: z.string().default(''),
  tags: z.object({
    tags: z.array(z.object({ tag: z.string() })).default([]),
  }).default({ tags: [] }),
  textEmbeddedImages: z.record(z.object({
    urls: z.object({ original: z.string() }),
  })).nullish(),
})

const preloadSchema = z.object({
  novel: z.record(preloadNovelSchema),
})

function mismatch(field: string, cause?: unknown): { ok: false; error: ExtractionMismatchError } {
  return err(new ExtractionMismatchError({ field, source: 'novel' }, { cause }))
}

/** Reads the novel embedded as JSON in the detail page's preload meta tag. */
export function extractNovelDetail(pageText: string): Result<NovelDetail, ExtractionMismatchError> {
  const scanner = new TokenScanner(pageText)
  if (!scanner.seek('name="preload-data"')) {
    return mismatch('preload-data')
  }
  const raw = scanner.extract(['content=\'', '\''], '')
  if (!raw) {
    return mismatch('preload-data')
  }

  let payload: unknown
  try {
    payload = JSON.parse(decodeEntities(raw))
  }
  catch (error) {
    return mismatch('preload-data', error)
  }

  const parsed = preloadSchema.safeParse(payload)
  if (!parsed.success) {
    return mismatch('novel', parsed.error)
  }

  const novel = Object.values(parsed.data.novel)[0]
  if (!novel) {
    return mismatch('novel')
  }

  const embeddedImages: Record<string, string> = {}
  for (const [imageId, image] of Object.entries(novel.textEmbeddedImages ?? {})) {
    embeddedImages[imageId] = image.urls.original
  }

  return ok({
    id: novel.id,
    title: novel.title,
    description: novel.description,
    content: novel.content,
    rating: novel.xRestrict,
    bookmarkCount: novel.bookmarkCount,
    authorId: novel.userId,
    authorName: novel.userName,
    createDate: novel.createDate,
    tags: novel.tags.tags.map(entry => entry.tag),
    embeddedImages,
  })
}
