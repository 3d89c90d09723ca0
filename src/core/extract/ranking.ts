import { ExtractionMismatchError } from '../errors.js'
import type { ExtractionContext, ListingRecord } from '../listings/types.js'
import { err, ok, type Result } from '../result.js'
import { decodeEntities, parseCount } from './html.js'
import { TokenScanner } from './scanner.js'

export const RECORD_START = 'class="_ranking-item'
export const DEFAULT_MAX_RECORDS = 50

const COVER = 'class="cover"'

/**
 * Pulls records out of one listing page. Implementations may parse however
 * they like as long as they return records in page order.
 */
export interface RecordExtractor {
  extractListing(
    pageText: string,
    maxRecords: number,
    context: ExtractionContext,
  ): Result<ListingRecord[], ExtractionMismatchError>
}

function mandatory(block: TokenScanner, markers: readonly string[], field: string, recordIndex: number): Result<string, ExtractionMismatchError> {
  const value = block.extract(markers, '')
  if (!value.trim()) {
    return err(new ExtractionMismatchError({ field, recordIndex, source: 'ranking' }))
  }
  return ok(value)
}

function extractRecord(block: TokenScanner, recordIndex: number, context: ExtractionContext): Result<ListingRecord, ExtractionMismatchError> {
  const id = mandatory(block, [COVER, 'data-id="', '"'], 'id', recordIndex)
  if (!id.ok) return id
  const rawTitle = mandatory(block, [COVER, 'alt="', '"'], 'title', recordIndex)
  if (!rawTitle.ok) return rawTitle

  // the cover alt text is "<title>/<author>"
  const title = decodeEntities(rawTitle.value.replace(/\/.*/s, '')).trim()
  if (!title) {
    return err(new ExtractionMismatchError({ field: 'title', recordIndex, source: 'ranking' }))
  }

  const tags = decodeEntities(block.extract([COVER, 'data-tags="', '"'], ''))
    .split(/\s+/)
    .filter(tag => tag.length > 0)

  return ok({
    id: id.value.trim(),
    title,
    tags,
    rating: context.rating,
    bookmarkCount: parseCount(block.extract(['class="bookmark-count"', '>', '<'], '')),
    textCount: parseCount(block.extract(['class="chars"', '>', '<'], '')),
    description: block.extract(['class="novel-caption"', '>', '</div>'], '').trim(),
    authorId: block.extract(['data-user_id="', '"'], '').trim(),
    authorName: decodeEntities(block.extract(['class="user-name"', '>', '<'], '')).trim(),
  })
}

export class RankingPageExtractor implements RecordExtractor {
  extractListing(
    pageText: string,
    maxRecords: number,
    context: ExtractionContext,
  ): Result<ListingRecord[], ExtractionMismatchError> {
    const scanner = new TokenScanner(pageText)
    const records: ListingRecord[] = []

    while (records.length < maxRecords && scanner.seek(RECORD_START)) {
      const record = extractRecord(scanner.window(RECORD_START), records.length, context)
      if (!record.ok) return record
      records.push(record.value)
    }

    return ok(records)
  }
}

export function extractListing(
  pageText: string,
  maxRecords: number,
  context: ExtractionContext,
): Result<ListingRecord[], ExtractionMismatchError> {
  return new RankingPageExtractor().extractListing(pageText, maxRecords, context)
}
