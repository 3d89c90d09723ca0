import { describe, expect, it, vi } from 'vitest'
import { ExtractionMismatchError, FetchError, ListingRequestError } from '../../../core/errors.js'
import { RateLimitedFetcher } from '../../../core/fetch/fetcher.js'
import { DestinationScheduler } from '../../../core/fetch/rate-limiter.js'
import type { TransportRequest, TransportResponse } from '../../../core/fetch/transport.js'
import { SiteClient } from '../client.js'

const BASE_URL = 'https://site.test'
const encoder = new TextEncoder()

function createClient(reply: (url: string) => string | Uint8Array, cookie?: string) {
  const requests: TransportRequest[] = []
  const transport = vi.fn(async (request: TransportRequest): Promise<TransportResponse> => {
    requests.push(request)
    const body = reply(request.url)
    return {
      status: 200,
      statusText: 'OK',
      url: request.url,
      body: typeof body === 'string' ? encoder.encode(body) : body,
    }
  })
  const fetcher = new RateLimitedFetcher({
    scheduler: new DestinationScheduler({ now: () => 0, sleep: async () => {} }),
    transport,
  })
  const client = new SiteClient({ fetcher, baseUrl: `${BASE_URL}/`, userAgent: 'test-agent', cookie })
  return { client, requests }
}

function work(id: string, extra: Record<string, unknown> = {}) {
  return {
    id,
    title: `Work ${id}`,
    tags: ['tag'],
    description: 'About it',
    xRestrict: 0,
    bookmarkCount: 12,
    textCount: 3400,
    userId: '77',
    userName: 'Writer',
    ...extra,
  }
}

describe('SiteClient.fetchRankingPage', () => {
  it('requests the ranking page without a cookie for general modes', async () => {
    const { client, requests } = createClient(() => '<html></html>', 'PHPSESSID=test-secret')

    await expect(client.fetchRankingPage('daily', '2024-03-09', 1)).resolves.toBe('<html></html>')
    await client.fetchRankingPage('daily', '2024-03-09', 2)

    expect(requests.map(request => request.url)).toEqual([
      'https://site.test/novel/ranking.php?mode=daily&date=20240309',
      'https://site.test/novel/ranking.php?mode=daily&date=20240309&page=2',
    ])
    expect(requests[0]?.headers['user-agent']).toBe('test-agent')
    expect(requests[0]?.headers.referer).toBe('https://site.test/')
    expect(requests[0]?.headers).not.toHaveProperty('cookie')
  })

  it('sends the cookie for restricted modes', async () => {
    const { client, requests } = createClient(() => '', 'PHPSESSID=test-secret')

    await client.fetchRankingPage('weekly_r18', '2024-03-09', 1)

    expect(requests[0]?.headers.cookie).toBe('PHPSESSID=test-secret')
  })

  it('refuses restricted modes without a cookie', async () => {
    const { client, requests } = createClient(() => '')

    expect(client.hasCookie()).toBe(false)
    await expect(client.fetchRankingPage('daily_r18', '2024-03-09', 1)).rejects.toBeInstanceOf(ListingRequestError)
    expect(requests).toEqual([])
  })

  it('refuses a malformed date', async () => {
    const { client } = createClient(() => '')

    await expect(client.fetchRankingPage('daily', '20240309', 1)).rejects.toThrow('Invalid ranking date "20240309" (expected YYYY-MM-DD)')
  })
})

describe('SiteClient.fetchSearchPage', () => {
  it('encodes the term and maps works to records', async () => {
    const { client, requests } = createClient(() => JSON.stringify({
      body: { novel: { data: [work('10', { xRestrict: 2 }), work('11', { tags: undefined })] } },
    }), 'PHPSESSID=test-secret')

    const records = await client.fetchSearchPage('猫', 3)

    expect(requests[0]?.url).toBe(
      'https://site.test/ajax/search/novels/%E7%8C%AB?word=%E7%8C%AB&order=date_d&mode=all&p=3&s_mode=s_tag&lang=ja',
    )
    expect(requests[0]?.headers.accept).toBe('application/json')
    expect(requests[0]?.headers.cookie).toBe('PHPSESSID=test-secret')
    expect(records).toEqual([
      {
        id: '10',
        title: 'Work 10',
        tags: ['tag'],
        rating: 2,
        bookmarkCount: 12,
        textCount: 3400,
        description: 'About it',
        authorId: '77',
        authorName: 'Writer',
      },
      {
        id: '11',
        title: 'Work 11',
        tags: [],
        rating: 0,
        bookmarkCount: 12,
        textCount: 3400,
        description: 'About it',
        authorId: '77',
        authorName: 'Writer',
      },
    ])
  })

  it('refuses a term that cannot be URL-encoded', async () => {
    const { client, requests } = createClient(() => '{}')

    const error = await client.fetchSearchPage('cat\ud800', 1).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(FetchError)
    expect(error).toHaveProperty('url', 'https://site.test/ajax/search/novels/')
    expect(requests).toEqual([])
  })

  it('reports a payload of an unexpected shape', async () => {
    const { client } = createClient(() => JSON.stringify({ body: { illust: {} } }))

    const error = await client.fetchSearchPage('cats', 1).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ExtractionMismatchError)
    expect(error).toHaveProperty('field', 'body.novel')
    expect(error).toHaveProperty('source', 'search')
  })
})

describe('SiteClient author endpoints', () => {
  it('lists the novel ids of an author', async () => {
    const { client, requests } = createClient(() => JSON.stringify({ body: { novels: { 3: null, 1: null, 2: null }, illusts: [] } }))

    await expect(client.fetchAuthorNovelIds('77')).resolves.toEqual(['1', '2', '3'])
    expect(requests[0]?.url).toBe('https://site.test/ajax/user/77/profile/all?lang=ja')
  })

  it('treats an empty array as no novels', async () => {
    const { client } = createClient(() => JSON.stringify({ body: { novels: [] } }))

    await expect(client.fetchAuthorNovelIds('77')).resolves.toEqual([])
  })

  it('fetches a batch and returns it in the requested order', async () => {
    const { client, requests } = createClient(() => JSON.stringify({
      body: { works: { 1: work('1'), 2: work('2'), 3: work('3') } },
    }))

    const records = await client.fetchAuthorNovels('77', ['3', '1', '2', '4'])

    expect(requests[0]?.url).toBe('https://site.test/ajax/user/77/profile/novels?ids[]=3&ids[]=1&ids[]=2&ids[]=4')
    expect(records.map(record => record.id)).toEqual(['3', '1', '2'])
  })

  it('validates ids and batch size', async () => {
    const { client, requests } = createClient(() => '{}')
    const tooMany = Array.from({ length: 101 }, (_, index) => String(index))

    await expect(client.fetchAuthorNovelIds('abc')).rejects.toThrow('Invalid author id "abc"')
    await expect(client.fetchAuthorNovels('77', [])).rejects.toThrow('At least one novel id is required')
    await expect(client.fetchAuthorNovels('77', tooMany)).rejects.toThrow('At most 100 novel ids can be queried at once; got 101')
    await expect(client.fetchAuthorNovels('77', ['1', 'x'])).rejects.toThrow('Invalid novel id "x"')
    expect(requests).toEqual([])
  })
})

describe('SiteClient detail and image endpoints', () => {
  it('fetches a novel page', async () => {
    const { client, requests } = createClient(() => '<html>novel</html>')

    await expect(client.fetchNovelPage('42')).resolves.toBe('<html>novel</html>')
    expect(requests[0]?.url).toBe('https://site.test/novel/show.php?id=42')
  })

  it('lists artwork image urls', async () => {
    const { client, requests } = createClient(() => JSON.stringify({
      body: [
        { urls: { original: 'https://img.site.test/1_p0.png', small: 'x' } },
        { urls: { original: 'https://img.site.test/1_p1.png' } },
      ],
    }))

    await expect(client.fetchArtworkImageUrls('1')).resolves.toEqual(['https://img.site.test/1_p0.png', 'https://img.site.test/1_p1.png'])
    expect(requests[0]?.url).toBe('https://site.test/ajax/illust/1/pages?lang=ja')
  })

  it('fetches image bytes with the site referer', async () => {
    const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47])
    const { client, requests } = createClient(() => png)

    await expect(client.fetchImage('https://img.site.test/1_p0.png')).resolves.toEqual(png)
    expect(requests[0]?.headers.referer).toBe('https://site.test/')
    expect(requests[0]?.headers.accept).toBe('image/avif,image/webp,image/png,image/*;q=0.8,*/*;q=0.5')
  })
})
