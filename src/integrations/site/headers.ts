import type { HeaderLayer } from '../../core/fetch/fetcher.js'

export const DEFAULT_SITE_BASE_URL = 'https://www.pixiv.net'
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36'

const DOCUMENT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8'
const ACCEPT_LANGUAGE = 'ja,en-US;q=0.7,en;q=0.3'
const ACCEPT_ENCODING = 'gzip, deflate, br'

// the site answers 404 to requests without browser-like headers
export function buildBaseHeaders(baseUrl: string, userAgent: string): HeaderLayer {
  return {
    'user-agent': userAgent,
    'accept': DOCUMENT_ACCEPT,
    'accept-language': ACCEPT_LANGUAGE,
    'accept-encoding': ACCEPT_ENCODING,
    'upgrade-insecure-requests': '1',
    'sec-fetch-dest': 'document',
    'sec-fetch-mode': 'navigate',
    'sec-fetch-site': 'none',
    'sec-fetch-user': '?1',
    'pragma': 'no-cache',
    'cache-control': 'no-cache',
    'referer': `${baseUrl}/`,
  }
}

export function buildCookieHeaders(cookie: string | undefined): HeaderLayer {
  return cookie ? { cookie } : {}
}

export const JSON_HEADERS: HeaderLayer = { accept: 'application/json' }

export const IMAGE_HEADERS: HeaderLayer = { accept: 'image/avif,image/webp,image/png,image/*;q=0.8,*/*;q=0.5' }
