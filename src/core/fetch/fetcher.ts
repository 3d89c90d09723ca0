import { asErrorMessage, DecodeError, FetchError } from '../errors.js'
import { createLogger } from '../../utils/logger.js'
import { DEFAULT_DECODE_CANDIDATES, decodeText, decompress } from './decode.js'
import { DestinationScheduler, destinationOf } from './rate-limiter.js'
import { fetchTransport, type Transport, type TransportResponse } from './transport.js'

export type FetchFormat = 'text' | 'bytes' | 'json'

export type HeaderLayer = Readonly<Record<string, string>>

export interface RateLimitedFetcherOptions {
  scheduler?: DestinationScheduler
  transport?: Transport
  timeoutMs?: number
  decodeCandidates?: readonly string[]
}

const DEFAULT_TIMEOUT_MS = 30_000

const log = createLogger('fetch')

/** Header names are case-insensitive; the later layer wins. */
export function mergeHeaderLayers(layers: readonly HeaderLayer[]): Record<string, string> {
  const merged: Record<string, string> = {}
  for (const layer of layers) {
    for (const [name, value] of Object.entries(layer)) {
      merged[name.toLowerCase()] = value
    }
  }
  return merged
}

const URI_SAFE = /[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=%]/

/**
 * Percent-encodes (as UTF-8) every character a URI may not carry literally.
 * A lone surrogate cannot be encoded and raises `FetchError`.
 */
export function encodeUrl(url: string): string {
  let encoded = ''
  for (const char of url) {
    if (URI_SAFE.test(char)) {
      encoded += char
      continue
    }
    try {
      encoded += encodeURIComponent(char)
    }
    catch (error) {
      throw new FetchError(`Invalid URL: ${url}`, { url, cause: error })
    }
  }
  return encoded
}

/**
 * Outbound GETs with per-destination spacing.
 *
 * One instance owns one schedule table; share the instance to share the limit.
 */
export class RateLimitedFetcher {
  private readonly scheduler: DestinationScheduler
  private readonly transport: Transport
  private readonly timeoutMs: number
  private readonly decodeCandidates: readonly string[]

  constructor(options: RateLimitedFetcherOptions = {}) {
    this.scheduler = options.scheduler ?? new DestinationScheduler()
    this.transport = options.transport ?? fetchTransport
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.decodeCandidates = options.decodeCandidates ?? DEFAULT_DECODE_CANDIDATES
  }

  fetch(url: string, format: 'text', headerLayers?: readonly HeaderLayer[]): Promise<string>
  fetch(url: string, format: 'bytes', headerLayers?: readonly HeaderLayer[]): Promise<Uint8Array>
  fetch(url: string, format: 'json', headerLayers?: readonly HeaderLayer[]): Promise<unknown>
  async fetch(url: string, format: FetchFormat, headerLayers: readonly HeaderLayer[] = []): Promise<unknown> {
    const body = await this.request(url, headerLayers)
    if (format === 'bytes') return body

    const text = this.decode(url, body)
    if (format === 'text') return text

    try {
      return JSON.parse(text)
    }
    catch (error) {
      throw new DecodeError(`Response is not JSON: ${asErrorMessage(error)}`, url, { cause: error })
    }
  }

  private async request(rawUrl: string, headerLayers: readonly HeaderLayer[]): Promise<Uint8Array> {
    const url = encodeUrl(rawUrl)
    let parsed: URL
    try {
      parsed = new URL(url)
    }
    catch (error) {
      throw new FetchError(`Invalid URL: ${rawUrl}`, { url: rawUrl, cause: error })
    }

    const headers = mergeHeaderLayers(headerLayers)
    const reservation = await this.scheduler.acquire(destinationOf(parsed))
    log.debug('Request', { url, waitedMs: reservation.delayMs })

    let response: TransportResponse
    try {
      response = await this.transport({ url, headers, timeoutMs: this.timeoutMs })
    }
    catch (error) {
      const timedOut = error instanceof Error && error.name === 'AbortError'
      const message = timedOut
        ? `Request timed out after ${this.timeoutMs}ms`
        : `Request failed: ${asErrorMessage(error)}`
      log.warn('Request failed', { url, error })
      throw new FetchError(message, { url, cause: error })
    }

    log.debug('Response', {
      url,
      status: response.status,
      bytes: response.body.byteLength,
      contentEncoding: response.contentEncoding,
    })

    if (response.status < 200 || response.status > 299) {
      log.warn('Request returned error status', { url, status: response.status })
      throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, { url, status: response.status })
    }

    try {
      return decompress(response.body, response.contentEncoding)
    }
    catch (error) {
      throw new DecodeError(`Cannot decompress ${response.contentEncoding ?? ''} body`, url, { cause: error })
    }
  }

  private decode(url: string, body: Uint8Array): string {
    const decoded = decodeText(body, this.decodeCandidates)
    if (!decoded) {
      throw new DecodeError(`None of [${this.decodeCandidates.join(', ')}] decodes the response`, url)
    }
    return decoded.text
  }
}
