import { isRecognizedEncoding } from './decode.js'

export interface TransportRequest {
  url: string
  headers: Record<string, string>
  timeoutMs: number
}

export interface TransportResponse {
  status: number
  statusText: string
  url: string
  /** Content-encoding still applied to `body`; `undefined` when the body is plain. */
  contentEncoding?: string
  body: Uint8Array
}

export type Transport = (request: TransportRequest) => Promise<TransportResponse>

/**
 * Global `fetch` transport. Undici already undoes gzip, deflate and br, so
 * those bodies are reported as plain.
 */
export const fetchTransport: Transport = async (request) => {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs)

  try {
    const response = await fetch(request.url, {
      method: 'GET',
      headers: request.headers,
      signal: controller.signal,
      redirect: 'follow',
    })
    const contentEncoding = response.headers.get('content-encoding') ?? undefined
    const body = new Uint8Array(await response.arrayBuffer())
    return {
      status: response.status,
      statusText: response.statusText,
      url: response.url || request.url,
      contentEncoding: isRecognizedEncoding(contentEncoding) ? undefined : contentEncoding,
      body,
    }
  }
  finally {
    clearTimeout(timeout)
  }
}
