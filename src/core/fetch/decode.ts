import zlib from 'node:zlib'

export const DEFAULT_DECODE_CANDIDATES = ['utf-8', 'shift_jis', 'euc-jp'] as const

const decompressors: Record<string, (body: Uint8Array) => Uint8Array> = {
  'gzip': body => zlib.gunzipSync(body),
  'x-gzip': body => zlib.gunzipSync(body),
  'deflate': body => zlib.inflateSync(body),
  'br': body => zlib.brotliDecompressSync(body),
}

export function isRecognizedEncoding(contentEncoding: string | undefined): boolean {
  if (!contentEncoding) return false
  return Object.hasOwn(decompressors, contentEncoding.trim().toLowerCase())
}

/** Undoes a recognized content-encoding; anything else is returned as is. */
export function decompress(body: Uint8Array, contentEncoding: string | undefined): Uint8Array {
  const encoding = contentEncoding?.trim().toLowerCase()
  if (!encoding || !Object.hasOwn(decompressors, encoding)) return body
  return decompressors[encoding](body)
}

/** First candidate that decodes without error, or `undefined` when none does. */
export function decodeText(body: Uint8Array, candidates: readonly string[]): { text: string; encoding: string } | undefined {
  for (const encoding of candidates) {
    let decoder: InstanceType<typeof TextDecoder>
    try {
      decoder = new TextDecoder(encoding, { fatal: true })
    }
    catch {
      // label not supported by this runtime
      continue
    }
    try {
      return { text: decoder.decode(body), encoding }
    }
    catch {
      continue
    }
  }
  return undefined
}
