import { ExtractionError } from '../errors.js'

/**
 * Forward-only substring scanner over a single text blob.
 *
 * `seek` moves the cursor; `extract` and `window` look ahead from the cursor
 * without moving it. There is no parse tree and no backtracking.
 */
export class TokenScanner {
  private readonly text: string
  private cursor = 0

  constructor(text: string) {
    this.text = text
  }

  get position(): number {
    return this.cursor
  }

  /** Moves the cursor just past the next `marker`. After `false` the cursor must not be relied on. */
  seek(marker: string): boolean {
    const index = this.text.indexOf(marker, this.cursor)
    if (index < 0) return false
    this.cursor = index + marker.length
    return true
  }

  /**
   * Finds each marker in order, every search starting just after the
   * previous match, and returns the text between the last two.
   * A missing marker returns `fallback` when given.
   */
  extract(markers: readonly string[], fallback?: string): string {
    if (markers.length < 2) {
      throw new ExtractionError(markers[0] ?? '')
    }

    let from = this.cursor
    let lastEnd = this.cursor
    let lastStart = this.cursor
    for (const marker of markers) {
      const index = this.text.indexOf(marker, from)
      if (index < 0) {
        if (fallback !== undefined) return fallback
        throw new ExtractionError(marker)
      }
      lastEnd = from
      lastStart = index
      from = index + marker.length
    }
    return this.text.slice(lastEnd, lastStart)
  }

  /** A new scanner over the text from the cursor up to the next `endMarker`, or to the end. */
  window(endMarker: string): TokenScanner {
    const end = this.text.indexOf(endMarker, this.cursor)
    return new TokenScanner(this.text.slice(this.cursor, end < 0 ? undefined : end))
  }
}
