export const MIN_SPACING_MS = 500
export const MAX_SPACING_MS = 3500
export const WAIT_SLACK_MS = 100

export interface DestinationSchedulerOptions {
  now?: () => number
  sleep?: (ms: number) => Promise<void>
  minSpacingMs?: number
  maxSpacingMs?: number
  slackMs?: number
}

export interface Reservation {
  destination: string
  /** Epoch ms at which the request may be sent. */
  sendAt: number
  /** How long the caller waits before sending. */
  delayMs: number
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

/** `scheme://host:port`, with the scheme's default port filled in. */
export function destinationOf(url: URL): string {
  const port = url.port || (url.protocol === 'https:' ? '443' : url.protocol === 'http:' ? '80' : '')
  return `${url.protocol}//${url.hostname}${port ? `:${port}` : ''}`
}

/**
 * Next-permitted-send table keyed by destination.
 *
 * Each reservation pushes the destination's next slot out by
 * `minSpacing + backlog`, clamped to `[minSpacing, maxSpacing]`, so bursts
 * slow down progressively while an isolated request goes out at once.
 */
export class DestinationScheduler {
  private readonly nextPermitted = new Map<string, number>()
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly minSpacingMs: number
  private readonly maxSpacingMs: number
  private readonly slackMs: number

  constructor(options: DestinationSchedulerOptions = {}) {
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
    this.minSpacingMs = options.minSpacingMs ?? MIN_SPACING_MS
    this.maxSpacingMs = options.maxSpacingMs ?? MAX_SPACING_MS
    this.slackMs = options.slackMs ?? WAIT_SLACK_MS
  }

  /** Claims the next slot. Synchronous, so concurrent callers never observe the same slot. */
  reserve(destination: string): Reservation {
    const now = this.now()
    const sendAt = Math.max(this.nextPermitted.get(destination) ?? now, now)
    const backlog = sendAt - now
    this.nextPermitted.set(destination, sendAt + clamp(this.minSpacingMs + backlog, this.minSpacingMs, this.maxSpacingMs))
    return { destination, sendAt, delayMs: backlog > this.slackMs ? backlog : 0 }
  }

  /** Reserves a slot and resolves once it is due. */
  async acquire(destination: string): Promise<Reservation> {
    const reservation = this.reserve(destination)
    if (reservation.delayMs > 0) {
      await this.sleep(reservation.delayMs)
    }
    return reservation
  }

  nextPermittedAt(destination: string): number | undefined {
    return this.nextPermitted.get(destination)
  }
}
