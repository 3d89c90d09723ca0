import cron, { type ScheduledTask } from 'node-cron'
import { asErrorMessage } from '../errors.js'
import type { RankingMode } from '../listings/types.js'
import { createLogger } from '../../utils/logger.js'

export type WarmReason = 'startup' | 'scheduled'

export interface WarmSummary {
  reason: WarmReason
  warmed: Array<{ mode: RankingMode; records: number }>
  failed: Array<{ mode: RankingMode; error: string }>
}

export interface SchedulerOptions {
  cronSchedule: string
  timezone: string
  modes: RankingMode[]
  warmOnStartup?: boolean
  warmRanking: (mode: RankingMode) => Promise<number>
}

const log = createLogger('scheduler')

/** Keeps yesterday's ranking buckets in the cache so readers rarely wait on the site. */
export class SchedulerService {
  private readonly cronSchedule: string
  private readonly timezone: string
  private readonly modes: RankingMode[]
  private readonly warmOnStartup: boolean
  private readonly warmRanking: (mode: RankingMode) => Promise<number>
  private task: ScheduledTask | null = null
  private inFlight = false

  constructor(options: SchedulerOptions) {
    this.cronSchedule = options.cronSchedule
    this.timezone = options.timezone
    this.modes = options.modes
    this.warmOnStartup = options.warmOnStartup === true
    this.warmRanking = options.warmRanking
  }

  async start(): Promise<void> {
    if (!cron.validate(this.cronSchedule)) {
      throw new Error(`Invalid cron schedule "${this.cronSchedule}"`)
    }
    log.info('Scheduler starting', {
      cronSchedule: this.cronSchedule,
      timezone: this.timezone,
      modes: this.modes,
    })

    if (this.warmOnStartup) {
      log.info('Startup ranking warm-up triggered')
      await this.runWarmUp('startup')
    }

    this.task = cron.schedule(this.cronSchedule, async () => {
      log.info('Scheduled ranking warm-up triggered')
      await this.runWarmUp('scheduled')
    }, { timezone: this.timezone })

    log.info('Scheduler started')
  }

  stop(): void {
    this.task?.stop()
    this.task = null
  }

  /** Warms every mode in turn; one failing mode does not stop the others. */
  async runWarmUp(reason: WarmReason): Promise<WarmSummary> {
    const summary: WarmSummary = { reason, warmed: [], failed: [] }
    if (this.inFlight) {
      log.warn('Ranking warm-up skipped; previous run still in progress', { reason })
      return summary
    }

    this.inFlight = true
    try {
      for (const mode of this.modes) {
        try {
          const records = await this.warmRanking(mode)
          summary.warmed.push({ mode, records })
        }
        catch (error) {
          const message = asErrorMessage(error)
          summary.failed.push({ mode, error: message })
          log.warn('Ranking warm-up failed', { mode, reason, error: message })
        }
      }
    }
    finally {
      this.inFlight = false
    }

    log.info('Ranking warm-up finished', {
      reason,
      warmed: summary.warmed.length,
      failed: summary.failed.length,
    })
    return summary
  }
}
