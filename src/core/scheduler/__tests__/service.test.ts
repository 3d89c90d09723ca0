import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { RankingMode } from '../../listings/types.js'
import { SchedulerService } from '../service.js'

const cronMocks = vi.hoisted(() => ({
  validate: vi.fn((_expression: string) => true),
  schedule: vi.fn((_expression: string, _job: () => Promise<void>, _options?: { timezone?: string }) => ({ stop: () => {} })),
  stop: vi.fn(),
}))

vi.mock('node-cron', () => ({
  default: {
    validate: cronMocks.validate,
    schedule: cronMocks.schedule,
  },
}))

function createScheduler(warmRanking: (mode: RankingMode) => Promise<number>, warmOnStartup = false) {
  return new SchedulerService({
    cronSchedule: '30 0 * * *',
    timezone: 'Asia/Tokyo',
    modes: ['daily', 'weekly', 'monthly'],
    warmOnStartup,
    warmRanking,
  })
}

beforeEach(() => {
  cronMocks.validate.mockReset().mockReturnValue(true)
  cronMocks.schedule.mockReset().mockReturnValue({ stop: cronMocks.stop })
  cronMocks.stop.mockReset()
})

describe('SchedulerService', () => {
  it('warms every mode in turn and collects failures', async () => {
    const warmRanking = vi.fn(async (mode: RankingMode) => {
      if (mode === 'weekly') throw new Error('HTTP 503: Service Unavailable')
      return mode.length
    })
    const scheduler = createScheduler(warmRanking)

    const summary = await scheduler.runWarmUp('scheduled')

    expect(warmRanking.mock.calls).toEqual([['daily'], ['weekly'], ['monthly']])
    expect(summary).toEqual({
      reason: 'scheduled',
      warmed: [{ mode: 'daily', records: 5 }, { mode: 'monthly', records: 7 }],
      failed: [{ mode: 'weekly', error: 'HTTP 503: Service Unavailable' }],
    })
  })

  it('skips a run while the previous one is still going', async () => {
    let release: () => void = () => {}
    const warmRanking = vi.fn(() => new Promise<number>((resolve) => {
      release = () => resolve(1)
    }))
    const scheduler = createScheduler(warmRanking)

    const first = scheduler.runWarmUp('scheduled')
    const second = await scheduler.runWarmUp('scheduled')
    release()
    await vi.waitFor(() => expect(warmRanking).toHaveBeenCalledTimes(2))
    release()
    await vi.waitFor(() => expect(warmRanking).toHaveBeenCalledTimes(3))
    release()

    expect(second).toEqual({ reason: 'scheduled', warmed: [], failed: [] })
    await expect(first).resolves.toHaveProperty('warmed.length', 3)
  })

  it('schedules the job in the configured time zone', async () => {
    const warmRanking = vi.fn(async () => 0)
    const scheduler = createScheduler(warmRanking)

    await scheduler.start()

    expect(warmRanking).not.toHaveBeenCalled()
    expect(cronMocks.schedule).toHaveBeenCalledWith('30 0 * * *', expect.any(Function), { timezone: 'Asia/Tokyo' })

    const job = cronMocks.schedule.mock.calls[0]?.[1]
    if (!job) throw new Error('job not registered')
    await job()
    expect(warmRanking).toHaveBeenCalledTimes(3)

    scheduler.stop()
    expect(cronMocks.stop).toHaveBeenCalledTimes(1)
  })

  it('warms on startup when asked', async () => {
    const warmRanking = vi.fn(async () => 0)
    const scheduler = createScheduler(warmRanking, true)

    await scheduler.start()

    expect(warmRanking).toHaveBeenCalledTimes(3)
  })

  it('rejects an invalid cron expression', async () => {
    cronMocks.validate.mockReturnValue(false)
    const scheduler = createScheduler(vi.fn(async () => 0))

    await expect(scheduler.start()).rejects.toThrow('Invalid cron schedule "30 0 * * *"')
    expect(cronMocks.schedule).not.toHaveBeenCalled()
  })
})
