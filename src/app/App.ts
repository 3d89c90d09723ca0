import { loadConfig, type AppConfig } from '../config/index.js'
import { ResilientCache } from '../core/cache/resilient-cache.js'
import { RateLimitedFetcher } from '../core/fetch/fetcher.js'
import { DestinationScheduler } from '../core/fetch/rate-limiter.js'
import { ListingAggregator } from '../core/listings/aggregator.js'
import { createListingHandlers, type ListingHandlers } from '../core/listings/dispatch.js'
import { RANKING_MODES } from '../core/listings/types.js'
import { SchedulerService } from '../core/scheduler/service.js'
import { SiteClient } from '../integrations/site/client.js'
import { closeLogger, configureLogger, logger } from '../utils/logger.js'

export interface AppServices {
  config: AppConfig
  client: SiteClient
  aggregator: ListingAggregator
  handlers: ListingHandlers
  scheduler: SchedulerService | null
}

export function createServices(config: AppConfig): AppServices {
  const fetcher = new RateLimitedFetcher({
    scheduler: new DestinationScheduler(),
    timeoutMs: config.HTTP_TIMEOUT_MS,
    decodeCandidates: config.decodeCandidates,
  })
  const client = new SiteClient({
    fetcher,
    baseUrl: config.SITE_BASE_URL,
    userAgent: config.userAgent,
    cookie: config.SITE_COOKIE,
  })
  const aggregator = new ListingAggregator({
    source: client,
    cache: new ResilientCache({ directory: config.cacheDir }),
    maxRecordsPerPage: config.MAX_RECORDS_PER_PAGE,
    rankingPages: config.RANKING_PAGES,
    searchCacheSeconds: config.SEARCH_CACHE_SECONDS,
    rankingCacheSeconds: config.RANKING_CACHE_SECONDS,
    novelCacheSeconds: config.NOVEL_CACHE_SECONDS,
    mismatchPolicy: config.EXTRACTION_MISMATCH_POLICY,
    timezone: config.timezone,
  })

  const scheduler = config.RANKING_WARM_ENABLED
    ? new SchedulerService({
      cronSchedule: config.RANKING_WARM_CRON,
      timezone: config.timezone,
      modes: config.rankingWarmModes,
      warmOnStartup: config.RANKING_WARM_ON_STARTUP,
      warmRanking: async (mode) => {
        const listing = await aggregator.ranking({ mode, minBookmarks: 0 })
        return listing.records.length
      },
    })
    : null

  return {
    config,
    client,
    aggregator,
    handlers: createListingHandlers(aggregator),
    scheduler,
  }
}

export class App {
  private services: AppServices | null = null

  async start(): Promise<AppServices> {
    const config = loadConfig()
    await configureLogger({
      level: config.LOG_LEVEL,
      summaryPath: config.logSummaryPath,
      detailPath: config.logDetailPath,
    })
    logger.info('App starting')
    logger.debug('App config', {
      dataPath: config.DATA_PATH,
      cacheDir: config.cacheDir,
      siteBaseUrl: config.SITE_BASE_URL,
      cookieConfigured: Boolean(config.SITE_COOKIE),
      httpTimeoutMs: config.HTTP_TIMEOUT_MS,
      decodeCandidates: config.decodeCandidates,
      rankingPages: config.RANKING_PAGES,
      mismatchPolicy: config.EXTRACTION_MISMATCH_POLICY,
      rankingWarmEnabled: config.RANKING_WARM_ENABLED,
      rankingWarmCron: config.RANKING_WARM_CRON,
      rankingWarmModes: config.rankingWarmModes,
      timezone: config.timezone,
      logLevel: config.LOG_LEVEL,
      logSummaryPath: config.logSummaryPath,
      logDetailPath: config.logDetailPath,
    })

    if (config.unknownWarmModes.length > 0) {
      logger.warn('Unknown ranking warm-up modes configured; ignoring', {
        unknown: config.unknownWarmModes,
        available: RANKING_MODES,
      })
    }
    if (!config.cacheDir) {
      logger.warn('Cache disabled; every listing request goes to the site')
    }

    const services = createServices(config)
    if (services.scheduler) {
      await services.scheduler.start()
    }

    this.services = services
    logger.info('App started')
    return services
  }

  stop(): void {
    this.services?.scheduler?.stop()
    this.services = null
    logger.info('App stopped')
    closeLogger()
  }
}
