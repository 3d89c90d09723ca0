import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'
import { DEFAULT_DECODE_CANDIDATES } from '../core/fetch/decode.js'
import { isRankingMode, type RankingMode } from '../core/listings/types.js'
import { DEFAULT_SITE_BASE_URL, DEFAULT_USER_AGENT } from '../integrations/site/headers.js'
import { LOG_LEVELS } from '../utils/logger.js'
import { DEFAULT_TIMEZONE } from '../utils/time.js'

dotenv.config()

const DEFAULT_WARM_MODES = 'daily,weekly,monthly'
const CACHE_DISABLED = 'NONE'

const optionalString = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}, z.string().optional())

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

const logLevelSchema = z.preprocess((value) => {
  if (typeof value === 'string') return value.toLowerCase()
  return value
}, z.enum(LOG_LEVELS).default('info'))

const envSchema = z.object({
  DATA_PATH: z.string().default('.data'),
  CACHE_DIR: optionalString,
  SITE_BASE_URL: z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().url().default(DEFAULT_SITE_BASE_URL),
  ),
  SITE_COOKIE: optionalString,
  USER_AGENT: optionalString,
  HTTP_TIMEOUT_MS: integerSchema(30000, 1000),
  DECODE_CANDIDATES: optionalString,
  MAX_RECORDS_PER_PAGE: integerSchema(50, 1),
  RANKING_PAGES: integerSchema(2, 1),
  SEARCH_CACHE_SECONDS: integerSchema(600, 0),
  RANKING_CACHE_SECONDS: integerSchema(3600, 0),
  NOVEL_CACHE_SECONDS: integerSchema(3 * 86400, 0),
  EXTRACTION_MISMATCH_POLICY: z.enum(['fail', 'skip-page']).default('fail'),
  RANKING_WARM_ENABLED: boolSchema(false),
  RANKING_WARM_CRON: z.string().default('30 0 * * *'),
  RANKING_WARM_MODES: z.string().default(DEFAULT_WARM_MODES),
  RANKING_WARM_ON_STARTUP: boolSchema(false),
  LOG_LEVEL: logLevelSchema,
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
  TZ: optionalString,
})

export type AppConfig = z.infer<typeof envSchema> & {
  /** `null` when caching is turned off. */
  cacheDir: string | null
  userAgent: string
  decodeCandidates: string[]
  rankingWarmModes: RankingMode[]
  unknownWarmModes: string[]
  timezone: string
  logSummaryPath: string
  logDetailPath: string
}

function splitList(value: string): string[] {
  return Array.from(
    new Set(
      value
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0),
    ),
  )
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env)
  const dataPath = parsed.DATA_PATH
  const cacheDir = parsed.CACHE_DIR === CACHE_DISABLED
    ? null
    : parsed.CACHE_DIR ?? path.join(dataPath, 'cache')
  const logsPath = path.join(dataPath, 'logs')
  const logSummaryPath = parsed.LOG_SUMMARY_PATH
    ? parsed.LOG_SUMMARY_PATH
    : path.join(logsPath, 'summary.log')
  const logDetailPath = parsed.LOG_DETAIL_PATH
    ? parsed.LOG_DETAIL_PATH
    : path.join(logsPath, 'detail.log')

  const decodeCandidates = splitList(parsed.DECODE_CANDIDATES ?? '')
  if (decodeCandidates.length === 0) {
    decodeCandidates.push(...DEFAULT_DECODE_CANDIDATES)
  }

  const requestedWarmModes = splitList(parsed.RANKING_WARM_MODES)
  const rankingWarmModes = requestedWarmModes.filter(isRankingMode)
  const unknownWarmModes = requestedWarmModes.filter(mode => !isRankingMode(mode))
  if (requestedWarmModes.length === 0) {
    rankingWarmModes.push(...splitList(DEFAULT_WARM_MODES).filter(isRankingMode))
  }

  return {
    ...parsed,
    cacheDir,
    userAgent: parsed.USER_AGENT ?? DEFAULT_USER_AGENT,
    decodeCandidates,
    rankingWarmModes,
    unknownWarmModes,
    timezone: parsed.TZ ?? DEFAULT_TIMEZONE,
    logSummaryPath,
    logDetailPath,
  }
}
