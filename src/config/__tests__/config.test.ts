import path from 'node:path'
import { describe, expect, it } from 'vitest'
import { loadConfig } from '../index.js'

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig({})

    expect(config.cacheDir).toBe(path.join('.data', 'cache'))
    expect(config.SITE_BASE_URL).toBe('https://www.pixiv.net')
    expect(config.SITE_COOKIE).toBeUndefined()
    expect(config.HTTP_TIMEOUT_MS).toBe(30000)
    expect(config.decodeCandidates).toEqual(['utf-8', 'shift_jis', 'euc-jp'])
    expect(config.MAX_RECORDS_PER_PAGE).toBe(50)
    expect(config.RANKING_PAGES).toBe(2)
    expect(config.SEARCH_CACHE_SECONDS).toBe(600)
    expect(config.RANKING_CACHE_SECONDS).toBe(3600)
    expect(config.NOVEL_CACHE_SECONDS).toBe(259200)
    expect(config.EXTRACTION_MISMATCH_POLICY).toBe('fail')
    expect(config.RANKING_WARM_ENABLED).toBe(false)
    expect(config.RANKING_WARM_CRON).toBe('30 0 * * *')
    expect(config.rankingWarmModes).toEqual(['daily', 'weekly', 'monthly'])
    expect(config.timezone).toBe('Asia/Tokyo')
    expect(config.LOG_LEVEL).toBe('info')
    expect(config.logSummaryPath).toBe(path.join('.data', 'logs', 'summary.log'))
    expect(config.logDetailPath).toBe(path.join('.data', 'logs', 'detail.log'))
  })

  it('turns the cache off with NONE', () => {
    expect(loadConfig({ CACHE_DIR: 'NONE' }).cacheDir).toBeNull()
    expect(loadConfig({ CACHE_DIR: '/var/cache/listings' }).cacheDir).toBe('/var/cache/listings')
  })

  it('parses booleans, integers and lists', () => {
    const config = loadConfig({
      RANKING_WARM_ENABLED: 'yes',
      RANKING_WARM_ON_STARTUP: 'off',
      HTTP_TIMEOUT_MS: '45000',
      DECODE_CANDIDATES: 'euc-jp, utf-8,,',
      EXTRACTION_MISMATCH_POLICY: 'skip-page',
      LOG_LEVEL: 'DEBUG',
      TZ: 'UTC',
    })

    expect(config.RANKING_WARM_ENABLED).toBe(true)
    expect(config.RANKING_WARM_ON_STARTUP).toBe(false)
    expect(config.HTTP_TIMEOUT_MS).toBe(45000)
    expect(config.decodeCandidates).toEqual(['euc-jp', 'utf-8'])
    expect(config.EXTRACTION_MISMATCH_POLICY).toBe('skip-page')
    expect(config.LOG_LEVEL).toBe('debug')
    expect(config.timezone).toBe('UTC')
  })

  it('separates unknown warm-up modes', () => {
    const config = loadConfig({ RANKING_WARM_MODES: 'daily, hourly,daily,male_r18' })

    expect(config.rankingWarmModes).toEqual(['daily', 'male_r18'])
    expect(config.unknownWarmModes).toEqual(['hourly'])
  })

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ HTTP_TIMEOUT_MS: '10' })).toThrow()
    expect(() => loadConfig({ SITE_BASE_URL: 'not a url' })).toThrow()
  })
})
