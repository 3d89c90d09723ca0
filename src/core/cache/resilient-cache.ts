import fs from 'node:fs/promises'
import path from 'node:path'
import { InvalidKeyError } from '../errors.js'
import { createLogger } from '../../utils/logger.js'

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type Producer<T extends JsonValue> = () => T | Promise<T>

export interface ResilientCacheOptions {
  /** Flat directory holding one file per key; `null` turns caching off. */
  directory: string | null
  now?: () => number
}

const KEY_PATTERN = /^[A-Za-z0-9_.-]+$/

const log = createLogger('cache')

export function isValidCacheKey(key: string): boolean {
  return KEY_PATTERN.test(key) && key !== '.' && key !== '..'
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

/**
 * File-backed key/value cache keyed by file mtime.
 *
 * A stale entry whose refresh fails is served as is; the producer error is
 * only logged. Concurrent calls for one key share a single producer run.
 */
export class ResilientCache {
  readonly directory: string | null
  private readonly now: () => number
  private readonly inFlight = new Map<string, Promise<JsonValue>>()

  constructor(options: ResilientCacheOptions) {
    this.directory = options.directory
    this.now = options.now ?? Date.now
  }

  isEnabled(): boolean {
    return this.directory !== null
  }

  async getOrCompute(key: string, producer: Producer<JsonValue>, expirySeconds: number): Promise<JsonValue> {
    if (this.directory === null) {
      return producer()
    }
    if (!isValidCacheKey(key)) {
      throw new InvalidKeyError(key)
    }

    const pending = this.inFlight.get(key)
    if (pending) {
      log.debug('Joining in-flight lookup', { key })
      return pending
    }

    const lookup = this.lookup(this.directory, key, producer, expirySeconds)
    this.inFlight.set(key, lookup)
    try {
      return await lookup
    }
    finally {
      this.inFlight.delete(key)
    }
  }

  /** Same as `getOrCompute`, argument order of the cache-wrap interface. */
  cached(key: string, expirySeconds: number, producer: Producer<JsonValue>): Promise<JsonValue> {
    return this.getOrCompute(key, producer, expirySeconds)
  }

  private async lookup(directory: string, key: string, producer: Producer<JsonValue>, expirySeconds: number): Promise<JsonValue> {
    const filePath = path.join(directory, key)

    let modifiedAt: number
    try {
      modifiedAt = (await fs.stat(filePath)).mtimeMs
    }
    catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') throw error
      const value = await this.refresh(directory, filePath, producer)
      log.debug('Cache new item', { key })
      return value
    }

    const ageMs = this.now() - modifiedAt
    if (ageMs < expirySeconds * 1000) {
      log.debug('Cache hit', { key, ageSeconds: Math.floor(ageMs / 1000) })
      return this.read(filePath)
    }

    try {
      const value = await this.refresh(directory, filePath, producer)
      log.debug('Cache refreshed', { key })
      return value
    }
    catch (error) {
      const stale = await this.read(filePath).catch((readError: unknown) => {
        log.error('Stale cache entry unreadable', { key, error: readError })
        throw error
      })
      log.warn('Cache refresh failed; serving stale value', {
        key,
        ageSeconds: Math.floor(ageMs / 1000),
        error,
      })
      return stale
    }
  }

  private async read(filePath: string): Promise<JsonValue> {
    const raw = await fs.readFile(filePath, 'utf8')
    return JSON.parse(raw)
  }

  private async refresh(directory: string, filePath: string, producer: Producer<JsonValue>): Promise<JsonValue> {
    const value = await producer()
    await fs.mkdir(directory, { recursive: true })
    // rename keeps readers from ever seeing a half-written file
    const tempPath = `${filePath}.${process.pid}.${Math.random().toString(36).slice(2)}.tmp`
    try {
      await fs.writeFile(tempPath, JSON.stringify(value), 'utf8')
      await fs.rename(tempPath, filePath)
    }
    catch (error) {
      await fs.rm(tempPath, { force: true })
      throw error
    }
    return value
  }
}
