import type { RankOptions, TiePolicy } from './types'
import { createError } from './builder/shared/errors'
import { REGEX_CACHE } from './builder/shared/constants'
import { isNonEmptyString } from './builder/shared/validators/type-guards'

export interface MongoConfig {
  uri: string
  dbName: string
  trackCollection: string
  artistCollection: string
}

export interface RankConfig {
  databaseUrl?: string
  sqlitePath?: string
  mongo?: MongoConfig
  debug: boolean
  rank: RankOptions
}

type Env = Record<string, string | undefined>

function readString(env: Env, key: string): string | undefined {
  const raw = env[key]
  return isNonEmptyString(raw) ? raw.trim() : undefined
}

function readBoolean(env: Env, key: string): boolean {
  const raw = readString(env, key)
  if (raw === undefined) return false
  const lowered = raw.toLowerCase()
  if (lowered === 'true' || lowered === '1') return true
  if (lowered === 'false' || lowered === '0') return false
  throw createError(`${key} must be true/false/1/0. Got: ${raw}`, {
    field: key,
  })
}

function readLimit(env: Env, key: string): number | undefined {
  const raw = readString(env, key)
  if (raw === undefined) return undefined
  if (!REGEX_CACHE.DIGITS.test(raw)) {
    throw createError(`${key} must be a positive integer. Got: ${raw}`, {
      field: key,
    })
  }
  return parseInt(raw, 10)
}

function readTies(env: Env, key: string): TiePolicy | undefined {
  const raw = readString(env, key)
  if (raw === undefined) return undefined
  if (raw === 'first' || raw === 'all') return raw
  throw createError(`${key} must be 'first' or 'all'. Got: ${raw}`, {
    field: key,
  })
}

function readMongo(env: Env): MongoConfig | undefined {
  const uri = readString(env, 'MONGO_URI')
  if (uri === undefined) return undefined

  const dbName = readString(env, 'MONGO_DB_NAME')
  if (dbName === undefined) {
    throw createError('MONGO_DB_NAME is required when MONGO_URI is set', {
      field: 'MONGO_DB_NAME',
    })
  }

  return {
    uri,
    dbName,
    trackCollection: readString(env, 'MONGO_TRACK_COLLECTION') ?? 'tracks',
    artistCollection: readString(env, 'MONGO_COLLECTION_NAME') ?? 'artists',
  }
}

export function loadConfig(env: Env = process.env): RankConfig {
  return {
    databaseUrl: readString(env, 'DATABASE_URL'),
    sqlitePath: readString(env, 'SQLITE_PATH'),
    mongo: readMongo(env),
    debug: readBoolean(env, 'RANK_DEBUG'),
    rank: {
      limit: readLimit(env, 'RANK_LIMIT'),
      ties: readTies(env, 'RANK_TIES'),
    },
  }
}
