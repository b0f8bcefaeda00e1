// src/index.ts
import type {
  BackendKind,
  PreparedRank,
  QueryInfo,
  RankBackend,
  RankedParent,
  RankOptions,
} from './types'
import { resolveRankOptions } from './builder/shared/rank-options'

interface RankerConfig {
  backend: RankBackend
  debug?: boolean
  onQuery?: (info: QueryInfo) => void
}

interface Ranker {
  readonly backend: BackendKind
  topByChildCount(options?: RankOptions): Promise<RankedParent[]>
  toQuery(options?: RankOptions): { query: string; params: readonly unknown[] }
}

interface ExecuteWithTimingInput {
  prepared: PreparedRank
  debug: boolean
  onQuery?: (info: QueryInfo) => void
}

function logRankError(
  debug: boolean,
  backend: BackendKind,
  error: unknown,
): void {
  if (!debug) return
  console.error(`[${backend}] topByChildCount failed:`, error)
}

async function executeWithTiming(
  input: ExecuteWithTimingInput,
): Promise<RankedParent[]> {
  const { prepared } = input
  const startTime = Date.now()

  if (input.debug) {
    console.log(`[${prepared.backend}] topByChildCount`)
    console.log('Query:', prepared.query)
    console.log('Params:', prepared.params)
  }

  let results: RankedParent[]
  try {
    results = await prepared.execute()
  } catch (error) {
    logRankError(input.debug, prepared.backend, error)
    throw error
  }
  const duration = Date.now() - startTime

  input.onQuery?.({
    backend: prepared.backend,
    query: prepared.query,
    params: prepared.params,
    rows: results.length,
    duration,
  })

  return results
}

export function createRanker(config: RankerConfig): Ranker {
  const { backend, debug = false, onQuery } = config

  if (!backend || typeof backend.prepare !== 'function') {
    throw new Error('createRanker requires a backend')
  }

  return {
    backend: backend.kind,

    async topByChildCount(options?: RankOptions): Promise<RankedParent[]> {
      const prepared = backend.prepare(resolveRankOptions(options))
      return executeWithTiming({ prepared, debug, onQuery })
    },

    toQuery(options?: RankOptions) {
      const { query, params } = backend.prepare(resolveRankOptions(options))
      return { query, params }
    },
  }
}

/**
 * One-shot form of `createRanker(...).topByChildCount(...)`.
 */
export function topByChildCount(
  backend: RankBackend,
  options?: RankOptions,
): Promise<RankedParent[]> {
  return createRanker({ backend }).topByChildCount(options)
}

export type { RankerConfig, Ranker }

export type {
  BackendKind,
  ChildRecord,
  DocumentShape,
  EmptyParentPolicy,
  FlatDocumentShape,
  NestedDocumentShape,
  ParentCollection,
  ParentEntity,
  ParentId,
  PreparedRank,
  QueryInfo,
  RankBackend,
  RankedParent,
  RankOptions,
  ReferencePolicy,
  RelationalSchema,
  ResolvedRankOptions,
  SqlResult,
  TiePolicy,
} from './types'
export type { SqlDialect } from './sql-builder-dialect'

export {
  rankByChildCount,
  type AggregateOptions,
  type ChildRelation,
} from './aggregator'
export {
  createMemoryBackend,
  type MemoryBackendConfig,
} from './adapters/memory'
export {
  createRelationalBackend,
  type PostgresClient,
  type RelationalBackendConfig,
  type SqliteDatabase,
} from './adapters/relational'
export {
  createDocumentBackend,
  fromMongoDb,
  type DocumentBackendConfig,
  type DocumentSource,
} from './adapters/document'
export { buildRankSQL } from './builder/rank'
export { buildRankPipeline } from './builder/pipeline'
export { resolveRankOptions } from './builder/shared/rank-options'
export {
  DEFAULT_FLAT_SHAPE,
  DEFAULT_NESTED_SHAPE,
  DEFAULT_RELATIONAL_SCHEMA,
} from './builder/shared/constants'
export {
  ConnectionError,
  InvalidInputError,
  RankError,
  type ErrorContext,
  type RankErrorCode,
} from './builder/shared/errors'
export { flattenNested, type FlattenedRelation } from './utils/flatten-nested'
export { loadConfig, type MongoConfig, type RankConfig } from './config'
