import type Database from 'better-sqlite3'
import type {
  PreparedRank,
  RankBackend,
  RankedParent,
  RelationalSchema,
  ResolvedRankOptions,
} from '../types'
import type { SqlDialect } from '../sql-builder-dialect'
import { buildRankSQL } from '../builder/rank'
import { DEFAULT_RELATIONAL_SCHEMA } from '../builder/shared/constants'
import {
  createConnectionError,
  isConnectionFailure,
} from '../builder/shared/errors'
import { transformRankRows } from '../result-transformers'

/**
 * The slice of a `postgres` (postgres.js) client this adapter calls.
 * A `postgres.Sql` instance satisfies it.
 */
export interface PostgresClient {
  unsafe(query: string, parameters?: unknown[]): PromiseLike<readonly unknown[]>
}

export type SqliteDatabase = Pick<Database.Database, 'prepare'>

export type RelationalBackendConfig = {
  schema?: RelationalSchema
} & (
  | { postgres: PostgresClient; sqlite?: undefined }
  | { sqlite: SqliteDatabase; postgres?: undefined }
)

type ExecuteQuery = (sql: string, params: unknown[]) => Promise<unknown[]>

async function executePostgres(
  client: PostgresClient,
  sql: string,
  params: unknown[],
): Promise<unknown[]> {
  const rows = await client.unsafe(sql, params)
  return [...rows]
}

function executeSqlite(
  db: SqliteDatabase,
  sql: string,
  params: unknown[],
): unknown[] {
  return db.prepare(sql).all(...params)
}

function createExecuteQuery(config: RelationalBackendConfig): ExecuteQuery {
  const { postgres, sqlite } = config
  if (postgres) {
    return (sql, params) => executePostgres(postgres, sql, params)
  }
  if (sqlite) {
    return async (sql, params) => executeSqlite(sqlite, sql, params)
  }
  throw new Error(
    'createRelationalBackend requires either postgres or sqlite client',
  )
}

async function runRankQuery(
  executeQuery: ExecuteQuery,
  dialect: SqlDialect,
  sql: string,
  params: unknown[],
): Promise<RankedParent[]> {
  let rows: unknown[]
  try {
    rows = await executeQuery(sql, params)
  } catch (error) {
    if (isConnectionFailure(error)) {
      throw createConnectionError(error, { backend: dialect })
    }
    throw error
  }
  return transformRankRows(rows, dialect)
}

/**
 * Ranks parent rows by joined child-row count. `emptyParents: 'include'`
 * uses LEFT JOIN so parents without children report 0; `'exclude'` uses an
 * inner JOIN and drops them.
 *
 * Ties are ordered by `parent_id ASC` under the id column's collation.
 * SQLite's default BINARY collation matches the in-memory aggregator's
 * code-unit order; on PostgreSQL, text ids match it only under a "C"
 * (byte-order) collation on the parent id column.
 */
export function createRelationalBackend(
  config: RelationalBackendConfig,
): RankBackend {
  if (config.postgres && config.sqlite) {
    throw new Error(
      'createRelationalBackend cannot use both postgres and sqlite clients',
    )
  }

  const dialect: SqlDialect = config.postgres ? 'postgres' : 'sqlite'
  const schema = config.schema ?? DEFAULT_RELATIONAL_SCHEMA
  const executeQuery = createExecuteQuery(config)

  return {
    kind: dialect,
    prepare(options: ResolvedRankOptions): PreparedRank {
      const { sql, params } = buildRankSQL(schema, options, dialect)
      return {
        backend: dialect,
        query: sql,
        params,
        execute: () => runRankQuery(executeQuery, dialect, sql, params),
      }
    },
  }
}
