import {
  MongoNetworkError,
  MongoServerSelectionError,
  ObjectId,
  type Db,
  type Document,
} from 'mongodb'
import type {
  DocumentShape,
  PreparedRank,
  RankBackend,
  RankedParent,
  ResolvedRankOptions,
} from '../types'
import { buildRankPipeline } from '../builder/pipeline'
import { DEFAULT_FLAT_SHAPE, RESULT_FIELDS } from '../builder/shared/constants'
import {
  createConnectionError,
  isConnectionFailure,
} from '../builder/shared/errors'
import { transformRankRows } from '../result-transformers'

export interface DocumentSource {
  aggregate(collection: string, pipeline: Document[]): Promise<Document[]>
}

export interface DocumentBackendConfig {
  source: DocumentSource
  shape?: DocumentShape
}

export function fromMongoDb(db: Db): DocumentSource {
  return {
    aggregate: (collection, pipeline) =>
      db.collection(collection).aggregate(pipeline).toArray(),
  }
}

function isMongoConnectionFailure(error: unknown): boolean {
  return (
    error instanceof MongoNetworkError ||
    error instanceof MongoServerSelectionError ||
    isConnectionFailure(error)
  )
}

function normalizeIdentity(row: Document): Document {
  const id: unknown = row[RESULT_FIELDS.PARENT_ID]
  if (!(id instanceof ObjectId)) return row
  return { ...row, [RESULT_FIELDS.PARENT_ID]: id.toHexString() }
}

async function runPipeline(
  source: DocumentSource,
  collection: string,
  pipeline: Document[],
): Promise<RankedParent[]> {
  let rows: Document[]
  try {
    rows = await source.aggregate(collection, pipeline)
  } catch (error) {
    if (isMongoConnectionFailure(error)) {
      throw createConnectionError(error, { backend: 'document' })
    }
    throw error
  }
  return transformRankRows(rows.map(normalizeIdentity), 'document')
}

export function createDocumentBackend(
  config: DocumentBackendConfig,
): RankBackend {
  const { source } = config
  const shape = config.shape ?? DEFAULT_FLAT_SHAPE

  return {
    kind: 'document',
    prepare(options: ResolvedRankOptions): PreparedRank {
      const pipeline = buildRankPipeline(shape, options)
      return {
        backend: 'document',
        query: `db.${shape.collection}.aggregate(${JSON.stringify(pipeline)})`,
        params: [],
        execute: () => runPipeline(source, shape.collection, pipeline),
      }
    },
  }
}
