import {
  createDocumentBackend,
  createRanker,
  createRelationalBackend,
  DEFAULT_FLAT_SHAPE,
  DEFAULT_NESTED_SHAPE,
  fromMongoDb,
  type QueryInfo,
  type RankBackend,
  type RankedParent,
} from '../../src'
import { CONFIG, openMongo, openPostgres, openSqlite } from './config'

function onQuery(info: QueryInfo): void {
  console.log(`⏱️  ${info.backend}: ${info.rows} row(s) in ${info.duration}ms`)
}

function printResults(label: string, results: RankedParent[]): void {
  console.log(`\n✅ ${label}`)
  if (results.length === 0) {
    console.log('   (no parents)')
    return
  }
  for (const r of results) {
    console.log(`   ${r.parentName} (${r.parentId}): ${r.totalChildren} tracks`)
  }
}

async function rank(label: string, backend: RankBackend): Promise<void> {
  const ranker = createRanker({ backend, debug: CONFIG.debug, onQuery })
  printResults(label, await ranker.topByChildCount(CONFIG.rank))
}

async function rankPostgres(url: string): Promise<void> {
  const sql = openPostgres(url)
  try {
    await rank('postgres', createRelationalBackend({ postgres: sql }))
  } finally {
    await sql.end()
  }
}

async function rankSqlite(path: string): Promise<void> {
  const db = openSqlite(path)
  try {
    await rank('sqlite', createRelationalBackend({ sqlite: db }))
  } finally {
    db.close()
  }
}

async function rankMongo(): Promise<void> {
  const mongo = CONFIG.mongo
  if (!mongo) return

  const client = openMongo(mongo.uri)
  try {
    const source = fromMongoDb(client.db(mongo.dbName))
    await rank(
      `mongo ${mongo.trackCollection} (flat)`,
      createDocumentBackend({
        source,
        shape: {
          ...DEFAULT_FLAT_SHAPE,
          collection: mongo.trackCollection,
          parents: {
            collection: mongo.artistCollection,
            idField: '_id',
            nameField: 'artist_name',
          },
        },
      }),
    )
    await rank(
      `mongo ${mongo.artistCollection} (nested)`,
      createDocumentBackend({
        source,
        shape: { ...DEFAULT_NESTED_SHAPE, collection: mongo.artistCollection },
      }),
    )
  } finally {
    await client.close()
  }
}

async function main(): Promise<void> {
  console.log('Ranking artists by track count...')

  if (CONFIG.databaseUrl) await rankPostgres(CONFIG.databaseUrl)
  if (CONFIG.sqlitePath) await rankSqlite(CONFIG.sqlitePath)
  await rankMongo()

  if (!CONFIG.databaseUrl && !CONFIG.sqlitePath && !CONFIG.mongo) {
    console.log('No data source configured. Copy .env.example to .env.')
  }
}

main().catch((error: unknown) => {
  console.error('❌ Ranking failed:', error)
  process.exitCode = 1
})
