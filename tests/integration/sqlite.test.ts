// tests/integration/sqlite.test.ts
import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import type Database from 'better-sqlite3'
import {
  ConnectionError,
  createRanker,
  createRelationalBackend,
  rankByChildCount,
  type RankOptions,
  type RelationalSchema,
} from '../../src'
import { createSqliteDB, type SqliteRows } from '../helpers/db'
import { generateLibrary, toRelationalRows } from '../fixtures/seed'

const ALBUM_SCHEMA: RelationalSchema = {
  parents: { table: 'artists', id: 'artist_id', name: 'artist_name' },
  through: { table: 'albums', id: 'album_id', parentKey: 'artist_id' },
  children: { table: 'tracks', id: 'track_id', parentKey: 'album_id' },
}

const SMALL_LIBRARY: SqliteRows = {
  artists: [
    { artist_id: 1, artist_name: 'Ada' },
    { artist_id: 2, artist_name: 'Ben' },
    { artist_id: 3, artist_name: 'Cy' },
    { artist_id: 4, artist_name: 'Dee' },
  ],
  albums: [
    { album_id: 10, artist_id: 1, album_name: 'First' },
    { album_id: 20, artist_id: 2, album_name: 'Second' },
    { album_id: 21, artist_id: 2, album_name: 'Third' },
    { album_id: 30, artist_id: 3, album_name: 'Fourth' },
  ],
  tracks: [
    { track_id: 100, artist_id: 1, album_id: 10 },
    { track_id: 101, artist_id: 1, album_id: 10 },
    { track_id: 200, artist_id: 2, album_id: 20 },
    { track_id: 201, artist_id: 2, album_id: 21 },
    { track_id: 300, artist_id: 3, album_id: 30 },
  ],
}

describe('sqlite backend', () => {
  let db: Database.Database

  beforeAll(() => {
    db = createSqliteDB(SMALL_LIBRARY, 'INTEGER')
  })

  afterAll(() => {
    db.close()
  })

  function rank(options?: RankOptions, schema?: RelationalSchema) {
    return createRanker({
      backend: createRelationalBackend({ sqlite: db, schema }),
    }).topByChildCount(options)
  }

  it('should return the artist with the most tracks', async () => {
    await expect(rank()).resolves.toEqual([
      { parentId: 1, parentName: 'Ada', totalChildren: 2 },
    ])
  })

  it('should break the tie between Ada and Ben by id', async () => {
    await expect(rank({ limit: 2 })).resolves.toEqual([
      { parentId: 1, parentName: 'Ada', totalChildren: 2 },
      { parentId: 2, parentName: 'Ben', totalChildren: 2 },
    ])
  })

  it('should include artists without tracks by default', async () => {
    await expect(rank({ limit: 10 })).resolves.toEqual([
      { parentId: 1, parentName: 'Ada', totalChildren: 2 },
      { parentId: 2, parentName: 'Ben', totalChildren: 2 },
      { parentId: 3, parentName: 'Cy', totalChildren: 1 },
      { parentId: 4, parentName: 'Dee', totalChildren: 0 },
    ])
  })

  it('should drop artists without tracks when excluded', async () => {
    const results = await rank({ limit: 10, emptyParents: 'exclude' })

    expect(results.map((r) => r.parentId)).toEqual([1, 2, 3])
  })

  it('should keep the whole tie block under the all policy', async () => {
    await expect(rank({ limit: 1, ties: 'all' })).resolves.toEqual([
      { parentId: 1, parentName: 'Ada', totalChildren: 2 },
      { parentId: 2, parentName: 'Ben', totalChildren: 2 },
    ])
  })

  it('should return identical results for repeated queries', async () => {
    const first = await rank({ limit: 10, ties: 'all' })
    const second = await rank({ limit: 10, ties: 'all' })

    expect(second).toEqual(first)
  })

  it('should filter by artist name', async () => {
    await expect(rank({ parentName: 'Cy' })).resolves.toEqual([
      { parentId: 3, parentName: 'Cy', totalChildren: 1 },
    ])
  })

  it('should return nothing for an unknown artist name', async () => {
    await expect(rank({ parentName: 'Nobody' })).resolves.toEqual([])
  })

  it('should count tracks through albums', async () => {
    await expect(rank({ limit: 4 }, ALBUM_SCHEMA)).resolves.toEqual([
      { parentId: 1, parentName: 'Ada', totalChildren: 2 },
      { parentId: 2, parentName: 'Ben', totalChildren: 2 },
      { parentId: 3, parentName: 'Cy', totalChildren: 1 },
      { parentId: 4, parentName: 'Dee', totalChildren: 0 },
    ])
  })

  it('should surface query errors without wrapping them', async () => {
    const schema: RelationalSchema = {
      parents: { table: 'artists', id: 'artist_id', name: 'artist_name' },
      children: { table: 'missing_tracks', id: 'track_id', parentKey: 'artist_id' },
    }

    const error = await rank({}, schema).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(Error)
    expect(error).not.toBeInstanceOf(ConnectionError)
  })
})

describe('sqlite backend with mixed-case text ids', () => {
  const rows: SqliteRows = {
    artists: [
      { artist_id: 'beta', artist_name: 'Beta' },
      { artist_id: 'Zed', artist_name: 'Zed' },
      { artist_id: 'alpha', artist_name: 'Alpha' },
    ],
    tracks: [
      { track_id: 't1', artist_id: 'beta' },
      { track_id: 't2', artist_id: 'Zed' },
      { track_id: 't3', artist_id: 'alpha' },
    ],
  }
  let db: Database.Database

  beforeAll(() => {
    db = createSqliteDB(rows)
  })

  afterAll(() => {
    db.close()
  })

  it('should order tied text ids by code unit like the in-memory ranking', async () => {
    const backend = createRelationalBackend({ sqlite: db })
    const fromDb = await createRanker({ backend }).topByChildCount({ limit: 3 })

    expect(fromDb.map((r) => r.parentId)).toEqual(['Zed', 'alpha', 'beta'])
    expect(fromDb).toEqual(
      rankByChildCount(
        rows.artists.map((a) => ({ id: a.artist_id, name: a.artist_name })),
        rows.tracks.map((t) => ({ parentId: t.artist_id })),
        { limit: 3 },
      ),
    )
  })
})

describe('sqlite backend on a generated library', () => {
  const library = generateLibrary()
  const rows = toRelationalRows(library)
  let db: Database.Database

  beforeAll(() => {
    db = createSqliteDB(rows)
  })

  afterAll(() => {
    db.close()
  })

  const parents = rows.artists.map((a) => ({
    id: a.artist_id,
    name: a.artist_name,
  }))
  const children = rows.tracks.map((t) => ({ parentId: t.artist_id }))

  const cases: RankOptions[] = [
    {},
    { limit: 5 },
    { limit: 3, ties: 'all' },
    { limit: 12, emptyParents: 'exclude' },
    { limit: 4, ties: 'all', emptyParents: 'exclude' },
  ]

  for (const options of cases) {
    it(`should match the in-memory ranking for ${JSON.stringify(options)}`, async () => {
      const backend = createRelationalBackend({ sqlite: db })
      const fromDb = await createRanker({ backend }).topByChildCount(options)

      expect(fromDb).toEqual(rankByChildCount(parents, children, options))
    })
  }

  it('should match the in-memory ranking when counting through albums', async () => {
    const backend = createRelationalBackend({ sqlite: db, schema: ALBUM_SCHEMA })
    const fromDb = await createRanker({ backend }).topByChildCount({ limit: 12 })

    expect(fromDb).toEqual(rankByChildCount(parents, children, { limit: 12 }))
  })
})
