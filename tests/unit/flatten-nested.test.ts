// tests/unit/flatten-nested.test.ts
import { describe, it, expect } from 'vitest'
import { ObjectId } from 'mongodb'
import { flattenNested } from '../../src/utils/flatten-nested'
import { rankByChildCount } from '../../src/aggregator'
import { generateLibrary, countTracks } from '../fixtures/seed'
import type { NestedDocumentShape } from '../../src/types'

const bryan = {
  _id: 'artist-bb',
  artist_name: 'Bryan Baker',
  albums: [
    { album_name: 'North', tracks: [{ title: 'a' }, { title: 'b' }, { title: 'c' }] },
    { album_name: 'South', tracks: [{ title: 'd' }] },
  ],
}

describe('flattenNested', () => {
  it('should emit one child record per leaf track', () => {
    const { parents, children } = flattenNested([bryan])

    expect(parents).toEqual([{ id: 'artist-bb', name: 'Bryan Baker' }])
    expect(children).toHaveLength(4)
    expect(children.every((c) => c.parentId === 'artist-bb')).toBe(true)
  })

  it('should feed the aggregator to rank nested documents', () => {
    const quiet = { _id: 'artist-q', artist_name: 'Quiet One', albums: [] }
    const { parents, children } = flattenNested([quiet, bryan])

    expect(rankByChildCount(parents, children)).toEqual([
      { parentId: 'artist-bb', parentName: 'Bryan Baker', totalChildren: 4 },
    ])
  })

  it('should keep parents that have no albums at all', () => {
    const { parents, children } = flattenNested([
      { _id: 1, artist_name: 'No Albums' },
      { _id: 2, artist_name: 'Null Albums', albums: null },
      { _id: 3, artist_name: 'Empty Album', albums: [{ tracks: [] }] },
    ])

    expect(parents.map((p) => p.id)).toEqual([1, 2, 3])
    expect(children).toEqual([])
  })

  it('should skip null albums and null tracks', () => {
    const { children } = flattenNested([
      {
        _id: 'x',
        artist_name: 'Gappy',
        albums: [null, { tracks: [null, { title: 't' }] }, { tracks: null }],
      },
    ])

    expect(children).toEqual([{ parentId: 'x' }])
  })

  it('should convert ObjectId parent ids to hex strings', () => {
    const id = new ObjectId('65a1b2c3d4e5f60718293a4b')

    const { parents } = flattenNested([
      { _id: id, artist_name: 'Hex', albums: [] },
    ])

    expect(parents).toEqual([{ id: '65a1b2c3d4e5f60718293a4b', name: 'Hex' }])
  })

  it('should follow a custom single-level path', () => {
    const shape: NestedDocumentShape = {
      kind: 'nested',
      collection: 'playlists',
      idField: 'slug',
      nameField: 'title',
      path: ['entries'],
    }

    const { children } = flattenNested(
      [{ slug: 'road-trip', title: 'Road Trip', entries: ['a', 'b'] }],
      shape,
    )

    expect(children).toEqual([
      { parentId: 'road-trip' },
      { parentId: 'road-trip' },
    ])
  })

  it('should count every track of a generated library', () => {
    const library = generateLibrary(6)

    const { parents, children } = flattenNested(library)

    expect(parents).toHaveLength(6)
    expect(children).toHaveLength(countTracks(library))
  })

  describe('malformed documents', () => {
    it('should reject a non-array level', () => {
      expect(() =>
        flattenNested([{ _id: 1, artist_name: 'A', albums: { tracks: [] } }]),
      ).toThrow(/Expected an array while flattening\nPath: albums/)
    })

    it('should reject a scalar where an embedded document is expected', () => {
      expect(() =>
        flattenNested([{ _id: 1, artist_name: 'A', albums: ['loose'] }]),
      ).toThrow(/Expected an embedded document while flattening/)
    })

    it('should reject a document without a name', () => {
      expect(() => flattenNested([{ _id: 1, albums: [] }])).toThrow(
        /Document 0 has no usable artist_name/,
      )
    })

    it('should reject a document without an id', () => {
      expect(() =>
        flattenNested([
          { _id: 1, artist_name: 'A' },
          { artist_name: 'B' },
        ]),
      ).toThrow(/Document 1 has no usable _id/)
    })

    it('should reject a value that is not a document', () => {
      expect(() => flattenNested(['artist'])).toThrow(
        /Document 0 is not an object/,
      )
    })
  })
})
