import type {
  FlatDocumentShape,
  NestedDocumentShape,
  RelationalSchema,
  ResolvedRankOptions,
} from '../../types'

export const SQL_SEPARATORS = Object.freeze({
  FIELD_LIST: ', ',
  CLAUSE: ' ',
} as const)

export const SQL_KEYWORDS = new Set([
  'select',
  'from',
  'where',
  'having',
  'order',
  'group',
  'limit',
  'offset',
  'join',
  'inner',
  'left',
  'right',
  'outer',
  'cross',
  'full',
  'and',
  'or',
  'not',
  'by',
  'as',
  'on',
  'union',
  'intersect',
  'except',
  'case',
  'when',
  'then',
  'else',
  'end',
  'user',
  'table',
  'column',
  'index',
  'values',
  'in',
  'like',
  'between',
  'is',
  'exists',
  'null',
  'true',
  'false',
  'all',
  'any',
  'some',
  'with',
  'rank',
  'count',
  'desc',
  'asc',
])

export const REGEX_CACHE = {
  VALID_IDENTIFIER: /^[a-z_][a-z0-9_]*$/,
  SAFE_IDENTIFIER: /^[A-Za-z_]\w*$/,
  DIGITS: /^\d+$/,
} as const

export const LIMITS = Object.freeze({
  MAX_NESTING_DEPTH: 4,
  MAX_RANK_LIMIT: 100000,
  MAX_IDENTIFIER_LENGTH: 63,
})

export const RESULT_FIELDS = Object.freeze({
  PARENT_ID: 'parent_id',
  PARENT_NAME: 'parent_name',
  TOTAL: 'total_children',
  RANK: 'rank_position',
} as const)

export const DEFAULT_RANK_OPTIONS: ResolvedRankOptions = Object.freeze({
  limit: 1,
  ties: 'first',
  emptyParents: 'include',
})

export const DEFAULT_RELATIONAL_SCHEMA: RelationalSchema = Object.freeze({
  parents: { table: 'artists', id: 'artist_id', name: 'artist_name' },
  children: { table: 'tracks', id: 'track_id', parentKey: 'artist_id' },
})

export const DEFAULT_FLAT_SHAPE: FlatDocumentShape = Object.freeze({
  kind: 'flat',
  collection: 'tracks',
  parentField: 'artist',
  idField: 'artist_id',
  nameField: 'artist_name',
  parents: { collection: 'artists', idField: '_id', nameField: 'artist_name' },
})

export const DEFAULT_NESTED_SHAPE: NestedDocumentShape = Object.freeze({
  kind: 'nested',
  collection: 'artists',
  idField: '_id',
  nameField: 'artist_name',
  path: Object.freeze(['albums', 'tracks']),
})
