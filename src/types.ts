import type { SqlDialect } from './sql-builder-dialect'

export type ParentId = string | number

export interface ParentEntity {
  readonly id: ParentId
  readonly name: string
}

export interface ChildRecord {
  readonly parentId: ParentId
}

export interface RankedParent {
  parentId: ParentId
  parentName: string
  totalChildren: number
}

export type TiePolicy = 'first' | 'all'

export type EmptyParentPolicy = 'include' | 'exclude'

export type ReferencePolicy = 'strict' | 'lenient'

export interface RankOptions {
  limit?: number
  ties?: TiePolicy
  emptyParents?: EmptyParentPolicy
  parentName?: string
}

export interface ResolvedRankOptions {
  readonly limit: number
  readonly ties: TiePolicy
  readonly emptyParents: EmptyParentPolicy
  readonly parentName?: string
}

export type BackendKind = SqlDialect | 'document' | 'memory'

export interface PreparedRank {
  readonly backend: BackendKind
  readonly query: string
  readonly params: readonly unknown[]
  execute(): Promise<RankedParent[]>
}

export interface RankBackend {
  readonly kind: BackendKind
  prepare(options: ResolvedRankOptions): PreparedRank
}

export interface QueryInfo {
  backend: BackendKind
  query: string
  params: readonly unknown[]
  rows: number
  duration: number
}

export interface RelationalTable {
  table: string
  id: string
}

export interface RelationalSchema {
  parents: RelationalTable & { name: string }
  children: RelationalTable & { parentKey: string }
  through?: RelationalTable & { parentKey: string }
}

export interface ParentCollection {
  collection: string
  idField: string
  nameField: string
}

export interface FlatDocumentShape {
  kind: 'flat'
  collection: string
  parentField: string
  idField: string
  nameField: string
  parents?: ParentCollection
}

export interface NestedDocumentShape {
  kind: 'nested'
  collection: string
  idField: string
  nameField: string
  path: readonly string[]
}

export type DocumentShape = FlatDocumentShape | NestedDocumentShape

export interface SqlResult {
  sql: string
  params: unknown[]
}
