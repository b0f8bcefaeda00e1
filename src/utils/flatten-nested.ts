import type {
  ChildRecord,
  NestedDocumentShape,
  ParentEntity,
  ParentId,
} from '../types'
import { DEFAULT_NESTED_SHAPE, LIMITS } from '../builder/shared/constants'
import { createError } from '../builder/shared/errors'
import {
  isNotNullish,
  isParentId,
  isPlainObject,
} from '../builder/shared/validators/type-guards'

export interface FlattenedRelation {
  parents: ParentEntity[]
  children: ChildRecord[]
}

interface FrontierEntry {
  readonly parentId: ParentId
  readonly node: Record<string, unknown>
}

function hasHexString(value: unknown): value is { toHexString(): string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toHexString' in value &&
    typeof value.toHexString === 'function'
  )
}

function toParentId(value: unknown, index: number, field: string): ParentId {
  if (isParentId(value)) return value
  if (hasHexString(value)) return value.toHexString()
  throw createError(`Document ${index} has no usable ${field}`, {
    field,
    backend: 'memory',
  })
}

function readParent(
  doc: unknown,
  index: number,
  shape: NestedDocumentShape,
): FrontierEntry & { name: string } {
  if (!isPlainObject(doc)) {
    throw createError(`Document ${index} is not an object`, {
      backend: 'memory',
    })
  }

  const name = doc[shape.nameField]
  if (typeof name !== 'string') {
    throw createError(`Document ${index} has no usable ${shape.nameField}`, {
      field: shape.nameField,
      backend: 'memory',
    })
  }

  const parentId = toParentId(doc[shape.idField], index, shape.idField)
  return { parentId, name, node: doc }
}

function expandLevel(
  frontier: readonly FrontierEntry[],
  path: readonly string[],
  depth: number,
  onLeaf: (parentId: ParentId) => void,
): FrontierEntry[] {
  const segment = path[depth]
  const isLeafLevel = depth === path.length - 1
  const next: FrontierEntry[] = []

  for (const entry of frontier) {
    const value = entry.node[segment]
    if (!isNotNullish(value)) continue

    if (!Array.isArray(value)) {
      throw createError('Expected an array while flattening', {
        path: path.slice(0, depth + 1),
        backend: 'memory',
      })
    }

    for (const element of value) {
      if (!isNotNullish(element)) continue
      if (isLeafLevel) {
        onLeaf(entry.parentId)
        continue
      }
      if (!isPlainObject(element)) {
        throw createError('Expected an embedded document while flattening', {
          path: path.slice(0, depth + 1),
          backend: 'memory',
        })
      }
      next.push({ parentId: entry.parentId, node: element })
    }
  }

  return next
}

/**
 * Flattens parent documents with nested child arrays (e.g. artist → albums
 * → tracks) into parents plus one child record per leaf. Works level by
 * level over a frontier of (parent, node) pairs, so depth is bounded by
 * the path length.
 */
export function flattenNested(
  documents: readonly unknown[],
  shape: NestedDocumentShape = DEFAULT_NESTED_SHAPE,
): FlattenedRelation {
  const { path } = shape
  if (path.length === 0 || path.length > LIMITS.MAX_NESTING_DEPTH) {
    throw createError(
      `Nested path must have 1..${LIMITS.MAX_NESTING_DEPTH} segments, got ${path.length}`,
      { path, backend: 'memory' },
    )
  }

  const parents: ParentEntity[] = []
  let frontier: FrontierEntry[] = documents.map((doc, i) => {
    const entry = readParent(doc, i, shape)
    parents.push({ id: entry.parentId, name: entry.name })
    return { parentId: entry.parentId, node: entry.node }
  })

  const children: ChildRecord[] = []
  for (let depth = 0; depth < path.length; depth++) {
    frontier = expandLevel(frontier, path, depth, (parentId) =>
      children.push({ parentId }),
    )
  }

  return { parents, children }
}
