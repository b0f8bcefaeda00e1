import type {
  ChildRecord,
  ParentEntity,
  ParentId,
  RankedParent,
  RankOptions,
  ReferencePolicy,
} from './types'
import { createError } from './builder/shared/errors'
import {
  compareRanked,
  selectTop,
} from './builder/shared/order-by-determinism'
import { resolveRankOptions } from './builder/shared/rank-options'
import { isParentId } from './builder/shared/validators/type-guards'

export type ChildRelation =
  | readonly ChildRecord[]
  | ((parent: ParentEntity) => Iterable<unknown>)

export interface AggregateOptions extends RankOptions {
  references?: ReferencePolicy
  onDanglingReference?: (child: ChildRecord) => void
}

function warnDangling(child: ChildRecord): void {
  console.warn(
    `[memory] skipped child referencing unknown parent ${JSON.stringify(child.parentId)}`,
  )
}

function indexParents(parents: readonly ParentEntity[]): Map<ParentId, number> {
  const counts = new Map<ParentId, number>()
  for (const parent of parents) {
    if (!isParentId(parent.id)) {
      throw createError(`Invalid parent id: ${String(parent.id)}`, {
        field: 'id',
        value: parent.id,
      })
    }
    if (counts.has(parent.id)) {
      throw createError(`Duplicate parent id: ${JSON.stringify(parent.id)}`, {
        field: 'id',
        value: parent.id,
      })
    }
    counts.set(parent.id, 0)
  }
  return counts
}

function countIterable(items: Iterable<unknown>): number {
  let n = 0
  for (const _ of items) n++
  return n
}

function countChildren(
  parents: readonly ParentEntity[],
  children: ChildRelation,
  references: ReferencePolicy,
  onDangling: (child: ChildRecord) => void,
): Map<ParentId, number> {
  const counts = indexParents(parents)

  if (typeof children === 'function') {
    for (const parent of parents) {
      counts.set(parent.id, countIterable(children(parent)))
    }
    return counts
  }

  for (const child of children) {
    const current = counts.get(child.parentId)
    if (current !== undefined) {
      counts.set(child.parentId, current + 1)
      continue
    }

    if (references === 'strict') {
      throw createError(
        `Child references unknown parent ${JSON.stringify(child.parentId)}`,
        { field: 'parentId', value: child.parentId, backend: 'memory' },
      )
    }
    onDangling(child)
  }

  return counts
}

/**
 * Counts children per parent and returns the top entries, ordered by count
 * descending then parent id ascending.
 */
export function rankByChildCount(
  parents: readonly ParentEntity[],
  children: ChildRelation,
  options: AggregateOptions = {},
): RankedParent[] {
  const resolved = resolveRankOptions(options)
  const references = options.references ?? 'strict'
  if (references !== 'strict' && references !== 'lenient') {
    throw createError(
      `references must be 'strict' or 'lenient'. Got: ${String(references)}`,
      { field: 'references', value: references },
    )
  }

  const counts = countChildren(
    parents,
    children,
    references,
    options.onDanglingReference ?? warnDangling,
  )

  const ranked: RankedParent[] = []
  for (const parent of parents) {
    if (
      resolved.parentName !== undefined &&
      parent.name !== resolved.parentName
    ) {
      continue
    }

    const totalChildren = counts.get(parent.id) ?? 0
    if (resolved.emptyParents === 'exclude' && totalChildren === 0) continue

    ranked.push({ parentId: parent.id, parentName: parent.name, totalChildren })
  }

  ranked.sort(compareRanked)
  return selectTop(ranked, resolved.limit, resolved.ties)
}
