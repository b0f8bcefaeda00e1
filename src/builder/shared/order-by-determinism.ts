import type { ParentId, RankedParent, TiePolicy } from '../../types'

/**
 * Total order over parent ids: numbers before strings, numbers
 * numerically, strings by UTF-16 code unit.
 */
export function compareParentIds(a: ParentId, b: ParentId): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'number') return -1
  if (typeof b === 'number') return 1
  if (a === b) return 0
  return a < b ? -1 : 1
}

export function compareRanked(a: RankedParent, b: RankedParent): number {
  const byCount = b.totalChildren - a.totalChildren
  if (byCount !== 0) return byCount
  return compareParentIds(a.parentId, b.parentId)
}

/**
 * Expects `sorted` ordered by `compareRanked`. Under `'all'` the cut keeps
 * every entry whose competition rank is within `limit`.
 */
export function selectTop(
  sorted: readonly RankedParent[],
  limit: number,
  ties: TiePolicy,
): RankedParent[] {
  if (sorted.length <= limit) return [...sorted]
  if (ties === 'first') return sorted.slice(0, limit)

  const boundary = sorted[limit - 1].totalChildren
  let end = limit
  while (end < sorted.length && sorted[end].totalChildren === boundary) end++
  return sorted.slice(0, end)
}
