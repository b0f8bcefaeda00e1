import type {
  EmptyParentPolicy,
  RankOptions,
  ResolvedRankOptions,
  TiePolicy,
} from '../../types'
import { DEFAULT_RANK_OPTIONS, LIMITS } from './constants'
import { createError } from './errors'
import { normalizeIntLike } from './int-like'
import { isNonEmptyString, isNotNullish } from './validators/type-guards'

const TIE_POLICIES: ReadonlySet<string> = new Set<TiePolicy>(['first', 'all'])
const EMPTY_PARENT_POLICIES: ReadonlySet<string> = new Set<EmptyParentPolicy>(
  ['include', 'exclude'],
)

function isTiePolicy(v: unknown): v is TiePolicy {
  return typeof v === 'string' && TIE_POLICIES.has(v)
}

function isEmptyParentPolicy(v: unknown): v is EmptyParentPolicy {
  return typeof v === 'string' && EMPTY_PARENT_POLICIES.has(v)
}

export function resolveRankOptions(
  options: RankOptions = {},
): ResolvedRankOptions {
  const limit =
    normalizeIntLike('limit', options.limit, {
      min: 1,
      max: LIMITS.MAX_RANK_LIMIT,
    }) ?? DEFAULT_RANK_OPTIONS.limit

  const ties = options.ties ?? DEFAULT_RANK_OPTIONS.ties
  if (!isTiePolicy(ties)) {
    throw createError(`ties must be 'first' or 'all'. Got: ${String(ties)}`, {
      field: 'ties',
      value: ties,
    })
  }

  const emptyParents = options.emptyParents ?? DEFAULT_RANK_OPTIONS.emptyParents
  if (!isEmptyParentPolicy(emptyParents)) {
    throw createError(
      `emptyParents must be 'include' or 'exclude'. Got: ${String(emptyParents)}`,
      { field: 'emptyParents', value: emptyParents },
    )
  }

  if (!isNotNullish(options.parentName)) {
    return { limit, ties, emptyParents }
  }

  if (!isNonEmptyString(options.parentName)) {
    throw createError('parentName must be a non-empty string', {
      field: 'parentName',
      value: options.parentName,
    })
  }

  return { limit, ties, emptyParents, parentName: options.parentName }
}
