import type { BackendKind, RankedParent } from './types'
import { RESULT_FIELDS } from './builder/shared/constants'
import { createError } from './builder/shared/errors'
import { parseCount } from './builder/shared/int-like'
import {
  isParentId,
  isPlainObject,
} from './builder/shared/validators/type-guards'

function transformRankRow(
  row: unknown,
  index: number,
  backend: BackendKind,
): RankedParent {
  if (!isPlainObject(row)) {
    throw createError(`Result row ${index} is not an object`, { backend })
  }

  const parentId = row[RESULT_FIELDS.PARENT_ID]
  if (!isParentId(parentId)) {
    throw createError(
      `Result row ${index} has no usable ${RESULT_FIELDS.PARENT_ID}: ${String(parentId)}`,
      { backend, field: RESULT_FIELDS.PARENT_ID, value: parentId },
    )
  }

  const parentName = row[RESULT_FIELDS.PARENT_NAME]
  if (typeof parentName !== 'string') {
    throw createError(
      `Result row ${index} has no usable ${RESULT_FIELDS.PARENT_NAME}`,
      { backend, field: RESULT_FIELDS.PARENT_NAME, value: parentName },
    )
  }

  const totalChildren = parseCount(row[RESULT_FIELDS.TOTAL])
  if (totalChildren === undefined) {
    throw createError(
      `Result row ${index} has an invalid ${RESULT_FIELDS.TOTAL}`,
      { backend, field: RESULT_FIELDS.TOTAL, value: row[RESULT_FIELDS.TOTAL] },
    )
  }

  return { parentId, parentName, totalChildren }
}

export function transformRankRows(
  rows: readonly unknown[],
  backend: BackendKind,
): RankedParent[] {
  return rows.map((row, i) => transformRankRow(row, i, backend))
}
