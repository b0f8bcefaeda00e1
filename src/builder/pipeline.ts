import type { Document } from 'mongodb'
import type {
  DocumentShape,
  FlatDocumentShape,
  NestedDocumentShape,
  ParentCollection,
  ResolvedRankOptions,
} from '../types'
import { LIMITS, RESULT_FIELDS } from './shared/constants'
import { createError } from './shared/errors'
import { isNonEmptyString } from './shared/validators/type-guards'

const GROUP_ID = '_id'
const CONTROL_CHARS = /[\x00-\x1f]/

function assertFieldName(label: string, name: string): void {
  if (!isNonEmptyString(name)) {
    throw createError(`${label} is required and cannot be empty`, {
      field: label,
      backend: 'document',
    })
  }
  if (name.startsWith('$') || name.includes('.') || CONTROL_CHARS.test(name)) {
    throw createError(
      `${label} must be a single field name without '$', '.' or control characters: ${JSON.stringify(name)}`,
      { field: label, value: name, backend: 'document' },
    )
  }
}

function assertCollectionName(label: string, name: string): void {
  if (
    !isNonEmptyString(name) ||
    name.includes('$') ||
    CONTROL_CHARS.test(name)
  ) {
    throw createError(
      `${label} is not a valid collection name: ${JSON.stringify(name)}`,
      { field: label, value: name, backend: 'document' },
    )
  }
}

function fieldRef(...segments: readonly string[]): string {
  return `$${segments.join('.')}`
}

function groupIdentity(idPath: string, namePath: string): Document {
  return {
    [RESULT_FIELDS.PARENT_ID]: idPath,
    [RESULT_FIELDS.PARENT_NAME]: namePath,
  }
}

function rankingStages(options: ResolvedRankOptions): Document[] {
  const sort = {
    $sort: {
      [RESULT_FIELDS.TOTAL]: -1,
      [`${GROUP_ID}.${RESULT_FIELDS.PARENT_ID}`]: 1,
    },
  }

  if (options.ties === 'first') {
    return [sort, { $limit: options.limit }]
  }

  return [
    {
      $setWindowFields: {
        sortBy: { [RESULT_FIELDS.TOTAL]: -1 },
        output: { [RESULT_FIELDS.RANK]: { $rank: {} } },
      },
    },
    { $match: { [RESULT_FIELDS.RANK]: { $lte: options.limit } } },
    sort,
  ]
}

function projectStage(): Document {
  return {
    $project: {
      [GROUP_ID]: 0,
      [RESULT_FIELDS.PARENT_ID]: fieldRef(GROUP_ID, RESULT_FIELDS.PARENT_ID),
      [RESULT_FIELDS.PARENT_NAME]: fieldRef(
        GROUP_ID,
        RESULT_FIELDS.PARENT_NAME,
      ),
      [RESULT_FIELDS.TOTAL]: 1,
    },
  }
}

function emptyParentsUnion(
  parents: ParentCollection,
  options: ResolvedRankOptions,
): Document[] {
  assertCollectionName('parents.collection', parents.collection)
  assertFieldName('parents.idField', parents.idField)
  assertFieldName('parents.nameField', parents.nameField)

  const pipeline: Document[] = []
  if (options.parentName !== undefined) {
    pipeline.push({ $match: { [parents.nameField]: options.parentName } })
  }
  pipeline.push({
    $project: {
      [GROUP_ID]: groupIdentity(
        fieldRef(parents.idField),
        fieldRef(parents.nameField),
      ),
      [RESULT_FIELDS.TOTAL]: { $literal: 0 },
    },
  })

  return [
    { $unionWith: { coll: parents.collection, pipeline } },
    {
      $group: {
        [GROUP_ID]: fieldRef(GROUP_ID),
        [RESULT_FIELDS.TOTAL]: { $sum: fieldRef(RESULT_FIELDS.TOTAL) },
      },
    },
  ]
}

function buildFlatPipeline(
  shape: FlatDocumentShape,
  options: ResolvedRankOptions,
): Document[] {
  assertFieldName('parentField', shape.parentField)
  assertFieldName('idField', shape.idField)
  assertFieldName('nameField', shape.nameField)

  if (options.emptyParents === 'include' && !shape.parents) {
    throw createError(
      "Flat document shape needs a parents collection to report parents without children; set shape.parents or use emptyParents: 'exclude'",
      { backend: 'document', field: 'emptyParents' },
    )
  }

  const namePath = `${shape.parentField}.${shape.nameField}`
  const stages: Document[] = []

  if (options.parentName !== undefined) {
    stages.push({ $match: { [namePath]: options.parentName } })
  }

  stages.push({
    $group: {
      [GROUP_ID]: groupIdentity(
        fieldRef(shape.parentField, shape.idField),
        fieldRef(shape.parentField, shape.nameField),
      ),
      [RESULT_FIELDS.TOTAL]: { $sum: 1 },
    },
  })

  if (options.emptyParents === 'include' && shape.parents) {
    stages.push(...emptyParentsUnion(shape.parents, options))
  }

  return [...stages, ...rankingStages(options), projectStage()]
}

function buildNestedPipeline(
  shape: NestedDocumentShape,
  options: ResolvedRankOptions,
): Document[] {
  assertFieldName('idField', shape.idField)
  assertFieldName('nameField', shape.nameField)

  if (shape.path.length === 0 || shape.path.length > LIMITS.MAX_NESTING_DEPTH) {
    throw createError(
      `Nested path must have 1..${LIMITS.MAX_NESTING_DEPTH} segments, got ${shape.path.length}`,
      { backend: 'document', path: shape.path },
    )
  }
  shape.path.forEach((segment, i) => assertFieldName(`path[${i}]`, segment))

  const include = options.emptyParents === 'include'
  const stages: Document[] = []

  if (options.parentName !== undefined) {
    stages.push({ $match: { [shape.nameField]: options.parentName } })
  }

  for (let depth = 1; depth <= shape.path.length; depth++) {
    const path = fieldRef(...shape.path.slice(0, depth))
    stages.push({
      $unwind: include ? { path, preserveNullAndEmptyArrays: true } : path,
    })
  }

  const leaf = fieldRef(...shape.path)
  // $unwind emits null array elements; they are not children
  if (!include) {
    stages.push({ $match: { [shape.path.join('.')]: { $ne: null } } })
  }
  stages.push({
    $group: {
      [GROUP_ID]: groupIdentity(
        fieldRef(shape.idField),
        fieldRef(shape.nameField),
      ),
      [RESULT_FIELDS.TOTAL]: include
        ? { $sum: { $cond: [{ $ifNull: [leaf, false] }, 1, 0] } }
        : { $sum: 1 },
    },
  })

  return [...stages, ...rankingStages(options), projectStage()]
}

/**
 * Builds the aggregation pipeline for a document shape. Output documents
 * carry `parent_id`, `parent_name` and `total_children`, matching the SQL
 * column aliases.
 */
export function buildRankPipeline(
  shape: DocumentShape,
  options: ResolvedRankOptions,
): Document[] {
  assertCollectionName('collection', shape.collection)
  return shape.kind === 'flat'
    ? buildFlatPipeline(shape, options)
    : buildNestedPipeline(shape, options)
}
