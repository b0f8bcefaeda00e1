import type {
  RelationalSchema,
  ResolvedRankOptions,
  SqlResult,
} from '../types'
import {
  countColumn,
  rankOver,
  type SqlDialect,
} from '../sql-builder-dialect'
import { RESULT_FIELDS, SQL_SEPARATORS } from './shared/constants'
import { createParamStore, type ParamStore } from './shared/param-store'
import {
  assertSafeIdentifier,
  col,
  quote,
  tableReference,
} from './shared/sql-utils'
import {
  validateParamConsistency,
  validateSelectQuery,
} from './shared/validators/sql-validators'

const PARENT_ALIAS = 'p'
const THROUGH_ALIAS = 't'
const CHILD_ALIAS = 'c'
const RANKED_CTE = 'ranked'

interface RankQueryParts {
  readonly columns: readonly string[]
  readonly countExpr: string
  readonly from: string
  readonly where: string
  readonly groupBy: string
}

function assertSchema(schema: RelationalSchema): void {
  assertSafeIdentifier('parents.id', schema.parents.id)
  assertSafeIdentifier('parents.name', schema.parents.name)
  assertSafeIdentifier('children.id', schema.children.id)
  assertSafeIdentifier('children.parentKey', schema.children.parentKey)
  if (schema.through) {
    assertSafeIdentifier('through.id', schema.through.id)
    assertSafeIdentifier('through.parentKey', schema.through.parentKey)
  }
}

function buildFrom(
  schema: RelationalSchema,
  options: ResolvedRankOptions,
): string {
  const join = options.emptyParents === 'include' ? 'LEFT JOIN' : 'JOIN'
  const parents = tableReference('parents.table', schema.parents.table)
  const children = tableReference('children.table', schema.children.table)
  const parentId = col(PARENT_ALIAS, schema.parents.id)

  if (!schema.through) {
    return [
      `FROM ${parents} AS ${PARENT_ALIAS}`,
      `${join} ${children} AS ${CHILD_ALIAS}`,
      `ON ${col(CHILD_ALIAS, schema.children.parentKey)} = ${parentId}`,
    ].join(SQL_SEPARATORS.CLAUSE)
  }

  const through = tableReference('through.table', schema.through.table)
  return [
    `FROM ${parents} AS ${PARENT_ALIAS}`,
    `${join} ${through} AS ${THROUGH_ALIAS}`,
    `ON ${col(THROUGH_ALIAS, schema.through.parentKey)} = ${parentId}`,
    `${join} ${children} AS ${CHILD_ALIAS}`,
    `ON ${col(CHILD_ALIAS, schema.children.parentKey)} = ${col(THROUGH_ALIAS, schema.through.id)}`,
  ].join(SQL_SEPARATORS.CLAUSE)
}

function buildParts(
  schema: RelationalSchema,
  options: ResolvedRankOptions,
  params: ParamStore,
): RankQueryParts {
  const parentId = col(PARENT_ALIAS, schema.parents.id)
  const parentName = col(PARENT_ALIAS, schema.parents.name)
  const countExpr = countColumn(col(CHILD_ALIAS, schema.children.id))

  const where =
    options.parentName !== undefined
      ? `WHERE ${parentName} = ${params.add(options.parentName)}`
      : ''

  return {
    columns: [
      `${parentId} AS ${quote(RESULT_FIELDS.PARENT_ID)}`,
      `${parentName} AS ${quote(RESULT_FIELDS.PARENT_NAME)}`,
      `${countExpr} AS ${quote(RESULT_FIELDS.TOTAL)}`,
    ],
    countExpr,
    from: buildFrom(schema, options),
    where,
    groupBy: `GROUP BY ${parentId}, ${parentName}`,
  }
}

function orderByClause(): string {
  return `ORDER BY ${quote(RESULT_FIELDS.TOTAL)} DESC, ${quote(RESULT_FIELDS.PARENT_ID)} ASC`
}

function joinClauses(clauses: readonly string[]): string {
  return clauses.filter((c) => c.length > 0).join(SQL_SEPARATORS.CLAUSE)
}

function buildFirstQuery(
  parts: RankQueryParts,
  params: ParamStore,
  limit: number,
): string {
  return joinClauses([
    `SELECT ${parts.columns.join(SQL_SEPARATORS.FIELD_LIST)}`,
    parts.from,
    parts.where,
    parts.groupBy,
    orderByClause(),
    `LIMIT ${params.add(limit)}`,
  ])
}

function buildAllQuery(
  parts: RankQueryParts,
  params: ParamStore,
  limit: number,
): string {
  const rankColumn = `${rankOver(parts.countExpr)} AS ${quote(RESULT_FIELDS.RANK)}`
  const inner = joinClauses([
    `SELECT ${[...parts.columns, rankColumn].join(SQL_SEPARATORS.FIELD_LIST)}`,
    parts.from,
    parts.where,
    parts.groupBy,
  ])
  const outputColumns = [
    RESULT_FIELDS.PARENT_ID,
    RESULT_FIELDS.PARENT_NAME,
    RESULT_FIELDS.TOTAL,
  ].map(quote)

  return joinClauses([
    `WITH ${RANKED_CTE} AS (${inner})`,
    `SELECT ${outputColumns.join(SQL_SEPARATORS.FIELD_LIST)}`,
    `FROM ${RANKED_CTE}`,
    `WHERE ${quote(RESULT_FIELDS.RANK)} <= ${params.add(limit)}`,
    orderByClause(),
  ])
}

/**
 * Builds the grouped count query: parent table joined to its children
 * (optionally through an intermediate table), counted per parent, ordered
 * by count descending then parent id ascending.
 */
export function buildRankSQL(
  schema: RelationalSchema,
  options: ResolvedRankOptions,
  dialect: SqlDialect,
): SqlResult {
  assertSchema(schema)

  const params = createParamStore(dialect)
  const parts = buildParts(schema, options, params)

  const sql =
    options.ties === 'all'
      ? buildAllQuery(parts, params, options.limit)
      : buildFirstQuery(parts, params, options.limit)

  const { params: values } = params.snapshot()
  const out = [...values]

  validateSelectQuery(sql)
  validateParamConsistency(sql, out, dialect)

  return { sql, params: out }
}
